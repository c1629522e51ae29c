const EXTERNAL_RE = /^(?:[a-z][a-z0-9+.-]*:|\/\/)/i;

/** True for references that leave the site: `https:`, `mailto:`, `data:`, `//host` */
export function isExternalUrl(ref: string): boolean {
  return EXTERNAL_RE.test(ref);
}

/** Path part of a normalized baseURL, always starting and ending with "/" */
export function basePathOf(baseURL: string): string {
  if (baseURL.startsWith("/")) {
    return baseURL;
  }
  return new URL(baseURL).pathname;
}

/** Site-relative path for a root path, honoring the base path */
export function relUrl(baseURL: string, path: string): string {
  if (isExternalUrl(path)) return path;
  return basePathOf(baseURL) + path.replace(/^\/+/, "");
}

/** Absolute URL for a root path; falls back to relUrl when baseURL has no host */
export function absUrl(baseURL: string, path: string): string {
  if (isExternalUrl(path)) return path;
  if (baseURL.startsWith("/")) return relUrl(baseURL, path);
  return new URL(path.replace(/^\/+/, ""), baseURL).href;
}

/** Prefix root-relative href/src attributes when the site lives below "/" */
export function prefixRootUrls(html: string, baseURL: string): string {
  const basePath = basePathOf(baseURL);
  if (basePath === "/") return html;
  return html.replace(/\b(href|src)="\/(?!\/)/g, `$1="${basePath}`);
}
