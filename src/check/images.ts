import { stat } from "fs/promises";
import { relative, resolve, sep } from "path";
import { sitePath, type ResolvedSiteConfig } from "../config";
import { maskCode } from "../content/math";
import type { Post } from "../content/model";
import { isExternalUrl } from "../urls";
import type { Diagnostic } from "./diagnostic";

export interface ImageRef {
  ref: string;
  /** 1-based line within the Markdown body; absent for front-matter images */
  line?: number;
  source: "markdown" | "html" | "front-matter";
}

const MARKDOWN_IMAGE_RE = /!\[[^\]]*\]\(\s*<?([^)\s>]+)>?(?:\s+(?:"[^"]*"|'[^']*'|\([^)]*\)))?\s*\)/g;
const REFERENCE_IMAGE_RE = /!\[([^\]]*)\](?:\[([^\]]*)\]|(?![(\[]))/g;
const LINK_DEFINITION_RE = /^ {0,3}\[([^\]]+)\]:[ \t]*<?([^\s>]+)>?/gm;
const HTML_IMAGE_RE = /<img\b[^>]*?\bsrc\s*=\s*(?:"([^"]*)"|'([^']*)')/gi;

function normalizeLabel(label: string): string {
  return label.trim().replace(/\s+/g, " ").toLowerCase();
}

/** Link reference definitions (`[label]: /path`); the first definition of a label wins */
function linkDefinitions(text: string): Map<string, string> {
  const definitions = new Map<string, string>();
  for (const match of text.matchAll(LINK_DEFINITION_RE)) {
    const [, label, ref] = match;
    if (label && ref && !definitions.has(normalizeLabel(label))) {
      definitions.set(normalizeLabel(label), ref);
    }
  }
  return definitions;
}

function lineAt(text: string, offset: number): number {
  let line = 1;
  for (let i = 0; i < offset; i++) {
    if (text[i] === "\n") line++;
  }
  return line;
}

/** Image references in the body (outside code) and in front-matter `images` */
export function extractImageRefs(post: Pick<Post, "markdown" | "frontMatter">): ImageRef[] {
  const text = maskCode(post.markdown);
  const refs: ImageRef[] = [];

  for (const match of text.matchAll(MARKDOWN_IMAGE_RE)) {
    const ref = match[1];
    if (ref) refs.push({ ref, line: lineAt(text, match.index ?? 0), source: "markdown" });
  }
  const definitions = linkDefinitions(text);
  for (const match of text.matchAll(REFERENCE_IMAGE_RE)) {
    // `![alt][label]`, `![label][]` and `![label]`
    const label = match[2] || match[1];
    const ref = label ? definitions.get(normalizeLabel(label)) : undefined;
    if (ref) refs.push({ ref, line: lineAt(text, match.index ?? 0), source: "markdown" });
  }
  for (const match of text.matchAll(HTML_IMAGE_RE)) {
    const ref = match[1] ?? match[2];
    if (ref) refs.push({ ref, line: lineAt(text, match.index ?? 0), source: "html" });
  }
  for (const ref of post.frontMatter.images) {
    refs.push({ ref, source: "front-matter" });
  }

  return refs.sort((a, b) => (a.line ?? 0) - (b.line ?? 0));
}

function isInside(parent: string, child: string): boolean {
  const rel = relative(parent, child);
  return rel !== "" && !rel.startsWith("..") && !rel.startsWith(sep);
}

async function isFile(path: string): Promise<boolean> {
  return stat(path).then(
    (info) => info.isFile(),
    () => false
  );
}

/**
 * Root-absolute refs must point into <static>/<imagesDir>; relative refs only
 * work from a page bundle and must stay inside it.
 */
export async function checkImageRefs(post: Post, file: string, config: ResolvedSiteConfig): Promise<Diagnostic[]> {
  const staticDir = sitePath(config, "staticDir");
  const imagesRoot = resolve(staticDir, config.imagesDir);
  const diagnostics: Diagnostic[] = [];

  for (const image of extractImageRefs(post)) {
    if (isExternalUrl(image.ref)) continue;

    const line = image.line === undefined ? undefined : post.bodyLine + image.line - 1;
    const report = (message: string) =>
      diagnostics.push({ file, line, rule: "image-refs", severity: "error", message });

    let path: string;
    try {
      path = decodeURI(image.ref.split(/[?#]/)[0] ?? "");
    } catch {
      report(`image reference "${image.ref}" is not a valid URL path`);
      continue;
    }

    if (path.startsWith("/")) {
      const target = resolve(staticDir, `.${path}`);
      if (!isInside(imagesRoot, target)) {
        report(`image "${image.ref}" is outside /${config.imagesDir}/`);
      } else if (!(await isFile(target))) {
        report(`image "${image.ref}" not found at ${relative(config.rootDir, target)}`);
      }
      continue;
    }

    if (!post.bundleDir) {
      report(`relative image "${image.ref}" only resolves inside a page bundle; use /${config.imagesDir}/...`);
      continue;
    }

    const target = resolve(post.bundleDir, path);
    if (!isInside(post.bundleDir, target)) {
      report(`image "${image.ref}" points outside its page bundle`);
    } else if (!(await isFile(target))) {
      report(`image "${image.ref}" not found at ${relative(config.rootDir, target)}`);
    }
  }

  return diagnostics;
}
