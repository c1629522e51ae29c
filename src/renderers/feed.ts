import type { ResolvedSiteConfig } from "../config";
import type { Post } from "../content/model";
import { toRfc822 } from "../presentation/date";
import { absUrl } from "../urls";

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/**
 * RSS 2.0 channel for the given posts (already ordered). lastBuildDate is the
 * newest post date rather than the wall clock, so rebuilding unchanged
 * content yields the same bytes.
 */
export function renderRss(config: ResolvedSiteConfig, posts: Post[], summaries: Map<string, string>): string {
  const link = absUrl(config.baseURL, "/");
  const newest = posts.find((post) => post.frontMatter.date)?.frontMatter.date;

  const items = posts.map((post) => {
    const permalink = absUrl(config.baseURL, post.url);
    const date = post.frontMatter.date;
    return [
      "    <item>",
      `      <title>${escapeXml(post.title)}</title>`,
      `      <link>${escapeXml(permalink)}</link>`,
      date ? `      <pubDate>${toRfc822(date)}</pubDate>` : null,
      `      <guid>${escapeXml(permalink)}</guid>`,
      `      <description>${escapeXml(summaries.get(post.url) ?? "")}</description>`,
      "    </item>",
    ]
      .filter((line): line is string => line !== null)
      .join("\n");
  });

  return [
    `<?xml version="1.0" encoding="utf-8" standalone="yes"?>`,
    `<rss version="2.0" xmlns:atom="http://www.w3.org/2005/Atom">`,
    "  <channel>",
    `    <title>${escapeXml(config.title)}</title>`,
    `    <link>${escapeXml(link)}</link>`,
    `    <description>${escapeXml(config.description || `Recent content on ${config.title}`)}</description>`,
    `    <language>${escapeXml(config.languageCode)}</language>`,
    newest ? `    <lastBuildDate>${toRfc822(newest)}</lastBuildDate>` : null,
    `    <atom:link href="${escapeXml(absUrl(config.baseURL, "/index.xml"))}" rel="self" type="application/rss+xml" />`,
    ...items,
    "  </channel>",
    "</rss>",
    "",
  ]
    .filter((line): line is string => line !== null)
    .join("\n");
}

export interface SitemapEntry {
  url: string;
  lastmod?: Date;
}

export function renderSitemap(config: ResolvedSiteConfig, entries: SitemapEntry[]): string {
  const urls = entries.map((entry) =>
    [
      "  <url>",
      `    <loc>${escapeXml(absUrl(config.baseURL, entry.url))}</loc>`,
      entry.lastmod ? `    <lastmod>${entry.lastmod.toISOString()}</lastmod>` : null,
      "  </url>",
    ]
      .filter((line): line is string => line !== null)
      .join("\n")
  );

  return [
    `<?xml version="1.0" encoding="utf-8" standalone="yes"?>`,
    `<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">`,
    ...urls,
    "</urlset>",
    "",
  ].join("\n");
}
