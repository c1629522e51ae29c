import { readdir, readFile, stat } from "fs/promises";
import { basename, dirname, resolve, sep } from "path";
import { sitePath, type ResolvedSiteConfig } from "../config";
import { FrontMatterError, parseDocument } from "./frontmatter";
import type { Post } from "./model";

export const SUMMARY_DIVIDER = "<!--more-->";

export class ContentError extends Error {
  override name = "ContentError";
}

export interface LoadedContent {
  posts: Post[];
  /** Documents whose front matter could not be read */
  errors: FrontMatterError[];
}

/** Every Markdown file under contentDir, relative, with forward slashes, sorted */
export async function discoverContent(contentDir: string): Promise<string[]> {
  const isDir = await stat(contentDir).then(
    (info) => info.isDirectory(),
    () => false
  );
  if (!isDir) {
    throw new ContentError(`Content directory not found: ${contentDir}`);
  }

  const entries = await readdir(contentDir, { recursive: true });
  return entries
    .map((entry) => entry.split(sep).join("/"))
    .filter((entry) => entry.endsWith(".md") && basename(entry) !== "_index.md")
    .sort();
}

export function getTitleFromMarkdown(markdown: string): string | null {
  let inFence = false;
  for (const line of markdown.split("\n")) {
    if (/^(```|~~~)/.test(line)) {
      inFence = !inFence;
      continue;
    }
    const match = !inFence ? line.match(/^#\s+(.+?)\s*#*\s*$/) : null;
    if (match?.[1]) {
      return match[1];
    }
  }
  return null;
}

/** Text before `<!--more-->`, otherwise the first paragraph that isn't a heading or code */
export function splitSummary(markdown: string): string {
  const dividerAt = markdown.indexOf(SUMMARY_DIVIDER);
  if (dividerAt !== -1) {
    return markdown.slice(0, dividerAt).trim();
  }

  const lines = markdown.split("\n");
  const paragraph: string[] = [];
  let inFence = false;

  for (const line of lines) {
    if (/^(```|~~~)/.test(line)) {
      inFence = !inFence;
      if (paragraph.length > 0) break;
      continue;
    }
    if (inFence) continue;

    if (line.trim() === "") {
      if (paragraph.length > 0) break;
      continue;
    }
    if (paragraph.length === 0 && (/^#{1,6}\s/.test(line) || /^\s*!\[[^\]]*\]\([^)]*\)\s*$/.test(line))) {
      continue;
    }
    paragraph.push(line);
  }

  return paragraph.join("\n").trim();
}

/** Build a Post from a file path relative to contentDir */
export function toPost(contentDir: string, relativePath: string, raw: string): Post {
  const sourcePath = resolve(contentDir, relativePath);
  const { frontMatter, body, bodyLine } = parseDocument(raw, relativePath);

  const segments = relativePath.split("/");
  const fileName = segments.at(-1) ?? relativePath;
  const dirSegments = segments.slice(0, -1);
  const isBundle = fileName === "index.md" && dirSegments.length > 0;

  const sectionSegments = isBundle ? dirSegments.slice(0, -1) : dirSegments;
  const fileSlug = isBundle ? (dirSegments.at(-1) ?? "index") : basename(fileName, ".md");
  const slug = frontMatter.slug ?? fileSlug;

  return {
    sourcePath,
    relativePath,
    section: sectionSegments[0] ?? "",
    slug,
    url: `/${[...sectionSegments, slug].join("/")}/`,
    frontMatter,
    title: frontMatter.title ?? getTitleFromMarkdown(body) ?? slug,
    markdown: body,
    summary: splitSummary(body),
    bundleDir: isBundle ? dirname(sourcePath) : undefined,
    bodyLine,
  };
}

/** Newest first; undated posts last; ties by url */
export function comparePosts(a: Post, b: Post): number {
  const aTime = a.frontMatter.date?.getTime();
  const bTime = b.frontMatter.date?.getTime();

  if (aTime !== undefined && bTime !== undefined && aTime !== bTime) {
    return bTime - aTime;
  }
  if (aTime === undefined && bTime !== undefined) return 1;
  if (aTime !== undefined && bTime === undefined) return -1;
  return a.url < b.url ? -1 : a.url > b.url ? 1 : 0;
}

export async function loadContent(contentDir: string): Promise<LoadedContent> {
  const files = await discoverContent(contentDir);
  const posts: Post[] = [];
  const errors: FrontMatterError[] = [];

  for (const relativePath of files) {
    const raw = await readFile(resolve(contentDir, relativePath), "utf8");
    try {
      posts.push(toPost(contentDir, relativePath, raw));
    } catch (err) {
      if (!(err instanceof FrontMatterError)) throw err;
      errors.push(err);
    }
  }

  return { posts: posts.sort(comparePosts), errors };
}

/** Groups posts sharing a URL; every returned group has two or more posts */
export function findDuplicateUrls(posts: Post[]): Post[][] {
  const byUrl = new Map<string, Post[]>();
  for (const post of posts) {
    byUrl.set(post.url, [...(byUrl.get(post.url) ?? []), post]);
  }
  return [...byUrl.values()].filter((group) => group.length > 1);
}

/** Published posts for a build. Throws on unreadable front matter or clashing URLs. */
export async function loadSite(
  config: ResolvedSiteConfig,
  opts: { includeDrafts?: boolean } = {}
): Promise<Post[]> {
  const { posts, errors } = await loadContent(sitePath(config, "contentDir"));
  const firstError = errors[0];
  if (firstError) {
    throw firstError;
  }

  const includeDrafts = opts.includeDrafts ?? config.buildDrafts;
  const published = includeDrafts ? posts : posts.filter((post) => !post.frontMatter.draft);

  const duplicate = findDuplicateUrls(published)[0];
  if (duplicate) {
    const files = duplicate.map((post) => post.relativePath).join(", ");
    throw new ContentError(`Multiple posts resolve to the same URL ${duplicate[0]?.url}: ${files}`);
  }

  return published;
}
