import { access, cp, mkdir, readdir, rm, writeFile } from "fs/promises";
import { dirname, isAbsolute, join, relative, resolve, sep } from "path";
import { fileURLToPath } from "url";
import { ConfigError, sitePath, type ResolvedSiteConfig } from "../config";
import { ContentError, loadSite } from "../content/load";
import type { Post } from "../content/model";
import { slugify } from "../presentation/structured-content";
import { createTemplateEnv, loadTemplateCss, resolveTemplateChain } from "../presentation/template";
import { renderPost, type RenderedPost } from "../render";
import { renderRss, renderSitemap, type SitemapEntry } from "./feed";
import { minifyHtml } from "./minify";

const BUNDLED_TEMPLATES = fileURLToPath(new URL("../../templates", import.meta.url));

export interface BuildSiteOptions {
  /** Overrides config.buildDrafts */
  includeDrafts?: boolean;
  /** Overrides config.publishDir */
  outputDir?: string;
  /** Folder holding templates/<name>; defaults to <root>/templates, then the bundled ones */
  templateDir?: string;
}

export interface BuildResult {
  outputDir: string;
  posts: Post[];
  /** Every file in the output, relative, forward slashes, sorted */
  files: string[];
}

export interface Term {
  name: string;
  slug: string;
  url: string;
  posts: Post[];
}

interface PageEntry {
  title: string;
  url: string;
  date?: Date;
  math: boolean;
  summaryHtml: string;
}

async function exists(path: string): Promise<boolean> {
  return access(path).then(
    () => true,
    () => false
  );
}

export async function resolveTemplateDir(config: ResolvedSiteConfig, override?: string): Promise<string> {
  if (override) return resolve(config.rootDir, override);
  const siteTemplates = resolve(config.rootDir, "templates");
  return (await exists(resolve(siteTemplates, config.template))) ? siteTemplates : BUNDLED_TEMPLATES;
}

/** Tags grouped by slug, sorted by name; the first spelling seen names the term */
export function collectTerms(posts: Post[]): Term[] {
  const terms = new Map<string, Term>();

  for (const post of posts) {
    for (const tag of post.frontMatter.tags) {
      const slug = slugify(tag) || "tag";
      const term = terms.get(slug) ?? { name: tag, slug, url: `/tags/${slug}/`, posts: [] };
      if (!term.posts.includes(post)) {
        term.posts.push(post);
      }
      terms.set(slug, term);
    }
  }

  return [...terms.values()].sort((a, b) => (a.slug < b.slug ? -1 : a.slug > b.slug ? 1 : 0));
}

export function paginate<T>(items: T[], perPage: number): T[][] {
  if (items.length === 0) return [[]];
  const pages: T[][] = [];
  for (let i = 0; i < items.length; i += perPage) {
    pages.push(items.slice(i, i + perPage));
  }
  return pages;
}

export function pagerUrl(pageNumber: number): string {
  return pageNumber === 1 ? "/" : `/page/${pageNumber}/`;
}

function assertSafeOutputDir(config: ResolvedSiteConfig, outputDir: string): void {
  const guarded = [config.rootDir, sitePath(config, "contentDir"), sitePath(config, "staticDir")];
  for (const dir of guarded) {
    const rel = relative(outputDir, dir);
    if (rel === "" || (!rel.startsWith("..") && !rel.startsWith(sep))) {
      throw new ConfigError(`Refusing to clean publish directory ${outputDir}: it contains ${dir}`);
    }
  }
}

/** Target under outputDir for a site path; throws when the path leaves it */
export function outputPath(outputDir: string, ...segments: string[]): string {
  const target = resolve(outputDir, ...segments.map((segment) => segment.replace(/^\/+/, "")));
  const rel = relative(outputDir, target);
  if (rel.startsWith("..") || isAbsolute(rel)) {
    throw new ContentError(`Refusing to write ${segments.join("")} outside ${outputDir}`);
  }
  return target;
}

async function listFiles(dir: string, prefix = ""): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...(await listFiles(join(dir, entry.name), rel)));
    } else if (entry.isFile()) {
      files.push(rel);
    }
  }
  return files;
}

async function copyBundleResources(post: Post, outputDir: string): Promise<void> {
  if (!post.bundleDir) return;
  const resources = (await listFiles(post.bundleDir)).filter((file) => !file.endsWith(".md"));
  for (const resource of resources) {
    const target = outputPath(outputDir, post.url, resource);
    await mkdir(dirname(target), { recursive: true });
    await cp(join(post.bundleDir, resource), target);
  }
}

export async function buildSite(config: ResolvedSiteConfig, opts: BuildSiteOptions = {}): Promise<BuildResult> {
  const outputDir = resolve(config.rootDir, opts.outputDir ?? config.publishDir);
  assertSafeOutputDir(config, outputDir);

  const posts = await loadSite(config, { includeDrafts: opts.includeDrafts });

  const templateDir = await resolveTemplateDir(config, opts.templateDir);
  const env = createTemplateEnv(await resolveTemplateChain(templateDir, config.template), config.baseURL);
  const css = await loadTemplateCss(templateDir, config.template);

  const site = {
    title: config.title,
    description: config.description,
    author: config.author,
    languageCode: config.languageCode,
    baseURL: config.baseURL,
    theme: config.theme,
    params: config.params,
  };

  async function writePage(urlPath: string, template: string, page: Record<string, unknown>, fileName = "index.html") {
    let html = env.render(template, { site, css, page });
    if (config.minify) {
      html = await minifyHtml(html);
    }
    const target = outputPath(outputDir, urlPath, fileName);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, html);
  }

  await rm(outputDir, { recursive: true, force: true });
  await mkdir(outputDir, { recursive: true });

  const rendered = new Map<string, RenderedPost>();
  for (const post of posts) {
    rendered.set(post.url, await renderPost(post, config.baseURL));
  }

  const entryFor = (post: Post): PageEntry => ({
    title: post.title,
    url: post.url,
    date: post.frontMatter.date,
    math: post.frontMatter.math,
    summaryHtml: rendered.get(post.url)?.summaryHtml ?? "",
  });

  const terms = collectTerms(posts);

  for (const post of posts) {
    const output = rendered.get(post.url);
    const fm = post.frontMatter;
    await writePage(post.url, "single.njk", {
      kind: "page",
      title: post.title,
      url: post.url,
      date: fm.date,
      draft: fm.draft,
      description: fm.description ?? "",
      images: fm.images,
      math: fm.math,
      tags: fm.tags.map((tag) => {
        const slug = slugify(tag) || "tag";
        return { name: tag, url: `/tags/${slug}/` };
      }),
      tocHtml: output?.tocHtml ?? "",
      content: output?.html ?? "",
      params: { ...config.params, ...fm.params },
    });
    await copyBundleResources(post, outputDir);
  }

  const listed = posts.filter((post) => config.mainSections.includes(post.section));
  const listPages = paginate(listed, config.paginate);
  for (const [index, pagePosts] of listPages.entries()) {
    const number = index + 1;
    const entries = pagePosts.map(entryFor);
    await writePage(pagerUrl(number), "list.njk", {
      kind: "home",
      title: config.title,
      url: pagerUrl(number),
      description: config.description,
      entries,
      math: entries.some((entry) => entry.math),
      pager:
        listPages.length > 1
          ? {
              number,
              total: listPages.length,
              prev: number > 1 ? pagerUrl(number - 1) : null,
              next: number < listPages.length ? pagerUrl(number + 1) : null,
            }
          : null,
    });
  }

  await writePage("/tags/", "terms.njk", {
    kind: "terms",
    title: "Tags",
    url: "/tags/",
    terms: terms.map((term) => ({ name: term.name, url: term.url, count: term.posts.length })),
  });
  for (const term of terms) {
    const entries = term.posts.map(entryFor);
    await writePage(term.url, "list.njk", {
      kind: "term",
      title: term.name,
      url: term.url,
      entries,
      math: entries.some((entry) => entry.math),
      pager: null,
    });
  }

  await writePage("/", "404.njk", { kind: "404", title: "Page not found", url: "/404.html" }, "404.html");

  const summaries = new Map(listed.map((post) => [post.url, rendered.get(post.url)?.summaryHtml ?? ""]));
  await writeFile(join(outputDir, "index.xml"), renderRss(config, listed, summaries));

  const sitemapEntries: SitemapEntry[] = [
    { url: "/", lastmod: listed.find((post) => post.frontMatter.date)?.frontMatter.date },
    ...posts.map((post) => ({ url: post.url, lastmod: post.frontMatter.date })),
    { url: "/tags/" },
    ...terms.map((term) => ({ url: term.url, lastmod: term.posts[0]?.frontMatter.date })),
  ];
  await writeFile(join(outputDir, "sitemap.xml"), renderSitemap(config, sitemapEntries));

  const staticDir = sitePath(config, "staticDir");
  if (await exists(staticDir)) {
    await cp(staticDir, outputDir, { recursive: true });
  }

  if (config.domain) {
    await writeFile(join(outputDir, "CNAME"), `${config.domain}\n`);
  }

  const files = (await listFiles(outputDir)).sort();
  return { outputDir, posts, files };
}
