import { Marked } from "marked";
import { protectMath } from "./content/math";
import type { Post } from "./content/model";
import { enrichHeadings, renderToc, type TocItem } from "./presentation/structured-content";
import { prefixRootUrls } from "./urls";

export interface RenderMarkdownOptions {
  /** Keep formula spans out of Markdown processing */
  math?: boolean;
  /** Normalized baseURL; root-relative links get its path prefixed */
  baseURL?: string;
}

export interface RenderedMarkdown {
  html: string;
  toc: TocItem[];
}

export interface RenderedPost extends RenderedMarkdown {
  /** Rendered table of contents, empty unless the post sets `toc: true` */
  tocHtml: string;
  summaryHtml: string;
}

const markdownParser = new Marked({ gfm: true, breaks: false });

export async function renderMarkdown(markdown: string, opts: RenderMarkdownOptions = {}): Promise<RenderedMarkdown> {
  let html: string;

  if (opts.math) {
    const guarded = protectMath(markdown);
    html = guarded.restore(await markdownParser.parse(guarded.markdown));
  } else {
    html = await markdownParser.parse(markdown);
  }

  const enriched = enrichHeadings(html);
  return {
    html: opts.baseURL ? prefixRootUrls(enriched.html, opts.baseURL) : enriched.html,
    toc: enriched.toc,
  };
}

export async function renderPost(post: Post, baseURL: string): Promise<RenderedPost> {
  const math = post.frontMatter.math;
  const body = await renderMarkdown(post.markdown, { math, baseURL });
  const summary = await renderMarkdown(post.summary, { math, baseURL });

  return {
    html: body.html,
    toc: body.toc,
    tocHtml: post.frontMatter.toc ? renderToc(body.toc) : "",
    summaryHtml: summary.html,
  };
}
