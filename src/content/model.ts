export interface FrontMatter {
  title?: string;
  date?: Date;
  draft: boolean;
  toc: boolean;
  images: string[];
  math: boolean;
  tags: string[];
  slug?: string;
  description?: string;
  /** Keys the schema doesn't know about, passed through to templates */
  params: Record<string, unknown>;
}

export type FrontMatterFormat = "yaml" | "toml" | "none";

export interface Post {
  sourcePath: string;
  /** Path relative to the content directory, always with forward slashes */
  relativePath: string;
  section: string;
  slug: string;
  url: string;
  frontMatter: FrontMatter;
  title: string;
  markdown: string;
  summary: string;
  /** Directory holding bundle resources when the post is `<dir>/index.md` */
  bundleDir?: string;
  /** 1-based line in the source file where the body starts */
  bodyLine: number;
}
