import matter from "gray-matter";
import { parse as parseToml } from "smol-toml";
import { z } from "zod";
import type { FrontMatter, FrontMatterFormat } from "./model";

export class FrontMatterError extends Error {
  override name = "FrontMatterError";

  constructor(
    readonly file: string,
    readonly reason: string,
    readonly field?: string
  ) {
    super(`${file}: ${reason}`);
  }
}

export const FrontMatterSchema = z
  .object({
    title: z.string().optional(),
    date: z.union([z.date(), z.string().pipe(z.coerce.date())]).optional(),
    draft: z.boolean().default(false),
    toc: z.boolean().default(false),
    images: z.array(z.string()).default([]),
    math: z.boolean().default(false),
    tags: z.array(z.string()).default([]),
    // One URL segment; it becomes a directory under the publish dir.
    slug: z
      .string()
      .regex(/^[^/\\]+$/, "must be a single path segment")
      .refine((value) => value !== "." && value !== "..", "must be a single path segment")
      .optional(),
    description: z.string().optional(),
  })
  .passthrough();

const KNOWN_KEYS = new Set(Object.keys(FrontMatterSchema.shape));

export interface ParsedDocument {
  format: FrontMatterFormat;
  frontMatter: FrontMatter;
  body: string;
  /** 1-based line where the body starts */
  bodyLine: number;
}

export function detectFormat(raw: string): FrontMatterFormat {
  const firstLine = raw.replace(/^\uFEFF/, "").split(/\r?\n/, 1)[0]?.trimEnd();
  if (firstLine === "---") return "yaml";
  if (firstLine === "+++") return "toml";
  return "none";
}

function readHeader(raw: string, format: FrontMatterFormat, file: string): { data: Record<string, unknown>; content: string } {
  if (format === "none") {
    return { data: {}, content: raw };
  }

  try {
    // gray-matter caches by input text unless it is given options, even when parsing throws.
    const result =
      format === "toml"
        ? matter(raw, {
            language: "toml",
            delimiters: "+++",
            engines: { toml: (input: string) => parseToml(input) },
          })
        : matter(raw, {});
    return { data: result.data, content: result.content };
  } catch (err) {
    const reason = err instanceof Error ? err.message.split("\n")[0] : String(err);
    throw new FrontMatterError(file, `unreadable ${format.toUpperCase()} front matter: ${reason}`);
  }
}

export function normalizeFrontMatter(data: Record<string, unknown>, file: string): FrontMatter {
  // An empty YAML key (`images:`) reads as null; treat it as absent.
  const present = Object.fromEntries(Object.entries(data).filter(([, value]) => value !== null));
  const parsed = FrontMatterSchema.safeParse(present);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".");
    throw new FrontMatterError(
      file,
      field ? `invalid front matter field "${field}": ${issue?.message}` : "invalid front matter",
      field
    );
  }

  const { title, date, draft, toc, images, math, tags, slug, description } = parsed.data;
  const params = Object.fromEntries(Object.entries(parsed.data).filter(([key]) => !KNOWN_KEYS.has(key)));

  return { title, date, draft, toc, images, math, tags, slug, description, params };
}

/** Parse a Markdown document with a YAML (`---`) or TOML (`+++`) header */
export function parseDocument(raw: string, file: string): ParsedDocument {
  const format = detectFormat(raw);
  const { data, content } = readHeader(raw, format, file);
  const header = raw.slice(0, raw.length - content.length);

  return {
    format,
    frontMatter: normalizeFrontMatter(data, file),
    body: content,
    bodyLine: header.split("\n").length,
  };
}
