import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { dirname, resolve } from "path";
import { tmpdir } from "os";
import { resolveSiteConfig } from "../config";
import { toPost } from "../content/load";
import { countErrors, runChecks, type CheckReport } from "./index";
import { extractImageRefs } from "./images";
import { checkMathDelimiters } from "./math";

async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [path, content] of Object.entries(files)) {
    await mkdir(dirname(resolve(root, path)), { recursive: true });
    await writeFile(resolve(root, path), content);
  }
}

let siteDir: string;
let report: CheckReport;

describe("runChecks", () => {
  beforeAll(async () => {
    siteDir = await mkdtemp(resolve(tmpdir(), "blogsmith-check-"));
    await writeFiles(siteDir, {
      "content/posts/good.md":
        "---\ntitle: Good\ndate: 2021-01-01\nmath: true\n---\nInline $a+b$ and ![x](/images/ok.png)\n",
      "content/posts/broken-yaml.md": "---\ntitle: [unclosed\n---\nBody\n",
      "content/posts/bad-field.md": "---\ntitle: Bad\ndate: 2021-01-01\ndraft: maybe\n---\n",
      "content/posts/unclosed.md": "---\ntitle: Unclosed\ndate: 2021-01-02\nmath: true\n---\nFirst line\n\n$$\nx^2\n",
      "content/posts/missing-image.md": [
        "---",
        "title: Missing",
        "date: 2021-01-03",
        "images: [/images/cover.png]",
        "---",
        "![a](/images/nope.png)",
        "",
        "![b](rel.png)",
        "",
        "```",
        "![c](/images/in-code.png)",
        "```",
        "",
        "![d](https://cdn.example.test/x.png)",
        "![e](/elsewhere/x.png)",
        "",
      ].join("\n"),
      "content/posts/bundle/index.md":
        "---\ntitle: Bundle\ndate: 2021-01-04\n---\n![ok](chart.svg)\n![up](../escape.png)\n![gone](missing.svg)\n",
      "content/posts/bundle/chart.svg": "<svg/>",
      "content/posts/dup.md": "---\ntitle: Dup\ndate: 2020-01-01\nslug: good\n---\nDup\n",
      "content/posts/undated.md": "---\ntitle: Undated\n---\nText\n",
      "content/posts/draft-math.md": "---\ntitle: Draft\ndraft: true\nmath: true\n---\nstray \\)\n",
      "static/images/ok.png": "png",
    });
    report = await runChecks(resolveSiteConfig(siteDir, {}));
  });

  afterAll(async () => {
    await rm(siteDir, { recursive: true, force: true });
  });

  test("counts every document, unreadable ones included", () => {
    expect(report.documents).toBe(9);
  });

  test("reports each problem with file, line and rule", () => {
    expect(
      report.diagnostics.map(({ file, line, rule, severity, message }) => [file, line, rule, severity, message])
    ).toEqual([
      [
        "content/posts/bad-field.md",
        undefined,
        "front-matter",
        "error",
        'invalid front matter field "draft": Expected boolean, received string',
      ],
      [
        "content/posts/broken-yaml.md",
        undefined,
        "front-matter",
        "error",
        expect.stringMatching(/^unreadable YAML front matter: /),
      ],
      [
        "content/posts/bundle/index.md",
        6,
        "image-refs",
        "error",
        'image "../escape.png" points outside its page bundle',
      ],
      [
        "content/posts/bundle/index.md",
        7,
        "image-refs",
        "error",
        'image "missing.svg" not found at content/posts/bundle/missing.svg',
      ],
      [
        "content/posts/draft-math.md",
        6,
        "math-delimiters",
        "error",
        'closing "\\)" without an opening "\\("',
      ],
      [
        "content/posts/dup.md",
        undefined,
        "duplicate-url",
        "error",
        "URL /posts/good/ is also used by content/posts/good.md",
      ],
      [
        "content/posts/missing-image.md",
        undefined,
        "image-refs",
        "error",
        'image "/images/cover.png" not found at static/images/cover.png',
      ],
      [
        "content/posts/missing-image.md",
        6,
        "image-refs",
        "error",
        'image "/images/nope.png" not found at static/images/nope.png',
      ],
      [
        "content/posts/missing-image.md",
        8,
        "image-refs",
        "error",
        'relative image "rel.png" only resolves inside a page bundle; use /images/...',
      ],
      [
        "content/posts/missing-image.md",
        15,
        "image-refs",
        "error",
        'image "/elsewhere/x.png" is outside /images/',
      ],
      [
        "content/posts/unclosed.md",
        8,
        "math-delimiters",
        "error",
        '"$$" is never closed with "$$"',
      ],
      [
        "content/posts/undated.md",
        undefined,
        "front-matter",
        "warning",
        "no date; the post is listed after every dated post",
      ],
    ]);
    expect(countErrors(report.diagnostics)).toBe(11);
  });

  test("resolves reference-style images", async () => {
    const refDir = await mkdtemp(resolve(tmpdir(), "blogsmith-ref-"));
    try {
      await writeFiles(refDir, {
        "content/posts/ref.md": "---\ntitle: Ref\ndate: 2021-01-01\n---\n![chart][c]\n\n[c]: /images/missing.png\n",
      });
      const { diagnostics } = await runChecks(resolveSiteConfig(refDir, {}));
      expect(diagnostics).toEqual([
        {
          file: "content/posts/ref.md",
          line: 5,
          rule: "image-refs",
          severity: "error",
          message: 'image "/images/missing.png" not found at static/images/missing.png',
        },
      ]);
    } finally {
      await rm(refDir, { recursive: true, force: true });
    }
  });

  test("a clean corpus has no diagnostics", async () => {
    const cleanDir = await mkdtemp(resolve(tmpdir(), "blogsmith-clean-"));
    try {
      await writeFiles(cleanDir, {
        "content/posts/ok.md": "---\ntitle: Ok\ndate: 2021-01-01\n---\nPrice: $5 and $6\n",
      });
      const clean = await runChecks(resolveSiteConfig(cleanDir, {}));
      expect(clean).toEqual({ diagnostics: [], documents: 1 });
    } finally {
      await rm(cleanDir, { recursive: true, force: true });
    }
  });
});

describe("individual checks", () => {
  test("math delimiters are only checked when math is on", () => {
    const off = toPost("/site/content", "posts/a.md", "---\ntitle: A\n---\nCosts $5\n");
    expect(checkMathDelimiters(off, "a.md")).toEqual([]);

    const on = toPost("/site/content", "posts/b.md", "---\ntitle: B\nmath: true\n---\nCosts $5\n\nmore\n");
    expect(checkMathDelimiters(on, "b.md")).toEqual([
      {
        file: "b.md",
        line: 5,
        rule: "math-delimiters",
        severity: "error",
        message: 'inline math opened with "$" runs into a blank line without "$"',
      },
    ]);
  });

  test("image references come from markdown, html and front matter", () => {
    const post = toPost(
      "/site/content",
      "posts/c.md",
      '---\nimages: [/images/cover.png]\n---\nText\n<img alt="x" src="/images/inline.png">\n`![no](/images/code.png)`\n![yes](/images/md.png "Title")\n'
    );
    expect(extractImageRefs(post)).toEqual([
      { ref: "/images/cover.png", source: "front-matter" },
      { ref: "/images/inline.png", line: 2, source: "html" },
      { ref: "/images/md.png", line: 4, source: "markdown" },
    ]);
  });

  test("reference images resolve through link definitions", () => {
    const post = toPost(
      "/site/content",
      "posts/d.md",
      [
        "![chart][c]",
        "![Logo][]",
        "![Logo]",
        "![inline](/images/i.png)",
        "",
        "[c]: /images/missing.png",
        '[logo]: </images/logo.svg> "Logo"',
        "[unused]: /images/nope.png",
        "",
      ].join("\n")
    );
    expect(extractImageRefs(post)).toEqual([
      { ref: "/images/missing.png", line: 1, source: "markdown" },
      { ref: "/images/logo.svg", line: 2, source: "markdown" },
      { ref: "/images/logo.svg", line: 3, source: "markdown" },
      { ref: "/images/i.png", line: 4, source: "markdown" },
    ]);
  });
});
