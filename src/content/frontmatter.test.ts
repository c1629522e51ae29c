import { describe, expect, test } from "vitest";
import { detectFormat, FrontMatterError, parseDocument } from "./frontmatter";

describe("detectFormat", () => {
  test("reads the opening delimiter", () => {
    expect(detectFormat("---\ntitle: a\n---\n")).toBe("yaml");
    expect(detectFormat("+++\ntitle = 'a'\n+++\n")).toBe("toml");
    expect(detectFormat("# Heading\n")).toBe("none");
  });
});

describe("parseDocument", () => {
  test("parses YAML front matter and keeps unknown keys as params", () => {
    const doc = parseDocument(
      `---
title: Hello
date: 2021-03-02
tags: [a, b]
math: true
series: intro
---
Body line
`,
      "posts/hello.md"
    );

    expect(doc.format).toBe("yaml");
    expect(doc.frontMatter.title).toBe("Hello");
    expect(doc.frontMatter.date?.toISOString()).toBe("2021-03-02T00:00:00.000Z");
    expect(doc.frontMatter.tags).toEqual(["a", "b"]);
    expect(doc.frontMatter.math).toBe(true);
    expect(doc.frontMatter.draft).toBe(false);
    expect(doc.frontMatter.toc).toBe(false);
    expect(doc.frontMatter.images).toEqual([]);
    expect(doc.frontMatter.params).toEqual({ series: "intro" });
    expect(doc.body).toBe("Body line\n");
    expect(doc.bodyLine).toBe(8);
  });

  test("parses TOML front matter into the same shape", () => {
    const doc = parseDocument(
      `+++
title = "Hi"
date = 2021-05-18T09:30:00Z
draft = true
tags = ["x"]
+++
Body
`,
      "posts/hi.md"
    );

    expect(doc.format).toBe("toml");
    expect(doc.frontMatter.title).toBe("Hi");
    expect(doc.frontMatter.date?.toISOString()).toBe("2021-05-18T09:30:00.000Z");
    expect(doc.frontMatter.draft).toBe(true);
    expect(doc.frontMatter.tags).toEqual(["x"]);
    expect(doc.frontMatter.params).toEqual({});
    expect(doc.body).toBe("Body\n");
    expect(doc.bodyLine).toBe(7);
  });

  test("a document without a header gets defaults", () => {
    const doc = parseDocument("Just text\n", "notes.md");
    expect(doc.format).toBe("none");
    expect(doc.frontMatter.draft).toBe(false);
    expect(doc.frontMatter.title).toBeUndefined();
    expect(doc.body).toBe("Just text\n");
    expect(doc.bodyLine).toBe(1);
  });

  test("treats an empty key as absent", () => {
    const doc = parseDocument("---\nimages:\n---\n", "posts/empty.md");
    expect(doc.frontMatter.images).toEqual([]);
  });

  test("names the file and field of a wrong-typed value", () => {
    const parse = () => parseDocument("---\ndraft: \"yes\"\n---\n", "posts/bad.md");
    expect(parse).toThrow(FrontMatterError);
    expect(parse).toThrow('posts/bad.md: invalid front matter field "draft"');

    try {
      parse();
    } catch (err) {
      expect(err instanceof FrontMatterError && err.field).toBe("draft");
    }
  });

  test("rejects an unparseable date", () => {
    expect(() => parseDocument("---\ndate: someday\n---\n", "posts/when.md")).toThrow(
      'invalid front matter field "date"'
    );
  });

  test("wraps YAML syntax errors", () => {
    expect(() => parseDocument("---\ntitle: [unclosed\n---\n", "posts/broken.md")).toThrow(
      "posts/broken.md: unreadable YAML front matter"
    );
  });

  test("reports broken YAML every time the same text is parsed", () => {
    const raw = "---\ntitle: [unclosed\ndraft: true\n---\nBody\n";
    expect(() => parseDocument(raw, "posts/again.md")).toThrow(FrontMatterError);
    expect(() => parseDocument(raw, "posts/again.md")).toThrow("posts/again.md: unreadable YAML front matter");
  });

  test("dates must be timestamps or date strings", () => {
    for (const value of ["true", "5", "[2021]"]) {
      expect(() => parseDocument(`---\ndate: ${value}\n---\n`, "posts/when.md")).toThrow(
        'invalid front matter field "date"'
      );
    }
    expect(parseDocument('---\ndate: "2021-03-02T10:00:00Z"\n---\n', "posts/when.md").frontMatter.date?.toISOString()).toBe(
      "2021-03-02T10:00:00.000Z"
    );
  });

  test("a slug is a single path segment", () => {
    for (const slug of ["../../../escaped", "a/b", "..", "a\\\\b"]) {
      expect(() => parseDocument(`---\nslug: "${slug}"\n---\n`, "posts/slug.md")).toThrow(
        'posts/slug.md: invalid front matter field "slug": must be a single path segment'
      );
    }
    expect(parseDocument("---\nslug: hello-world\n---\n", "posts/slug.md").frontMatter.slug).toBe("hello-world");
  });
});
