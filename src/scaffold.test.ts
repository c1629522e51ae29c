import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import { resolve } from "path";
import { tmpdir } from "os";
import { ContentError, toPost } from "./content/load";
import { createPost, draftTemplate, titleFromFileName } from "./scaffold";

const now = new Date("2024-05-06T07:08:09Z");
let contentDir: string;

describe("scaffold", () => {
  beforeAll(async () => {
    contentDir = await mkdtemp(resolve(tmpdir(), "blogsmith-new-"));
  });

  afterAll(async () => {
    await rm(contentDir, { recursive: true, force: true });
  });

  test("titles come from the file or bundle name", () => {
    expect(titleFromFileName("posts/my-first_post.md")).toBe("My First Post");
    expect(titleFromFileName("posts/trip/index.md")).toBe("Trip");
  });

  test("drafts start with front matter only", () => {
    expect(draftTemplate("Trip", now)).toBe(
      '---\ntitle: "Trip"\ndate: 2024-05-06T07:08:09.000Z\ndraft: true\ntags: []\n---\n\n'
    );
  });

  test("creates a draft that loads as a post", async () => {
    const created = await createPost(contentDir, "posts/new-idea", { now });
    expect(created).toBe(resolve(contentDir, "posts/new-idea.md"));

    const post = toPost(contentDir, "posts/new-idea.md", await readFile(created, "utf8"));
    expect(post.title).toBe("New Idea");
    expect(post.frontMatter.draft).toBe(true);
    expect(post.frontMatter.date?.toISOString()).toBe("2024-05-06T07:08:09.000Z");
    expect(post.url).toBe("/posts/new-idea/");
  });

  test("never overwrites an existing post", async () => {
    await expect(createPost(contentDir, "posts/new-idea.md", { now })).rejects.toThrow(
      new ContentError("posts/new-idea.md already exists")
    );
  });

  test("rejects paths outside the content directory", async () => {
    await expect(createPost(contentDir, "../outside")).rejects.toThrow(ContentError);
  });
});
