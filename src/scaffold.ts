import { mkdir, writeFile } from "fs/promises";
import { basename, dirname, resolve, sep } from "path";
import { ContentError } from "./content/load";

export function titleFromFileName(fileName: string): string {
  const stem = basename(fileName, ".md");
  const name = stem === "index" ? basename(dirname(fileName)) : stem;
  return name
    .split(/[-_\s]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

export function draftTemplate(title: string, now: Date): string {
  return `---
title: ${JSON.stringify(title)}
date: ${now.toISOString()}
draft: true
tags: []
---

`;
}

/** Write a new draft post under contentDir; never overwrites */
export async function createPost(
  contentDir: string,
  relativePath: string,
  opts: { now?: Date } = {}
): Promise<string> {
  const withExtension = relativePath.endsWith(".md") ? relativePath : `${relativePath}.md`;
  const target = resolve(contentDir, withExtension);
  if (!target.startsWith(resolve(contentDir) + sep)) {
    throw new ContentError(`New post path must stay inside ${contentDir}: ${relativePath}`);
  }

  await mkdir(dirname(target), { recursive: true });
  try {
    await writeFile(target, draftTemplate(titleFromFileName(withExtension), opts.now ?? new Date()), { flag: "wx" });
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "EEXIST") {
      throw new ContentError(`${withExtension} already exists`);
    }
    throw err;
  }
  return target;
}
