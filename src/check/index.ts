import { join, relative, sep } from "path";
import { sitePath, type ResolvedSiteConfig } from "../config";
import { findDuplicateUrls, loadContent } from "../content/load";
import { compareDiagnostics, type Diagnostic } from "./diagnostic";
import { checkImageRefs } from "./images";
import { checkMathDelimiters } from "./math";

export { countErrors, type Diagnostic } from "./diagnostic";

export interface CheckReport {
  diagnostics: Diagnostic[];
  /** Markdown documents examined, unreadable ones included */
  documents: number;
}

/** Integrity checks over the whole corpus, drafts included */
export async function runChecks(config: ResolvedSiteConfig): Promise<CheckReport> {
  const contentDir = sitePath(config, "contentDir");
  const { posts, errors } = await loadContent(contentDir);
  const fileOf = (relativePath: string) => relative(config.rootDir, join(contentDir, relativePath)).split(sep).join("/");

  const diagnostics: Diagnostic[] = errors.map((error) => ({
    file: fileOf(error.file),
    rule: "front-matter",
    severity: "error",
    message: error.reason,
  }));

  for (const post of posts) {
    const file = fileOf(post.relativePath);
    if (!post.frontMatter.draft && !post.frontMatter.date) {
      diagnostics.push({
        file,
        rule: "front-matter",
        severity: "warning",
        message: "no date; the post is listed after every dated post",
      });
    }
    diagnostics.push(...checkMathDelimiters(post, file));
    diagnostics.push(...(await checkImageRefs(post, file, config)));
  }

  for (const group of findDuplicateUrls(posts)) {
    const [first, ...rest] = group;
    for (const post of rest) {
      diagnostics.push({
        file: fileOf(post.relativePath),
        rule: "duplicate-url",
        severity: "error",
        message: `URL ${post.url} is also used by ${first ? fileOf(first.relativePath) : "another post"}`,
      });
    }
  }

  return { diagnostics: diagnostics.sort(compareDiagnostics), documents: posts.length + errors.length };
}
