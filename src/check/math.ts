import { scanMath } from "../content/math";
import type { Post } from "../content/model";
import type { Diagnostic } from "./diagnostic";

/** Unbalanced formula delimiters in posts that turn math rendering on */
export function checkMathDelimiters(post: Post, file: string): Diagnostic[] {
  if (!post.frontMatter.math) {
    return [];
  }

  return scanMath(post.markdown).issues.map((issue) => ({
    file,
    line: post.bodyLine + issue.line - 1,
    rule: "math-delimiters",
    severity: "error",
    message: issue.message,
  }));
}
