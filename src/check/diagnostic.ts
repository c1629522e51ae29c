export type Severity = "error" | "warning";

export type RuleId = "front-matter" | "math-delimiters" | "image-refs" | "duplicate-url";

export interface Diagnostic {
  /** Path relative to the site root */
  file: string;
  line?: number;
  rule: RuleId;
  severity: Severity;
  message: string;
}

export function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  if (a.file !== b.file) return a.file < b.file ? -1 : 1;
  return (a.line ?? 0) - (b.line ?? 0);
}

export function countErrors(diagnostics: Diagnostic[]): number {
  return diagnostics.filter((diagnostic) => diagnostic.severity === "error").length;
}
