import type { Diagnostic } from "./check/diagnostic";

const RED = "\x1b[31m";
const YELLOW = "\x1b[33m";
const GREEN = "\x1b[32m";
const BOLD = "\x1b[1m";
const RESET = "\x1b[0m";

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const color = diagnostic.severity === "error" ? RED : YELLOW;
  const location = diagnostic.line === undefined ? diagnostic.file : `${diagnostic.file}:${diagnostic.line}`;
  return `${color}${diagnostic.severity}${RESET} ${location} ${BOLD}[${diagnostic.rule}]${RESET} ${diagnostic.message}`;
}

export function formatCheckSummary(diagnostics: Diagnostic[], postCount: number): string {
  const errors = diagnostics.filter((d) => d.severity === "error").length;
  const warnings = diagnostics.length - errors;
  if (errors === 0 && warnings === 0) {
    return `${GREEN}${BOLD}✓ [blogsmith] ${postCount} document(s) checked, no problems${RESET}`;
  }
  const color = errors > 0 ? RED : YELLOW;
  return `${color}${BOLD}[blogsmith] ${errors} error(s), ${warnings} warning(s) in ${postCount} document(s)${RESET}`;
}

export function formatError(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err);
  return `${RED}${BOLD}[blogsmith]${RESET}${RED} ${message}${RESET}`;
}
