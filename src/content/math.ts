export type MathDelimiter = "$$" | "$" | "\\[" | "\\(";

const CLOSERS: Record<MathDelimiter, string> = {
  $$: "$$",
  $: "$",
  "\\[": "\\]",
  "\\(": "\\)",
};

export interface MathSpan {
  /** Offset of the opening delimiter */
  start: number;
  /** Offset just past the closing delimiter */
  end: number;
  open: MathDelimiter;
  display: boolean;
  /** 1-based line of the opening delimiter */
  line: number;
}

export interface MathIssue {
  line: number;
  message: string;
}

export interface MathScan {
  spans: MathSpan[];
  issues: MathIssue[];
}

function blank(text: string): string {
  return text.replace(/[^\n]/g, " ");
}

/**
 * Blank out fenced code blocks and inline code spans, keeping offsets and
 * line breaks where they were.
 */
export function maskCode(markdown: string): string {
  const lines = markdown.split("\n");
  let fence: string | null = null;

  const withoutFences = lines
    .map((line) => {
      const marker = line.match(/^ {0,3}(`{3,}|~{3,})/)?.[1];
      if (fence === null) {
        if (marker) {
          fence = marker;
          return blank(line);
        }
        return line;
      }
      if (marker && marker[0] === fence[0] && marker.length >= fence.length && line.trim() === marker) {
        fence = null;
      }
      return blank(line);
    })
    .join("\n");

  return withoutFences.replace(/(`+)(?:[^`\n]|\n(?![ \t]*\n))+?\1/g, blank);
}

interface OpenMath {
  delimiter: MathDelimiter;
  start: number;
  line: number;
}

function toSpan(open: OpenMath, end: number): MathSpan {
  return {
    start: open.start,
    end,
    open: open.delimiter,
    display: open.delimiter === "$$" || open.delimiter === "\\[",
    line: open.line,
  };
}

function isBlankLineAt(text: string, offset: number): boolean {
  const next = text.indexOf("\n", offset);
  const line = text.slice(offset, next === -1 ? text.length : next);
  return line.trim() === "";
}

/**
 * Find formula spans and unbalanced delimiters outside code. `\$` is a literal
 * dollar; an inline span may not run past a blank line.
 */
export function scanMath(markdown: string): MathScan {
  const text = maskCode(markdown);
  const spans: MathSpan[] = [];
  const issues: MathIssue[] = [];

  let open: OpenMath | null = null;
  let line = 1;
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    const next = text[i + 1];

    if (ch === "\n") {
      line++;
      i++;
      if (open && (open.delimiter === "$" || open.delimiter === "\\(") && isBlankLineAt(text, i)) {
        issues.push({
          line: open.line,
          message: `inline math opened with "${open.delimiter}" runs into a blank line without "${CLOSERS[open.delimiter]}"`,
        });
        open = null;
      }
      continue;
    }

    if (ch === "\\") {
      const bracket = next === "[" || next === "]" ? "[" : next === "(" || next === ")" ? "(" : null;
      const opener: MathDelimiter | null = bracket === "[" ? "\\[" : bracket === "(" ? "\\(" : null;
      const isOpening = next === "[" || next === "(";

      if (opener && isOpening && !open) {
        open = { delimiter: opener, start: i, line };
      } else if (opener && !isOpening && open?.delimiter === opener) {
        spans.push(toSpan(open, i + 2));
        open = null;
      } else if (opener && !isOpening && !open) {
        issues.push({ line, message: `closing "${CLOSERS[opener]}" without an opening "${opener}"` });
      }
      // Anything else is an escaped character, `\$` included. A trailing
      // backslash leaves the line break to the newline branch.
      i += next === "\n" ? 1 : 2;
      continue;
    }

    if (ch === "$") {
      const double = next === "$";
      if (!open) {
        open = { delimiter: double ? "$$" : "$", start: i, line };
        i += double ? 2 : 1;
      } else if (open.delimiter === "$$" && double) {
        spans.push(toSpan(open, i + 2));
        open = null;
        i += 2;
      } else if (open.delimiter === "$") {
        spans.push(toSpan(open, i + 1));
        open = null;
        i += 1;
      } else {
        i += double ? 2 : 1;
      }
      continue;
    }

    i++;
  }

  if (open) {
    issues.push({
      line: open.line,
      message: `"${open.delimiter}" is never closed with "${CLOSERS[open.delimiter]}"`,
    });
  }

  return { spans, issues };
}

export function escapeHtml(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}

export interface ProtectedMath {
  markdown: string;
  restore(html: string): string;
}

/**
 * Swap formula spans for placeholders so Markdown emphasis and escapes can't
 * touch them; `restore` puts the escaped TeX back into the rendered HTML.
 */
export function protectMath(markdown: string): ProtectedMath {
  const { spans } = scanMath(markdown);
  const sources: string[] = [];
  let result = "";
  let cursor = 0;

  spans.forEach((span, index) => {
    result += markdown.slice(cursor, span.start) + `MATHSPAN${index}X`;
    sources.push(markdown.slice(span.start, span.end));
    cursor = span.end;
  });
  result += markdown.slice(cursor);

  return {
    markdown: result,
    restore: (html) => html.replace(/MATHSPAN(\d+)X/g, (token, index: string) => {
      const source = sources[Number(index)];
      return source === undefined ? token : escapeHtml(source);
    }),
  };
}
