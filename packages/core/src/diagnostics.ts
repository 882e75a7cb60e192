/**
 * Terminal rendering for source diagnostics.
 *
 * Produces Rust-style excerpts: a header, a `-->` location line, and the
 * surrounding source lines in a numbered gutter with a caret under the
 * reported column.
 *
 * @example Output:
 * ```
 * error: unexpected ')'
 *   --> <input>:2:9
 *     |
 *   1 | x = 1
 *   2 | y = (2 + )
 *     |         ^
 *     |
 * ```
 */

// ============================================================================
// Colors
// ============================================================================

/**
 * ANSI color codes for terminal output.
 * Set NO_COLOR or GRAMMARKIT_NO_COLOR to disable.
 */
export const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
} as const;

export type ColorName = keyof typeof COLORS;

/**
 * Check if color output should be enabled.
 */
export function colorsEnabled(): boolean {
  if (typeof process === "undefined") return false;
  const env = process.env;
  return !env.NO_COLOR && !env.GRAMMARKIT_NO_COLOR && env.FORCE_COLOR !== "0";
}

/**
 * Apply color if colors are enabled.
 */
export function color(text: string, ...styles: ColorName[]): string {
  return paint(colorsEnabled(), text, styles);
}

function paint(enabled: boolean, text: string, styles: ColorName[]): string {
  if (!enabled || styles.length === 0) return text;
  const prefix = styles.map((s) => COLORS[s]).join("");
  return `${prefix}${text}${COLORS.reset}`;
}

// ============================================================================
// Source excerpts
// ============================================================================

export type Severity = "error" | "warning" | "info";

function severityColor(severity: Severity): "red" | "yellow" | "cyan" {
  switch (severity) {
    case "error":
      return "red";
    case "warning":
      return "yellow";
    case "info":
      return "cyan";
  }
}

function lineNumberWidth(maxLine: number): number {
  return Math.max(3, String(maxLine).length);
}

/**
 * Options for {@link renderSourceLocation}.
 */
export interface SourceLocationOptions {
  /** Whether to use colors (default: auto-detect) */
  colors?: boolean;
  /** Source lines shown before and after the reported line (default: 2) */
  contextLines?: number;
  /** Name shown on the location line (default: "<input>") */
  fileName?: string;
  /** Header label (default: "error") */
  severity?: Severity;
}

/**
 * Render a message pointing at a 1-based line and column of `source`.
 */
export function renderSourceLocation(
  source: string,
  line: number,
  column: number,
  message: string,
  options: SourceLocationOptions = {}
): string {
  const {
    colors = colorsEnabled(),
    contextLines = 2,
    fileName = "<input>",
    severity = "error",
  } = options;
  const c = (text: string, ...styles: ColorName[]): string => paint(colors, text, styles);
  const accent = severityColor(severity);

  const sourceLines = source.split("\n");
  const lastLine = sourceLines.length;
  const target = Math.min(Math.max(1, line), lastLine);
  const minLine = Math.max(1, target - contextLines);
  const maxLine = Math.min(lastLine, target + contextLines);
  const numWidth = lineNumberWidth(maxLine);
  const gutter = " ".repeat(numWidth);
  const bar = c("|", "blue");

  const out: string[] = [];
  out.push(`${c(severity, "bold", accent)}: ${c(message, "bold")}`);
  out.push(`  ${c("-->", "blue")} ${fileName}:${line}:${column}`);
  out.push(` ${gutter} ${bar}`);

  for (let lineNum = minLine; lineNum <= maxLine; lineNum++) {
    const text = sourceLines[lineNum - 1] ?? "";
    const num = String(lineNum).padStart(numWidth, " ");
    out.push(` ${c(num, "blue")} ${bar} ${text}`);
    if (lineNum === target) {
      const caret = " ".repeat(Math.max(0, column - 1)) + "^";
      out.push(` ${gutter} ${bar} ${c(caret, accent)}`);
    }
  }

  out.push(` ${gutter} ${bar}`);
  return out.join("\n");
}
