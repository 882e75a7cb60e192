/**
 * Whitespace and comment skipping.
 *
 * Besides the new position, every skip reports `reach`: one past the last
 * offset it looked at (`source.length + 1` when it observed the end of the
 * input). The incremental parser relies on these extents to know which
 * edits could change a skip's outcome.
 */

import { GrammarDefinitionError } from "./errors.js";

export interface Skip {
  pos: number;
  reach: number;
}

type ReachClass = "line" | "global";

interface CommentMatcher {
  readonly source: string;
  readonly regex: RegExp;
  /** Literal text every match begins with. */
  readonly prefix: string;
  /** How far a failed or successful attempt may have looked. */
  readonly reach: ReachClass;
}

// Constructs that let a match (or a failed attempt) run past a line break.
const CROSSES_LINES = /\\[sSnrtWDbBuxcfv0-9]|\[\^|\$|\(\?[=!<]|\n/;

const METACHARS = new Set(["\\", "^", "$", ".", "|", "?", "*", "+", "(", ")", "[", "]", "{", "}"]);
const QUANTIFIERS = new Set(["?", "*", "+", "{"]);

function literalPrefix(pattern: string): string {
  if (pattern.includes("|")) return "";
  let prefix = "";
  let i = 0;
  while (i < pattern.length) {
    let ch = pattern[i];
    let width = 1;
    if (ch === "\\") {
      const next = pattern[i + 1];
      if (next === undefined || /[A-Za-z0-9]/.test(next)) break;
      ch = next;
      width = 2;
    } else if (METACHARS.has(ch)) {
      break;
    }
    if (QUANTIFIERS.has(pattern[i + width] ?? "")) break;
    prefix += ch;
    i += width;
  }
  return prefix;
}

function compileComment(source: string): CommentMatcher {
  let regex: RegExp;
  try {
    regex = new RegExp(source, "y");
  } catch (e: unknown) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new GrammarDefinitionError("Invalid comment pattern", [
      `Comment pattern '${source}' is not a valid regular expression: ${reason}`,
    ]);
  }
  return {
    source,
    regex,
    prefix: literalPrefix(source),
    reach: CROSSES_LINES.test(source) ? "global" : "line",
  };
}

export class IgnoredText {
  private readonly comments: readonly CommentMatcher[];

  constructor(
    private readonly enabled: boolean,
    commentPatterns: readonly string[]
  ) {
    this.comments = enabled ? commentPatterns.map(compileComment) : [];
  }

  /** Skip whitespace and comments, repeating until nothing more is skipped. */
  skip(source: string, pos: number): Skip {
    return this.run(source, pos, " \t\r\n");
  }

  /** Like `skip`, but line breaks are significant and stay. */
  skipInline(source: string, pos: number): Skip {
    return this.run(source, pos, " \t");
  }

  private run(source: string, start: number, blanks: string): Skip {
    if (!this.enabled) return { pos: start, reach: start };
    const n = source.length;
    let pos = start;
    let reach = start;
    let changed = true;
    while (changed) {
      changed = false;
      while (pos < n && blanks.includes(source[pos])) {
        pos++;
        changed = true;
      }
      // The first character that is not a blank was looked at too.
      reach = Math.max(reach, pos + 1);
      for (const comment of this.comments) {
        const attempt = this.matchComment(comment, source, pos);
        reach = Math.max(reach, attempt.reach);
        if (attempt.length > 0) {
          pos += attempt.length;
          changed = true;
        }
      }
    }
    return { pos, reach };
  }

  private matchComment(
    comment: CommentMatcher,
    source: string,
    pos: number
  ): { length: number; reach: number } {
    const n = source.length;
    for (let i = 0; i < comment.prefix.length; i++) {
      if (source[pos + i] !== comment.prefix[i]) {
        return { length: 0, reach: Math.min(pos + i, n) + 1 };
      }
    }
    comment.regex.lastIndex = pos;
    const m = comment.regex.exec(source);
    const length = m ? m[0].length : 0;
    if (comment.reach === "global") return { length, reach: n + 1 };
    const lineEnd = source.indexOf("\n", pos);
    return { length, reach: (lineEnd === -1 ? n : lineEnd) + 1 };
  }
}
