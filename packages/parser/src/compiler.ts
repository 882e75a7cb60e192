/**
 * Grammar text compiler: PEG notation to a Grammar.
 *
 * ```
 * # one rule per logical line
 * program   <- statement*
 * statement <- IDENT '=' expr ';'
 * expr      <- term (('+' / '-') term)*
 *              # indented lines without '<-' continue the rule above
 * term      <- NUMBER / IDENT / '(' expr ')'
 * ```
 *
 * Precedence, loosest first: choice `/`, sequence, prefixes `& ! @label:`,
 * suffixes `* + ?`, primaries.
 */

import { createLogger, type Logger } from "@grammarkit/core";
import {
  alt,
  between,
  char,
  describe,
  lazy,
  many,
  map,
  optional,
  regex,
  sepBy1,
  seq,
  token,
  type Failure,
  type Parser,
} from "./combinators.js";
import * as b from "./builder.js";
import { GrammarDefinitionError } from "./errors.js";
import { Grammar, type GrammarOptions } from "./grammar.js";
import { isTokenKind, type GrammarNode } from "./types.js";

export interface CompileOptions extends GrammarOptions {
  /** Throw on malformed lines instead of skipping them with a warning */
  strict?: boolean;
  logger?: Logger;
}

const RULE_LINE = /^([A-Za-z_]\w*)\s*<-\s*(.*)$/;

// ---------------------------------------------------------------------------
// Pattern notation
// ---------------------------------------------------------------------------

const ESCAPES: Readonly<Record<string, string>> = { n: "\n", r: "\r", t: "\t" };

function unescape(body: string): string {
  return body.replace(/\\(.)/g, (_, ch: string) => ESCAPES[ch] ?? ch);
}

const quoted: Parser<GrammarNode> = map(
  regex(/'(?:[^'\\]|\\.)*'|"(?:[^"\\]|\\.)*"/, "literal"),
  (text) => b.lit(unescape(text.slice(1, -1)))
);

const charClass: Parser<GrammarNode> = map(regex(/\[(?:[^\]\\]|\\.)*\]/, "character class"), (text) =>
  b.charClass(text.slice(1, -1))
);

const anyChar: Parser<GrammarNode> = map(char("."), () => b.any());

const reference: Parser<GrammarNode> = map(regex(/[A-Za-z_][A-Za-z0-9_]*/, "identifier"), (name) =>
  isTokenKind(name) ? b.token(name) : b.ref(name)
);

const group: Parser<GrammarNode> = between(
  token(char("(")),
  lazy(() => choice),
  token(char(")"))
);

const primary: Parser<GrammarNode> = token(alt(quoted, charClass, anyChar, group, reference));

const suffixed: Parser<GrammarNode> = map(
  seq(primary, optional(token(regex(/[*+?]/, "quantifier")))),
  ([node, suffix]) => {
    switch (suffix) {
      case "*":
        return b.star(node);
      case "+":
        return b.plus(node);
      case "?":
        return b.opt(node);
      default:
        return node;
    }
  }
);

const prefixed: Parser<GrammarNode> = describe(
  alt(
    map(seq(token(regex(/[&!]/, "predicate")), lazy(() => prefixed)), ([op, node]) =>
      op === "&" ? b.and(node) : b.not(node)
    ),
    map(seq(token(regex(/@[A-Za-z_][A-Za-z0-9_]*:/, "label")), lazy(() => prefixed)), ([tag, node]) =>
      b.label(tag.slice(1, -1), node)
    ),
    suffixed
  ),
  "pattern element"
);

const sequence: Parser<GrammarNode> = map(many(prefixed), (items) => {
  if (items.length === 0) return b.lit("");
  return items.length === 1 ? items[0] : b.seq(...items);
});

const choice: Parser<GrammarNode> = map(sepBy1(sequence, token(char("/"))), (items) =>
  items.length === 1 ? items[0] : b.choice(...items)
);

/** Parse a whole pattern, or describe why it cannot be parsed. */
export function parsePattern(text: string): { ok: true; node: GrammarNode } | { ok: false; failure: Failure } {
  const result = token(choice).parse(text, 0);
  if (!result.ok) return { ok: false, failure: result };

  const rest = result.pos + (/^[ \t]*/.exec(text.slice(result.pos))?.[0].length ?? 0);
  if (rest === text.length) return { ok: true, node: result.value };

  // Re-run the element that stopped the sequence to learn what it expected.
  const stuck = prefixed.parse(text, rest);
  return { ok: false, failure: stuck.ok ? { ok: false, pos: rest, expected: "'/'" } : stuck };
}

// ---------------------------------------------------------------------------
// Lines
// ---------------------------------------------------------------------------

interface LogicalLine {
  /** 1-based number of the line the rule starts on */
  line: number;
  text: string;
}

/** Cut a `#` comment that is not inside a literal or character class. */
function stripComment(line: string): string {
  let quote: string | undefined;
  let inClass = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === "\\") {
      i++;
    } else if (quote) {
      if (ch === quote) quote = undefined;
    } else if (inClass) {
      if (ch === "]") inClass = false;
    } else if (ch === "'" || ch === '"') {
      quote = ch;
    } else if (ch === "[") {
      inClass = true;
    } else if (ch === "#") {
      return line.slice(0, i);
    }
  }
  return line;
}

/**
 * Join continuation lines: an indented line without `<-` extends the rule
 * above it. A line starting with `|` is not a continuation.
 */
function logicalLines(text: string): LogicalLine[] {
  const lines: LogicalLine[] = [];
  text.split(/\r?\n/).forEach((raw, i) => {
    const content = stripComment(raw).trim();
    if (content === "") return;
    const previous = lines.at(-1);
    if (previous && /^\s/.test(raw) && !content.includes("<-")) {
      previous.text += " " + content;
    } else {
      lines.push({ line: i + 1, text: content });
    }
  });
  return lines;
}

function found(text: string, pos: number): string {
  return pos >= text.length ? "end of rule" : `'${text.slice(pos, pos + 20)}'`;
}

// ---------------------------------------------------------------------------
// Compiler
// ---------------------------------------------------------------------------

/**
 * Compile PEG notation into a Grammar.
 *
 * Malformed rule lines are skipped with a warning, or rejected when
 * `strict` is set. The result is not validated; call `validate()`.
 *
 * @throws GrammarDefinitionError in strict mode, listing every malformed line
 */
export function compileGrammar(text: string, options: CompileOptions = {}): Grammar {
  const log = options.logger ?? createLogger("compiler");
  const grammar = new Grammar(options);
  const problems: string[] = [];

  for (const { line, text: content } of logicalLines(text)) {
    const m = RULE_LINE.exec(content);
    if (!m) {
      problems.push(`Line ${line}: expected '<name> <- <pattern>', found '${content}'`);
      continue;
    }
    const [, name, body] = m;
    const pattern = parsePattern(body);
    if (!pattern.ok) {
      const { pos, expected } = pattern.failure;
      problems.push(`Line ${line}: expected ${expected}, found ${found(body, pos)}`);
      continue;
    }
    grammar.addRule(name, pattern.node);
  }

  if (problems.length > 0) {
    if (options.strict) {
      throw new GrammarDefinitionError(`Grammar '${grammar.name}' has malformed rules`, problems);
    }
    for (const problem of problems) log.warn(`Skipped malformed rule: ${problem}`);
  }
  return grammar;
}

/**
 * Compile a grammar written as a template literal. The raw template text is
 * used, so `'\n'` in the template is the two-character escape.
 *
 * ```ts
 * const grammar = peg`
 *   list <- '[' (NUMBER (',' NUMBER)*)? ']'
 * `;
 * ```
 */
export function peg(strings: TemplateStringsArray, ...values: unknown[]): Grammar {
  return compileGrammar(String.raw(strings, ...values));
}
