/**
 * PEG interpreter: executes a Grammar against source text.
 *
 * Packrat parsing: each (rule id, offset) pair is matched at most once per
 * parse. Failures are reported at the furthest offset any attempt reached.
 *
 * Every rule invocation also leaves an {@link Invocation} record describing
 * which offsets it looked at. Nothing in a plain parse needs them; the
 * incremental parser uses them to prove that re-matching a single rule is
 * equivalent to parsing the whole document again.
 */

import { config, createLogger, unreachable, type Logger } from "@grammarkit/core";
import { GrammarDefinitionError, ParseDepthError, ParseError } from "./errors.js";
import type { Grammar } from "./grammar.js";
import { IgnoredText, type Skip } from "./ignored.js";
import { LineIndex, SourceAST, type ASTValue } from "./source-ast.js";
import {
  childNodes,
  isBuiltinToken,
  type GrammarNode,
  type NamedRule,
  type TokenKind,
} from "./types.js";

// ============================================================================
// Types
// ============================================================================

/** Matched text not yet wrapped in a node. */
export interface Lexeme {
  readonly text: string;
  readonly start: number;
  readonly end: number;
}

type Fragment = SourceAST | Lexeme;

interface Match {
  ok: boolean;
  pos: number;
  value?: Fragment;
  children: Fragment[];
}

/** What one rule invocation did during a parse. */
export interface Invocation {
  readonly ruleId: number;
  readonly ruleName: string;
  readonly fragment: boolean;
  /** Offset the rule was invoked at, before skipping whitespace. */
  start: number;
  /** Offset after the match, or -1 if the rule failed. */
  end: number;
  /** One past the furthest offset this invocation or its callees looked at. */
  reach: number;
  /** Intervals inspected by the rule itself, flattened as [from, to, from, to, ...]. */
  direct: number[];
  /** Invocation that first called this one. */
  parent: Invocation | undefined;
  readonly depth: number;
}

export interface ParseTrace {
  readonly invocations: Invocation[];
  /** The invocation that produced each rule node. */
  readonly nodeRecords: WeakMap<SourceAST, Invocation>;
}

export interface TracedParse {
  ast: SourceAST;
  trace: ParseTrace;
}

export interface RuleRematch {
  ok: boolean;
  end: number;
  node: SourceAST | undefined;
  record: Invocation | undefined;
  invocations: Invocation[];
}

export interface InterpreterOptions {
  /** Maximum nesting of rule invocations (default: config `parser.maxDepth`) */
  maxDepth?: number;
  /** Packrat memoization (default: config `parser.memoize`) */
  memoize?: boolean;
  logger?: Logger;
}

interface MemoEntry {
  match: Match;
  record: Invocation;
}

/** Literals that must end at a word boundary. */
const KEYWORD = /^\p{L}{2,}$/u;
const WORD_CHAR = /[\p{L}\p{N}_]/u;
const IDENT_RE = /[A-Za-z_][A-Za-z0-9_]*/y;
const WHITESPACE = /\s/;

function fail(pos: number): Match {
  return { ok: false, pos, children: [] };
}

/** Numbers a double cannot hold exactly keep their source text. */
function numberValue(text: string): ASTValue {
  const value = Number(text);
  if (!Number.isFinite(value)) return text;
  if (/^\d+$/.test(text) && !Number.isSafeInteger(value)) return text;
  return value;
}

function isDigit(code: number): boolean {
  return code >= 48 && code <= 57;
}

function configured<T>(path: string, guard: (value: unknown) => value is T, fallback: T): T {
  const value = config.get(path);
  return guard(value) ? value : fallback;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function isBoolean(value: unknown): value is boolean {
  return typeof value === "boolean";
}

// ============================================================================
// Interpreter
// ============================================================================

export class PEGInterpreter {
  readonly grammar: Grammar;
  readonly maxDepth: number;
  readonly memoize: boolean;

  private readonly log: Logger;
  private readonly ignored: IgnoredText;
  private readonly charClasses = new Map<string, RegExp>();

  // Per-parse state
  private source = "";
  private lines = new LineIndex("");
  private memo: (Map<number, MemoEntry> | undefined)[] = [];
  private maxPos = 0;
  private maxRule = "";
  private depth = 0;
  private current: Invocation | undefined;
  private invocations: Invocation[] = [];
  private nodeRecords = new WeakMap<SourceAST, Invocation>();

  constructor(grammar: Grammar, options: InterpreterOptions = {}) {
    const recursion = grammar.leftRecursion();
    if (recursion.length > 0) {
      throw new GrammarDefinitionError(`Grammar '${grammar.name}' cannot be executed`, recursion);
    }

    this.grammar = grammar;
    this.maxDepth = options.maxDepth ?? configured("parser.maxDepth", isPositiveInteger, 1000);
    this.memoize = options.memoize ?? configured("parser.memoize", isBoolean, true);
    this.log = options.logger ?? createLogger("interpreter");
    this.ignored = new IgnoredText(grammar.skipWhitespace, grammar.commentPatterns);

    for (const rule of grammar.rules.values()) this.prepare(rule, rule.pattern);
  }

  private prepare(rule: NamedRule, node: GrammarNode): void {
    if (node.type === "charClass") this.charClass(node.pattern, rule.name);
    if (node.type === "tokenRef" && (node.token === "INDENT" || node.token === "DEDENT")) {
      this.log.warn(`Rule '${rule.name}' uses ${node.token}, which is reserved and never matches`);
    }
    for (const child of childNodes(node)) this.prepare(rule, child);
  }

  /**
   * Parse `source` with the grammar's start rule. All input except trailing
   * whitespace must be consumed.
   *
   * @throws ParseError
   */
  parse(source: string): SourceAST {
    return this.parseTraced(source).ast;
  }

  /** {@link parse}, also returning the invocation records of the run. */
  parseTraced(source: string): TracedParse {
    return this.run(this.grammar.start, source, "Program");
  }

  /**
   * Parse the whole of `text` as one occurrence of `ruleName`.
   *
   * @throws GrammarDefinitionError if the grammar has no such rule
   * @throws ParseError
   */
  parseRule(ruleName: string, text: string): SourceAST {
    const rule = this.grammar.getRule(ruleName);
    if (!rule && !isBuiltinToken(ruleName)) {
      throw new GrammarDefinitionError(`Cannot parse with rule '${ruleName}'`, [
        `Rule '${ruleName}' is not defined`,
      ]);
    }
    return this.run(ruleName, text, rule?.nodeType ?? ruleName).ast;
  }

  /**
   * Match `ruleName` at `start` of `source` with a fresh memo table, as the
   * callee of `parent` at nesting `depth`. Used by the incremental parser.
   *
   * @internal
   */
  rematch(
    ruleName: string,
    source: string,
    start: number,
    context: {
      parent: Invocation | undefined;
      depth: number;
      nodeRecords: WeakMap<SourceAST, Invocation>;
    }
  ): RuleRematch {
    this.begin(source);
    this.nodeRecords = context.nodeRecords;
    this.depth = context.depth - 1;
    const match = this.matchRule(ruleName, start);
    const record = this.invocations.at(-1);
    if (record) record.parent = context.parent;
    return {
      ok: match.ok,
      end: match.pos,
      node: match.value instanceof SourceAST ? match.value : undefined,
      record,
      invocations: this.invocations,
    };
  }

  private begin(source: string): void {
    this.source = source;
    this.lines = new LineIndex(source);
    this.memo = [];
    this.maxPos = 0;
    this.maxRule = "";
    this.depth = 0;
    this.current = undefined;
    this.invocations = [];
    this.nodeRecords = new WeakMap();
  }

  private run(ruleName: string, source: string, fallbackType: string): TracedParse {
    const t0 = performance.now();
    this.begin(source);
    this.maxRule = ruleName;

    const result = this.matchRule(ruleName, 0);
    if (!result.ok) {
      throw this.unexpected();
    }

    let rest = result.pos;
    while (rest < source.length && WHITESPACE.test(source[rest])) rest++;
    if (rest < source.length) {
      throw new ParseError({
        kind: "trailing-input",
        offset: rest,
        ...this.lines.locate(rest),
        snippet: source.slice(rest).trim().slice(0, 30),
      });
    }

    const ast =
      result.value instanceof SourceAST ? result.value : this.wrap(fallbackType, result, 0);
    const trace: ParseTrace = { invocations: this.invocations, nodeRecords: this.nodeRecords };
    this.log.debug(
      `Parsed ${source.length} characters with '${ruleName}' in ${(performance.now() - t0).toFixed(2)}ms`
    );
    return { ast, trace };
  }

  // ==========================================================================
  // Rules
  // ==========================================================================

  private matchRule(name: string, pos: number): Match {
    const id = this.grammar.ruleId(name);
    if (id === undefined) return fail(pos);

    if (this.memoize) {
      const hit = this.memo[id]?.get(pos);
      if (hit) {
        // The caller depends on everything the memoized invocation looked at.
        this.inspect(hit.record.start, hit.record.reach);
        return hit.match;
      }
    }

    if (pos > this.maxPos) {
      this.maxPos = pos;
      this.maxRule = name;
    }
    if (this.depth >= this.maxDepth) {
      throw new ParseDepthError(
        { offset: pos, ...this.lines.locate(pos), rule: name, snippet: this.snippet(pos) },
        this.maxDepth
      );
    }

    const rule = isBuiltinToken(name) ? undefined : this.grammar.getRule(name);
    const caller = this.current;
    const record: Invocation = {
      ruleId: id,
      ruleName: name,
      fragment: rule?.fragment ?? false,
      start: pos,
      end: -1,
      reach: pos,
      direct: [],
      parent: caller,
      depth: this.depth + 1,
    };

    this.current = record;
    this.depth++;
    let match: Match;
    try {
      if (isBuiltinToken(name)) {
        match = this.matchToken(name, pos);
      } else if (rule) {
        match = this.applyRule(rule, record, pos);
      } else {
        match = fail(pos);
      }
    } finally {
      this.current = caller;
      this.depth--;
    }

    if (match.ok) record.end = match.pos;
    if (caller) caller.reach = Math.max(caller.reach, record.reach);
    this.invocations.push(record);
    if (this.memoize) {
      let table = this.memo[id];
      if (!table) {
        table = new Map();
        this.memo[id] = table;
      }
      table.set(pos, { match, record });
    }
    return match;
  }

  private applyRule(rule: NamedRule, record: Invocation, pos: number): Match {
    const start = this.skip(pos);
    const body = this.matchNode(rule.pattern, start);
    if (!body.ok || rule.fragment) return body;

    const node = this.wrap(rule.nodeType, body, start);
    this.nodeRecords.set(node, record);
    return { ok: true, pos: body.pos, value: node, children: [] };
  }

  /** Build the node a successful rule match produces. */
  private wrap(type: string, body: Match, start: number): SourceAST {
    const node = this.node(type, start, body.pos);
    const value = body.value;
    if (value instanceof SourceAST) {
      node.children = [value];
    } else if (value && value.text !== "") {
      node.value = value.text;
    } else {
      for (const child of body.children) {
        if (child instanceof SourceAST) {
          node.children.push(child);
        } else if (child.text.trim() !== "") {
          node.children.push(this.leaf("Operator", child.start, child.end, child.text));
        }
      }
    }
    return node;
  }

  // ==========================================================================
  // Grammar nodes
  // ==========================================================================

  private matchNode(node: GrammarNode, pos: number): Match {
    switch (node.type) {
      case "literal":
        return this.matchLiteral(node.value, pos);
      case "charClass":
        return this.matchCharClass(node.pattern, pos);
      case "any":
        this.attempt(pos);
        this.inspect(pos, pos + 1);
        return pos < this.source.length ? this.lexeme(pos, pos + 1) : fail(pos);
      case "ruleRef":
        return this.matchRule(node.name, pos);
      case "tokenRef":
        return this.matchToken(node.token, pos);
      case "sequence":
        return this.matchSequence(node.items, pos);
      case "choice":
        for (const item of node.items) {
          const result = this.matchNode(item, pos);
          if (result.ok) return result;
        }
        return fail(pos);
      case "zeroOrMore":
        return this.matchRepeat(node.item, pos, 0);
      case "oneOrMore":
        return this.matchRepeat(node.item, pos, 1);
      case "optional": {
        const result = this.matchNode(node.item, pos);
        return result.ok ? result : { ok: true, pos, children: [] };
      }
      case "and":
        return { ok: this.matchNode(node.item, pos).ok, pos, children: [] };
      case "not":
        return { ok: !this.matchNode(node.item, pos).ok, pos, children: [] };
      default:
        return unreachable(node);
    }
  }

  private matchSequence(items: readonly GrammarNode[], pos: number): Match {
    const collected: Fragment[] = [];
    let cur = pos;
    for (const item of items) {
      const result = this.matchNode(item, cur);
      if (!result.ok) return fail(pos);
      cur = result.pos;
      collect(collected, result);
    }
    return { ok: true, pos: cur, children: collected };
  }

  private matchRepeat(item: GrammarNode, pos: number, min: number): Match {
    const collected: Fragment[] = [];
    let cur = pos;
    let count = 0;
    for (;;) {
      const result = this.matchNode(item, cur);
      // Stop on failure or when the sub-pattern no longer advances.
      if (!result.ok || result.pos === cur) break;
      cur = result.pos;
      count++;
      collect(collected, result);
    }
    if (count < min) return fail(pos);
    return { ok: true, pos: cur, children: collected };
  }

  private matchLiteral(text: string, pos: number): Match {
    const p = this.skip(pos);
    const n = this.source.length;
    this.attempt(p);

    let k = 0;
    while (k < text.length && this.source[p + k] === text[k]) k++;
    if (k < text.length) {
      this.inspect(p, Math.min(p + k, n) + 1);
      return fail(p);
    }

    const end = p + text.length;
    if (KEYWORD.test(text)) {
      // END must not match the start of ENDIF.
      this.inspect(p, Math.min(end, n) + 1);
      if (end < n && WORD_CHAR.test(this.source[end])) return fail(p);
    } else {
      this.inspect(p, end);
    }
    return this.lexeme(p, end);
  }

  private matchCharClass(pattern: string, pos: number): Match {
    this.attempt(pos);
    this.inspect(pos, pos + 1);
    if (pos >= this.source.length) return fail(pos);
    const regex = this.charClass(pattern, this.current?.ruleName ?? this.grammar.start);
    regex.lastIndex = pos;
    return regex.test(this.source) ? this.lexeme(pos, pos + 1) : fail(pos);
  }

  /** Compiled class, built on first use for rules added after construction. */
  private charClass(pattern: string, ruleName: string): RegExp {
    const known = this.charClasses.get(pattern);
    if (known) return known;
    let regex: RegExp;
    try {
      regex = new RegExp(`[${pattern}]`, "y");
    } catch (e: unknown) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new GrammarDefinitionError(`Grammar '${this.grammar.name}' cannot be executed`, [
        `Rule '${ruleName}' has an invalid character class [${pattern}]: ${reason}`,
      ]);
    }
    this.charClasses.set(pattern, regex);
    return regex;
  }

  // ==========================================================================
  // Built-in tokens
  // ==========================================================================

  private matchToken(kind: TokenKind, pos: number): Match {
    switch (kind) {
      case "NUMBER":
        return this.matchNumber(this.skip(pos));
      case "STRING":
        return this.matchString(this.skip(pos));
      case "IDENT":
        return this.matchIdent(this.skip(pos));
      case "NEWLINE":
        return this.matchNewline(this.skip(pos, true));
      case "EOF":
        return this.matchEof(this.skip(pos));
      case "INDENT":
      case "DEDENT":
        return fail(pos);
    }
  }

  private matchNumber(p: number): Match {
    const src = this.source;
    const n = src.length;
    const digits = (i: number): number => {
      while (i < n && isDigit(src.charCodeAt(i))) i++;
      return i;
    };
    this.attempt(p);

    const intEnd = digits(p);
    if (intEnd === p) {
      this.inspect(p, p + 1);
      return fail(p);
    }
    let end = intEnd;
    let seen = intEnd;
    if (src[intEnd] === ".") {
      const fracEnd = digits(intEnd + 1);
      seen = fracEnd;
      if (fracEnd > intEnd + 1) end = fracEnd;
    }
    if (src[end] === "e" || src[end] === "E") {
      let k = end + 1;
      if (src[k] === "+" || src[k] === "-") k++;
      const expEnd = digits(k);
      seen = Math.max(seen, expEnd);
      if (expEnd > k) end = expEnd;
    }
    this.inspect(p, seen + 1);

    return this.token("Number", p, end, numberValue(src.slice(p, end)));
  }

  private matchString(p: number): Match {
    const src = this.source;
    const n = src.length;
    this.attempt(p);
    const quote = src[p];
    if (quote !== '"' && quote !== "'") {
      this.inspect(p, p + 1);
      return fail(p);
    }
    let i = p + 1;
    while (i < n) {
      const ch = src[i];
      if (ch === "\\" && i + 1 < n) {
        i += 2;
      } else if (ch === quote) {
        this.inspect(p, i + 1);
        return this.token("String", p, i + 1, src.slice(p + 1, i));
      } else {
        i++;
      }
    }
    // Unterminated
    this.inspect(p, n + 1);
    return fail(p);
  }

  private matchIdent(p: number): Match {
    this.attempt(p);
    IDENT_RE.lastIndex = p;
    const m = IDENT_RE.exec(this.source);
    if (!m) {
      this.inspect(p, p + 1);
      return fail(p);
    }
    const end = p + m[0].length;
    this.inspect(p, end + 1);
    return this.token("Identifier", p, end, m[0]);
  }

  private matchNewline(p: number): Match {
    this.attempt(p);
    if (this.source[p] === "\n") {
      this.inspect(p, p + 1);
      return { ok: true, pos: p + 1, children: [] };
    }
    if (this.source.startsWith("\r\n", p)) {
      this.inspect(p, p + 2);
      return { ok: true, pos: p + 2, children: [] };
    }
    this.inspect(p, Math.min(p + 2, this.source.length + 1));
    return fail(p);
  }

  private matchEof(p: number): Match {
    this.attempt(p);
    const n = this.source.length;
    let i = p;
    while (i < n && WHITESPACE.test(this.source[i])) i++;
    this.inspect(p, i + 1);
    return i === n ? { ok: true, pos: p, children: [] } : fail(p);
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private skip(pos: number, inline = false): number {
    const skipped: Skip = inline
      ? this.ignored.skipInline(this.source, pos)
      : this.ignored.skip(this.source, pos);
    this.inspect(pos, skipped.reach);
    return skipped.pos;
  }

  /** Record that the current invocation looked at [from, to). */
  private inspect(from: number, to: number): void {
    const record = this.current;
    if (!record || to <= from) return;
    if (to > record.reach) record.reach = to;
    const d = record.direct;
    const last = d.length - 2;
    if (last >= 0 && from >= d[last] && from <= d[last + 1]) {
      d[last + 1] = Math.max(d[last + 1], to);
    } else {
      d.push(from, to);
    }
  }

  /** Track the furthest offset a terminal was tried at. */
  private attempt(pos: number): void {
    if (pos > this.maxPos) {
      this.maxPos = pos;
      this.maxRule = this.current?.ruleName ?? this.maxRule;
    }
  }

  private unexpected(): ParseError {
    const offset = this.maxPos;
    return new ParseError({
      kind: "unexpected",
      offset,
      ...this.lines.locate(offset),
      rule: this.maxRule,
      snippet: this.snippet(offset),
    });
  }

  private snippet(offset: number): string {
    return this.source.slice(offset, offset + 30).split("\n")[0];
  }

  private node(type: string, start: number, end: number): SourceAST {
    return new SourceAST(type, {
      start,
      end,
      text: this.source.slice(start, end),
      ...this.lines.locate(start),
    });
  }

  private leaf(type: string, start: number, end: number, value: ASTValue): SourceAST {
    const node = this.node(type, start, end);
    node.value = value;
    return node;
  }

  private lexeme(start: number, end: number): Match {
    return {
      ok: true,
      pos: end,
      value: { text: this.source.slice(start, end), start, end },
      children: [],
    };
  }

  private token(type: string, start: number, end: number, value: ASTValue): Match {
    return { ok: true, pos: end, value: this.leaf(type, start, end, value), children: [] };
  }
}

function collect(into: Fragment[], result: Match): void {
  if (result.value !== undefined) into.push(result.value);
  into.push(...result.children);
}
