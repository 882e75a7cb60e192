/**
 * Grammar: the rule table a PEG interpreter executes.
 *
 * Rules are registered by name and interned to small integer ids (the
 * built-in tokens take ids 0-4). `validate()` reports problems as plain
 * strings; callers decide which of them are fatal.
 */

import { createLogger } from "@grammarkit/core";
import {
  BUILTIN_TOKENS,
  childNodes,
  isBuiltinToken,
  type GrammarNode,
  type NamedRule,
  type TokenKind,
} from "./types.js";

const log = createLogger("grammar");

/** Comment syntax skipped when a grammar does not name its own. */
export const DEFAULT_COMMENT_PATTERNS: readonly string[] = ["//.*", "/\\*[\\s\\S]*?\\*/"];

export interface GrammarOptions {
  /** Grammar name (default "custom") */
  name?: string;
  /** Start rule; defaults to "program" if declared, else the first rule */
  start?: string;
  /** Skip whitespace and comments before rules and tokens (default true) */
  skipWhitespace?: boolean;
  /** Regular expressions matching comments */
  commentPatterns?: readonly string[];
}

export interface RuleOptions {
  /** Kind of the produced SourceAST node (defaults to the rule name) */
  nodeType?: string;
  /** Match without producing a node of its own */
  fragment?: boolean;
  description?: string;
}

export class Grammar {
  readonly name: string;
  readonly skipWhitespace: boolean;
  readonly commentPatterns: readonly string[];

  private readonly explicitStart: string | undefined;
  private readonly table = new Map<string, NamedRule>();
  private readonly ids = new Map<string, number>();

  constructor(options: GrammarOptions = {}) {
    this.name = options.name ?? "custom";
    this.explicitStart = options.start;
    this.skipWhitespace = options.skipWhitespace ?? true;
    this.commentPatterns = [...(options.commentPatterns ?? DEFAULT_COMMENT_PATTERNS)];
    BUILTIN_TOKENS.forEach((token, id) => this.ids.set(token, id));
  }

  /** Name of the rule parsing begins with. */
  get start(): string {
    if (this.explicitStart !== undefined) return this.explicitStart;
    if (this.table.has("program")) return "program";
    const first = this.table.keys().next();
    return first.done ? "program" : first.value;
  }

  get rules(): ReadonlyMap<string, NamedRule> {
    return this.table;
  }

  /** Number of interned ids (built-ins included). */
  get idCount(): number {
    return this.ids.size;
  }

  /** Register a rule, replacing any rule of the same name. */
  addRule(name: string, pattern: GrammarNode, options: RuleOptions = {}): this {
    if (isBuiltinToken(name)) {
      log.warn(`Rule '${name}' is unreachable: references to '${name}' match the built-in token`);
    }
    this.table.set(name, {
      name,
      pattern,
      nodeType: options.nodeType || name,
      fragment: options.fragment ?? false,
      description: options.description ?? "",
    });
    if (!this.ids.has(name)) this.ids.set(name, this.ids.size);
    return this;
  }

  getRule(name: string): NamedRule | undefined {
    return this.table.get(name);
  }

  hasRule(name: string): boolean {
    return this.table.has(name);
  }

  /** Interned id of a rule or built-in token name. */
  ruleId(name: string): number | undefined {
    return this.ids.get(name);
  }

  /**
   * Check the grammar before parsing. Returns one message per problem:
   * undefined references, a missing start rule, invalid character classes
   * or comment patterns, and left recursion.
   */
  validate(): string[] {
    const errors: string[] = [];

    for (const [name, rule] of this.table) {
      walk(rule.pattern, (node) => {
        if (node.type === "ruleRef" && !this.table.has(node.name) && !isBuiltinToken(node.name)) {
          errors.push(`Rule '${name}' references undefined rule '${node.name}'`);
        }
        if (node.type === "charClass") {
          const problem = regexProblem(`[${node.pattern}]`);
          if (problem) {
            errors.push(`Rule '${name}' has an invalid character class [${node.pattern}]: ${problem}`);
          }
        }
      });
    }

    if (!this.table.has(this.start)) {
      errors.push(`Start rule '${this.start}' is not defined`);
    }

    for (const pattern of this.commentPatterns) {
      const problem = regexProblem(pattern);
      if (problem) errors.push(`Comment pattern '${pattern}' is not a valid regular expression: ${problem}`);
    }

    errors.push(...this.leftRecursion());
    return errors;
  }

  /** Left-recursion diagnostics only, one per offending rule. */
  leftRecursion(): string[] {
    const errors: string[] = [];
    const nullable = new NullableAnalysis(this.table);
    for (const name of this.table.keys()) {
      const path = this.leftRecursionPath(name, nullable);
      if (path) {
        errors.push(`Rule '${name}' is left-recursive (not allowed in PEG): ${path.join(" -> ")}`);
      }
    }
    return errors;
  }

  /**
   * Depth-first search over the rules each rule can invoke before
   * consuming input; returns the path back to `start` if there is one.
   */
  private leftRecursionPath(start: string, nullable: NullableAnalysis): string[] | undefined {
    const visited = new Set<string>();
    const search = (name: string, path: string[]): string[] | undefined => {
      const rule = this.table.get(name);
      if (!rule) return undefined;
      for (const ref of leadingRefs(rule.pattern, nullable)) {
        if (ref === start) return [...path, ref];
        if (visited.has(ref)) continue;
        visited.add(ref);
        const found = search(ref, [...path, ref]);
        if (found) return found;
      }
      return undefined;
    };
    return search(start, [start]);
  }
}

// ---------------------------------------------------------------------------
// Analysis helpers
// ---------------------------------------------------------------------------

function walk(node: GrammarNode, visit: (node: GrammarNode) => void): void {
  visit(node);
  for (const child of childNodes(node)) walk(child, visit);
}

function regexProblem(source: string): string | undefined {
  try {
    new RegExp(source);
    return undefined;
  } catch (e: unknown) {
    return e instanceof Error ? e.message : String(e);
  }
}

/** Which rules can succeed without consuming input. */
class NullableAnalysis {
  private readonly cache = new Map<string, boolean>();
  private readonly pending = new Set<string>();

  constructor(private readonly rules: ReadonlyMap<string, NamedRule>) {}

  rule(name: string): boolean {
    if (isBuiltinToken(name)) return tokenNullable(name);
    const cached = this.cache.get(name);
    if (cached !== undefined) return cached;
    const rule = this.rules.get(name);
    // Undefined rules never succeed; a rule already being analyzed is
    // left-recursive and reported separately.
    if (!rule || this.pending.has(name)) return false;
    this.pending.add(name);
    const result = this.node(rule.pattern);
    this.pending.delete(name);
    this.cache.set(name, result);
    return result;
  }

  node(node: GrammarNode): boolean {
    switch (node.type) {
      case "sequence":
        return node.items.every((item) => this.node(item));
      case "choice":
        return node.items.some((item) => this.node(item));
      case "zeroOrMore":
      case "optional":
      case "and":
      case "not":
        return true;
      case "oneOrMore":
        return this.node(node.item);
      case "literal":
        return node.value === "";
      case "charClass":
      case "any":
        return false;
      case "ruleRef":
        return this.rule(node.name);
      case "tokenRef":
        return tokenNullable(node.token);
    }
  }
}

function tokenNullable(token: TokenKind): boolean {
  return token === "EOF";
}

/** Rules a node can invoke at the offset it starts at. */
function leadingRefs(node: GrammarNode, nullable: NullableAnalysis): string[] {
  switch (node.type) {
    case "ruleRef":
      return [node.name];
    case "sequence": {
      const refs: string[] = [];
      for (const item of node.items) {
        refs.push(...leadingRefs(item, nullable));
        if (!nullable.node(item)) break;
      }
      return refs;
    }
    case "choice":
      return node.items.flatMap((item) => leadingRefs(item, nullable));
    case "zeroOrMore":
    case "oneOrMore":
    case "optional":
    case "and":
    case "not":
      return leadingRefs(node.item, nullable);
    case "literal":
    case "charClass":
    case "any":
    case "tokenRef":
      return [];
  }
}
