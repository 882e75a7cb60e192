/**
 * Programmatic grammar construction.
 *
 * ```ts
 * const grammar = new GrammarBuilder("assign")
 *   .rule("program", star(ref("statement")))
 *   .rule("statement", seq(ident(), lit("="), number(), lit(";")))
 *   .build();
 * ```
 */

import { GrammarDefinitionError } from "./errors.js";
import { DEFAULT_COMMENT_PATTERNS, Grammar, type RuleOptions } from "./grammar.js";
import type { GrammarNode, TokenKind } from "./types.js";

// ---------------------------------------------------------------------------
// Node constructors
// ---------------------------------------------------------------------------

export function seq(...items: GrammarNode[]): GrammarNode {
  return { type: "sequence", items };
}

/** Ordered choice: the first alternative that matches wins. */
export function choice(...items: GrammarNode[]): GrammarNode {
  return { type: "choice", items };
}

export function star(item: GrammarNode): GrammarNode {
  return { type: "zeroOrMore", item };
}

export function plus(item: GrammarNode): GrammarNode {
  return { type: "oneOrMore", item };
}

export function opt(item: GrammarNode): GrammarNode {
  return { type: "optional", item };
}

/** Positive lookahead; consumes nothing. */
export function and(item: GrammarNode): GrammarNode {
  return { type: "and", item };
}

/** Negative lookahead; consumes nothing. */
export function not(item: GrammarNode): GrammarNode {
  return { type: "not", item };
}

export function lit(value: string): GrammarNode {
  return { type: "literal", value };
}

/** One character matching the bracket body `pattern` (without the brackets). */
export function charClass(pattern: string): GrammarNode {
  return { type: "charClass", pattern };
}

export function any(): GrammarNode {
  return { type: "any" };
}

export function ref(name: string): GrammarNode {
  return { type: "ruleRef", name };
}

export function token(kind: TokenKind): GrammarNode {
  return { type: "tokenRef", token: kind };
}

/** Attach a capture label. */
export function label(name: string, node: GrammarNode): GrammarNode {
  return { ...node, label: name };
}

export const ident = (): GrammarNode => token("IDENT");
export const number = (): GrammarNode => token("NUMBER");
export const string = (): GrammarNode => token("STRING");

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

export class GrammarBuilder {
  private readonly rules: { name: string; pattern: GrammarNode; options: RuleOptions }[] = [];
  private startRule: string | undefined;
  private skip = true;
  private commentPatterns: readonly string[] = DEFAULT_COMMENT_PATTERNS;

  constructor(private readonly name = "custom") {}

  rule(name: string, pattern: GrammarNode, options: RuleOptions = {}): this {
    this.rules.push({ name, pattern, options });
    return this;
  }

  start(name: string): this {
    this.startRule = name;
    return this;
  }

  skipWhitespace(flag: boolean): this {
    this.skip = flag;
    return this;
  }

  comments(patterns: readonly string[]): this {
    this.commentPatterns = [...patterns];
    return this;
  }

  /**
   * Build and validate the grammar.
   *
   * @throws GrammarDefinitionError listing every problem `Grammar.validate()` finds
   */
  build(): Grammar {
    const grammar = new Grammar({
      name: this.name,
      start: this.startRule,
      skipWhitespace: this.skip,
      commentPatterns: this.commentPatterns,
    });
    for (const { name, pattern, options } of this.rules) grammar.addRule(name, pattern, options);

    const errors = grammar.validate();
    if (errors.length > 0) {
      throw new GrammarDefinitionError(`Grammar '${this.name}' is invalid`, errors);
    }
    return grammar;
  }
}
