/**
 * Core types for @grammarkit/parser
 *
 * Defines the grammar node model (the PEG expression IR), named rules and
 * the built-in token kinds.
 */

/** Token kinds the interpreter recognizes without a user rule. */
export const BUILTIN_TOKENS = ["NUMBER", "STRING", "IDENT", "NEWLINE", "EOF"] as const;

/** Token names the notation reserves but the interpreter never matches. */
export const RESERVED_TOKENS = ["INDENT", "DEDENT"] as const;

export type BuiltinToken = (typeof BUILTIN_TOKENS)[number];
export type ReservedToken = (typeof RESERVED_TOKENS)[number];
export type TokenKind = BuiltinToken | ReservedToken;

/** Grammar node IR: one PEG construct. Every variant may carry a capture label. */
export type GrammarNode =
  | { readonly type: "sequence"; readonly items: readonly GrammarNode[]; readonly label?: string }
  | { readonly type: "choice"; readonly items: readonly GrammarNode[]; readonly label?: string }
  | { readonly type: "zeroOrMore"; readonly item: GrammarNode; readonly label?: string }
  | { readonly type: "oneOrMore"; readonly item: GrammarNode; readonly label?: string }
  | { readonly type: "optional"; readonly item: GrammarNode; readonly label?: string }
  | { readonly type: "and"; readonly item: GrammarNode; readonly label?: string }
  | { readonly type: "not"; readonly item: GrammarNode; readonly label?: string }
  | { readonly type: "literal"; readonly value: string; readonly label?: string }
  | { readonly type: "charClass"; readonly pattern: string; readonly label?: string }
  | { readonly type: "any"; readonly label?: string }
  | { readonly type: "ruleRef"; readonly name: string; readonly label?: string }
  | { readonly type: "tokenRef"; readonly token: TokenKind; readonly label?: string };

export type GrammarNodeType = GrammarNode["type"];

/** A named rule of a grammar. */
export interface NamedRule {
  readonly name: string;
  readonly pattern: GrammarNode;
  /** Kind of the SourceAST node the rule produces (defaults to the rule name). */
  readonly nodeType: string;
  /** Fragment rules match without wrapping their result in a new node. */
  readonly fragment: boolean;
  readonly description: string;
}

const builtinNames: ReadonlySet<string> = new Set(BUILTIN_TOKENS);
const tokenNames: ReadonlySet<string> = new Set([...BUILTIN_TOKENS, ...RESERVED_TOKENS]);

export function isBuiltinToken(name: string): name is BuiltinToken {
  return builtinNames.has(name);
}

export function isTokenKind(name: string): name is TokenKind {
  return tokenNames.has(name);
}

/** Direct sub-nodes of a grammar node, in order. */
export function childNodes(node: GrammarNode): readonly GrammarNode[] {
  switch (node.type) {
    case "sequence":
    case "choice":
      return node.items;
    case "zeroOrMore":
    case "oneOrMore":
    case "optional":
    case "and":
    case "not":
      return [node.item];
    case "literal":
    case "charClass":
    case "any":
    case "ruleRef":
    case "tokenRef":
      return [];
  }
}
