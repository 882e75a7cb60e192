/**
 * @grammarkit/parser: PEG grammars, a packrat interpreter and incremental
 * re-parsing.
 *
 * @example
 * ```typescript
 * import { compileGrammar, PEGInterpreter } from "@grammarkit/parser";
 *
 * const grammar = compileGrammar(`
 *   program   <- statement*
 *   statement <- IDENT '=' NUMBER ';'
 * `);
 * const ast = new PEGInterpreter(grammar).parse("x = 5;");
 * ```
 */

// Grammar model
export {
  BUILTIN_TOKENS,
  RESERVED_TOKENS,
  childNodes,
  isBuiltinToken,
  isTokenKind,
  type BuiltinToken,
  type GrammarNode,
  type GrammarNodeType,
  type NamedRule,
  type ReservedToken,
  type TokenKind,
} from "./types.js";
export {
  DEFAULT_COMMENT_PATTERNS,
  Grammar,
  type GrammarOptions,
  type RuleOptions,
} from "./grammar.js";

// Construction
export {
  GrammarBuilder,
  and,
  any,
  charClass,
  choice,
  ident,
  label,
  lit,
  not,
  number,
  opt,
  plus,
  ref,
  seq,
  star,
  string,
  token,
} from "./builder.js";
export { compileGrammar, parsePattern, peg, type CompileOptions } from "./compiler.js";
export {
  defaultGrammar,
  grammarFromConfig,
  loadGrammarFromConfig,
  type GrammarConfigOptions,
} from "./config.js";

// Parsing
export {
  PEGInterpreter,
  type InterpreterOptions,
  type Invocation,
  type Lexeme,
  type ParseTrace,
  type RuleRematch,
  type TracedParse,
} from "./interpreter.js";
export {
  LineIndex,
  SourceAST,
  type ASTValue,
  type ASTVisitor,
  type SourceASTInit,
  type SourceASTJSON,
} from "./source-ast.js";
export {
  IncrementalParser,
  type Edit,
  type EditTuple,
  type IncrementalParserOptions,
  type IncrementalStats,
  type Region,
} from "./incremental.js";

// Errors
export {
  GrammarDefinitionError,
  ParseDepthError,
  ParseError,
  type ParseErrorDetails,
  type ParseErrorKind,
} from "./errors.js";
