/**
 * Error types raised by grammar construction and parsing.
 */

import { renderSourceLocation, type SourceLocationOptions } from "@grammarkit/core";

/** Grammar cannot be built: one message per problem found. */
export class GrammarDefinitionError extends Error {
  readonly diagnostics: readonly string[];

  constructor(message: string, diagnostics: readonly string[]) {
    super(diagnostics.length > 0 ? `${message}: ${diagnostics.join("; ")}` : message);
    this.name = "GrammarDefinitionError";
    this.diagnostics = diagnostics;
  }
}

export type ParseErrorKind = "unexpected" | "trailing-input" | "depth-exceeded";

export interface ParseErrorDetails {
  kind: ParseErrorKind;
  /** Zero-based offset of the reported position. */
  offset: number;
  line: number;
  column: number;
  /** Rule active at the reported position, when known. */
  rule?: string;
  /** Source text shown in the message. */
  snippet: string;
}

/** Syntax error located at the furthest position any match attempt reached. */
export class ParseError extends Error {
  readonly kind: ParseErrorKind;
  readonly offset: number;
  readonly line: number;
  readonly column: number;
  readonly rule: string | undefined;
  readonly snippet: string;

  constructor(details: ParseErrorDetails, message: string = describe(details)) {
    super(message);
    this.name = "ParseError";
    this.kind = details.kind;
    this.offset = details.offset;
    this.line = details.line;
    this.column = details.column;
    this.rule = details.rule;
    this.snippet = details.snippet;
  }

  /** Render the error as a source excerpt with a caret under the position. */
  format(source: string, options?: SourceLocationOptions): string {
    return renderSourceLocation(source, this.line, this.column, this.message, options);
  }
}

/** The rule nesting limit was exceeded before the parse could finish. */
export class ParseDepthError extends ParseError {
  readonly maxDepth: number;

  constructor(details: Omit<ParseErrorDetails, "kind">, maxDepth: number) {
    super(
      { ...details, kind: "depth-exceeded" },
      `Maximum rule depth ${maxDepth} exceeded at line ${details.line}, column ${details.column}` +
        (details.rule ? ` (in rule '${details.rule}')` : "")
    );
    this.name = "ParseDepthError";
    this.maxDepth = maxDepth;
  }
}

function describe(details: ParseErrorDetails): string {
  const { line, column, rule, snippet } = details;
  if (details.kind === "trailing-input") {
    return `Unexpected input at line ${line}, column ${column}: '${snippet}'`;
  }
  const found = snippet === "" ? "end of input" : `'${snippet}'`;
  return `Parse error at line ${line}, column ${column} (in rule '${rule ?? ""}'): unexpected ${found}`;
}
