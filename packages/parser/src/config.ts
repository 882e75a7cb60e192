/**
 * Grammars described as configuration records.
 *
 * ```yaml
 * # .grammarkitrc.yaml
 * grammar:
 *   start: program
 *   comments: ["//.*"]
 *   rules:
 *     program: "statement*"
 *     statement: "IDENT '=' expr ';'"
 *     expr: "NUMBER / IDENT"
 * ```
 */

import { config, type GrammarConfigRecord, type Logger } from "@grammarkit/core";
import { compileGrammar } from "./compiler.js";
import { GrammarDefinitionError } from "./errors.js";
import type { Grammar } from "./grammar.js";

/** Statements (`def`, `if`, `while`, `for`, `return`, assignment) and expressions, without indentation. */
const DEFAULT_GRAMMAR = String.raw`
program        <- statement*
statement      <- function_def / if_stmt / while_stmt / for_stmt / return_stmt
                  / assignment / expr_stmt
function_def   <- 'def' IDENT '(' param_list? ')' ':' block
param_list     <- IDENT (',' IDENT)*
if_stmt        <- 'if' expr ':' block ('elif' expr ':' block)* ('else' ':' block)?
while_stmt     <- 'while' expr ':' block
for_stmt       <- 'for' IDENT 'in' expr ':' block
return_stmt    <- 'return' expr?
assignment     <- IDENT '=' expr
expr_stmt      <- expr
block          <- statement+
expr           <- comparison
comparison     <- addition (('==' / '!=' / '<=' / '>=' / '<' / '>') addition)*
addition       <- multiplication (('+' / '-') multiplication)*
multiplication <- unary (('*' / '/' / '%') unary)*
unary          <- ('-' / '!') unary / call
call           <- primary ('(' arg_list? ')')*
arg_list       <- expr (',' expr)*
primary        <- NUMBER / STRING / IDENT / '(' expr ')' / list_literal
list_literal   <- '[' (expr (',' expr)*)? ']'
`;

/** Comment syntax of a configured grammar that names none. */
const CONFIG_COMMENT_PATTERNS = ["//.*"];

export interface GrammarConfigOptions {
  strict?: boolean;
  logger?: Logger;
}

/** The grammar used when a configuration defines no rules. */
export function defaultGrammar(options: GrammarConfigOptions = {}): Grammar {
  return compileGrammar(DEFAULT_GRAMMAR, { ...options, name: "default" });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Check an untyped record against the configuration-record shape. Returns
 * the problems found, one message per field.
 */
function checkRecord(record: Record<string, unknown>): string[] {
  const problems: string[] = [];
  for (const key of ["name", "start"]) {
    if (record[key] !== undefined && typeof record[key] !== "string") {
      problems.push(`'${key}' must be a string`);
    }
  }
  for (const key of ["skip_whitespace", "skipWhitespace"]) {
    if (record[key] !== undefined && typeof record[key] !== "boolean") {
      problems.push(`'${key}' must be a boolean`);
    }
  }
  if (record.comments !== undefined && !isStringArray(record.comments)) {
    problems.push("'comments' must be a list of regular expression strings");
  }
  const rules = record.rules;
  if (rules !== undefined) {
    if (!isRecord(rules)) {
      problems.push("'rules' must map rule names to pattern strings");
    } else {
      for (const [name, pattern] of Object.entries(rules)) {
        if (typeof pattern !== "string") problems.push(`Rule '${name}' must be a pattern string`);
      }
    }
  }
  return problems;
}

function isGrammarConfigRecord(record: Record<string, unknown>): record is Record<string, unknown> & GrammarConfigRecord {
  return checkRecord(record).length === 0;
}

/**
 * Build a grammar from a configuration record. A missing record, or one
 * without rules, gives the default grammar.
 *
 * @throws GrammarDefinitionError if a field has the wrong type
 */
export function grammarFromConfig(record: unknown, options: GrammarConfigOptions = {}): Grammar {
  if (record === undefined || record === null) return defaultGrammar(options);
  if (!isRecord(record)) {
    throw new GrammarDefinitionError("Invalid grammar configuration", ["Expected an object"]);
  }
  if (!isGrammarConfigRecord(record)) {
    throw new GrammarDefinitionError("Invalid grammar configuration", checkRecord(record));
  }

  const rules = Object.entries(record.rules ?? {});
  if (rules.length === 0) return defaultGrammar(options);

  const skipWhitespace = record.skip_whitespace ?? record.skipWhitespace;
  const text = rules.map(([name, pattern]) => `${name} <- ${pattern}`).join("\n");
  return compileGrammar(text, {
    ...options,
    name: record.name ?? "custom",
    start: record.start,
    skipWhitespace: typeof skipWhitespace === "boolean" ? skipWhitespace : true,
    commentPatterns: record.comments ?? CONFIG_COMMENT_PATTERNS,
  });
}

/** The grammar declared under `grammar` in the project configuration. */
export function loadGrammarFromConfig(options: GrammarConfigOptions = {}): Grammar {
  return grammarFromConfig(config.get("grammar"), options);
}
