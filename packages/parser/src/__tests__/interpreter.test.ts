import { describe, it, expect, afterEach } from "vitest";
import { config, setLogSink } from "@grammarkit/core";
import { compileGrammar } from "../compiler.js";
import { GrammarBuilder, charClass, choice, ident, lit, number, plus, ref, seq } from "../builder.js";
import { GrammarDefinitionError, ParseDepthError, ParseError } from "../errors.js";
import { PEGInterpreter } from "../interpreter.js";
import type { SourceAST } from "../source-ast.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const ASSIGN = `
  program   <- statement*
  statement <- IDENT '=' NUMBER ';'
`;

function interpreter(text: string): PEGInterpreter {
  return new PEGInterpreter(compileGrammar(text));
}

function parseError(run: () => unknown): ParseError {
  try {
    run();
  } catch (e) {
    if (e instanceof ParseError) return e;
    throw e;
  }
  throw new Error("expected a ParseError");
}

function types(node: SourceAST): string[] {
  return node.children.map((c) => c.type);
}

// ---------------------------------------------------------------------------
// Tree synthesis
// ---------------------------------------------------------------------------

describe("PEGInterpreter.parse", () => {
  afterEach(() => {
    setLogSink();
    config.reset();
  });

  it("parses an assignment into one statement node", () => {
    const ast = interpreter(ASSIGN).parse("x = 5 ;");
    expect(ast.type).toBe("program");
    expect(types(ast)).toEqual(["statement"]);
    expect(ast.find("Identifier")?.value).toBe("x");
    expect(ast.find("Number")?.value).toBe(5);
  });

  it("keeps operators as positioned leaves", () => {
    const ast = interpreter(ASSIGN).parse("x = 5 ;");
    expect(ast.children[0].toJSON()).toEqual({
      type: "statement",
      value: null,
      line: 1,
      column: 1,
      children: [
        { type: "Identifier", value: "x", children: [], line: 1, column: 1 },
        { type: "Operator", value: "=", children: [], line: 1, column: 3 },
        { type: "Number", value: 5, children: [], line: 1, column: 5 },
        { type: "Operator", value: ";", children: [], line: 1, column: 7 },
      ],
    });
  });

  it("records offsets and matched text", () => {
    const ast = interpreter(ASSIGN).parse("a = 1;\n  b = 22;");
    const second = ast.children[1];
    expect(second.start).toBe(9);
    expect(second.end).toBe(16);
    expect(second.text).toBe("b = 22;");
    expect(second.line).toBe(2);
    expect(second.column).toBe(3);
    expect(ast.text).toBe("a = 1;\n  b = 22;");
  });

  it("skips comments", () => {
    const g = compileGrammar(ASSIGN, { commentPatterns: ["//.*"] });
    const ast = new PEGInterpreter(g).parse("x = 1; // note\ny = 2;");
    expect(types(ast)).toEqual(["statement", "statement"]);
    expect(JSON.stringify(ast.toJSON())).not.toContain("note");
    expect(ast.children[1].line).toBe(2);
  });

  it("skips block comments with the default patterns", () => {
    const ast = interpreter(ASSIGN).parse("/* first */ x = 1; /* a\nb */ y = 2;");
    expect(ast.findAll("Identifier").map((n) => n.value)).toEqual(["x", "y"]);
  });

  it("does not let a keyword match the start of a longer word", () => {
    const p = interpreter(`
      kw         <- 'END' / endif_rule
      endif_rule <- 'ENDIF'
    `);
    const ast = p.parse("ENDIF");
    expect(ast.type).toBe("kw");
    expect(types(ast)).toEqual(["endif_rule"]);
    expect(ast.children[0].value).toBe("ENDIF");
    expect(p.parse("END").value).toBe("END");
  });

  it("commits to the first alternative that matches", () => {
    const p = interpreter("r <- 'a' / 'ab'");
    expect(p.parseRule("r", "a").value).toBe("a");
    const error = parseError(() => p.parse("ab"));
    expect(error.kind).toBe("trailing-input");
    expect(error.message).toBe("Unexpected input at line 1, column 2: 'b'");
  });

  it("stops repeating when the item matches empty", () => {
    const p = interpreter(`
      loop  <- inner*
      inner <- 'x'?
    `);
    expect(p.parse("xx").children.map((c) => c.value)).toEqual(["x", "x"]);
    expect(p.parse("").children).toEqual([]);
  });

  it("evaluates predicates without consuming input", () => {
    const p = interpreter(`
      word <- !'end' IDENT / &'end' 'end' IDENT
    `);
    expect(p.parse("total").children.map((c) => c.type)).toEqual(["Identifier"]);
    expect(types(p.parse("end x"))).toEqual(["Operator", "Identifier"]);
  });

  it("matches character classes and any character", () => {
    const p = interpreter("hex <- '#' [0-9a-f] [0-9a-f] .");
    const ast = p.parse("#a9z");
    expect(ast.children.map((c) => c.value)).toEqual(["#", "a", "9", "z"]);
    expect(() => p.parse("#a9")).toThrow(ParseError);
  });

  it("does not skip whitespace before a character class", () => {
    const p = interpreter("pair <- 'x' [0-9]");
    expect(p.parse("x1").children.map((c) => c.value)).toEqual(["x", "1"]);
    expect(() => p.parse("x 1")).toThrow(ParseError);
  });

  it("splices fragment rules into their parent", () => {
    const g = new GrammarBuilder()
      .rule("obj", seq(lit("{"), ref("pair"), lit("}")))
      .rule("pair", seq(ident(), lit(":"), number()), { fragment: true })
      .build();
    const ast = new PEGInterpreter(g).parse("{a:1}");
    expect(ast.type).toBe("obj");
    expect(ast.children.map((c) => `${c.type}:${String(c.value)}`)).toEqual([
      "Operator:{",
      "Identifier:a",
      "Operator::",
      "Number:1",
      "Operator:}",
    ]);
  });

  it("names nodes after the rule's node type", () => {
    const g = new GrammarBuilder()
      .rule("value", choice(ref("num"), ident()))
      .rule("num", number(), { nodeType: "Literal" })
      .build();
    const ast = new PEGInterpreter(g).parse("42");
    expect(types(ast)).toEqual(["Literal"]);
    expect(ast.find("Number")?.value).toBe(42);
  });

  it("wraps a fragment start rule in a Program node", () => {
    const g = new GrammarBuilder()
      .rule("items", seq(ident(), ident()), { fragment: true })
      .build();
    const ast = new PEGInterpreter(g).parse("a b");
    expect(ast.type).toBe("Program");
    expect(ast.children.map((c) => c.value)).toEqual(["a", "b"]);
  });

  it("is deterministic", () => {
    const p = interpreter(ASSIGN);
    expect(p.parse("a = 1; b = 2;").toJSON()).toEqual(p.parse("a = 1; b = 2;").toJSON());
  });

  it("builds the same tree without memoization", () => {
    const g = compileGrammar(`
      program <- (assign / call)*
      assign  <- IDENT '=' NUMBER ';'
      call    <- IDENT '(' ')' ';'
    `);
    const source = "f(); x = 1; g();";
    const memoized = new PEGInterpreter(g).parse(source).toJSON();
    expect(new PEGInterpreter(g, { memoize: false }).parse(source).toJSON()).toEqual(memoized);
  });
});

// ---------------------------------------------------------------------------
// Built-in tokens
// ---------------------------------------------------------------------------

describe("built-in tokens", () => {
  afterEach(() => setLogSink());

  const value = interpreter("value <- NUMBER / STRING / IDENT");

  it("reads integers, decimals and exponents", () => {
    expect(value.parse("7").children[0].value).toBe(7);
    expect(value.parse("3.25").children[0].value).toBe(3.25);
    expect(value.parse("1e3").children[0].value).toBe(1000);
    expect(value.parse("2.5E-2").children[0].value).toBe(0.025);
  });

  it("keeps numbers a double cannot hold as their text", () => {
    expect(value.parse("9007199254740991").children[0].value).toBe(9007199254740991);
    expect(value.parse("9007199254740993").children[0].value).toBe("9007199254740993");
    expect(value.parse("1e999").children[0].value).toBe("1e999");
    expect(value.parse("1e999").children[0].toJSON().value).toBe("1e999");
  });

  it("does not take a dot without digits", () => {
    const error = parseError(() => value.parse("7."));
    expect(error.message).toBe("Unexpected input at line 1, column 2: '.'");
  });

  it("keeps the raw text between quotes", () => {
    expect(value.parse(`"hi there"`).children[0].value).toBe("hi there");
    expect(value.parse(String.raw`'it\'s'`).children[0].value).toBe(String.raw`it\'s`);
    expect(value.parse(`"say 'hi'"`).children[0].type).toBe("String");
  });

  it("rejects an unterminated string", () => {
    const error = parseError(() => value.parse(`"abc`));
    expect(error.message).toBe(`Parse error at line 1, column 1 (in rule 'value'): unexpected '"abc'`);
  });

  it("reads identifiers", () => {
    expect(value.parse("_a1").children[0].toJSON()).toEqual({
      type: "Identifier",
      value: "_a1",
      children: [],
      line: 1,
      column: 1,
    });
  });

  it("matches line breaks with NEWLINE", () => {
    const p = interpreter(`
      lines <- line+
      line  <- IDENT NEWLINE
    `);
    const ast = p.parse("a\r\nb  \n");
    expect(ast.children.map((c) => c.children[0].value)).toEqual(["a", "b"]);
  });

  it("accepts only trailing whitespace at EOF", () => {
    const p = interpreter("program <- 'a' EOF");
    expect(p.parse("a  \n").type).toBe("program");
    const error = parseError(() => p.parse("a b"));
    expect(error.message).toBe("Parse error at line 1, column 3 (in rule 'program'): unexpected 'b'");
  });

  it("never matches reserved tokens and warns about them", () => {
    const lines: string[] = [];
    setLogSink((_, line) => lines.push(line));
    const p = interpreter("r <- INDENT / 'x'");
    expect(lines).toEqual([
      "[grammarkit:interpreter] Rule 'r' uses INDENT, which is reserved and never matches",
    ]);
    expect(p.parse("x").value).toBe("x");
  });
});

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

describe("syntax errors", () => {
  it("reports the furthest position reached", () => {
    const p = interpreter(`
      program   <- statement+
      statement <- IDENT '=' NUMBER ';'
    `);
    const error = parseError(() => p.parse("x = ;"));
    expect(error.kind).toBe("unexpected");
    expect(error.message).toBe("Parse error at line 1, column 5 (in rule 'statement'): unexpected ';'");
    expect(error.offset).toBe(4);
    expect(error.rule).toBe("statement");
    expect(error.snippet).toBe(";");
  });

  it("reports trailing input when the start rule stops early", () => {
    const error = parseError(() => interpreter(ASSIGN).parse("x = ;"));
    expect(error.kind).toBe("trailing-input");
    expect(error.message).toBe("Unexpected input at line 1, column 1: 'x = ;'");
    expect(error.rule).toBeUndefined();
  });

  it("locates errors on later lines", () => {
    const p = interpreter("program <- statement+ EOF\nstatement <- IDENT '=' NUMBER ';'");
    const error = parseError(() => p.parse("a = 1;\nb = 2\nc = 3;"));
    expect(error.message).toBe("Parse error at line 3, column 1 (in rule 'statement'): unexpected 'c = 3;'");
  });

  it("reports the end of input", () => {
    const p = interpreter("program <- statement+\nstatement <- IDENT '=' NUMBER ';'");
    const error = parseError(() => p.parse("x = 5"));
    expect(error.message).toBe(
      "Parse error at line 1, column 6 (in rule 'statement'): unexpected end of input"
    );
  });

  it("renders a source excerpt", () => {
    const p = interpreter("program <- statement+\nstatement <- IDENT '=' NUMBER ';'");
    const source = "x = ;";
    const error = parseError(() => p.parse(source));
    expect(error.format(source, { colors: false }).split("\n")).toEqual([
      "error: Parse error at line 1, column 5 (in rule 'statement'): unexpected ';'",
      "  --> <input>:1:5",
      "     |",
      "   1 | x = ;",
      "     |     ^",
      "     |",
    ]);
  });

  it("stops at the maximum rule depth", () => {
    const g = compileGrammar("e <- '(' e ')' / 'x'");
    const p = new PEGInterpreter(g, { maxDepth: 5 });
    expect(p.parse("((x))").type).toBe("e");

    const error = parseError(() => p.parse("((((((x))))))"));
    expect(error).toBeInstanceOf(ParseDepthError);
    expect(error.kind).toBe("depth-exceeded");
    expect(error.message).toBe("Maximum rule depth 5 exceeded at line 1, column 6 (in rule 'e')");
  });

  it("takes the depth limit from configuration", () => {
    config.set({ parser: { maxDepth: 3, memoize: false } });
    const p = interpreter(ASSIGN);
    expect(p.maxDepth).toBe(3);
    expect(p.memoize).toBe(false);
    config.reset();
    expect(interpreter(ASSIGN).maxDepth).toBe(1000);
  });

  it("refuses left-recursive grammars", () => {
    expect(() => interpreter("a <- a 'x' / 'y'")).toThrow(GrammarDefinitionError);
  });
});

// ---------------------------------------------------------------------------
// Entry points
// ---------------------------------------------------------------------------

describe("PEGInterpreter.parseRule", () => {
  const p = interpreter(`
    program   <- statement*
    statement <- IDENT '=' expr ';'
    expr      <- term (('+' / '-') term)*
    term      <- NUMBER / IDENT
  `);

  it("parses with any named rule", () => {
    const ast = p.parseRule("expr", "1 + a");
    expect(ast.type).toBe("expr");
    expect(types(ast)).toEqual(["term", "Operator", "term"]);
  });

  it("parses with a built-in token", () => {
    expect(p.parseRule("NUMBER", "42").value).toBe(42);
  });

  it("requires the whole text to match", () => {
    expect(() => p.parseRule("term", "1 2")).toThrow("Unexpected input at line 1, column 3: '2'");
  });

  it("matches character classes of rules added after construction", () => {
    const grammar = compileGrammar("program <- IDENT");
    const late = new PEGInterpreter(grammar);
    grammar.addRule("digits", plus(charClass("0-9")));
    const ast = late.parseRule("digits", "42");
    expect(ast.type).toBe("digits");
    expect(ast.children.map((c) => c.value)).toEqual(["4", "2"]);
  });

  it("rejects unknown rules", () => {
    expect(() => p.parseRule("nope", "x")).toThrow(
      "Cannot parse with rule 'nope': Rule 'nope' is not defined"
    );
  });

  it("traces which invocation produced each node", () => {
    const { ast, trace } = p.parseTraced("x = 1;");
    const statement = ast.children[0];
    const record = trace.nodeRecords.get(statement);
    expect(record?.ruleName).toBe("statement");
    expect(record?.start).toBe(0);
    expect(record?.end).toBe(6);
    expect(record?.parent?.ruleName).toBe("program");
    expect(trace.nodeRecords.get(ast)?.parent).toBeUndefined();
  });
});
