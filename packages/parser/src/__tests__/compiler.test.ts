import { describe, it, expect, afterEach } from "vitest";
import { setLogSink } from "@grammarkit/core";
import { compileGrammar, parsePattern, peg } from "../compiler.js";
import { GrammarDefinitionError } from "../errors.js";
import { charClass, choice, label, lit, not, opt, plus, ref, seq, star, token } from "../builder.js";
import type { GrammarNode } from "../types.js";

// ---------------------------------------------------------------------------
// Helper
// ---------------------------------------------------------------------------

function pattern(text: string): GrammarNode {
  const result = parsePattern(text);
  if (!result.ok) throw new Error(`pattern did not parse: ${result.failure.expected}`);
  return result.node;
}

function captureWarnings(): string[] {
  const lines: string[] = [];
  setLogSink((level, line) => {
    if (level === "warn") lines.push(line);
  });
  return lines;
}

// ---------------------------------------------------------------------------
// Rules and lines
// ---------------------------------------------------------------------------

describe("compileGrammar", () => {
  afterEach(() => setLogSink());

  it("compiles one rule per line", () => {
    const g = compileGrammar(`
      program   <- statement*
      statement <- IDENT '=' NUMBER ';'
    `);
    expect([...g.rules.keys()]).toEqual(["program", "statement"]);
    expect(g.getRule("program")?.pattern).toEqual(star(ref("statement")));
    expect(g.getRule("statement")?.pattern).toEqual(
      seq(token("IDENT"), lit("="), token("NUMBER"), lit(";"))
    );
    expect(g.start).toBe("program");
    expect(g.validate()).toEqual([]);
  });

  it("passes grammar options through", () => {
    const g = compileGrammar("expr <- NUMBER", {
      name: "calc",
      start: "expr",
      skipWhitespace: false,
      commentPatterns: [";.*"],
    });
    expect(g.name).toBe("calc");
    expect(g.start).toBe("expr");
    expect(g.skipWhitespace).toBe(false);
    expect(g.commentPatterns).toEqual([";.*"]);
  });

  it("joins indented continuation lines", () => {
    const g = compileGrammar(["expr <- term", "    (('+' / '-') term)*", "term <- NUMBER"].join("\n"));
    expect(g.getRule("expr")?.pattern).toEqual(
      seq(ref("term"), star(seq(choice(lit("+"), lit("-")), ref("term"))))
    );
    expect(g.getRule("term")?.pattern).toEqual(token("NUMBER"));
  });

  it("ignores comment lines and trailing comments", () => {
    const g = compileGrammar(["# statements", "stmt <- 'a' # the letter a", "", "hash <- '#' [#]"].join("\n"));
    expect(g.getRule("stmt")?.pattern).toEqual(lit("a"));
    expect(g.getRule("hash")?.pattern).toEqual(seq(lit("#"), charClass("#")));
  });

  it("skips a line without '<-' and warns", () => {
    const warnings = captureWarnings();
    const g = compileGrammar("program <- 'a'\njunk");
    expect([...g.rules.keys()]).toEqual(["program"]);
    expect(warnings).toEqual([
      "[grammarkit:compiler] Skipped malformed rule: Line 2: expected '<name> <- <pattern>', found 'junk'",
    ]);
  });

  it("does not treat a line starting with '|' as a continuation", () => {
    const warnings = captureWarnings();
    const g = compileGrammar("r <- 'a'\n| 'b'");
    expect(g.getRule("r")?.pattern).toEqual(lit("a"));
    expect(warnings).toEqual([
      "[grammarkit:compiler] Skipped malformed rule: Line 2: expected '<name> <- <pattern>', found '| 'b''",
    ]);
  });

  it("skips a rule whose pattern has a stray '|'", () => {
    const warnings = captureWarnings();
    const g = compileGrammar("r <- 'a'\n  | 'b'");
    expect(g.rules.size).toBe(0);
    expect(warnings).toEqual([
      "[grammarkit:compiler] Skipped malformed rule: Line 1: expected pattern element, found '| 'b''",
    ]);
  });

  it("reports an unbalanced group at the end of the rule", () => {
    const warnings = captureWarnings();
    compileGrammar("r <- ('a' 'b'");
    expect(warnings).toEqual([
      "[grammarkit:compiler] Skipped malformed rule: Line 1: expected ')', found end of rule",
    ]);
  });

  it("throws in strict mode", () => {
    const compile = () => compileGrammar("ok <- 'a'\nbad <- 'unterminated", { strict: true });
    expect(compile).toThrow(GrammarDefinitionError);
    expect(compile).toThrow(
      "Grammar 'custom' has malformed rules: Line 2: expected pattern element, found ''unterminated'"
    );
  });

  it("compiles a template literal from its raw text", () => {
    const g = peg`
      list <- '[' (NUMBER (',' NUMBER)*)? ']'
      tab  <- '\t'
    `;
    expect(g.getRule("list")?.pattern).toEqual(
      seq(lit("["), opt(seq(token("NUMBER"), star(seq(lit(","), token("NUMBER"))))), lit("]"))
    );
    expect(g.getRule("tab")?.pattern).toEqual(lit("\t"));
  });
});

// ---------------------------------------------------------------------------
// Pattern notation
// ---------------------------------------------------------------------------

describe("parsePattern", () => {
  it("binds prefixes looser than suffixes", () => {
    expect(pattern("!a*")).toEqual(not(star(ref("a"))));
    expect(pattern("@x:b?")).toEqual(label("x", opt(ref("b"))));
  });

  it("binds sequence tighter than choice", () => {
    expect(pattern("a b / c")).toEqual(choice(seq(ref("a"), ref("b")), ref("c")));
  });

  it("allows whitespace before a suffix", () => {
    expect(pattern("a +")).toEqual(plus(ref("a")));
  });

  it("processes escapes in literals", () => {
    expect(pattern(String.raw`'\n' "\"" '\\' '\q'`)).toEqual(
      seq(lit("\n"), lit('"'), lit("\\"), lit("q"))
    );
  });

  it("keeps character class bodies verbatim", () => {
    expect(pattern(String.raw`[a-z\]]`)).toEqual(charClass("a-z\\]"));
  });

  it("turns built-in names into token references", () => {
    expect(pattern("NEWLINE EOF INDENT")).toEqual(
      seq(token("NEWLINE"), token("EOF"), token("INDENT"))
    );
  });

  it("reads an empty pattern as the empty literal", () => {
    expect(pattern("")).toEqual(lit(""));
  });

  it("reports what it expected and where", () => {
    expect(parsePattern("a )")).toEqual({
      ok: false,
      failure: { ok: false, pos: 2, expected: "pattern element" },
    });
  });
});
