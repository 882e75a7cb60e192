import { describe, it, expect, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { config } from "@grammarkit/core";
import { defaultGrammar, grammarFromConfig, loadGrammarFromConfig } from "../config.js";
import { GrammarDefinitionError, ParseError } from "../errors.js";
import { PEGInterpreter } from "../interpreter.js";

function definitionError(run: () => unknown): GrammarDefinitionError {
  try {
    run();
  } catch (e) {
    if (e instanceof GrammarDefinitionError) return e;
    throw e;
  }
  throw new Error("expected a GrammarDefinitionError");
}

describe("defaultGrammar", () => {
  it("is a valid grammar starting at program", () => {
    const g = defaultGrammar();
    expect(g.name).toBe("default");
    expect(g.start).toBe("program");
    expect(g.validate()).toEqual([]);
  });

  it("parses assignments and arithmetic", () => {
    const ast = new PEGInterpreter(defaultGrammar()).parse("x = 1 + 2");
    expect(ast.children.map((c) => c.type)).toEqual(["statement"]);
    expect(ast.children[0].children[0].type).toBe("assignment");
    expect(ast.findAll("Number").map((n) => n.value)).toEqual([1, 2]);
  });

  it("does not read a keyword out of a longer identifier", () => {
    const ast = new PEGInterpreter(defaultGrammar()).parse("iffy = 1");
    expect(ast.findAll("if_stmt")).toEqual([]);
    expect(ast.find("Identifier")?.value).toBe("iffy");
  });
});

describe("grammarFromConfig", () => {
  it("falls back to the default grammar without rules", () => {
    expect(grammarFromConfig(undefined).name).toBe("default");
    expect(grammarFromConfig(null).name).toBe("default");
    expect(grammarFromConfig({ name: "empty", rules: {} }).name).toBe("default");
  });

  it("builds a grammar from rule patterns", () => {
    const g = grammarFromConfig({
      name: "assign",
      rules: { program: "statement*", statement: "IDENT '=' NUMBER ';'" },
    });
    expect(g.name).toBe("assign");
    expect(g.start).toBe("program");
    expect(g.skipWhitespace).toBe(true);
    expect(g.commentPatterns).toEqual(["//.*"]);

    const ast = new PEGInterpreter(g).parse("x = 1; // one\ny = 2;");
    expect(ast.findAll("statement")).toHaveLength(2);
  });

  it("takes the start rule and comment syntax from the record", () => {
    const g = grammarFromConfig({
      start: "list",
      comments: ["#.*"],
      rules: { item: "NUMBER", list: "item (',' item)*" },
    });
    expect(g.start).toBe("list");
    expect(g.commentPatterns).toEqual(["#.*"]);
  });

  it("accepts either spelling of the whitespace flag", () => {
    expect(grammarFromConfig({ skip_whitespace: false, rules: { a: "'a'" } }).skipWhitespace).toBe(false);
    const g = grammarFromConfig({ skipWhitespace: false, rules: { word: "[a-z]+" } });
    expect(g.skipWhitespace).toBe(false);
    expect(() => new PEGInterpreter(g).parse(" ab")).toThrow(ParseError);
  });

  it("rejects a record that is not an object", () => {
    const error = definitionError(() => grammarFromConfig("program <- 'a'"));
    expect(error.message).toBe("Invalid grammar configuration: Expected an object");
    expect(error.diagnostics).toEqual(["Expected an object"]);
  });

  it("reports every field with the wrong type", () => {
    const error = definitionError(() =>
      grammarFromConfig({ name: 3, skip_whitespace: "yes", comments: "#.*", rules: { a: 1 } })
    );
    expect(error.diagnostics).toEqual([
      "'name' must be a string",
      "'skip_whitespace' must be a boolean",
      "'comments' must be a list of regular expression strings",
      "Rule 'a' must be a pattern string",
    ]);
  });

  it("rejects rules that are not a mapping", () => {
    const error = definitionError(() => grammarFromConfig({ rules: ["a <- 'a'"] }));
    expect(error.diagnostics).toEqual(["'rules' must map rule names to pattern strings"]);
  });
});

describe("loadGrammarFromConfig", () => {
  afterEach(() => config.reset());

  it("reads the grammar section of the configuration", () => {
    config.set({ grammar: { name: "configured", rules: { greeting: "'hello' IDENT" } } });
    const g = loadGrammarFromConfig();
    expect(g.name).toBe("configured");
    expect(new PEGInterpreter(g).parse("hello world").find("Identifier")?.value).toBe("world");
  });

  it("reads a grammar declared in a config file", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "grammarkit-grammar-"));
    fs.writeFileSync(
      path.join(dir, ".grammarkitrc.json"),
      JSON.stringify({ grammar: { name: "from-file", rules: { pair: "IDENT ':' NUMBER" } } })
    );
    config.loadFrom(dir);

    const g = loadGrammarFromConfig();
    expect(g.name).toBe("from-file");
    expect(new PEGInterpreter(g).parse("width: 3").find("Number")?.value).toBe(3);
  });

  it("uses the default grammar when nothing is configured", () => {
    expect(loadGrammarFromConfig().name).toBe("default");
  });
});
