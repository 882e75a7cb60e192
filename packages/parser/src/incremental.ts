/**
 * Incremental re-parsing for editor workloads.
 *
 * An IncrementalParser owns one document: its text, its last good tree and
 * the invocation trace of the parse that produced it. An edit is first tried
 * in place: the smallest rule node containing it is re-matched at its
 * original offset and spliced into the tree. The splice is only taken when
 * the trace shows that no invocation outside that node (other than its
 * ancestors' own bookkeeping) looked at the edited characters, and the node
 * still ends where the edit says it should. Everything else is a full parse.
 *
 * Syntax errors never escape an edit: the previous tree is kept until the
 * text parses again.
 */

import { createLogger, invariant, type Logger } from "@grammarkit/core";
import { ParseError } from "./errors.js";
import type { Invocation, ParseTrace, PEGInterpreter, RuleRematch } from "./interpreter.js";
import { LineIndex, type SourceAST } from "./source-ast.js";

export interface Edit {
  /** Offset in the current text */
  offset: number;
  /** Number of characters replaced */
  oldLength: number;
  newText: string;
}

export type EditTuple = readonly [offset: number, oldLength: number, newText: string];

/** Span of the current text produced by one rule node. */
export interface Region {
  readonly start: number;
  readonly end: number;
  readonly node: SourceAST;
  readonly ruleName: string;
}

export interface IncrementalStats {
  /** parse() and applyEdit() calls */
  totalParses: number;
  /** Edits served by an in-place splice */
  incremental: number;
  /** Full parses, including explicit parse() calls */
  fullReparse: number;
  lastParseMs: number;
}

export interface IncrementalParserOptions {
  logger?: Logger;
}

interface RegionEntry extends Region {
  readonly depth: number;
}

export class IncrementalParser {
  readonly interpreter: PEGInterpreter;

  private readonly log: Logger;
  private text = "";
  private tree: SourceAST | undefined;
  private trace: ParseTrace | undefined;
  private entries: RegionEntry[] = [];
  private parents = new Map<SourceAST, SourceAST>();
  private counters: IncrementalStats = emptyStats();

  constructor(interpreter: PEGInterpreter, options: IncrementalParserOptions = {}) {
    this.interpreter = interpreter;
    this.log = options.logger ?? createLogger("incremental");
  }

  get source(): string {
    return this.text;
  }

  /** Last successfully parsed tree. */
  get ast(): SourceAST | undefined {
    return this.tree;
  }

  get regions(): readonly Region[] {
    return this.entries;
  }

  get stats(): IncrementalStats {
    return { ...this.counters };
  }

  /**
   * Parse a whole document, replacing any previous state.
   *
   * @throws ParseError
   */
  parse(source: string): SourceAST {
    const t0 = performance.now();
    this.counters.totalParses++;
    this.counters.fullReparse++;
    try {
      const { ast, trace } = this.interpreter.parseTraced(source);
      this.text = source;
      this.tree = ast;
      this.trace = trace;
      this.rebuildRegions();
      return ast;
    } finally {
      this.counters.lastParseMs = performance.now() - t0;
    }
  }

  /**
   * Replace `oldLength` characters at `offset` with `newText` and bring the
   * tree up to date. Returns the current tree, which is the previous one if
   * the edited text does not parse.
   *
   * @throws RangeError if the edited span is not inside the current text
   */
  applyEdit(offset: number, oldLength: number, newText: string): SourceAST | undefined {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.text.length) {
      throw new RangeError(`Edit offset ${offset} is outside the text (length ${this.text.length})`);
    }
    if (!Number.isInteger(oldLength) || oldLength < 0 || offset + oldLength > this.text.length) {
      throw new RangeError(
        `Edit of ${oldLength} characters at ${offset} runs past the end of the text (length ${this.text.length})`
      );
    }

    const t0 = performance.now();
    this.counters.totalParses++;
    this.text = this.text.slice(0, offset) + newText + this.text.slice(offset + oldLength);

    const edit: Edit = { offset, oldLength, newText };
    const region = this.trySplice(edit);
    if (region) {
      this.counters.incremental++;
      this.log.debug(`Edit at ${offset}: re-matched '${region.ruleName}' in place`);
    } else {
      this.counters.fullReparse++;
      this.log.debug(`Edit at ${offset}: full re-parse`);
      this.reparse();
    }

    this.counters.lastParseMs = performance.now() - t0;
    return this.tree;
  }

  /**
   * Apply several edits, all given in offsets of the current text. They are
   * applied from the highest offset down so earlier offsets stay valid.
   */
  applyEdits(edits: readonly (Edit | EditTuple)[]): SourceAST | undefined {
    const ordered = edits
      .map((e): Edit => (isEditTuple(e) ? { offset: e[0], oldLength: e[1], newText: e[2] } : e))
      .sort((a, b) => b.offset - a.offset);
    for (const e of ordered) this.applyEdit(e.offset, e.oldLength, e.newText);
    return this.tree;
  }

  /** Drop the region cache so the next edit re-parses fully. */
  invalidate(): void {
    this.trace = undefined;
    this.entries = [];
    this.parents = new Map();
  }

  /** Forget the document and the statistics. */
  reset(): void {
    this.invalidate();
    this.text = "";
    this.tree = undefined;
    this.counters = emptyStats();
  }

  // ==========================================================================
  // Full parse
  // ==========================================================================

  private reparse(): void {
    try {
      const { ast, trace } = this.interpreter.parseTraced(this.text);
      this.tree = ast;
      this.trace = trace;
      this.rebuildRegions();
    } catch (e: unknown) {
      if (!(e instanceof ParseError)) throw e;
      this.log.debug(`Keeping previous tree: ${e.message}`);
      this.invalidate();
    }
  }

  private rebuildRegions(): void {
    this.entries = [];
    this.parents = new Map();
    const trace = this.trace;
    if (!this.tree || !trace) return;
    this.tree.walk((node, parent, depth) => {
      if (!parent) return;
      this.parents.set(node, parent);
      const record = trace.nodeRecords.get(node);
      if (record) {
        this.entries.push({ start: node.start, end: node.end, node, ruleName: record.ruleName, depth });
      }
    });
  }

  // ==========================================================================
  // In-place splice
  // ==========================================================================

  /** Returns the region that was re-matched, or undefined if a full parse is needed. */
  private trySplice(edit: Edit): Region | undefined {
    if (!this.tree || !this.trace) return undefined;
    const { offset, oldLength } = edit;
    const editEnd = offset + oldLength;

    const candidates = this.entries
      .filter((r) =>
        oldLength === 0 ? r.start < offset && offset < r.end : r.start <= offset && editEnd <= r.end
      )
      .sort((a, b) => a.end - a.start - (b.end - b.start) || b.depth - a.depth);

    for (const region of candidates) {
      if (this.splice(region, edit, this.tree, this.trace)) return region;
    }
    return undefined;
  }

  private splice(region: RegionEntry, edit: Edit, tree: SourceAST, trace: ParseTrace): boolean {
    const { offset, oldLength, newText } = edit;
    const editEnd = offset + oldLength;
    const delta = newText.length - oldLength;
    const touches = (from: number, to: number): boolean =>
      to > offset && (from <= offset || from < editEnd);

    const record = trace.nodeRecords.get(region.node);
    const parent = this.parents.get(region.node);
    if (!record || !parent) return false;

    // The invocation chain above the node must be exactly its tree
    // ancestors plus successful fragment rules in between.
    const treeAncestors = new Set<Invocation>();
    for (let p: SourceAST | undefined = parent; p; p = this.parents.get(p)) {
      const r = trace.nodeRecords.get(p);
      if (r) treeAncestors.add(r);
    }
    const chain = new Set<Invocation>();
    let reached = 0;
    for (let r = record.parent; r; r = r.parent) {
      if (treeAncestors.has(r)) reached++;
      else if (!r.fragment || r.end < 0) return false;
      chain.add(r);
    }
    if (reached !== treeAncestors.size) return false;

    const inside = insideOf(record);
    for (const r of trace.invocations) {
      if (inside(r)) continue;
      if (chain.has(r)) {
        for (let i = 0; i < r.direct.length; i += 2) {
          if (touches(r.direct[i], r.direct[i + 1])) return false;
        }
      } else if (touches(r.start, r.reach)) {
        return false;
      }
    }

    const result = this.rematch(record, trace);
    const fresh = result?.node;
    if (!result?.ok || !fresh || result.end !== record.end + delta) return false;

    const index = parent.children.indexOf(region.node);
    invariant(index >= 0, `Region '${region.ruleName}' is not a child of its parent node`);
    parent.children[index] = fresh;

    this.shiftNodes(tree, fresh, offset, editEnd, delta);
    const invocations = trace.invocations.filter((r) => !inside(r));
    for (const r of invocations) shiftRecord(r, offset, editEnd, delta);
    invocations.push(...result.invocations);
    this.trace = { invocations, nodeRecords: trace.nodeRecords };
    this.rebuildRegions();
    return true;
  }

  private rematch(record: Invocation, trace: ParseTrace): RuleRematch | undefined {
    try {
      return this.interpreter.rematch(record.ruleName, this.text, record.start, {
        parent: record.parent,
        depth: record.depth,
        nodeRecords: trace.nodeRecords,
      });
    } catch (e: unknown) {
      // Nesting too deep: the full parse reports it.
      if (e instanceof ParseError) return undefined;
      throw e;
    }
  }

  /** Move every node outside `fresh` to its offsets in the edited text. */
  private shiftNodes(
    tree: SourceAST,
    fresh: SourceAST,
    offset: number,
    editEnd: number,
    delta: number
  ): void {
    const lines = new LineIndex(this.text);
    const visited = new Set<SourceAST>();
    tree.walk((node) => {
      if (node === fresh || visited.has(node)) return false;
      visited.add(node);
      if (node.start >= editEnd) {
        node.start += delta;
        node.end += delta;
      } else if (node.end > offset) {
        node.end += delta;
      }
      const { line, column } = lines.locate(node.start);
      node.line = line;
      node.column = column;
      node.text = this.text.slice(node.start, node.end);
    });
  }
}

function emptyStats(): IncrementalStats {
  return { totalParses: 0, incremental: 0, fullReparse: 0, lastParseMs: 0 };
}

function isEditTuple(edit: Edit | EditTuple): edit is EditTuple {
  return Array.isArray(edit);
}

/** Predicate for invocations made (transitively) by `root`, `root` included. */
function insideOf(root: Invocation): (record: Invocation) => boolean {
  const known = new Map<Invocation, boolean>();
  const inside = (record: Invocation): boolean => {
    const cached = known.get(record);
    if (cached !== undefined) return cached;
    const result = record === root || (record.parent !== undefined && inside(record.parent));
    known.set(record, result);
    return result;
  };
  return inside;
}

function shiftRecord(record: Invocation, offset: number, editEnd: number, delta: number): void {
  if (record.start >= editEnd) {
    record.start += delta;
    if (record.end >= 0) record.end += delta;
    record.reach += delta;
  } else {
    if (record.end > offset) record.end += delta;
    if (record.reach > offset) record.reach += delta;
  }
  const d = record.direct;
  for (let i = 0; i < d.length; i += 2) {
    if (d[i] >= editEnd) {
      d[i] += delta;
      d[i + 1] += delta;
    }
  }
}
