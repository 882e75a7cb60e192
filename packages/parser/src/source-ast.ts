/**
 * SourceAST: the generic parse tree the interpreter produces.
 *
 * `toJSON()` is the encoding downstream consumers match on:
 * `{ type, value, children, line, column }`. Offsets (`start`, `end`) and
 * the matched `text` are kept alongside for editors and incremental
 * re-parsing.
 */

export type ASTValue = string | number | null;

export interface SourceASTJSON {
  type: string;
  value: ASTValue;
  children: SourceASTJSON[];
  line: number;
  column: number;
}

export interface SourceASTInit {
  value?: ASTValue;
  children?: SourceAST[];
  line?: number;
  column?: number;
  start?: number;
  end?: number;
  text?: string;
}

/** Return `false` to skip a node's children. */
export type ASTVisitor = (node: SourceAST, parent: SourceAST | undefined, depth: number) => void | false;

export class SourceAST {
  type: string;
  value: ASTValue;
  children: SourceAST[];
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
  /** Offset of the first matched character. */
  start: number;
  /** Offset just past the last matched character. */
  end: number;
  /** Raw matched source slice. */
  text: string;

  constructor(type: string, init: SourceASTInit = {}) {
    this.type = type;
    this.value = init.value ?? null;
    this.children = init.children ?? [];
    this.line = init.line ?? 0;
    this.column = init.column ?? 0;
    this.start = init.start ?? 0;
    this.end = init.end ?? this.start;
    this.text = init.text ?? "";
  }

  toJSON(): SourceASTJSON {
    return {
      type: this.type,
      value: this.value,
      children: this.children.map((c) => c.toJSON()),
      line: this.line,
      column: this.column,
    };
  }

  toString(): string {
    if (this.value !== null) return `${this.type}(${JSON.stringify(this.value)})`;
    if (this.children.length > 0) return `${this.type}[${this.children.length}]`;
    return this.type;
  }

  /** One node per line, children indented two spaces. */
  pretty(indent = 0): string {
    const lines = [`${"  ".repeat(indent)}${this.toString()}`];
    for (const child of this.children) lines.push(child.pretty(indent + 1));
    return lines.join("\n");
  }

  /** Depth-first, parents before children. */
  walk(visitor: ASTVisitor): void {
    const visit = (node: SourceAST, parent: SourceAST | undefined, depth: number): void => {
      if (visitor(node, parent, depth) === false) return;
      for (const child of node.children) visit(child, node, depth + 1);
    };
    visit(this, undefined, 0);
  }

  /** First node of the given type, this node included. */
  find(type: string): SourceAST | undefined {
    let found: SourceAST | undefined;
    this.walk((node) => {
      if (found) return false;
      if (node.type === type) {
        found = node;
        return false;
      }
    });
    return found;
  }

  findAll(type: string): SourceAST[] {
    const found: SourceAST[] = [];
    this.walk((node) => {
      if (node.type === type) found.push(node);
    });
    return found;
  }
}

/** Maps offsets to 1-based line and column numbers. */
export class LineIndex {
  private readonly starts: number[] = [0];

  constructor(text: string) {
    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) === 10) this.starts.push(i + 1);
    }
  }

  locate(offset: number): { line: number; column: number } {
    let lo = 0;
    let hi = this.starts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.starts[mid] <= offset) lo = mid;
      else hi = mid - 1;
    }
    return { line: lo + 1, column: offset - this.starts[lo] + 1 };
  }
}
