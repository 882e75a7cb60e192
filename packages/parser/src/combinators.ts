/**
 * Small parser combinator kit used to read PEG notation.
 *
 * All combinators return `Parser<T>` values that can be composed freely.
 * PEG semantics: ordered alternation, first match wins. A failure reports
 * the furthest position any alternative reached and what it expected there.
 */

export type ParseResult<T> =
  | { readonly ok: true; readonly value: T; readonly pos: number }
  | { readonly ok: false; readonly pos: number; readonly expected: string };

export type Failure = Extract<ParseResult<unknown>, { ok: false }>;

export interface Parser<T> {
  parse(input: string, pos?: number): ParseResult<T>;
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Create a Parser<T> from a raw parse function. */
function mkParser<T>(parseFn: (input: string, pos: number) => ParseResult<T>): Parser<T> {
  return {
    parse(input: string, pos = 0): ParseResult<T> {
      return parseFn(input, pos);
    },
  };
}

function ok<T>(value: T, pos: number): ParseResult<T> {
  return { ok: true, value, pos };
}

function fail(pos: number, expected: string): Failure {
  return { ok: false, pos, expected };
}

/** The more informative of two failures: the further one, or both merged. */
function furthest(a: Failure, b: Failure): Failure {
  if (a.pos > b.pos) return a;
  if (b.pos > a.pos) return b;
  return fail(a.pos, `${a.expected} or ${b.expected}`);
}

// ---------------------------------------------------------------------------
// Primitive parsers
// ---------------------------------------------------------------------------

/** Match a single specific character. */
export function char(c: string): Parser<string> {
  return mkParser((input, pos) => {
    if (pos < input.length && input[pos] === c) {
      return ok(c, pos + 1);
    }
    return fail(pos, `'${c}'`);
  });
}

/** Match a regex anchored at the current position. */
export function regex(pattern: RegExp, expected = `/${pattern.source}/`): Parser<string> {
  const anchored = new RegExp(pattern.source, "y");
  return mkParser((input, pos) => {
    anchored.lastIndex = pos;
    const m = anchored.exec(input);
    if (m) {
      return ok(m[0], pos + m[0].length);
    }
    return fail(pos, expected);
  });
}

// ---------------------------------------------------------------------------
// Sequence and alternation
// ---------------------------------------------------------------------------

/** Sequence two parsers. */
export function seq<A, B>(a: Parser<A>, b: Parser<B>): Parser<[A, B]> {
  return mkParser((input, pos) => {
    const ra = a.parse(input, pos);
    if (!ra.ok) return ra;
    const rb = b.parse(input, ra.pos);
    if (!rb.ok) return rb;
    return ok([ra.value, rb.value], rb.pos);
  });
}

/** Ordered alternation (PEG): the first parser that succeeds wins. */
export function alt<T>(...parsers: Parser<T>[]): Parser<T> {
  return mkParser((input, pos) => {
    let failure: Failure | undefined;
    for (const p of parsers) {
      const r = p.parse(input, pos);
      if (r.ok) return r;
      failure = failure ? furthest(failure, r) : r;
    }
    return failure ?? fail(pos, "nothing");
  });
}

// ---------------------------------------------------------------------------
// Repetition
// ---------------------------------------------------------------------------

/** Zero or more repetitions. Always succeeds. */
export function many<T>(p: Parser<T>): Parser<T[]> {
  return mkParser((input, pos) => {
    const results: T[] = [];
    let cur = pos;
    for (;;) {
      const r = p.parse(input, cur);
      if (!r.ok) break;
      if (r.pos === cur) break; // prevent infinite loop on zero-width match
      results.push(r.value);
      cur = r.pos;
    }
    return ok(results, cur);
  });
}

/** Optional: succeed with `null` if `p` fails. */
export function optional<T>(p: Parser<T>): Parser<T | null> {
  return mkParser((input, pos) => {
    const r = p.parse(input, pos);
    if (r.ok) return r;
    return ok(null, pos);
  });
}

/** One or more items separated by `sep`. */
export function sepBy1<T, S>(item: Parser<T>, sep: Parser<S>): Parser<T[]> {
  return mkParser((input, pos) => {
    const first = item.parse(input, pos);
    if (!first.ok) return first;
    const results: T[] = [first.value];
    let cur = first.pos;
    for (;;) {
      const rs = sep.parse(input, cur);
      if (!rs.ok) break;
      const ri = item.parse(input, rs.pos);
      if (!ri.ok) break;
      results.push(ri.value);
      cur = ri.pos;
    }
    return ok(results, cur);
  });
}

/** Parse `p` between `open` and `close`, returning only the inner result. */
export function between<O, T, C>(open: Parser<O>, p: Parser<T>, close: Parser<C>): Parser<T> {
  return mkParser((input, pos) => {
    const ro = open.parse(input, pos);
    if (!ro.ok) return ro;
    const rp = p.parse(input, ro.pos);
    if (!rp.ok) return rp;
    const rc = close.parse(input, rp.pos);
    if (!rc.ok) return rc;
    return ok(rp.value, rc.pos);
  });
}

// ---------------------------------------------------------------------------
// Transformation
// ---------------------------------------------------------------------------

/** Transform a parser's result with a function. */
export function map<A, B>(p: Parser<A>, f: (a: A) => B): Parser<B> {
  return mkParser((input, pos) => {
    const r = p.parse(input, pos);
    if (!r.ok) return r;
    return ok(f(r.value), r.pos);
  });
}

/** Name what `p` expects when it fails without getting past its first character. */
export function describe<T>(p: Parser<T>, expected: string): Parser<T> {
  return mkParser((input, pos) => {
    const r = p.parse(input, pos);
    if (r.ok || r.pos > pos) return r;
    return fail(pos, expected);
  });
}

/** Skip spaces and tabs before `p`. */
export function token<T>(p: Parser<T>): Parser<T> {
  const ws = /[ \t]*/y;
  return mkParser((input, pos) => {
    ws.lastIndex = pos;
    const m = ws.exec(input);
    return p.parse(input, pos + (m ? m[0].length : 0));
  });
}

/** Lazy parser for recursive grammars. `f` is called on first use. */
export function lazy<T>(f: () => Parser<T>): Parser<T> {
  let cached: Parser<T> | null = null;
  return mkParser((input, pos) => {
    if (!cached) cached = f();
    return cached.parse(input, pos);
  });
}
