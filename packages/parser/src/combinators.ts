/**
 * Programmatic parser combinator API for @combjson/parser
 *
 * All combinators return `Parser<T>` values that can be composed freely.
 *
 * Consumption discipline: a parser that fails after consuming input commits
 * the enclosing alternation. `alt`, `many`, `optional` and `sepBy` only move
 * on when their operand failed without consuming; a consuming failure is
 * propagated as-is. Use `attempt` to opt back into backtracking.
 */

import type { Cursor } from "./cursor.js";
import {
  continueWith,
  fail,
  mergeExpected,
  mkParser,
  ok,
  stopHint,
} from "./parser.js";
import type { Failure, Parser, ParseResult, Success } from "./types.js";

// ---------------------------------------------------------------------------
// Transformation
// ---------------------------------------------------------------------------

/** Transform a parser's result with a function. */
export function map<A, B>(p: Parser<A>, f: (a: A) => B): Parser<B> {
  return mkParser((cursor) => {
    const r = p.run(cursor);
    if (!r.ok) return r;
    return ok(f(r.value), r.rest, r.hint);
  });
}

/**
 * Run `p`, pass its value to `f`, and run the parser `f` returns on the
 * advanced cursor.
 */
export function andThen<A, B>(p: Parser<A>, f: (a: A) => Parser<B>): Parser<B> {
  return mkParser((cursor) => {
    const ra = p.run(cursor);
    if (!ra.ok) return ra;
    return continueWith(cursor, ra, f(ra.value).run(ra.rest));
  });
}

/** Succeed with the slice of input `p` consumed, discarding `p`'s value. */
export function recognize<T>(p: Parser<T>): Parser<string> {
  return mkParser((cursor) => {
    const r = p.run(cursor);
    if (!r.ok) return r;
    return ok(cursor.source.slice(cursor.offset, r.rest.offset), r.rest, r.hint);
  });
}

// ---------------------------------------------------------------------------
// Sequence combinators
// ---------------------------------------------------------------------------

/** Sequence two parsers. */
export function seq<A, B>(a: Parser<A>, b: Parser<B>): Parser<[A, B]> {
  return mkParser((cursor) => {
    const ra = a.run(cursor);
    if (!ra.ok) return ra;
    const rb = continueWith(cursor, ra, b.run(ra.rest));
    if (!rb.ok) return rb;
    return ok<[A, B]>([ra.value, rb.value], rb.rest, rb.hint);
  });
}

/** Sequence three parsers. */
export function seq3<A, B, C>(a: Parser<A>, b: Parser<B>, c: Parser<C>): Parser<[A, B, C]> {
  return mkParser((cursor) => {
    const ra = a.run(cursor);
    if (!ra.ok) return ra;
    const rb = continueWith(cursor, ra, b.run(ra.rest));
    if (!rb.ok) return rb;
    const rc = continueWith(cursor, rb, c.run(rb.rest));
    if (!rc.ok) return rc;
    return ok<[A, B, C]>([ra.value, rb.value, rc.value], rc.rest, rc.hint);
  });
}

/** Sequence two parsers, keeping the first value. */
export function left<A, B>(a: Parser<A>, b: Parser<B>): Parser<A> {
  return map(seq(a, b), ([x]) => x);
}

/** Sequence two parsers, keeping the second value. */
export function right<A, B>(a: Parser<A>, b: Parser<B>): Parser<B> {
  return mkParser((cursor) => {
    const ra = a.run(cursor);
    if (!ra.ok) return ra;
    return continueWith(cursor, ra, b.run(ra.rest));
  });
}

/** Parse `p` between `open` and `close`, returning only the inner result. */
export function between<O, T, C>(open: Parser<O>, p: Parser<T>, close: Parser<C>): Parser<T> {
  return mkParser((cursor) => {
    const ro = open.run(cursor);
    if (!ro.ok) return ro;
    const rp = continueWith(cursor, ro, p.run(ro.rest));
    if (!rp.ok) return rp;
    const rc = continueWith(cursor, rp, close.run(rp.rest));
    if (!rc.ok) return rc;
    return ok(rp.value, rc.rest, rc.hint);
  });
}

/** Exactly `n` repetitions of `p`. */
export function count<T>(n: number, p: Parser<T>): Parser<T[]> {
  return mkParser((cursor) => {
    const results: T[] = [];
    let last: Success<unknown> = ok(null, cursor);
    for (let i = 0; i < n; i++) {
      const r = continueWith(cursor, last, p.run(last.rest));
      if (!r.ok) return r;
      results.push(r.value);
      last = r;
    }
    return ok(results, last.rest, last.hint);
  });
}

// ---------------------------------------------------------------------------
// Alternation
// ---------------------------------------------------------------------------

/**
 * Combine two failures of alternatives tried at the same cursor. Both are
 * non-consuming; the deeper one wins, equal offsets merge.
 */
function mergeFailures(a: Failure, b: Failure): Failure {
  if (a.pos > b.pos) return a;
  if (b.pos > a.pos) return b;
  return fail(a.pos, mergeExpected(a.expected, b.expected));
}

/** Success of a later alternative, carrying the earlier alternatives' expectations if it consumed nothing. */
function afterAlternatives<T>(cursor: Cursor, failed: Failure, r: Success<T>): Success<T> {
  if (r.rest.offset !== cursor.offset || failed.pos !== cursor.offset) return r;
  return ok(r.value, r.rest, mergeExpected(failed.expected, r.hint));
}

/**
 * Ordered alternation: try `a`, then `b` on the same cursor if `a` failed
 * without consuming input. A consuming failure of `a` is returned as-is.
 */
export function alt<A, B>(a: Parser<A>, b: Parser<B>): Parser<A | B> {
  return mkParser((cursor): ParseResult<A | B> => {
    const ra = a.run(cursor);
    if (ra.ok || ra.consumed) return ra;
    const rb = b.run(cursor);
    if (rb.ok) return afterAlternatives(cursor, ra, rb);
    if (rb.consumed) return rb;
    return mergeFailures(ra, rb);
  });
}

/** N-ary ordered alternation over parsers of the same type. */
export function choice<T>(...parsers: Parser<T>[]): Parser<T> {
  return mkParser((cursor) => {
    let failed: Failure | null = null;
    for (const p of parsers) {
      const r = p.run(cursor);
      if (r.ok) return failed === null ? r : afterAlternatives(cursor, failed, r);
      if (r.consumed) return r;
      failed = failed === null ? r : mergeFailures(failed, r);
    }
    return failed ?? fail(cursor.offset, []);
  });
}

// ---------------------------------------------------------------------------
// Repetition
// ---------------------------------------------------------------------------

/**
 * Zero or more repetitions. Stops at the first non-consuming failure or
 * zero-width success; a consuming failure fails the whole repetition.
 */
export function many<T>(p: Parser<T>): Parser<T[]> {
  return mkParser((cursor) => {
    const results: T[] = [];
    let last: Success<unknown> = ok(null, cursor);
    for (;;) {
      const r = p.run(last.rest);
      if (!r.ok) {
        if (r.consumed) return r;
        return ok(results, last.rest, stopHint(last, r));
      }
      if (r.rest.offset === last.rest.offset) break; // zero-width match would loop forever
      results.push(r.value);
      last = r;
    }
    return ok(results, last.rest, last.hint);
  });
}

/** One or more repetitions. */
export function many1<T>(p: Parser<T>): Parser<T[]> {
  return map(seq(p, many(p)), ([first, rest]) => [first, ...rest]);
}

/** Optional: succeed with `null` if `p` fails without consuming. */
export function optional<T>(p: Parser<T>): Parser<T | null> {
  return mkParser((cursor): ParseResult<T | null> => {
    const r = p.run(cursor);
    if (r.ok || r.consumed) return r;
    return ok(null, cursor, r.pos === cursor.offset ? r.expected : undefined);
  });
}

// ---------------------------------------------------------------------------
// Separation combinators
// ---------------------------------------------------------------------------

/** Items after the first: `(sep item)*`. A separator must be followed by an item. */
function sepTail<T, S>(
  item: Parser<T>,
  sep: Parser<S>,
  cursor: Cursor,
  first: Success<T>
): ParseResult<T[]> {
  const results: T[] = [first.value];
  let last: Success<unknown> = first;
  for (;;) {
    const rs = sep.run(last.rest);
    if (!rs.ok) {
      if (rs.consumed) return rs;
      return ok(results, last.rest, stopHint(last, rs));
    }
    const ri = continueWith(last.rest, rs, item.run(rs.rest));
    if (!ri.ok) {
      if (ri.consumed) return ri;
      return ok(results, last.rest, stopHint(last, ri));
    }
    if (ri.rest.offset === last.rest.offset) break;
    results.push(ri.value);
    last = ri;
  }
  return ok(results, last.rest, last.hint);
}

/** Zero or more items separated by `sep`, without a trailing separator. */
export function sepBy<T, S>(item: Parser<T>, sep: Parser<S>): Parser<T[]> {
  return mkParser((cursor): ParseResult<T[]> => {
    const first = item.run(cursor);
    if (!first.ok) {
      if (first.consumed) return first;
      return ok([], cursor, first.pos === cursor.offset ? first.expected : undefined);
    }
    return sepTail(item, sep, cursor, first);
  });
}

/** One or more items separated by `sep`, without a trailing separator. */
export function sepBy1<T, S>(item: Parser<T>, sep: Parser<S>): Parser<T[]> {
  return mkParser((cursor): ParseResult<T[]> => {
    const first = item.run(cursor);
    if (!first.ok) return first;
    return sepTail(item, sep, cursor, first);
  });
}

// ---------------------------------------------------------------------------
// Error reporting and commitment
// ---------------------------------------------------------------------------

/**
 * Name `p` in error messages. A failure that consumed nothing now expects
 * `description`; expectations from inside `p` do not leak past a success.
 * An empty description hides `p` from messages altogether.
 */
export function label<T>(p: Parser<T>, description: string): Parser<T> {
  const expected = description === "" ? [] : [description];
  return mkParser((cursor) => {
    const r = p.run(cursor);
    if (r.ok) {
      if (r.hint === undefined) return r;
      return ok(r.value, r.rest, r.rest.offset === cursor.offset ? expected : undefined);
    }
    if (r.consumed) return r;
    return fail(cursor.offset, expected);
  });
}

/** Backtrack: a failure of `p` counts as non-consuming, so alternatives are still tried. */
export function attempt<T>(p: Parser<T>): Parser<T> {
  return mkParser((cursor) => {
    const r = p.run(cursor);
    if (r.ok || !r.consumed) return r;
    return fail(r.pos, r.expected, false);
  });
}

/** Commit: a failure of `p` counts as consuming, so no alternative is tried after it. */
export function cut<T>(p: Parser<T>): Parser<T> {
  return mkParser((cursor) => {
    const r = p.run(cursor);
    if (r.ok || r.consumed) return r;
    return fail(r.pos, r.expected, true);
  });
}

/** Run `p` without consuming input. */
export function lookahead<T>(p: Parser<T>): Parser<T> {
  return mkParser((cursor) => {
    const r = p.run(cursor);
    if (!r.ok) return r;
    return ok(r.value, cursor);
  });
}

// ---------------------------------------------------------------------------
// Recursion
// ---------------------------------------------------------------------------

/**
 * Lazy parser for recursive grammars. `f` is called on first use; after
 * that the returned parser delegates straight to the resolved one.
 */
export function lazy<T>(f: () => Parser<T>): Parser<T> {
  let cached: Parser<T> | null = null;
  const self: Parser<T> = mkParser((cursor) => {
    if (cached === null) {
      cached = f();
      self.run = cached.run;
    }
    return cached.run(cursor);
  });
  return self;
}
