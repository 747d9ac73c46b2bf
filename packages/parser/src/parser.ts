/**
 * Parser construction and result plumbing shared by the primitives and the
 * combinators.
 */

import { Cursor } from "./cursor.js";
import { ParseError } from "./errors.js";
import type { Failure, Parser, ParseResult, Success } from "./types.js";

/** Create a Parser<T> from a raw run function. */
export function mkParser<T>(run: (cursor: Cursor) => ParseResult<T>): Parser<T> {
  const parser: Parser<T> = {
    run,
    parse(input: string, pos = 0): ParseResult<T> {
      return parser.run(Cursor.of(input, pos));
    },
    parseAll(input: string): T {
      const result = parser.run(Cursor.of(input));
      if (!result.ok) {
        throw new ParseError(input, result.pos, result.expected);
      }
      if (!result.rest.isAtEnd()) {
        throw new ParseError(input, result.rest.offset, ["end of input"], "trailing-input");
      }
      return result.value;
    },
  };
  return parser;
}

export function ok<T>(value: T, rest: Cursor, hint?: readonly string[]): Success<T> {
  if (hint !== undefined && hint.length > 0) {
    return { ok: true, value, rest, hint };
  }
  return { ok: true, value, rest };
}

export function fail(pos: number, expected: readonly string[], consumed = false): Failure {
  return { ok: false, pos, expected, consumed };
}

/** Order-preserving union of two expectation lists. */
export function mergeExpected(
  a: readonly string[] | undefined,
  b: readonly string[] | undefined
): readonly string[] {
  if (a === undefined || a.length === 0) return b ?? [];
  if (b === undefined || b.length === 0) return a;
  const merged = [...a];
  for (const e of b) {
    if (!merged.includes(e)) merged.push(e);
  }
  return merged;
}

/**
 * Hint to carry when `prev` is the last success before a non-consuming
 * failure `f`: the failure's expectations join `prev`'s hint when both sit at
 * the same offset.
 */
export function stopHint(prev: Success<unknown>, f: Failure): readonly string[] | undefined {
  return f.pos === prev.rest.offset ? mergeExpected(prev.hint, f.expected) : prev.hint;
}

/**
 * Combine the result of a step run at `prev.rest` with the success `prev`
 * of the steps before it, all started at `start`.
 *
 * - A failure is consuming if the step consumed or anything before it did;
 *   a non-consuming failure at `prev.rest` also reports `prev`'s hint.
 * - A success that consumed nothing inherits `prev`'s hint.
 */
export function continueWith<B>(
  start: Cursor,
  prev: Success<unknown>,
  next: ParseResult<B>
): ParseResult<B> {
  if (!next.ok) {
    const expected =
      !next.consumed && next.pos === prev.rest.offset
        ? mergeExpected(prev.hint, next.expected)
        : next.expected;
    return fail(next.pos, expected, next.consumed || prev.rest.offset > start.offset);
  }
  if (next.rest.offset === prev.rest.offset && prev.hint !== undefined) {
    return ok(next.value, next.rest, mergeExpected(prev.hint, next.hint));
  }
  return next;
}
