/**
 * Leaf parsers over characters and literal strings.
 *
 * Every primitive either consumes what it matches or fails without
 * consuming anything, so they are all safe operands for `alt` and `many`.
 */

import { fail, mkParser, ok } from "./parser.js";
import { label, many, recognize } from "./combinators.js";
import type { Parser } from "./types.js";

/** Match one character satisfying `pred`. `description` names it in errors. */
export function satisfy(pred: (c: string) => boolean, description: string): Parser<string> {
  return mkParser((cursor) => {
    const c = cursor.peek();
    const next = cursor.advance();
    if (c === null || next === null || !pred(c)) {
      return fail(cursor.offset, [description]);
    }
    return ok(c, next);
  });
}

/** Match a single specific character. */
export function char(c: string): Parser<string> {
  return satisfy((x) => x === c, `'${c}'`);
}

/** Match any one of the characters in `chars`. */
export function oneOf(chars: string): Parser<string> {
  const set = Array.from(chars);
  return mkParser((cursor) => {
    const c = cursor.peek();
    const next = cursor.advance();
    if (c === null || next === null || !set.includes(c)) {
      return fail(
        cursor.offset,
        set.map((x) => `'${x}'`)
      );
    }
    return ok(c, next);
  });
}

/** Match a single character in the inclusive range [from, to]. */
export function charRange(from: string, to: string): Parser<string> {
  return satisfy((c) => c >= from && c <= to, `'${from}'..'${to}'`);
}

/** Match any single character. */
export function anyChar(): Parser<string> {
  return satisfy(() => true, "any character");
}

/**
 * Match an exact string. Atomic: a partial match consumes nothing, so
 * `alt(literal("true"), ...)` still tries the next alternative on `"tru"`.
 */
export function literal(s: string): Parser<string> {
  return mkParser((cursor) => {
    const next = cursor.skip(s);
    if (next === null) {
      return fail(cursor.offset, [`'${s}'`]);
    }
    return ok(s, next);
  });
}

/** Match end of input. */
export function eof(): Parser<null> {
  return mkParser((cursor) => {
    if (cursor.isAtEnd()) {
      return ok(null, cursor);
    }
    return fail(cursor.offset, ["end of input"]);
  });
}

/** Succeed with `value` without consuming input. */
export function succeed<T>(value: T): Parser<T> {
  return mkParser((cursor) => ok(value, cursor));
}

/** Fail without consuming input, expecting `description`. */
export function failure<T = never>(description: string): Parser<T> {
  return mkParser((cursor) => fail(cursor.offset, [description]));
}

// ---------------------------------------------------------------------------
// Convenience character-class parsers
// ---------------------------------------------------------------------------

/** Match a single ASCII digit [0-9]. */
export function digit(): Parser<string> {
  return label(charRange("0", "9"), "digit");
}

/** Match a single hexadecimal digit [0-9a-fA-F]. */
export function hexDigit(): Parser<string> {
  return satisfy((c) => /^[0-9a-fA-F]$/.test(c), "hex digit");
}

const WHITESPACE = new Set([" ", "\t", "\n", "\r"]);

/**
 * Zero or more spaces, tabs, carriage returns and line feeds. Always
 * succeeds, and never shows up in error expectations.
 */
export function whitespace(): Parser<string> {
  return label(recognize(many(satisfy((c) => WHITESPACE.has(c), "whitespace"))), "");
}
