/**
 * Top-level entry point: JSON text to `Value`.
 */

import { Cursor, ParseError } from "@combjson/parser";
import { jsonGrammar, type GrammarOptions } from "./grammar.js";
import type { Value } from "./value.js";

export type ParseOptions = GrammarOptions;

export type Result<T, E> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: E };

/**
 * Parse a complete JSON document.
 *
 * Leading and trailing whitespace is allowed; anything else after the value
 * is a `trailing-input` error. Failures are returned, never thrown; only an
 * invalid `maxDepth` option throws (a `RangeError`).
 */
export function parse(text: string, options: ParseOptions = {}): Result<Value, ParseError> {
  const result = jsonGrammar(options).value.run(Cursor.of(text));
  if (!result.ok) {
    return { ok: false, error: new ParseError(text, result.pos, result.expected) };
  }
  if (!result.rest.isAtEnd()) {
    return {
      ok: false,
      error: new ParseError(text, result.rest.offset, ["end of input"], "trailing-input"),
    };
  }
  return { ok: true, value: result.value };
}

/** Like `parse`, but throws the `ParseError`. */
export function parseOrThrow(text: string, options: ParseOptions = {}): Value {
  const result = parse(text, options);
  if (!result.ok) throw result.error;
  return result.value;
}
