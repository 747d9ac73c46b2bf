/**
 * @combjson/parser
 *
 * Parser combinators over an immutable input cursor.
 *
 * Provides:
 * - `Cursor`, the immutable position over the input
 * - primitive parsers for characters and literals
 * - combinators for sequencing, alternation, repetition and error labelling
 *
 * @module
 */

// Core types
export type { ParseResult, Parser, Success, Failure } from "./types.js";

export { Cursor } from "./cursor.js";

export { ParseError, formatExpected, lineCol } from "./errors.js";
export type { ParseErrorKind } from "./errors.js";

export { mkParser } from "./parser.js";

// Primitive parsers
export {
  satisfy,
  char,
  oneOf,
  charRange,
  anyChar,
  literal,
  eof,
  succeed,
  failure,
  digit,
  hexDigit,
  whitespace,
} from "./primitives.js";

// Combinator API
export {
  map,
  andThen,
  recognize,
  seq,
  seq3,
  left,
  right,
  between,
  count,
  alt,
  choice,
  many,
  many1,
  optional,
  sepBy,
  sepBy1,
  label,
  attempt,
  cut,
  lookahead,
  lazy,
} from "./combinators.js";
