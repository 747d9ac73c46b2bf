/**
 * @combjson/json
 *
 * JSON parsing with @combjson/parser combinators.
 *
 * @module
 */

export { Value, equals, stringify, inspect, quote, toNative } from "./value.js";
export type { ValueType } from "./value.js";

export { jsonGrammar, DEFAULT_MAX_DEPTH } from "./grammar.js";
export type { GrammarOptions, JsonGrammar, LeadingZeros } from "./grammar.js";

export { parse, parseOrThrow } from "./parse.js";
export type { ParseOptions, Result } from "./parse.js";

export { ParseError } from "@combjson/parser";
export type { ParseErrorKind } from "@combjson/parser";
