/**
 * Core types for @combjson/parser
 *
 * Defines the parse result and the parser interface.
 */

import type { Cursor } from "./cursor.js";

/** A successful parse: the value and the cursor after the consumed input. */
export interface Success<T> {
  readonly ok: true;
  readonly value: T;
  readonly rest: Cursor;
  /**
   * Expectations that failed at `rest` without consuming input, e.g. the
   * iteration that stopped a `many`. A later failure at the same offset
   * reports them alongside its own.
   */
  readonly hint?: readonly string[];
}

/** A failed parse. */
export interface Failure {
  readonly ok: false;
  /** Offset of the failure in the source. */
  readonly pos: number;
  /** Descriptions of what would have been accepted at `pos`. */
  readonly expected: readonly string[];
  /** Whether input was consumed before failing. Alternatives are only tried when it was not. */
  readonly consumed: boolean;
}

/** Result of a parse attempt: success with a value, or failure with expected descriptions. */
export type ParseResult<T> = Success<T> | Failure;

/** A parser turns a cursor into a ParseResult. Parsers are immutable and reusable. */
export interface Parser<T> {
  /** Attempt to parse at `cursor`. */
  run(cursor: Cursor): ParseResult<T>;
  /** Attempt to parse `input` starting at `pos` (default 0). */
  parse(input: string, pos?: number): ParseResult<T>;
  /** Parse the full input, throwing a ParseError if it fails or input remains. */
  parseAll(input: string): T;
}
