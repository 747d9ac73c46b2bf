/**
 * JSON grammar built from @combjson/parser combinators.
 *
 * One parser per production. `value` is recursive through arrays and
 * objects; the recursion goes through `lazy`, so building the grammar never
 * unfolds it.
 */

import {
  alt,
  between,
  char,
  charRange,
  choice,
  count,
  cut,
  digit,
  failure,
  hexDigit,
  label,
  lazy,
  left,
  literal,
  lookahead,
  many,
  many1,
  map,
  oneOf,
  optional,
  recognize,
  right,
  satisfy,
  sepBy,
  seq,
  seq3,
  whitespace,
} from "@combjson/parser";
import type { Parser } from "@combjson/parser";
import { Value } from "./value.js";

/**
 * `reject`: strict JSON, an integer part is `0` or starts with `1`-`9`, so
 * `01` stops after the `0`.
 * `allow`: any run of digits.
 */
export type LeadingZeros = "reject" | "allow";

export interface GrammarOptions {
  /**
   * Deepest nesting of arrays and objects. A top-level container is at
   * depth 0; opening a container at depth `maxDepth` is an error.
   * A non-negative integer, default `DEFAULT_MAX_DEPTH`. Parsing recurses
   * once per level, so this bounds the stack the parser needs.
   */
  readonly maxDepth?: number;
  /** Default `"reject"`. */
  readonly leadingZeros?: LeadingZeros;
}

export const DEFAULT_MAX_DEPTH = 1000;

export interface JsonGrammar {
  readonly value: Parser<Value>;
  readonly null: Parser<Value>;
  readonly boolean: Parser<Value>;
  readonly number: Parser<Value>;
  readonly string: Parser<Value>;
  readonly array: Parser<Value>;
  readonly object: Parser<Value>;
}

const ESCAPES: Record<string, string> = {
  '"': '"',
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
};

// ---------------------------------------------------------------------------
// Scalars
// ---------------------------------------------------------------------------

const jsonNull: Parser<Value> = label(
  map(literal("null"), () => Value.null),
  "null"
);

const jsonBool: Parser<Value> = label(
  map(alt(literal("true"), literal("false")), (word) => Value.boolean(word === "true")),
  "boolean"
);

const hex4 = map(count(4, hexDigit()), (digits) =>
  String.fromCharCode(parseInt(digits.join(""), 16))
);

const escape = right(
  char("\\"),
  label(
    alt(
      map(oneOf('"\\/bfnrt'), (c) => ESCAPES[c]),
      right(char("u"), hex4)
    ),
    "escape sequence"
  )
);

const unescaped = satisfy((c) => c !== '"' && c !== "\\" && c >= " ", "string character");

/** A quoted string, as the raw string (object keys use this directly). */
const quoted: Parser<string> = between(
  label(char('"'), "string"),
  map(many(label(alt(unescaped, escape), "string character")), (parts) => parts.join("")),
  label(char('"'), "closing quote")
);

const jsonString: Parser<Value> = map(quoted, (s) => Value.string(s));

function numberParser(leadingZeros: LeadingZeros): Parser<Value> {
  const integer =
    leadingZeros === "allow"
      ? recognize(many1(digit()))
      : recognize(alt(char("0"), seq(charRange("1", "9"), many(digit()))));
  const fraction = seq(char("."), many1(digit()));
  const exponent = seq3(oneOf("eE"), optional(oneOf("+-")), many1(digit()));
  const text = recognize(
    seq3(optional(char("-")), label(integer, "digit"), seq(optional(fraction), optional(exponent)))
  );
  return label(
    map(text, (t) => Value.number(Number(t))),
    "number"
  );
}

// ---------------------------------------------------------------------------
// Grammar
// ---------------------------------------------------------------------------

/** Build the JSON productions for the given options. */
export function jsonGrammar(options: GrammarOptions = {}): JsonGrammar {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new RangeError(`maxDepth must be a non-negative integer, got ${maxDepth}`);
  }
  const ws = whitespace();
  const jsonNumber = numberParser(options.leadingZeros ?? "reject");

  const comma = seq3(ws, char(","), ws);
  const colon = seq3(ws, char(":"), ws);

  const tooDeep: Parser<Value> = label(
    right(lookahead(oneOf("[{")), cut(failure<Value>(`nesting depth of at most ${maxDepth}`))),
    ""
  );

  function arrayOf(element: Parser<Value>): Parser<Value> {
    return map(
      between(seq(label(char("["), "array"), ws), sepBy(element, comma), seq(ws, char("]"))),
      (items) => Value.array(items)
    );
  }

  function objectOf(element: Parser<Value>): Parser<Value> {
    const member = seq(left(quoted, colon), element);
    return map(
      between(seq(label(char("{"), "object"), ws), sepBy(member, comma), seq(ws, char("}"))),
      (entries) => Value.object(entries)
    );
  }

  // Levels up to `maxDepth` are distinct so the deepest can refuse containers.
  const levels = new Map<number, Parser<Value>>();

  function valueAt(depth: number): Parser<Value> {
    const level = Math.min(depth, maxDepth);
    const cached = levels.get(level);
    if (cached !== undefined) return cached;

    const element = lazy(() => valueAt(level + 1));
    const containers = level < maxDepth ? [objectOf(element), arrayOf(element)] : [tooDeep];
    const parser = between(
      ws,
      choice(...containers, jsonString, jsonNumber, jsonBool, jsonNull),
      ws
    );
    levels.set(level, parser);
    return parser;
  }

  const nested = lazy(() => valueAt(1));

  return {
    value: valueAt(0),
    null: jsonNull,
    boolean: jsonBool,
    number: jsonNumber,
    string: jsonString,
    array: maxDepth > 0 ? arrayOf(nested) : tooDeep,
    object: maxDepth > 0 ? objectOf(nested) : tooDeep,
  };
}
