import { describe, it, expect } from "vitest";
import {
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
  ParseError,
  formatExpected,
} from "../index.js";
import type { Parser, ParseResult } from "../types.js";

/** Flatten a result to plain data for `toEqual`. */
function summary<T>(r: ParseResult<T>) {
  if (r.ok) return { ok: true, value: r.value, pos: r.rest.offset };
  return { ok: false, pos: r.pos, expected: r.expected, consumed: r.consumed };
}

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

describe("literal", () => {
  it("matches an exact string", () => {
    expect(summary(literal("hello").parse("hello world"))).toEqual({
      ok: true,
      value: "hello",
      pos: 5,
    });
  });

  it("fails on mismatch without consuming", () => {
    expect(summary(literal("hello").parse("world"))).toEqual({
      ok: false,
      pos: 0,
      expected: ["'hello'"],
      consumed: false,
    });
  });

  it("fails atomically on a partial match", () => {
    expect(summary(literal("hello").parse("help"))).toEqual({
      ok: false,
      pos: 0,
      expected: ["'hello'"],
      consumed: false,
    });
  });

  it("matches empty string", () => {
    expect(summary(literal("").parse("anything"))).toEqual({ ok: true, value: "", pos: 0 });
  });

  it("respects the start offset", () => {
    expect(summary(literal("b").parse("ab", 1))).toEqual({ ok: true, value: "b", pos: 2 });
  });
});

describe("char", () => {
  it("matches a single character", () => {
    expect(summary(char("x").parse("xyz"))).toEqual({ ok: true, value: "x", pos: 1 });
  });

  it("fails on wrong character", () => {
    expect(char("x").parse("abc").ok).toBe(false);
  });

  it("fails on empty input", () => {
    expect(summary(char("x").parse(""))).toEqual({
      ok: false,
      pos: 0,
      expected: ["'x'"],
      consumed: false,
    });
  });
});

describe("satisfy", () => {
  it("consumes a whole code point", () => {
    const p = satisfy(() => true, "anything");
    expect(summary(p.parse("😀a"))).toEqual({ ok: true, value: "😀", pos: 2 });
  });

  it("reports its description on failure", () => {
    const p = satisfy((c) => c === c.toUpperCase(), "uppercase letter");
    expect(summary(p.parse("a"))).toEqual({
      ok: false,
      pos: 0,
      expected: ["uppercase letter"],
      consumed: false,
    });
  });
});

describe("character classes", () => {
  it("charRange matches inside the range only", () => {
    const p = charRange("a", "z");
    expect(summary(p.parse("m"))).toEqual({ ok: true, value: "m", pos: 1 });
    expect(p.parse("A").ok).toBe(false);
  });

  it("oneOf lists every accepted character", () => {
    const r = oneOf("eE").parse("x");
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.expected).toEqual(["'e'", "'E'"]);
    expect(summary(oneOf("eE").parse("E"))).toEqual({ ok: true, value: "E", pos: 1 });
  });

  it("anyChar matches anything but end of input", () => {
    expect(summary(anyChar().parse("\n"))).toEqual({ ok: true, value: "\n", pos: 1 });
    expect(anyChar().parse("").ok).toBe(false);
  });

  it("digit and hexDigit", () => {
    expect(summary(digit().parse("7"))).toEqual({ ok: true, value: "7", pos: 1 });
    expect(summary(digit().parse("a"))).toEqual({
      ok: false,
      pos: 0,
      expected: ["digit"],
      consumed: false,
    });
    expect(summary(hexDigit().parse("F"))).toEqual({ ok: true, value: "F", pos: 1 });
    expect(summary(hexDigit().parse("g"))).toEqual({
      ok: false,
      pos: 0,
      expected: ["hex digit"],
      consumed: false,
    });
  });
});

describe("whitespace", () => {
  it("consumes spaces, tabs and line breaks", () => {
    expect(summary(whitespace().parse(" \t\r\nx"))).toEqual({
      ok: true,
      value: " \t\r\n",
      pos: 4,
    });
  });

  it("succeeds on no whitespace and leaves no expectation behind", () => {
    const r = whitespace().parse("x");
    expect(summary(r)).toEqual({ ok: true, value: "", pos: 0 });
    expect(r.ok && r.hint).toBeUndefined();
  });
});

describe("eof, succeed and failure", () => {
  it("eof succeeds at end of input", () => {
    expect(summary(eof().parse("", 0))).toEqual({ ok: true, value: null, pos: 0 });
    expect(summary(eof().parse("abc", 3))).toEqual({ ok: true, value: null, pos: 3 });
  });

  it("eof fails when input remains", () => {
    expect(summary(eof().parse("abc"))).toEqual({
      ok: false,
      pos: 0,
      expected: ["end of input"],
      consumed: false,
    });
  });

  it("succeed consumes nothing", () => {
    expect(summary(succeed(42).parse("x"))).toEqual({ ok: true, value: 42, pos: 0 });
  });

  it("failure fails without consuming", () => {
    expect(summary(failure("thing").parse("x"))).toEqual({
      ok: false,
      pos: 0,
      expected: ["thing"],
      consumed: false,
    });
  });
});

// ---------------------------------------------------------------------------
// Combinators
// ---------------------------------------------------------------------------

describe("seq", () => {
  it("sequences two parsers", () => {
    const p = seq(literal("a"), literal("b"));
    expect(summary(p.parse("abc"))).toEqual({ ok: true, value: ["a", "b"], pos: 2 });
  });

  it("fails without consuming if the first parser fails", () => {
    const p = seq(literal("a"), literal("b"));
    expect(summary(p.parse("bc"))).toEqual({
      ok: false,
      pos: 0,
      expected: ["'a'"],
      consumed: false,
    });
  });

  it("fails at the second parser after consuming", () => {
    const p = seq(literal("a"), literal("b"));
    expect(summary(p.parse("ac"))).toEqual({
      ok: false,
      pos: 1,
      expected: ["'b'"],
      consumed: true,
    });
  });

  it("seq3 sequences three parsers", () => {
    const p = seq3(char("("), literal("ok"), char(")"));
    expect(summary(p.parse("(ok)"))).toEqual({ ok: true, value: ["(", "ok", ")"], pos: 4 });
  });
});

describe("left, right and between", () => {
  const hello = literal("Hello");
  const goodbye = literal(" Goodbye");

  it("left keeps the first value", () => {
    expect(summary(left(hello, goodbye).parse("Hello Goodbye Again"))).toEqual({
      ok: true,
      value: "Hello",
      pos: 13,
    });
  });

  it("right keeps the second value", () => {
    expect(summary(right(hello, goodbye).parse("Hello Goodbye Again"))).toEqual({
      ok: true,
      value: " Goodbye",
      pos: 13,
    });
  });

  it("both fail on empty input", () => {
    expect(left(hello, goodbye).parse("").ok).toBe(false);
    expect(right(hello, goodbye).parse("").ok).toBe(false);
  });

  it("between keeps the middle value", () => {
    const p = between(char("("), literal("x"), char(")"));
    expect(summary(p.parse("(x)"))).toEqual({ ok: true, value: "x", pos: 3 });
    expect(summary(p.parse("(x]"))).toEqual({
      ok: false,
      pos: 2,
      expected: ["')'"],
      consumed: true,
    });
  });
});

describe("alt", () => {
  it("tries first then second", () => {
    const p = alt(literal("foo"), literal("bar"));
    expect(summary(p.parse("foo"))).toEqual({ ok: true, value: "foo", pos: 3 });
    expect(summary(p.parse("bar"))).toEqual({ ok: true, value: "bar", pos: 3 });
  });

  it("merges expectations when both fail at the same offset", () => {
    const p = alt(literal("foo"), literal("bar"));
    expect(summary(p.parse("baz"))).toEqual({
      ok: false,
      pos: 0,
      expected: ["'foo'", "'bar'"],
      consumed: false,
    });
  });

  it("returns first match (ordered)", () => {
    const p = alt(literal("fo"), literal("foo"));
    expect(summary(p.parse("foo"))).toEqual({ ok: true, value: "fo", pos: 2 });
  });

  it("does not try the second branch after the first consumed input", () => {
    const p = alt(seq(char("t"), char("x")), seq(char("t"), char("y")));
    expect(summary(p.parse("ty"))).toEqual({
      ok: false,
      pos: 1,
      expected: ["'x'"],
      consumed: true,
    });
  });

  it("tries the second branch again when the first is wrapped in attempt", () => {
    const p = alt(attempt(seq(char("t"), char("x"))), seq(char("t"), char("y")));
    expect(summary(p.parse("ty"))).toEqual({ ok: true, value: ["t", "y"], pos: 2 });
  });

  it("never tries the second branch after a cut", () => {
    const p = alt(cut(char("a")), char("b"));
    expect(summary(p.parse("b"))).toEqual({
      ok: false,
      pos: 0,
      expected: ["'a'"],
      consumed: true,
    });
  });
});

describe("choice", () => {
  const p = choice(literal("a"), literal("b"), literal("c"));

  it("returns the first alternative that matches", () => {
    expect(summary(p.parse("c"))).toEqual({ ok: true, value: "c", pos: 1 });
  });

  it("lists every alternative when all fail", () => {
    expect(summary(p.parse("d"))).toEqual({
      ok: false,
      pos: 0,
      expected: ["'a'", "'b'", "'c'"],
      consumed: false,
    });
  });
});

describe("many", () => {
  it("matches zero occurrences", () => {
    expect(summary(many(char("a")).parse("bbb"))).toEqual({ ok: true, value: [], pos: 0 });
  });

  it("matches multiple occurrences", () => {
    expect(summary(many(char("a")).parse("aaab"))).toEqual({
      ok: true,
      value: ["a", "a", "a"],
      pos: 3,
    });
  });

  it("fails when an iteration fails after consuming", () => {
    const p = many(seq(char("a"), char("b")));
    expect(summary(p.parse("ababac"))).toEqual({
      ok: false,
      pos: 5,
      expected: ["'b'"],
      consumed: true,
    });
  });

  it("stops on a zero-width match", () => {
    expect(summary(many(optional(char("a"))).parse("b"))).toEqual({
      ok: true,
      value: [],
      pos: 0,
    });
  });

  it("reports the stopping expectation with the next failure", () => {
    const p = seq(many(char("a")), char("]"));
    expect(summary(p.parse("aax"))).toEqual({
      ok: false,
      pos: 2,
      expected: ["'a'", "']'"],
      consumed: true,
    });
  });
});

describe("many1", () => {
  it("fails on zero occurrences", () => {
    expect(summary(many1(char("a")).parse("bbb"))).toEqual({
      ok: false,
      pos: 0,
      expected: ["'a'"],
      consumed: false,
    });
  });

  it("matches one or more", () => {
    expect(summary(many1(char("a")).parse("aab"))).toEqual({
      ok: true,
      value: ["a", "a"],
      pos: 2,
    });
  });
});

describe("optional", () => {
  it("returns null when the parser fails without consuming", () => {
    expect(summary(optional(char("a")).parse("b"))).toEqual({ ok: true, value: null, pos: 0 });
  });

  it("passes a match through", () => {
    expect(summary(optional(char("a")).parse("a"))).toEqual({ ok: true, value: "a", pos: 1 });
  });

  it("propagates a failure that consumed input", () => {
    expect(summary(optional(seq(char("a"), char("b"))).parse("ac"))).toEqual({
      ok: false,
      pos: 1,
      expected: ["'b'"],
      consumed: true,
    });
  });
});

describe("sepBy", () => {
  const p = sepBy(digit(), char(","));

  it("parses separated items", () => {
    expect(summary(p.parse("1,2,3"))).toEqual({ ok: true, value: ["1", "2", "3"], pos: 5 });
  });

  it("parses zero items", () => {
    expect(summary(p.parse(""))).toEqual({ ok: true, value: [], pos: 0 });
  });

  it("rejects a trailing separator", () => {
    expect(summary(p.parse("1,2,"))).toEqual({
      ok: false,
      pos: 4,
      expected: ["digit"],
      consumed: true,
    });
  });

  it("sepBy1 requires one item", () => {
    expect(summary(sepBy1(digit(), char(",")).parse(""))).toEqual({
      ok: false,
      pos: 0,
      expected: ["digit"],
      consumed: false,
    });
    expect(summary(sepBy1(digit(), char(",")).parse("4"))).toEqual({
      ok: true,
      value: ["4"],
      pos: 1,
    });
  });
});

describe("count", () => {
  it("parses exactly n items", () => {
    expect(summary(count(3, digit()).parse("12345"))).toEqual({
      ok: true,
      value: ["1", "2", "3"],
      pos: 3,
    });
  });

  it("fails when fewer are available", () => {
    expect(summary(count(3, digit()).parse("12x"))).toEqual({
      ok: false,
      pos: 2,
      expected: ["digit"],
      consumed: true,
    });
  });
});

describe("map, andThen and recognize", () => {
  it("map transforms the value", () => {
    expect(summary(map(digit(), Number).parse("7"))).toEqual({ ok: true, value: 7, pos: 1 });
  });

  it("andThen chooses the next parser from the previous value", () => {
    const lengthPrefixed = andThen(map(digit(), Number), (n) => count(n, charRange("a", "z")));
    expect(summary(lengthPrefixed.parse("3abcd"))).toEqual({
      ok: true,
      value: ["a", "b", "c"],
      pos: 4,
    });
    expect(summary(lengthPrefixed.parse("3ab"))).toEqual({
      ok: false,
      pos: 3,
      expected: ["'a'..'z'"],
      consumed: true,
    });
  });

  it("recognize returns the consumed text", () => {
    const decimal = recognize(seq(many1(digit()), optional(seq(char("."), many1(digit())))));
    expect(summary(decimal.parse("12.5x"))).toEqual({ ok: true, value: "12.5", pos: 4 });
  });

  it("lookahead does not consume", () => {
    expect(summary(lookahead(literal("ab")).parse("abc"))).toEqual({
      ok: true,
      value: "ab",
      pos: 0,
    });
  });
});

describe("label", () => {
  it("replaces the expectation of a non-consuming failure", () => {
    expect(summary(label(literal("true"), "boolean").parse("x"))).toEqual({
      ok: false,
      pos: 0,
      expected: ["boolean"],
      consumed: false,
    });
  });

  it("keeps the deeper message of a consuming failure", () => {
    expect(summary(label(seq(char("a"), char("b")), "pair").parse("ax"))).toEqual({
      ok: false,
      pos: 1,
      expected: ["'b'"],
      consumed: true,
    });
  });

  it("hides a parser behind an empty label", () => {
    expect(summary(label(char("a"), "").parse("b"))).toEqual({
      ok: false,
      pos: 0,
      expected: [],
      consumed: false,
    });
  });

  it("does not leak inner expectations past a success", () => {
    const p = seq(label(many(char("a")), "a run"), char("]"));
    expect(summary(p.parse("aax"))).toEqual({
      ok: false,
      pos: 2,
      expected: ["']'"],
      consumed: true,
    });
  });
});

describe("lazy", () => {
  const nested: Parser<number> = lazy(() =>
    alt(
      map(between(char("("), nested, char(")")), (depth) => depth + 1),
      succeed(0)
    )
  );

  it("supports recursive definitions", () => {
    expect(nested.parseAll("((()))")).toBe(3);
    expect(nested.parseAll("")).toBe(0);
  });

  it("reports the missing closer", () => {
    const r = nested.parse("(()");
    expect(summary(r)).toEqual({ ok: false, pos: 3, expected: ["')'"], consumed: true });
  });
});

// ---------------------------------------------------------------------------
// parseAll and errors
// ---------------------------------------------------------------------------

describe("parseAll", () => {
  it("returns the value when all input is consumed", () => {
    expect(literal("ab").parseAll("ab")).toBe("ab");
  });

  it("throws a syntax error with line and column", () => {
    expect(() => seq(literal("a\n"), char("b")).parseAll("a\nc")).toThrow(
      "Parse error at line 2, col 1: expected 'b'"
    );
  });

  it("throws a trailing-input error when input remains", () => {
    try {
      literal("ab").parseAll("abc");
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ParseError);
      if (e instanceof ParseError) {
        expect(e.kind).toBe("trailing-input");
        expect(e.pos).toBe(2);
        expect(e.description).toBe("expected end of input");
      }
    }
  });
});

describe("ParseError", () => {
  it("derives line and column from the offset", () => {
    const e = new ParseError("ab\ncd", 4, ["'x'", "'y'"]);
    expect(e.line).toBe(2);
    expect(e.column).toBe(2);
    expect(e.kind).toBe("syntax");
    expect(e.message.split("\n")[0]).toBe("Parse error at line 2, col 2: expected 'x' or 'y'");
  });

  it("formats expectation lists", () => {
    expect(formatExpected(["a"])).toBe("a");
    expect(formatExpected(["a", "b", "c"])).toBe("a, b or c");
    expect(formatExpected([])).toBe("nothing");
  });
});
