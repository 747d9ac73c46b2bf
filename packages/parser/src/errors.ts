// ---------------------------------------------------------------------------
// Error reporting
// ---------------------------------------------------------------------------

/**
 * `syntax`: the input does not match the grammar at `pos`.
 * `trailing-input`: a complete value was parsed but input remains at `pos`.
 */
export type ParseErrorKind = "syntax" | "trailing-input";

/** Descriptive parse error with position context. */
export class ParseError extends Error {
  /** Zero-based offset in the input where parsing failed. */
  readonly pos: number;
  /** What the parser expected at the failure position. */
  readonly expected: readonly string[];
  readonly kind: ParseErrorKind;
  /** 1-based line of `pos`. */
  readonly line: number;
  /** 1-based column of `pos`. */
  readonly column: number;

  constructor(
    input: string,
    pos: number,
    expected: readonly string[],
    kind: ParseErrorKind = "syntax"
  ) {
    const { line, col } = lineCol(input, pos);
    const snippet = input.slice(Math.max(0, pos - 10), pos + 20);
    super(
      `Parse error at line ${line}, col ${col}: expected ${formatExpected(expected)}\n  ...${snippet}...`
    );
    this.name = "ParseError";
    this.pos = pos;
    this.expected = expected;
    this.kind = kind;
    this.line = line;
    this.column = col;
  }

  /** `expected ...` without the location prefix or snippet. */
  get description(): string {
    return `expected ${formatExpected(this.expected)}`;
  }
}

/** Join expectations as `a`, `a or b`, `a, b or c`. */
export function formatExpected(expected: readonly string[]): string {
  if (expected.length === 0) return "nothing";
  if (expected.length === 1) return expected[0];
  return `${expected.slice(0, -1).join(", ")} or ${expected[expected.length - 1]}`;
}

/** Convert a zero-based offset to 1-based line/col. */
export function lineCol(input: string, pos: number): { line: number; col: number } {
  let line = 1;
  let col = 1;
  for (let i = 0; i < pos && i < input.length; i++) {
    if (input[i] === "\n") {
      line++;
      col = 1;
    } else {
      col++;
    }
  }
  return { line, col };
}
