/**
 * Immutable input cursor.
 *
 * A cursor is the source text plus an offset into it. Offsets are UTF-16
 * indices (so they line up with `String.prototype.slice`), but every advance
 * moves by whole code points, so a cursor never points into the middle of a
 * surrogate pair.
 */
export class Cursor {
  private constructor(
    /** The full input. Shared by every cursor derived from it. */
    readonly source: string,
    /** Zero-based UTF-16 offset of the next unread character. */
    readonly offset: number
  ) {}

  /** Create a cursor over `source`, starting at `offset` (default 0). */
  static of(source: string, offset = 0): Cursor {
    if (!Number.isInteger(offset) || offset < 0 || offset > source.length) {
      throw new RangeError(`Cursor offset ${offset} is outside 0..${source.length}`);
    }
    return new Cursor(source, offset);
  }

  /** The next character (a full code point), or `null` at end of input. */
  peek(): string | null {
    const cp = this.source.codePointAt(this.offset);
    return cp === undefined ? null : String.fromCodePoint(cp);
  }

  /**
   * A cursor `n` characters further on, or `null` if fewer than `n`
   * characters remain. `this` stays valid either way.
   */
  advance(n = 1): Cursor | null {
    let next = this.offset;
    for (let i = 0; i < n; i++) {
      const cp = this.source.codePointAt(next);
      if (cp === undefined) return null;
      next += cp > 0xffff ? 2 : 1;
    }
    return next === this.offset ? this : new Cursor(this.source, next);
  }

  /** A cursor past `prefix` if the remaining input starts with it, else `null`. */
  skip(prefix: string): Cursor | null {
    if (!this.startsWith(prefix)) return null;
    return prefix.length === 0 ? this : new Cursor(this.source, this.offset + prefix.length);
  }

  startsWith(prefix: string): boolean {
    return this.source.startsWith(prefix, this.offset);
  }

  isAtEnd(): boolean {
    return this.offset >= this.source.length;
  }

  /** The unread part of the input. */
  remainingText(): string {
    return this.source.slice(this.offset);
  }
}
