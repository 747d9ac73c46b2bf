/**
 * The JSON value model.
 *
 * `Value` is a closed tagged union discriminated on `type`. Trees are
 * immutable and acyclic; arrays and objects own their children.
 */

export type Value =
  | { readonly type: "null" }
  | { readonly type: "boolean"; readonly value: boolean }
  | { readonly type: "number"; readonly value: number }
  | { readonly type: "string"; readonly value: string }
  | { readonly type: "array"; readonly items: readonly Value[] }
  | { readonly type: "object"; readonly members: ReadonlyMap<string, Value> };

export type ValueType = Value["type"];

const NULL: Value = { type: "null" };

/** Constructors for each variant. */
export const Value = {
  null: NULL,

  boolean(value: boolean): Value {
    return { type: "boolean", value };
  },

  number(value: number): Value {
    return { type: "number", value };
  },

  string(value: string): Value {
    return { type: "string", value };
  },

  array(items: readonly Value[]): Value {
    return { type: "array", items: [...items] };
  },

  /**
   * Build an object from key/value pairs. A repeated key keeps the position
   * of its first occurrence and the value of its last.
   */
  object(entries: Iterable<readonly [string, Value]>): Value {
    return { type: "object", members: new Map(entries) };
  },
} as const;

// ---------------------------------------------------------------------------
// Equality
// ---------------------------------------------------------------------------

/**
 * Structural equality. Member order of objects is not significant, and
 * numbers compare with `===` (so `0` equals `-0` and `NaN` equals nothing).
 */
export function equals(a: Value, b: Value): boolean {
  switch (a.type) {
    case "null":
      return b.type === "null";
    case "boolean":
    case "number":
    case "string":
      return b.type === a.type && b.value === a.value;
    case "array": {
      if (b.type !== "array" || a.items.length !== b.items.length) return false;
      const others = b.items;
      return a.items.every((item, i) => equals(item, others[i]));
    }
    case "object": {
      if (b.type !== "object" || a.members.size !== b.members.size) return false;
      for (const [key, value] of a.members) {
        const other = b.members.get(key);
        if (other === undefined || !equals(value, other)) return false;
      }
      return true;
    }
  }
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

const SHORT_ESCAPES: Record<string, string> = {
  '"': '\\"',
  "\\": "\\\\",
  "\b": "\\b",
  "\f": "\\f",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
};

/** A JSON string literal for `s`. */
export function quote(s: string): string {
  let out = '"';
  for (const ch of s) {
    const short = SHORT_ESCAPES[ch];
    if (short !== undefined) {
      out += short;
    } else if (ch < " ") {
      out += `\\u${ch.charCodeAt(0).toString(16).padStart(4, "0")}`;
    } else {
      out += ch;
    }
  }
  return out + '"';
}

function renderNumber(n: number): string {
  // JSON has no spelling for NaN or the infinities.
  return Number.isFinite(n) ? String(n) : "null";
}

/** Compact JSON text. `parse(stringify(v))` is equal to `v` for finite numbers. */
export function stringify(value: Value): string {
  switch (value.type) {
    case "null":
      return "null";
    case "boolean":
      return value.value ? "true" : "false";
    case "number":
      return renderNumber(value.value);
    case "string":
      return quote(value.value);
    case "array":
      return `[${value.items.map(stringify).join(",")}]`;
    case "object": {
      const members: string[] = [];
      for (const [key, member] of value.members) {
        members.push(`${quote(key)}:${stringify(member)}`);
      }
      return `{${members.join(",")}}`;
    }
  }
}

/**
 * Multi-line diagnostic dump:
 *
 * ```text
 * Object {
 *   "name": String("x"),
 *   "tags": Array [
 *     Bool(true),
 *   ],
 * }
 * ```
 */
export function inspect(value: Value, indent = ""): string {
  const inner = indent + "  ";
  switch (value.type) {
    case "null":
      return "Null";
    case "boolean":
      return `Bool(${value.value})`;
    case "number":
      return `Number(${renderNumber(value.value)})`;
    case "string":
      return `String(${quote(value.value)})`;
    case "array": {
      if (value.items.length === 0) return "Array []";
      const lines = value.items.map((item) => `${inner}${inspect(item, inner)},\n`);
      return `Array [\n${lines.join("")}${indent}]`;
    }
    case "object": {
      if (value.members.size === 0) return "Object {}";
      let body = "";
      for (const [key, member] of value.members) {
        body += `${inner}${quote(key)}: ${inspect(member, inner)},\n`;
      }
      return `Object {\n${body}${indent}}`;
    }
  }
}

/** Convert to plain JavaScript data (`null`, booleans, numbers, strings, arrays, objects). */
export function toNative(value: Value): unknown {
  switch (value.type) {
    case "null":
      return null;
    case "boolean":
    case "number":
    case "string":
      return value.value;
    case "array":
      return value.items.map(toNative);
    case "object": {
      const out: Record<string, unknown> = {};
      for (const [key, member] of value.members) {
        Object.defineProperty(out, key, {
          value: toNative(member),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return out;
    }
  }
}
