import type { Value } from "./value.js";

export type PlainValue =
  | number
  | bigint
  | string
  | PlainValue[]
  | { [key: string]: PlainValue };

/**
 * Convert a value tree to plain JS data.
 * Integers outside the safe range stay `bigint` so no digits are lost.
 */
export function toPlain(v: Value): PlainValue {
  switch (v.kind) {
    case "Integer": {
      const n = Number(v.value);
      return Number.isSafeInteger(n) ? n : v.value;
    }
    case "Text":
      return v.value;
    case "Array":
      return v.items.map(toPlain);
    case "Dict":
      // fromEntries defines own properties, so "__proto__" stays an ordinary key
      return Object.fromEntries([...v.entries].map(([k, item]): [string, PlainValue] => [k, toPlain(item)]));
  }
}

/**
 * Render a value tree as JSON text.
 *
 * The layout matches `JSON.stringify(data, null, indent)`; an indent of 0
 * gives compact output. Integers are printed exactly, however large, and
 * non-ASCII text is left unescaped.
 */
export function serialize(v: Value, indent: number = 2): string {
  return write(v, " ".repeat(indent), "");
}

function write(v: Value, unit: string, current: string): string {
  switch (v.kind) {
    case "Integer":
      return v.value.toString();
    case "Text":
      return JSON.stringify(v.value);
    case "Array": {
      if (v.items.length === 0) return "[]";
      const inner = current + unit;
      const parts = v.items.map((item) => write(item, unit, inner));
      return wrap("[", "]", parts, unit, current);
    }
    case "Dict": {
      if (v.entries.size === 0) return "{}";
      const inner = current + unit;
      const sep = unit ? ": " : ":";
      const parts = [...v.entries].map(([k, item]) => `${JSON.stringify(k)}${sep}${write(item, unit, inner)}`);
      return wrap("{", "}", parts, unit, current);
    }
  }
}

function wrap(open: string, close: string, parts: string[], unit: string, current: string): string {
  if (!unit) return `${open}${parts.join(",")}${close}`;
  const inner = current + unit;
  return `${open}\n${inner}${parts.join(`,\n${inner}`)}\n${current}${close}`;
}
