export type Value =
  | { kind: "Integer"; value: bigint }
  | { kind: "Text"; value: string }
  | { kind: "Array"; items: Value[] }
  | { kind: "Dict"; entries: Map<string, Value> };

export function integer(value: bigint): Value {
  return { kind: "Integer", value };
}

export function text(value: string): Value {
  return { kind: "Text", value };
}

export function array(items: Value[]): Value {
  return { kind: "Array", items };
}

export function dict(entries: Map<string, Value>): Value {
  return { kind: "Dict", entries };
}

export function valueToString(v: Value): string {
  switch (v.kind) {
    case "Integer": return `0b${v.value.toString(2)}`;
    case "Text": return `[[${v.value}]]`;
    case "Array": return `array(${v.items.map(valueToString).join(", ")})`;
    case "Dict": {
      if (v.entries.size === 0) return "@{ }";
      const parts = [...v.entries].map(([k, item]) => `${k} = ${valueToString(item)};`);
      return `@{ ${parts.join(" ")} }`;
    }
  }
}
