import { describe, it, expect } from "vitest";
import { array, dict, integer, text, valueToString, type Value } from "../../src/value/value.js";
import { serialize, toPlain } from "../../src/value/json.js";

const sample: Value = dict(new Map<string, Value>([
  ["name", text("main_server")],
  ["ports", array([integer(80n), integer(443n)])],
  ["empty", array([])],
  ["meta", dict(new Map<string, Value>([
    ["owner", text("ops")],
    ["limits", dict(new Map())],
  ]))],
]));

describe("toPlain", () => {
  it("converts nested values", () => {
    expect(toPlain(sample)).toEqual({
      name: "main_server",
      ports: [80, 443],
      empty: [],
      meta: { owner: "ops", limits: {} },
    });
  });

  it("keeps dict key order", () => {
    const v = dict(new Map<string, Value>([["z", integer(1n)], ["a", integer(2n)]]));
    expect(Object.keys(toPlain(v))).toEqual(["z", "a"]);
  });

  it("keeps integers outside the safe range as bigint", () => {
    expect(toPlain(integer(2n ** 53n - 1n))).toBe(9007199254740991);
    expect(toPlain(integer(2n ** 70n))).toBe(2n ** 70n);
  });

  it("treats __proto__ as an ordinary key", () => {
    const plain = toPlain(dict(new Map([["__proto__", integer(1n)]])));
    expect(Object.keys(plain)).toEqual(["__proto__"]);
    expect(Object.getPrototypeOf(plain)).toBe(Object.prototype);
  });
});

describe("serialize", () => {
  it("matches JSON.stringify layout", () => {
    expect(serialize(sample)).toBe(JSON.stringify(toPlain(sample), null, 2));
    expect(serialize(sample, 4)).toBe(JSON.stringify(toPlain(sample), null, 4));
  });

  it("writes compact output for an indent of 0", () => {
    const v = dict(new Map<string, Value>([["port", integer(4056n)], ["host", text("localhost")]]));
    expect(serialize(v, 0)).toBe('{"port":4056,"host":"localhost"}');
  });

  it("writes the indented layout", () => {
    const v = dict(new Map<string, Value>([["a", array([integer(1n)])], ["b", array([])]]));
    expect(serialize(v)).toBe('{\n  "a": [\n    1\n  ],\n  "b": []\n}');
  });

  it("writes empty collections inline", () => {
    expect(serialize(array([]))).toBe("[]");
    expect(serialize(dict(new Map()))).toBe("{}");
  });

  it("writes large integers exactly", () => {
    expect(serialize(integer(2n ** 70n))).toBe("1180591620717411303424");
  });

  it("leaves non-ASCII text unescaped", () => {
    expect(serialize(text("привет"))).toBe('"привет"');
  });

  it("escapes quotes and control characters", () => {
    expect(serialize(text('say "hi"\n'))).toBe('"say \\"hi\\"\\n"');
  });

  it("round-trips through JSON.parse", () => {
    expect(JSON.parse(serialize(sample))).toEqual(toPlain(sample));
  });
});

describe("valueToString", () => {
  it("renders values in source syntax", () => {
    expect(valueToString(integer(5n))).toBe("0b101");
    expect(valueToString(array([text("a"), integer(0n)]))).toBe("array([[a]], 0b0)");
    expect(valueToString(dict(new Map([["k", integer(1n)]])))).toBe("@{ k = 0b1; }");
    expect(valueToString(dict(new Map()))).toBe("@{ }");
  });
});
