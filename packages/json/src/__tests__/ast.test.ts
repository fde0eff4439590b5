import { describe, it, expect } from "vitest";
import {
  fromNative,
  jsonArray,
  jsonEquals,
  jsonNull,
  jsonNumber,
  jsonObject,
  jsonString,
  parseJsonOrThrow,
  toNative,
} from "../index.js";

describe("jsonObject", () => {
  it("keeps the first position and the last value of a repeated key", () => {
    const obj = jsonObject([
      ["a", jsonNumber(1)],
      ["b", jsonNumber(2)],
      ["a", jsonNumber(3)],
    ]);
    expect([...obj.entries.keys()]).toEqual(["a", "b"]);
    expect(obj.entries.get("a")).toEqual(jsonNumber(3));
  });
});

describe("jsonEquals", () => {
  it("ignores object key order", () => {
    const a = jsonObject([
      ["x", jsonNull],
      ["y", jsonString("s")],
    ]);
    const b = jsonObject([
      ["y", jsonString("s")],
      ["x", jsonNull],
    ]);
    expect(jsonEquals(a, b)).toBe(true);
  });

  it("compares arrays by position", () => {
    const a = jsonArray([jsonNumber(1), jsonNumber(2)]);
    const b = jsonArray([jsonNumber(2), jsonNumber(1)]);
    expect(jsonEquals(a, b)).toBe(false);
    expect(jsonEquals(a, jsonArray([jsonNumber(1)]))).toBe(false);
  });

  it("distinguishes types", () => {
    expect(jsonEquals(jsonNumber(1), jsonString("1"))).toBe(false);
    expect(jsonEquals(jsonNull, jsonArray([]))).toBe(false);
    expect(jsonEquals(jsonObject([]), jsonArray([]))).toBe(false);
  });

  it("treats zero and negative zero as equal", () => {
    expect(jsonEquals(jsonNumber(0), jsonNumber(-0))).toBe(true);
  });
});

describe("native conversion", () => {
  it("converts in both directions", () => {
    const native = { a: [1, "two", null, false], b: { c: {} } };
    expect(toNative(fromNative(native))).toEqual(native);
  });

  it("keeps __proto__ as an ordinary key", () => {
    const out = toNative(parseJsonOrThrow('{"__proto__": 1}'));
    expect(Object.keys(out ?? {})).toEqual(["__proto__"]);
    expect(Object.getPrototypeOf(out)).toBe(Object.prototype);
  });
});
