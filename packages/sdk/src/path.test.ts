import { describe, it, expect } from "vitest";
import {
  IndexedList,
  evaluate,
  evaluateValue,
  formatPath,
  parsePath,
  stripLeadingAll,
} from "./path.js";
import { MalformedPathError, OutOfRangeError, TypeMismatchError } from "./errors.js";
import type { JsonValue } from "./types.js";

describe("parsePath", () => {
  it("should parse member access, positions and wildcards", () => {
    expect(parsePath("[*].author.name")).toEqual([
      { kind: "all" },
      { kind: "key", name: "author" },
      { kind: "key", name: "name" },
    ]);
    expect(parsePath("items[2].tags[*]")).toEqual([
      { kind: "key", name: "items" },
      { kind: "index", position: 2 },
      { kind: "key", name: "tags" },
      { kind: "all" },
    ]);
  });

  it("should ignore empty segments between dots", () => {
    expect(parsePath("a..b.")).toEqual([
      { kind: "key", name: "a" },
      { kind: "key", name: "b" },
    ]);
  });

  it("should return no segments for an empty path", () => {
    expect(parsePath("")).toEqual([]);
  });

  it("should reject an unclosed bracket", () => {
    expect(() => parsePath("items[0")).toThrow(MalformedPathError);
  });

  it.each(["[-1]", "[]", "[x]", "[1.5]"])("should reject bracket contents in %s", (path) => {
    expect(() => parsePath(path)).toThrow(MalformedPathError);
  });

  it("should round-trip through formatPath", () => {
    expect(formatPath(parsePath("[*].author.tags[0]"))).toBe("[*].author.tags[0]");
    expect(formatPath(parsePath("a.b[*].c"))).toBe("a.b[*].c");
  });
});

describe("stripLeadingAll", () => {
  it("should drop only a leading wildcard", () => {
    expect(stripLeadingAll(parsePath("[*].a"))).toEqual([{ kind: "key", name: "a" }]);
    expect(stripLeadingAll(parsePath("a[*]"))).toEqual(parsePath("a[*]"));
  });
});

describe("evaluate", () => {
  const rows: JsonValue = [
    { content: "a", author: { name: "Ada", tags: ["x", "y"] } },
    { content: "b", author: { name: "Ben", tags: [] } },
    { content: "c", author: null },
  ];

  it("should return the addressed value without wildcards", () => {
    expect(evaluate(rows, parsePath("[1].author.name"))).toBe("Ben");
    expect(evaluate(rows, parsePath("[0].author.tags[1]"))).toBe("y");
  });

  it("should index every element under the first wildcard", () => {
    const result = evaluate(rows, parsePath("[*].content"));

    expect(result).toBeInstanceOf(IndexedList);
    expect(JSON.parse(JSON.stringify(result))).toEqual([
      { index: 0, value: "a" },
      { index: 1, value: "b" },
      { index: 2, value: "c" },
    ]);
  });

  it("should yield null for elements whose shape doesn't fit", () => {
    const result = evaluate(rows, parsePath("[*].author.name"));

    expect(result).toBeInstanceOf(IndexedList);
    if (result instanceof IndexedList) {
      expect(result.entries).toEqual([
        { index: 0, value: "Ada" },
        { index: 1, value: "Ben" },
        { index: 2, value: null },
      ]);
    }
  });

  it("should yield null for out-of-range positions inside a wildcard", () => {
    const result = evaluate(rows, parsePath("[*].author.tags[0]"));

    if (!(result instanceof IndexedList)) throw new Error("expected an IndexedList");
    expect(result.entries.map((entry) => entry.value)).toEqual(["x", null, null]);
  });

  it("should return plain arrays for nested wildcards", () => {
    const result = evaluate(rows, parsePath("[*].author.tags[*]"));

    if (!(result instanceof IndexedList)) throw new Error("expected an IndexedList");
    expect(result.entries).toEqual([
      { index: 0, value: ["x", "y"] },
      { index: 1, value: [] },
      { index: 2, value: null },
    ]);
  });

  it("should evaluate a missing member to null", () => {
    expect(evaluate({ a: 1 }, parsePath("b"))).toBeNull();
  });

  it("should not resolve inherited members", () => {
    expect(evaluate({ a: 1 }, parsePath("toString"))).toBeNull();
  });

  it("should throw a type mismatch outside any wildcard", () => {
    expect(() => evaluate({ a: 1 }, parsePath("b.c"))).toThrow(TypeMismatchError);
    expect(() => evaluate([1, 2], parsePath("a"))).toThrow(TypeMismatchError);
    expect(() => evaluate({ a: 1 }, parsePath("[0]"))).toThrow(TypeMismatchError);
  });

  it("should throw out of range outside any wildcard", () => {
    expect(() => evaluate([1, 2], parsePath("[2]"))).toThrow(OutOfRangeError);
    expect(() => evaluate([1, 2], parsePath("[2]"))).toThrow(
      "Index [2] out of range for array of length 2"
    );
  });

  it("should throw when a wildcard is applied to a non-array", () => {
    expect(() => evaluate({ a: 1 }, parsePath("[*]"))).toThrow(TypeMismatchError);
  });

  it("should return the value itself for no segments", () => {
    expect(evaluate(rows, [])).toBe(rows);
  });

  it("should not mutate its input", () => {
    const input: JsonValue = [{ a: { b: [1, 2] } }];
    const before = JSON.stringify(input);

    evaluate(input, parsePath("[*].a.b[*]"));
    evaluate(input, parsePath("[0].a.b[1]"));

    expect(JSON.stringify(input)).toBe(before);
  });
});

describe("evaluateValue", () => {
  it("should return a plain array for the first wildcard too", () => {
    expect(evaluateValue([{ n: 1 }, { n: 2 }], parsePath("[*].n"))).toEqual([1, 2]);
  });
});
