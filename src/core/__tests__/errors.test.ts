import { describe, expect, it } from "vitest";
import { HeapDictError, describeValue, emptyCollection, isHeapDictError, keyNotFound } from "../index.js";

describe("HeapDictError", () => {
  it("carries a code, title and detail", () => {
    const err = keyNotFound("x");
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("HeapDictError");
    expect(err.code).toBe("KEY_NOT_FOUND");
    expect(err.title).toBe("Key not found");
    expect(err.detail).toBe("'x'");
    expect(err.message).toBe("Key not found: 'x'");
  });

  it("uses the title alone when there is no detail", () => {
    expect(new HeapDictError("INVARIANT_VIOLATION").message).toBe("Invariant violation");
  });

  it("narrows by code", () => {
    const err: unknown = emptyCollection("pop item");
    expect(isHeapDictError(err)).toBe(true);
    expect(isHeapDictError(err, "EMPTY_COLLECTION")).toBe(true);
    expect(isHeapDictError(err, "KEY_NOT_FOUND")).toBe(false);
    expect(isHeapDictError(new Error("x"))).toBe(false);
  });
});

describe("describeValue", () => {
  it("renders primitives as literals", () => {
    expect(describeValue("a'b")).toBe("'a\\'b'");
    expect(describeValue(12)).toBe("12");
    expect(describeValue(3n)).toBe("3n");
    expect(describeValue(true)).toBe("true");
    expect(describeValue(null)).toBe("null");
    expect(describeValue(undefined)).toBe("undefined");
    expect(describeValue(Symbol("k"))).toBe("Symbol(k)");
  });

  it("renders dates and objects", () => {
    expect(describeValue(new Date("2024-01-02T03:04:05Z"))).toBe("2024-01-02T03:04:05.000Z");
    expect(describeValue([1, "a"])).toBe('[1,"a"]');
    expect(describeValue({ rank: 2 })).toBe('{"rank":2}');
    expect(describeValue({ n: 1n })).toBe("[object Object]");
  });
});
