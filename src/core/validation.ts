import { HeapDictError, describeValue } from "./errors.js";
import type { HashKey, HeapOrder } from "./types.js";
import { HEAP_ORDERS } from "./types.js";

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function isIterable(v: unknown): v is Iterable<unknown> {
  return (typeof v === "object" || typeof v === "string") && v !== null && Symbol.iterator in Object(v);
}

export function isPair<T>(v: T): v is T & readonly [unknown, unknown] {
  return Array.isArray(v) && v.length === 2;
}

export function isHeapOrder(v: unknown): v is HeapOrder {
  return typeof v === "string" && HEAP_ORDERS.some((o) => o === v);
}

/**
 * Default key identity: primitives stand for themselves (SameValueZero, like Map).
 * null and undefined are rejected; objects need an explicit hashKey option.
 */
export function defaultHashKey(key: unknown): HashKey {
  switch (typeof key) {
    case "string":
    case "number":
    case "bigint":
    case "boolean":
    case "symbol":
      return key;
  }
  throw new HeapDictError(
    "INVALID_KEY",
    `${describeValue(key)} cannot be used as a key without a hashKey option`,
  );
}

/** Natural ordering for numbers, bigints, strings and dates. */
export function naturalCompare(a: unknown, b: unknown): number {
  const x = orderable(a);
  const y = orderable(b);
  if (typeof x === "string" && typeof y === "string") {
    return x < y ? -1 : x > y ? 1 : 0;
  }
  if (typeof x !== "string" && typeof y !== "string") {
    return x < y ? -1 : x > y ? 1 : 0;
  }
  throw new HeapDictError("INVALID_ARGUMENT", `can't compare ${describeValue(a)} with ${describeValue(b)}`);
}

function orderable(v: unknown): number | bigint | string {
  if (typeof v === "number") {
    if (Number.isNaN(v)) throw new HeapDictError("INVALID_ARGUMENT", "NaN is not an orderable priority");
    return v;
  }
  if (typeof v === "bigint" || typeof v === "string") return v;
  if (v instanceof Date) {
    const t = v.getTime();
    if (Number.isNaN(t)) throw new HeapDictError("INVALID_ARGUMENT", "Invalid Date is not an orderable priority");
    return t;
  }
  throw new HeapDictError(
    "INVALID_ARGUMENT",
    `${describeValue(v)} is not orderable; pass a compare option`,
  );
}
