import { describe, expect, it } from "vitest";
import { HeapDict, HEAP_ORDERS, isHeapDictError, type HeapOrder } from "../../index.js";
import { randomInts, seeded } from "./slots.js";

const KEYS = ["a", "b", "c", "d", "e", "f", "g", "h"];

function pick<T>(rand: () => number, items: readonly T[]): T {
  return items[Math.floor(rand() * items.length)]!;
}

function extremes(model: Map<string, number>): { min: number; max: number } {
  const values = [...model.values()];
  return { min: Math.min(...values), max: Math.max(...values) };
}

function expectConsistent(d: HeapDict<string, number>, model: Map<string, number>): void {
  expect(d.checkInvariants()).toEqual([]);
  expect([...d.entries()]).toEqual([...model.entries()]);
}

function drain(d: HeapDict<number, number>, take: () => "min" | "max"): { mins: number[]; maxs: number[] } {
  const mins: number[] = [];
  const maxs: number[] = [];
  while (!d.isEmpty()) {
    if (take() === "min") mins.push(d.popMin()[1]);
    else maxs.push(d.popMax()[1]);
    expect(d.checkInvariants()).toEqual([]);
  }
  return { mins, maxs };
}

describe.each(HEAP_ORDERS.map((order) => [order]))("HeapDict (%s) against a Map model", (order: HeapOrder) => {
  it("matches dictionary semantics over random operation sequences", () => {
    for (let seed = 1; seed <= 25; seed++) {
      const rand = seeded(seed);
      const d = new HeapDict<string, number>(null, { order });
      const model = new Map<string, number>();

      for (let step = 0; step < 120; step++) {
        const op = rand();
        const key = pick(rand, KEYS);

        if (op < 0.45) {
          const priority = Math.floor(rand() * 11) - 5;
          d.set(key, priority);
          model.set(key, priority);
        } else if (op < 0.6) {
          if (model.has(key)) {
            d.delete(key);
            model.delete(key);
          } else {
            expect(isHeapDictError(catchError(() => d.delete(key)), "KEY_NOT_FOUND")).toBe(true);
          }
        } else if (op < 0.7) {
          expect(d.pop(key, null)).toBe(model.get(key) ?? null);
          model.delete(key);
        } else if (op < 0.98) {
          const which = pick(rand, ["min", "max", "item"] as const);
          const popped =
            which === "min" ? d.popMin(null) : which === "max" ? d.popMax(null) : d.popItem(null);

          if (!model.size) {
            expect(popped).toBeNull();
          } else {
            const { min, max } = extremes(model);
            const wantMax = which === "max" || (which === "item" && order === "max");
            expect(popped?.[1]).toBe(wantMax ? max : min);
            expect(model.get(popped?.[0] ?? "")).toBe(popped?.[1]);
            model.delete(popped?.[0] ?? "");
          }
        } else {
          d.clear();
          model.clear();
        }

        expectConsistent(d, model);
      }
    }
  });

  it("builds valid heaps from pairs of every size", () => {
    const rand = seeded(11);
    for (let n = 0; n < 70; n++) {
      const priorities = randomInts(rand, n, -30, 30);
      const d = new HeapDict(
        priorities.map((p, i) => [i, p] as const),
        { order },
      );
      expect(d.checkInvariants()).toEqual([]);
      expect(d.size).toBe(n);
    }
  });

  it("pops minimums in ascending and maximums in descending order", () => {
    const rand = seeded(21);
    for (let n = 0; n < 40; n++) {
      const priorities = randomInts(rand, n, -10, 10);
      const sorted = [...priorities].sort((x, y) => x - y);

      const asc = drain(new HeapDict(priorities.entries(), { order }), () => "min");
      expect(asc.mins).toEqual(sorted);

      const desc = drain(new HeapDict(priorities.entries(), { order }), () => "max");
      expect(desc.maxs).toEqual([...sorted].reverse());
    }
  });

  it("sorts under any interleaving of popMin and popMax", () => {
    const rand = seeded(42);
    for (let n = 0; n < 40; n++) {
      const priorities = randomInts(rand, n, -10, 10);
      const { mins, maxs } = drain(new HeapDict(priorities.entries(), { order }), () =>
        rand() < 0.5 ? "min" : "max",
      );

      expect([...mins, ...maxs.reverse()]).toEqual([...priorities].sort((x, y) => x - y));
    }
  });

  it("keeps copies independent under random mutation", () => {
    const rand = seeded(5);
    const source = new HeapDict(
      KEYS.map((k) => [k, Math.floor(rand() * 20)] as const),
      { order },
    );
    const frozen = [...source.entries()];
    const copy = source.copy();

    for (let i = 0; i < 30; i++) {
      const key = pick(rand, KEYS);
      if (rand() < 0.5) copy.set(key, Math.floor(rand() * 20));
      else copy.pop(key, null);
    }

    expect([...source.entries()]).toEqual(frozen);
    expect(source.checkInvariants()).toEqual([]);
    expect(copy.checkInvariants()).toEqual([]);
  });
});

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  return undefined;
}
