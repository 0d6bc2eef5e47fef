import type { HeapSlots } from "../../heap.js";

/** Plain numeric heap storage for exercising layouts directly. */
export class ArraySlots implements HeapSlots {
  constructor(readonly values: number[] = []) {}

  size(): number {
    return this.values.length;
  }

  less(i: number, j: number): boolean {
    return this.values[i]! < this.values[j]!;
  }

  swap(i: number, j: number): void {
    const a = this.values;
    [a[i], a[j]] = [a[j]!, a[i]!];
  }
}

/** Deterministic PRNG (mulberry32) so failures reproduce from the seed. */
export function seeded(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomInts(rand: () => number, n: number, lo: number, hi: number): number[] {
  const out: number[] = [];
  for (let i = 0; i < n; i++) out.push(lo + Math.floor(rand() * (hi - lo + 1)));
  return out;
}
