import type { HeapLayout, HeapSlots } from "../heap.js";
import { parentOf } from "../heap.js";

/**
 * Single-order binary heap over HeapSlots.
 *
 * The heap's own extreme sits at the root (O(1)); the opposite extreme can only be a leaf,
 * so it is found by scanning positions n/2..n-1 (O(n)).
 */
export class BinaryHeapLayout implements HeapLayout {
  constructor(readonly order: "min" | "max") {}

  siftUp(slots: HeapSlots, i: number): void {
    while (i > 0) {
      const p = parentOf(i);
      if (!this.above(slots, i, p)) return;
      slots.swap(i, p);
      i = p;
    }
  }

  siftDown(slots: HeapSlots, i: number): void {
    const n = slots.size();

    while (true) {
      const l = i * 2 + 1;
      const r = l + 1;
      let best = i;

      if (l < n && this.above(slots, l, best)) best = l;
      if (r < n && this.above(slots, r, best)) best = r;
      if (best === i) return;

      slots.swap(i, best);
      i = best;
    }
  }

  heapify(slots: HeapSlots): void {
    for (let i = (slots.size() >> 1) - 1; i >= 0; i--) this.siftDown(slots, i);
  }

  minIndex(slots: HeapSlots): number {
    return this.order === "min" ? rootIndex(slots) : scanLeaves(slots, (i, j) => slots.less(i, j));
  }

  maxIndex(slots: HeapSlots): number {
    return this.order === "max" ? rootIndex(slots) : scanLeaves(slots, (i, j) => slots.less(j, i));
  }

  violations(slots: HeapSlots): string[] {
    const out: string[] = [];
    for (let i = 1; i < slots.size(); i++) {
      const p = parentOf(i);
      if (this.above(slots, i, p)) out.push(`position ${i} is out of ${this.order}-order with parent ${p}`);
    }
    return out;
  }

  /** i belongs closer to the root than j */
  private above(slots: HeapSlots, i: number, j: number): boolean {
    return this.order === "min" ? slots.less(i, j) : slots.less(j, i);
  }
}

function rootIndex(slots: HeapSlots): number {
  return slots.size() ? 0 : -1;
}

function scanLeaves(slots: HeapSlots, better: (i: number, j: number) => boolean): number {
  const n = slots.size();
  if (!n) return -1;
  let best = n >> 1;
  for (let i = best + 1; i < n; i++) {
    if (better(i, best)) best = i;
  }
  return best;
}
