import type { HeapOrder } from "./types.js";

/**
 * Array-backed storage a heap layout operates on.
 * Positions are 0-based; children of i live at 2i+1 and 2i+2.
 */
export interface HeapSlots {
  size(): number;
  /** True when the priority at i is strictly lower than the priority at j. */
  less(i: number, j: number): boolean;
  /** Exchanges two positions, keeping any position index in sync. */
  swap(i: number, j: number): void;
}

/**
 * Heap ordering strategy.
 *
 * Contract notes:
 * - siftUp moves an element toward the root, siftDown toward the leaves
 * - both are no-ops when the element is already in place
 * - heapify restores the whole array bottom-up in O(n)
 */
export interface HeapLayout {
  readonly order: HeapOrder;

  siftUp(slots: HeapSlots, i: number): void;
  siftDown(slots: HeapSlots, i: number): void;
  heapify(slots: HeapSlots): void;

  /** Position of the lowest priority, or -1 when empty. */
  minIndex(slots: HeapSlots): number;
  /** Position of the highest priority, or -1 when empty. */
  maxIndex(slots: HeapSlots): number;

  /** Human-readable descriptions of every ordering violation. */
  violations(slots: HeapSlots): string[];
}

export function parentOf(i: number): number {
  return (i - 1) >> 1;
}
