import type { HeapLayout, HeapSlots } from "../heap.js";
import { parentOf } from "../heap.js";

/** Depth of position i; the root is level 0. */
export function levelOf(i: number): number {
  return 31 - Math.clz32(i + 1);
}

export function isMinLevel(i: number): boolean {
  return (levelOf(i) & 1) === 0;
}

/**
 * Interleaved min-max heap (Atkinson et al.).
 *
 * Even levels hold values <= all their descendants, odd levels values >= all their descendants,
 * so the minimum is the root and the maximum is one of the root's children.
 */
export class MinMaxHeapLayout implements HeapLayout {
  readonly order = "minmax";

  siftUp(slots: HeapSlots, i: number): void {
    if (i === 0) return;
    const p = parentOf(i);

    if (isMinLevel(i)) {
      if (slots.less(p, i)) {
        slots.swap(i, p);
        this.bubbleUp(slots, p, true);
      } else {
        this.bubbleUp(slots, i, false);
      }
    } else if (slots.less(i, p)) {
      slots.swap(i, p);
      this.bubbleUp(slots, p, false);
    } else {
      this.bubbleUp(slots, i, true);
    }
  }

  siftDown(slots: HeapSlots, i: number): void {
    const max = !isMinLevel(i);
    // m beats n in the direction of the current level
    const beats = max ? (m: number, n: number) => slots.less(n, m) : (m: number, n: number) => slots.less(m, n);
    const size = slots.size();

    while (true) {
      const first = i * 2 + 1;
      if (first >= size) return;

      // best among children and grandchildren
      let m = first;
      for (const c of [first + 1, first * 2 + 1, first * 2 + 2, first * 2 + 3, first * 2 + 4]) {
        if (c < size && beats(c, m)) m = c;
      }

      if (!beats(m, i)) return;
      slots.swap(m, i);
      if (m <= first + 1) return;

      const p = parentOf(m);
      if (beats(p, m)) slots.swap(m, p);
      i = m;
    }
  }

  heapify(slots: HeapSlots): void {
    for (let i = (slots.size() >> 1) - 1; i >= 0; i--) this.siftDown(slots, i);
  }

  minIndex(slots: HeapSlots): number {
    return slots.size() ? 0 : -1;
  }

  maxIndex(slots: HeapSlots): number {
    const n = slots.size();
    if (n <= 2) return n - 1;
    return slots.less(1, 2) ? 2 : 1;
  }

  violations(slots: HeapSlots): string[] {
    const out: string[] = [];
    const n = slots.size();

    for (let i = 1; i < n; i++) {
      const p = parentOf(i);
      const bad = isMinLevel(i) ? slots.less(p, i) : slots.less(i, p);
      if (bad) out.push(`position ${i} is out of order with parent ${p}`);
    }

    for (let i = 3; i < n; i++) {
      const g = parentOf(parentOf(i));
      const bad = isMinLevel(i) ? slots.less(i, g) : slots.less(g, i);
      if (bad) out.push(`position ${i} is out of order with grandparent ${g}`);
    }

    return out;
  }

  /** Walks grandparents on max (or min) levels while i beats them. */
  private bubbleUp(slots: HeapSlots, i: number, max: boolean): void {
    while (i > 2) {
      const g = parentOf(parentOf(i));
      const out = max ? slots.less(g, i) : slots.less(i, g);
      if (!out) return;
      slots.swap(i, g);
      i = g;
    }
  }
}
