import type { Entry, HeapOrder } from "./types.js";

/**
 * Dictionary of key -> priority with heap-ordered extraction.
 *
 * Contract notes:
 * - lookups are O(1); set/delete and pops are O(log n)
 * - iteration follows key insertion order; updating a priority keeps the key's position
 * - extremal accessors throw EMPTY_COLLECTION unless a fallback is passed
 * - every operation is all-or-nothing
 * - do not mutate while iterating
 */
export interface PriorityDict<K, P> extends Iterable<K> {
  readonly order: HeapOrder;

  readonly size: number;
  isEmpty(): boolean;
  has(key: K): boolean;

  get(key: K): P;
  get<D>(key: K, fallback: D): P | D;
  set(key: K, priority: P): this;
  setDefault(key: K, priority: P): P;
  delete(key: K): void;
  pop(key: K): P;
  pop<D>(key: K, fallback: D): P | D;

  peekMin(): Entry<K, P>;
  peekMin<D>(fallback: D): Entry<K, P> | D;
  peekMax(): Entry<K, P>;
  peekMax<D>(fallback: D): Entry<K, P> | D;
  /** Peeks the layout's primary extreme: max for "max" order, min otherwise. */
  peekItem(): Entry<K, P>;
  peekItem<D>(fallback: D): Entry<K, P> | D;

  popMin(): Entry<K, P>;
  popMin<D>(fallback: D): Entry<K, P> | D;
  popMax(): Entry<K, P>;
  popMax<D>(fallback: D): Entry<K, P> | D;
  popItem(): Entry<K, P>;
  popItem<D>(fallback: D): Entry<K, P> | D;

  keys(): IterableIterator<K>;
  /** Keys in reverse insertion order. */
  reversed(): IterableIterator<K>;
  values(): IterableIterator<P>;
  entries(): IterableIterator<Entry<K, P>>;

  clear(): void;
  copy(): PriorityDict<K, P>;
  /** Same (key, priority) pairs, ignoring insertion order and heap shape. */
  equals(other: unknown): boolean;
}
