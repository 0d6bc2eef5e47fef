/** Shared core types used by module contracts. */

/** Primitive identity a key is stored under. */
export type HashKey = string | number | bigint | boolean | symbol;

/**
 * Which extreme(s) the heap keeps at hand.
 * - "min" / "max": single-order binary heap
 * - "minmax": interleaved min-max heap, both extremes O(1)
 */
export type HeapOrder = "min" | "max" | "minmax";

export const HEAP_ORDERS: readonly HeapOrder[] = ["min", "max", "minmax"];

/** A (key, priority) pair as handed out to callers. */
export type Entry<K, P> = readonly [key: K, priority: P];

/** Array.sort semantics: <0 means a has the lower priority. */
export type Comparator<P> = (a: P, b: P) => number;

/** Maps a key to the identity it is stored under; throws to reject the key. */
export type KeyHasher<K> = (key: K) => HashKey;

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface HeapDictOptions<K, P> {
  order?: HeapOrder;
  compare?: Comparator<P>;
  hashKey?: KeyHasher<K>;
  /** Re-check every invariant after each mutation (debug aid, O(n) per call). */
  checkInvariants?: boolean;
  logger?: Logger;
}

/**
 * Anything a HeapDict can be built from or merged with.
 * Maps (and other HeapDicts) are read through their entries; plain records go through HeapDict.fromRecord.
 */
export type PairSource<K, P> = Iterable<readonly [K, P]> | ReadonlyMap<K, P>;
