import { loadCheckInvariants, loadOrder } from "../config.js";
import { HeapDictError, describeValue, emptyCollection, isHeapDictError, keyNotFound } from "../errors.js";
import type { HeapLayout, HeapSlots } from "../heap.js";
import type { PriorityDict } from "../priorityDict.js";
import type {
  Comparator,
  Entry,
  HashKey,
  HeapDictOptions,
  HeapOrder,
  KeyHasher,
  Logger,
  PairSource,
} from "../types.js";
import { defaultHashKey, isIterable, isPair, isRecord, naturalCompare } from "../validation.js";
import { BinaryHeapLayout } from "./binaryHeapLayout.js";
import { MinMaxHeapLayout } from "./minMaxHeapLayout.js";

type Node<K, P> = {
  readonly hash: HashKey;
  readonly key: K;
  priority: P;
};

type ResolvedOptions<K, P> = Required<HeapDictOptions<K, P>>;

export type HeapDictSource<K, P> = PairSource<K, P> | HeapDict<K, P>;

/** Operands accepted by union. */
export type Mapping<K, P> = ReadonlyMap<K, P> | HeapDict<K, P>;

const UNSET: unique symbol = Symbol("unset");
type Unset = typeof UNSET;

export function createLayout(order: HeapOrder): HeapLayout {
  return order === "minmax" ? new MinMaxHeapLayout() : new BinaryHeapLayout(order);
}

/**
 * Priority queue with dictionary access.
 *
 * Data structure (three views kept in sync):
 * - priorities: hash -> node, in key insertion order (iteration, repr, equality)
 * - heap: position -> node, arranged by the layout (min, max or min-max)
 * - indexes: hash -> heap position
 *
 * Nodes are shared between the views, so a priority update touches a single object.
 */
export class HeapDict<K, P> implements PriorityDict<K, P> {
  private readonly priorities = new Map<HashKey, Node<K, P>>();
  private readonly heap: Node<K, P>[] = [];
  private readonly indexes = new Map<HashKey, number>();

  private readonly options: ResolvedOptions<K, P>;
  private readonly layout: HeapLayout;
  private readonly compare: Comparator<P>;
  private readonly hashKey: KeyHasher<K>;
  private readonly logger: Logger;

  private readonly slots: HeapSlots = {
    size: () => this.heap.length,
    less: (i, j) => this.compare(this.heap[i]!.priority, this.heap[j]!.priority) < 0,
    swap: (i, j) => {
      const a = this.heap[i]!;
      const b = this.heap[j]!;
      this.heap[i] = b;
      this.heap[j] = a;
      this.indexes.set(a.hash, j);
      this.indexes.set(b.hash, i);
    },
  };

  /**
   * Builds the dictionary from pairs in O(n): later duplicates overwrite the priority
   * but keep the key's first position, then the heap is restored bottom-up.
   */
  constructor(source?: HeapDictSource<K, P> | null, options: HeapDictOptions<K, P> = {}) {
    this.options = {
      order: options.order ?? loadOrder(),
      compare: options.compare ?? naturalCompare,
      hashKey: options.hashKey ?? defaultHashKey,
      checkInvariants: options.checkInvariants ?? loadCheckInvariants(),
      logger: options.logger ?? console,
    };
    this.layout = createLayout(this.options.order);
    this.compare = this.options.compare;
    this.hashKey = this.options.hashKey;
    this.logger = this.options.logger;

    if (source == null) return;

    for (const node of this.prepare(pairsOf(source))) {
      const existing = this.priorities.get(node.hash);
      if (existing) {
        existing.priority = node.priority;
        continue;
      }
      this.priorities.set(node.hash, node);
      this.indexes.set(node.hash, this.heap.length);
      this.heap.push(node);
    }
    this.layout.heapify(this.slots);
    this.verify("construct");
  }

  static fromKeys<K, P>(keys: Iterable<K>, priority: P, options?: HeapDictOptions<K, P>): HeapDict<K, P> {
    if (!isIterable(keys)) {
      throw new HeapDictError("INVALID_ARGUMENT", `${describeValue(keys)} is not iterable`);
    }
    const pairs: Array<readonly [K, P]> = [];
    for (const key of keys) pairs.push([key, priority]);
    return new HeapDict(pairs, options);
  }

  static fromRecord<P>(record: Readonly<Record<string, P>>, options?: HeapDictOptions<string, P>): HeapDict<string, P> {
    if (!isRecord(record)) {
      throw new HeapDictError("INVALID_ARGUMENT", `${describeValue(record)} is not a record`);
    }
    return new HeapDict(Object.entries(record), options);
  }

  /** Union where either operand may be a plain Map; the result is always a HeapDict. */
  static union<K, P>(left: Mapping<K, P>, right: Mapping<K, P>, options?: HeapDictOptions<K, P>): HeapDict<K, P> {
    if (left instanceof HeapDict && !options) return left.union(right);
    assertMapping(left);
    const opts = options ?? (right instanceof HeapDict ? right.options : {});
    return new HeapDict(left, opts).union(right);
  }

  get order(): HeapOrder {
    return this.layout.order;
  }

  get size(): number {
    return this.priorities.size;
  }

  isEmpty(): boolean {
    return this.priorities.size === 0;
  }

  has(key: K): boolean {
    return this.priorities.has(this.hashOf(key));
  }

  get(key: K): P;
  get<D>(key: K, fallback: D): P | D;
  get<D>(key: K, ...fallback: [] | [D]): P | D {
    const node = this.priorities.get(this.hashOf(key));
    if (node) return node.priority;
    return orElse(fallback, () => keyNotFound(key));
  }

  /**
   * Inserts or updates a key.
   *
   * An existing key keeps its insertion position; its slot is re-sifted toward the root and then
   * toward the leaves. A new key is appended and can only move toward the root.
   */
  set(key: K, priority: P): this {
    const hash = this.hashOf(key);
    this.checkPriority(priority, UNSET);

    const i = this.indexes.get(hash);
    if (i !== undefined) {
      this.heap[i]!.priority = priority;
      this.layout.siftUp(this.slots, i);
      this.layout.siftDown(this.slots, i);
    } else {
      const node: Node<K, P> = { hash, key, priority };
      this.priorities.set(hash, node);
      this.indexes.set(hash, this.heap.length);
      this.heap.push(node);
      this.layout.siftUp(this.slots, this.heap.length - 1);
    }

    this.verify("set");
    return this;
  }

  setDefault(key: K, priority: P): P {
    const node = this.priorities.get(this.hashOf(key));
    if (node) return node.priority;
    this.set(key, priority);
    return priority;
  }

  /** Sets every pair of the source in order; nothing is applied if any pair is invalid. */
  update(source: HeapDictSource<K, P>): this {
    for (const node of this.prepare(pairsOf(source))) this.set(node.key, node.priority);
    return this;
  }

  delete(key: K): void {
    const i = this.indexes.get(this.hashOf(key));
    if (i === undefined) throw keyNotFound(key);
    this.removeAt(i);
    this.verify("delete");
  }

  pop(key: K): P;
  pop<D>(key: K, fallback: D): P | D;
  pop<D>(key: K, ...fallback: [] | [D]): P | D {
    const i = this.indexes.get(this.hashOf(key));
    if (i === undefined) return orElse(fallback, () => keyNotFound(key));
    const node = this.removeAt(i);
    this.verify("pop");
    return node.priority;
  }

  peekMin(): Entry<K, P>;
  peekMin<D>(fallback: D): Entry<K, P> | D;
  peekMin<D>(...fallback: [] | [D]): Entry<K, P> | D {
    return this.peekAt(this.layout.minIndex(this.slots), "peek min item", fallback);
  }

  peekMax(): Entry<K, P>;
  peekMax<D>(fallback: D): Entry<K, P> | D;
  peekMax<D>(...fallback: [] | [D]): Entry<K, P> | D {
    return this.peekAt(this.layout.maxIndex(this.slots), "peek max item", fallback);
  }

  peekItem(): Entry<K, P>;
  peekItem<D>(fallback: D): Entry<K, P> | D;
  peekItem<D>(...fallback: [] | [D]): Entry<K, P> | D {
    return this.peekAt(this.primaryIndex(), "peek item", fallback);
  }

  popMin(): Entry<K, P>;
  popMin<D>(fallback: D): Entry<K, P> | D;
  popMin<D>(...fallback: [] | [D]): Entry<K, P> | D {
    return this.popAt(this.layout.minIndex(this.slots), "pop min item", fallback);
  }

  popMax(): Entry<K, P>;
  popMax<D>(fallback: D): Entry<K, P> | D;
  popMax<D>(...fallback: [] | [D]): Entry<K, P> | D {
    return this.popAt(this.layout.maxIndex(this.slots), "pop max item", fallback);
  }

  popItem(): Entry<K, P>;
  popItem<D>(fallback: D): Entry<K, P> | D;
  popItem<D>(...fallback: [] | [D]): Entry<K, P> | D {
    return this.popAt(this.primaryIndex(), "pop item", fallback);
  }

  [Symbol.iterator](): IterableIterator<K> {
    return this.keys();
  }

  *keys(): IterableIterator<K> {
    for (const node of this.priorities.values()) yield node.key;
  }

  *reversed(): IterableIterator<K> {
    const nodes = Array.from(this.priorities.values());
    for (let i = nodes.length - 1; i >= 0; i--) yield nodes[i]!.key;
  }

  *values(): IterableIterator<P> {
    for (const node of this.priorities.values()) yield node.priority;
  }

  *entries(): IterableIterator<Entry<K, P>> {
    for (const node of this.priorities.values()) yield [node.key, node.priority];
  }

  forEach(fn: (priority: P, key: K, dict: this) => void): void {
    for (const node of this.priorities.values()) fn(node.priority, node.key, this);
  }

  toMap(): Map<K, P> {
    return new Map(this.entries());
  }

  /** Drops all three views at once; nothing is re-sifted. */
  clear(): void {
    this.priorities.clear();
    this.indexes.clear();
    this.heap.length = 0;
    this.verify("clear");
  }

  /** O(n) clone of all three views; keys and priorities themselves are shared. */
  copy(): HeapDict<K, P> {
    const out = new HeapDict<K, P>(null, this.options);
    const clones = new Map<HashKey, Node<K, P>>();

    for (const node of this.heap) {
      const clone: Node<K, P> = { hash: node.hash, key: node.key, priority: node.priority };
      clones.set(node.hash, clone);
      out.heap.push(clone);
    }
    for (const hash of this.priorities.keys()) {
      const clone = clones.get(hash);
      if (clone) out.priorities.set(hash, clone);
    }
    for (const [hash, i] of this.indexes) out.indexes.set(hash, i);

    out.verify("copy");
    return out;
  }

  /** New HeapDict with this dictionary's pairs followed by other's; later priorities win. */
  union(other: Mapping<K, P>): HeapDict<K, P> {
    assertMapping(other);
    return this.copy().update(other);
  }

  equals(other: unknown): boolean {
    if (other === this) return true;
    if (!(other instanceof HeapDict || other instanceof Map)) return false;
    if (other.size !== this.size) return false;

    for (const [key, priority] of other.entries()) {
      try {
        const node = this.priorities.get(this.hashOf(key));
        if (!node || this.compare(node.priority, priority) !== 0) return false;
      } catch (e) {
        // unhashable key or incomparable priority: cannot be one of ours
        if (isHeapDictError(e)) return false;
        throw e;
      }
    }
    return true;
  }

  /** `HeapDict({'a': 1, 'b': 2})` in insertion order. */
  toString(): string {
    return this.render("HeapDict");
  }

  /** toString annotated with the order, e.g. `HeapDict<minmax>({'a': 1})`. */
  describe(): string {
    return this.render(`HeapDict<${this.order}>`);
  }

  /** Every broken invariant, or an empty array when all views agree. */
  checkInvariants(): string[] {
    const out: string[] = [];
    const n = this.heap.length;

    if (this.priorities.size !== n || this.indexes.size !== n) {
      out.push(`view sizes differ: priorities=${this.priorities.size} heap=${n} indexes=${this.indexes.size}`);
    }

    for (let i = 0; i < n; i++) {
      const node = this.heap[i]!;
      if (this.indexes.get(node.hash) !== i) out.push(`index of heap position ${i} is ${this.indexes.get(node.hash)}`);
      if (this.priorities.get(node.hash) !== node) out.push(`heap position ${i} holds a node missing from priorities`);
    }
    for (const [hash, i] of this.indexes) {
      if (this.heap[i]?.hash !== hash) out.push(`index ${i} of ${describeValue(hash)} points at another node`);
    }

    if (!out.length) out.push(...this.layout.violations(this.slots));
    return out;
  }

  private primaryIndex(): number {
    return this.order === "max" ? this.layout.maxIndex(this.slots) : this.layout.minIndex(this.slots);
  }

  private peekAt<D>(i: number, op: string, fallback: [] | [D]): Entry<K, P> | D {
    const node = this.heap[i];
    if (node) return [node.key, node.priority];
    return orElse(fallback, () => emptyCollection(op));
  }

  private popAt<D>(i: number, op: string, fallback: [] | [D]): Entry<K, P> | D {
    if (i < 0) return orElse(fallback, () => emptyCollection(op));
    const node = this.removeAt(i);
    this.verify(op);
    return [node.key, node.priority];
  }

  /**
   * Swap-with-last removal. The moved-in node may be out of order in either direction,
   * so its slot is sifted both ways.
   */
  private removeAt(i: number): Node<K, P> {
    const last = this.heap.length - 1;
    const node = this.heap[i]!;

    this.slots.swap(i, last);
    this.heap.pop();
    this.indexes.delete(node.hash);
    this.priorities.delete(node.hash);

    if (i < last) {
      this.layout.siftUp(this.slots, i);
      this.layout.siftDown(this.slots, i);
    }
    return node;
  }

  private hashOf(key: K): HashKey {
    let hash: unknown;
    try {
      hash = this.hashKey(key);
    } catch (e) {
      if (isHeapDictError(e)) throw e;
      throw new HeapDictError("INVALID_KEY", `hashKey rejected ${describeValue(key)}`, { cause: e });
    }
    if (!isHashKey(hash)) {
      throw new HeapDictError("INVALID_KEY", `hashKey returned ${describeValue(hash)} for ${describeValue(key)}`);
    }
    return hash;
  }

  /**
   * Rejects priorities the comparator cannot order, before any view changes.
   * Comparing against the root also catches mixing incompatible priority types.
   */
  private checkPriority(priority: P, against: P | Unset): void {
    try {
      this.compare(priority, priority);
      const root = this.heap[0];
      if (root) this.compare(priority, root.priority);
      if (against !== UNSET) this.compare(priority, against);
    } catch (e) {
      if (isHeapDictError(e)) throw e;
      throw new HeapDictError("INVALID_ARGUMENT", `can't order priority ${describeValue(priority)}`, { cause: e });
    }
  }

  /** Hashes and validates a batch of pairs without touching the views. */
  private prepare(pairs: Iterable<readonly [K, P]>): Node<K, P>[] {
    const nodes: Node<K, P>[] = [];
    let first: P | Unset = UNSET;

    for (const [key, priority] of pairs) {
      const hash = this.hashOf(key);
      this.checkPriority(priority, first);
      if (first === UNSET) first = priority;
      nodes.push({ hash, key, priority });
    }
    return nodes;
  }

  private render(name: string): string {
    const items: string[] = [];
    for (const node of this.priorities.values()) {
      items.push(`${describeValue(node.key)}: ${describeValue(node.priority)}`);
    }
    return `${name}({${items.join(", ")}})`;
  }

  private verify(op: string): void {
    if (!this.options.checkInvariants) return;

    const problems = this.checkInvariants();
    if (problems.length) {
      for (const p of problems) this.logger.error(`heapdict ${op}: ${p}`);
      throw new HeapDictError("INVARIANT_VIOLATION", `${op} left ${problems.length} violation(s)`);
    }
    this.logger.debug(`heapdict ${op}: ${this.heap.length} entries ok`);
  }
}

function orElse<D>(fallback: [] | [D], fail: () => HeapDictError): D {
  if (fallback.length === 1) return fallback[0];
  throw fail();
}

function isHashKey(v: unknown): v is HashKey {
  const t = typeof v;
  return t === "string" || t === "number" || t === "bigint" || t === "boolean" || t === "symbol";
}

function assertMapping(v: unknown): void {
  if (!(v instanceof HeapDict || v instanceof Map)) {
    throw new HeapDictError("INVALID_ARGUMENT", `unsupported operand ${describeValue(v)}; expected HeapDict or Map`);
  }
}

/** Normalizes a source into (key, priority) pairs, rejecting anything that is not pairs. */
function* pairsOf<K, P>(source: HeapDictSource<K, P>): Iterable<readonly [K, P]> {
  if (source instanceof HeapDict) {
    yield* source.entries();
    return;
  }
  if (!isIterable(source)) {
    throw new HeapDictError("INVALID_ARGUMENT", `${describeValue(source)} is neither a mapping nor an iterable of pairs`);
  }
  for (const item of source) {
    if (!isPair(item)) {
      throw new HeapDictError("INVALID_ARGUMENT", `${describeValue(item)} is not a (key, priority) pair`);
    }
    yield item;
  }
}
