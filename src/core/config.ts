import { HeapDictError } from "./errors.js";
import type { HeapOrder } from "./types.js";
import { isHeapOrder } from "./validation.js";

export interface HeapDictConfig {
  order: HeapOrder;
  checkInvariants: boolean;
}

export type Env = Readonly<Record<string, string | undefined>>;

/**
 * Process-wide defaults; per-instance options win over these.
 *
 * HEAPDICT_ORDER            min | max | minmax (default minmax)
 * HEAPDICT_CHECK_INVARIANTS "1" re-checks every invariant after each mutation
 */
export function loadConfig(env: Env = process.env): HeapDictConfig {
  return {
    order: loadOrder(env),
    checkInvariants: loadCheckInvariants(env),
  };
}

export function loadOrder(env: Env = process.env): HeapOrder {
  const order = env.HEAPDICT_ORDER ?? "minmax";
  if (!isHeapOrder(order)) {
    throw new HeapDictError("INVALID_ARGUMENT", `HEAPDICT_ORDER must be one of: min, max, minmax (got '${order}')`);
  }
  return order;
}

export function loadCheckInvariants(env: Env = process.env): boolean {
  return env.HEAPDICT_CHECK_INVARIANTS === "1";
}
