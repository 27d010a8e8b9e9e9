import type { ArrayStore } from "./array-store";
import type { RangeAggregateCache } from "./range-cache";

export type RangeQueryContext = {
  store: ArrayStore;
  cache: RangeAggregateCache;
};

export function rangeSumDirect(store: ArrayStore, lo: number, hi: number): number {
  return store.sum(lo, hi);
}

export function updateDirect(store: ArrayStore, index: number, value: number): void {
  store.set(index, value);
}

/** Sum of `[lo, hi]`, served from the cache when the same range was asked before. */
export function rangeAggregate({ store, cache }: RangeQueryContext, lo: number, hi: number): number {
  // validate first so a bad range never lands in the cache
  store.checkRange(lo, hi);

  const cached = cache.get(lo, hi);
  if (cached !== undefined) return cached;

  const sum = store.sum(lo, hi);
  cache.put(lo, hi, sum);
  return sum;
}

/**
 * Write `value` at `index`, then drop every cached sum that included it.
 * Returns the number of cache entries invalidated.
 */
export function pointUpdate({ store, cache }: RangeQueryContext, index: number, value: number): number {
  store.set(index, value);
  return cache.invalidateIndex(index);
}
