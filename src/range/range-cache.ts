import { LruMap } from "../cache/lru-map";
import type { IndexRange, RangeCacheStats } from "../types";

type RangeEntry = { range: IndexRange; sum: number };

export const DEFAULT_RANGE_CACHE_CAPACITY = 1000;

export function rangeCacheKey(lo: number, hi: number): string {
  return `${lo}:${hi}`;
}

/**
 * Fixed-capacity LRU of range sums keyed by the inclusive interval `[lo, hi]`.
 * Both `get` hits and `put` promote the range to most recently used.
 */
export class RangeAggregateCache {
  private readonly _lru: LruMap<string, RangeEntry>;
  private _hits = 0;
  private _misses = 0;
  private _invalidated = 0;
  private _evictionsAtReset = 0;

  constructor(capacity: number = DEFAULT_RANGE_CACHE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`RangeAggregateCache capacity must be a positive integer, got ${capacity}`);
    }
    this._lru = new LruMap(capacity);
  }

  get capacity(): number {
    return this._lru.maxSize;
  }

  get size(): number {
    return this._lru.size;
  }

  get(lo: number, hi: number): number | undefined {
    const entry = this._lru.get(rangeCacheKey(lo, hi));
    if (entry === undefined) {
      this._misses += 1;
      return undefined;
    }
    this._hits += 1;
    return entry.sum;
  }

  put(lo: number, hi: number, sum: number): void {
    this._lru.set(rangeCacheKey(lo, hi), { range: { lo, hi }, sum });
  }

  /** Drop every cached range matching `predicate`; returns how many were dropped. */
  invalidate(predicate: (range: IndexRange) => boolean): number {
    const removed = this._lru.invalidate((_key, entry) => predicate(entry.range));
    this._invalidated += removed;
    return removed;
  }

  /** Drop every cached range that covers `index`. */
  invalidateIndex(index: number): number {
    return this.invalidate(({ lo, hi }) => lo <= index && index <= hi);
  }

  /** Cached ranges from least to most recently used. */
  ranges(): IndexRange[] {
    return this._lru.keys().flatMap((key) => {
      const entry = this._lru.peek(key);
      return entry ? [{ ...entry.range }] : [];
    });
  }

  stats(): RangeCacheStats {
    return {
      size: this._lru.size,
      capacity: this._lru.maxSize,
      hits: this._hits,
      misses: this._misses,
      evictions: this._lru.evictions - this._evictionsAtReset,
      invalidations: this._invalidated,
    };
  }

  resetStats(): void {
    this._hits = 0;
    this._misses = 0;
    this._invalidated = 0;
    this._evictionsAtReset = this._lru.evictions;
  }

  clear(): void {
    this._lru.clear();
    this._evictionsAtReset = 0;
  }
}
