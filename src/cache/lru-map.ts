/**
 * A simple LRU (Least Recently Used) cache backed by a Map.
 *
 * Uses the fact that JS Map iteration order is insertion order.
 * On `get`, the entry is re-inserted so it moves to the end (most recent).
 * On `set`, if the map exceeds `maxSize`, the oldest entry is evicted.
 * `invalidate` drops every entry matching a predicate, whatever its position.
 */
export class LruMap<K, V> {
  private readonly _map = new Map<K, V>();
  private readonly _maxSize: number;
  private _evictions = 0;

  constructor(maxSize: number) {
    if (!Number.isInteger(maxSize) || maxSize < 1) throw new Error("LruMap maxSize must be >= 1");
    this._maxSize = maxSize;
  }

  get size(): number {
    return this._map.size;
  }

  get maxSize(): number {
    return this._maxSize;
  }

  /** Entries evicted for capacity since construction (or the last `clear`). */
  get evictions(): number {
    return this._evictions;
  }

  has(key: K): boolean {
    return this._map.has(key);
  }

  get(key: K): V | undefined {
    const value = this._map.get(key);
    if (value === undefined) return undefined;

    // Move to end (most recently used)
    this._map.delete(key);
    this._map.set(key, value);
    return value;
  }

  /** Read without touching recency. */
  peek(key: K): V | undefined {
    return this._map.get(key);
  }

  set(key: K, value: V): this {
    // If key already exists, delete first so it moves to end
    if (this._map.has(key)) {
      this._map.delete(key);
    }

    this._map.set(key, value);

    // One insert can overflow by at most one entry
    if (this._map.size > this._maxSize) {
      const oldest = this._map.keys().next();
      if (!oldest.done) {
        this._map.delete(oldest.value);
        this._evictions += 1;
      }
    }

    return this;
  }

  /**
   * Remove every entry for which `predicate` returns true.
   * Keys are collected before anything is deleted, so the predicate sees
   * each entry present at call time exactly once.
   */
  invalidate(predicate: (key: K, value: V) => boolean): number {
    const doomed: K[] = [];
    for (const [key, value] of this._map) {
      if (predicate(key, value)) doomed.push(key);
    }
    for (const key of doomed) this._map.delete(key);
    return doomed.length;
  }

  /** Keys from least to most recently used. */
  keys(): K[] {
    return [...this._map.keys()];
  }

  delete(key: K): boolean {
    return this._map.delete(key);
  }

  clear(): void {
    this._map.clear();
    this._evictions = 0;
  }
}
