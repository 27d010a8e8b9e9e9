import { LruMap } from "../cache/lru-map";

export type LruFibonacci = {
  evaluate: (n: number) => bigint;
  clear: () => void;
  cache: LruMap<number, bigint>;
};

/**
 * Iterative Fibonacci with results memoised in an LRU map.
 * The baseline the splay-tree memo is benchmarked against.
 */
export function createLruFibonacci(maxSize = 1024): LruFibonacci {
  const cache = new LruMap<number, bigint>(maxSize);

  const evaluate = (n: number): bigint => {
    if (!Number.isSafeInteger(n) || n < 0) {
      throw new Error(`evaluate expects a non-negative integer, got ${n}`);
    }

    const cached = cache.get(n);
    if (cached !== undefined) return cached;

    let a = 0n;
    let b = 1n;
    if (n === 0) b = 0n;
    for (let i = 2; i <= n; i++) {
      const next = a + b;
      a = b;
      b = next;
    }

    cache.set(n, b);
    return b;
  };

  return { evaluate, clear: () => cache.clear(), cache };
}
