import { describe, it, expect, vi } from "vitest";
import { MemoizedRecurrence, fibonacci, fibonacciBig } from "../src/recurrence/memoized";
import { createLruFibonacci } from "../src/recurrence/lru-fibonacci";
import { SplayTree } from "../src/splay/splay-tree";

function naiveFib(n: number): number {
  return n < 2 ? n : naiveFib(n - 1) + naiveFib(n - 2);
}

// ---------------------------------------------------------------------------
// Splay-memoised recurrence
// ---------------------------------------------------------------------------
describe("MemoizedRecurrence", () => {
  it("computes Fibonacci base cases and small values", () => {
    const fib = fibonacci();
    expect(fib.evaluate(0)).toBe(0);
    expect(fib.evaluate(1)).toBe(1);
    expect(fib.evaluate(10)).toBe(55);
  });

  it("matches the plain recursive definition", () => {
    for (let n = 0; n <= 20; n++) {
      expect(fibonacci().evaluate(n)).toBe(naiveFib(n));
    }
  });

  it("caches every key from 0 to n once", () => {
    const fib = fibonacci();
    fib.evaluate(10);
    expect(fib.cache.size).toBe(11);
    expect(fib.cache.keys()).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(fib.cache.rootKey).toBe(10);
  });

  it("computes each value once and serves repeats from the cache", () => {
    const combine = vi.fn((a: number, b: number) => a + b);
    const rec = new MemoizedRecurrence<number>({ base: (n) => n, combine });

    expect(rec.evaluate(12)).toBe(144);
    expect(combine).toHaveBeenCalledTimes(11);

    expect(rec.evaluate(12)).toBe(144);
    expect(rec.evaluate(7)).toBe(13);
    expect(combine).toHaveBeenCalledTimes(11);
  });

  it("reuses a tree passed in by the caller", () => {
    const tree = new SplayTree<number>();
    fibonacci(tree).evaluate(6);
    expect(tree.search(6)).toBe(8);
    expect(tree.rootKey).toBe(6);

    const second = fibonacci(tree);
    expect(second.evaluate(5)).toBe(5);
    expect(tree.size).toBe(7);
  });

  it("supports other second-order recurrences", () => {
    const lucas = new MemoizedRecurrence<number>({
      base: (n) => (n === 0 ? 2 : 1),
      combine: (a, b) => a + b,
    });
    expect(lucas.evaluate(5)).toBe(11);
  });

  it("is exact for large n with bigint", () => {
    expect(fibonacciBig().evaluate(100)).toBe(354224848179261915075n);
  });

  it("handles n deep enough to overflow a recursive evaluator", () => {
    const big = fibonacciBig().evaluate(10_000);
    expect(big).toBe(createLruFibonacci().evaluate(10_000));
  });

  it("looks up small n after a deep evaluation without exhausting the stack", () => {
    const fib = fibonacci();
    fib.evaluate(100_000);
    expect(fib.cache.size).toBe(100_001);

    expect(fib.evaluate(3)).toBe(2);
    expect(fib.cache.rootKey).toBe(3);
    expect(fib.evaluate(10)).toBe(55);
  });

  it("rejects negative or fractional n", () => {
    const fib = fibonacci();
    expect(() => fib.evaluate(-1)).toThrow("non-negative integer");
    expect(() => fib.evaluate(2.5)).toThrow("non-negative integer");
  });

  it("reset clears the cache", () => {
    const fib = fibonacci();
    fib.evaluate(5);
    fib.reset();
    expect(fib.cache.size).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// LRU-memoised baseline
// ---------------------------------------------------------------------------
describe("createLruFibonacci", () => {
  it("computes the same values", () => {
    const fib = createLruFibonacci();
    expect(fib.evaluate(0)).toBe(0n);
    expect(fib.evaluate(1)).toBe(1n);
    expect(fib.evaluate(2)).toBe(1n);
    expect(fib.evaluate(10)).toBe(55n);
    expect(fib.evaluate(100)).toBe(354224848179261915075n);
  });

  it("keeps at most maxSize results", () => {
    const fib = createLruFibonacci(2);
    fib.evaluate(3);
    fib.evaluate(4);
    fib.evaluate(5);
    expect(fib.cache.keys()).toEqual([4, 5]);
    fib.clear();
    expect(fib.cache.size).toBe(0);
  });

  it("rejects negative n", () => {
    expect(() => createLruFibonacci().evaluate(-3)).toThrow("non-negative integer");
  });
});
