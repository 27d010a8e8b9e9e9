import { SplayTree } from "../splay/splay-tree";

export type RecurrenceSpec<T> = {
  /** Value for n = 0 and n = 1. */
  base: (n: number) => T;
  /** Combines f(n - 1) and f(n - 2). */
  combine: (prev1: T, prev2: T) => T;
};

type Frame = { n: number; stage: "enter" | "combine" };

/**
 * f(n) = combine(f(n - 1), f(n - 2)) with f(0), f(1) from `base`,
 * memoised in a splay tree.
 *
 * Evaluation runs on an explicit work-list instead of the call stack, but
 * probes and inserts the cache in the same order plain recursion would:
 * f(n - 1) is finished before f(n - 2) is looked up.
 */
export class MemoizedRecurrence<T> {
  readonly cache: SplayTree<T>;
  private readonly _spec: RecurrenceSpec<T>;

  constructor(spec: RecurrenceSpec<T>, cache: SplayTree<T> = new SplayTree<T>()) {
    this._spec = spec;
    this.cache = cache;
  }

  evaluate(n: number): T {
    if (!Number.isSafeInteger(n) || n < 0) {
      throw new Error(`evaluate expects a non-negative integer, got ${n}`);
    }

    const frames: Frame[] = [{ n, stage: "enter" }];
    const results: T[] = [];

    while (frames.length > 0) {
      const frame = frames.pop();
      if (!frame) break;

      if (frame.stage === "enter") {
        const hit = this.cache.search(frame.n);
        if (hit !== undefined) {
          results.push(hit);
          continue;
        }

        if (frame.n < 2) {
          const value = this._spec.base(frame.n);
          this.cache.insert(frame.n, value);
          results.push(value);
          continue;
        }

        // popped in reverse: n - 1 runs first, then n - 2, then the combine
        frames.push({ n: frame.n, stage: "combine" });
        frames.push({ n: frame.n - 2, stage: "enter" });
        frames.push({ n: frame.n - 1, stage: "enter" });
        continue;
      }

      const prev2 = results.pop();
      const prev1 = results.pop();
      if (prev1 === undefined || prev2 === undefined) {
        throw new Error(`evaluate(${frame.n}) lost its sub-results`);
      }
      const value = this._spec.combine(prev1, prev2);
      this.cache.insert(frame.n, value);
      results.push(value);
    }

    const result = results.pop();
    if (result === undefined) throw new Error(`evaluate(${n}) produced no result`);
    return result;
  }

  reset(): void {
    this.cache.clear();
  }
}

/** Fibonacci over `number`; exact up to n = 78. */
export function fibonacci(cache?: SplayTree<number>): MemoizedRecurrence<number> {
  return new MemoizedRecurrence<number>({ base: (n) => n, combine: (a, b) => a + b }, cache);
}

/** Fibonacci over `bigint`; exact for every n. */
export function fibonacciBig(cache?: SplayTree<bigint>): MemoizedRecurrence<bigint> {
  return new MemoizedRecurrence<bigint>({ base: (n) => BigInt(n), combine: (a, b) => a + b }, cache);
}
