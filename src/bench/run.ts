import { createLruFibonacci } from "../recurrence/lru-fibonacci";
import { fibonacciBig } from "../recurrence/memoized";
import { ArrayStore } from "../range/array-store";
import { pointUpdate, rangeAggregate, rangeSumDirect, updateDirect } from "../range/query";
import { RangeAggregateCache } from "../range/range-cache";
import type {
  RangeBenchConfig,
  RangeBenchResult,
  RangeQuery,
  RecurrenceBenchConfig,
  RecurrenceBenchRow,
} from "../types";
import { resolveRangeBenchConfig, resolveRecurrenceBenchConfig } from "./config";
import { randomArray, randomQueries } from "./workload";

export type Clock = () => number;

const defaultClock: Clock = () => performance.now();

/** Milliseconds spent in `fn`. */
export function timeIt(fn: () => void, clock: Clock = defaultClock): number {
  const t0 = clock();
  fn();
  return clock() - t0;
}

export function runRangeBenchmark(
  config: Partial<RangeBenchConfig> = {},
  clock: Clock = defaultClock,
): RangeBenchResult {
  const cfg = resolveRangeBenchConfig(config);
  const random = cfg.random ?? Math.random;

  const values = randomArray(cfg.arraySize, cfg.maxValue, random);
  const queries = randomQueries(cfg.queryCount, cfg.arraySize, cfg.maxValue, random);
  return replayRangeWorkload(values, queries, cfg.capacity, clock);
}

/** Replays one workload twice, without and with the cache, on separate copies of `values`. */
export function replayRangeWorkload(
  values: number[],
  queries: RangeQuery[],
  capacity: number,
  clock: Clock = defaultClock,
): RangeBenchResult {
  let uncachedChecksum = 0;
  const plain = new ArrayStore(values);
  const uncachedMs = timeIt(() => {
    for (const q of queries) {
      if (q.kind === "range") uncachedChecksum += rangeSumDirect(plain, q.lo, q.hi);
      else updateDirect(plain, q.index, q.value);
    }
  }, clock);

  let cachedChecksum = 0;
  const ctx = { store: new ArrayStore(values), cache: new RangeAggregateCache(capacity) };
  const cachedMs = timeIt(() => {
    for (const q of queries) {
      if (q.kind === "range") cachedChecksum += rangeAggregate(ctx, q.lo, q.hi);
      else pointUpdate(ctx, q.index, q.value);
    }
  }, clock);

  const rangeQueries = queries.filter((q) => q.kind === "range").length;

  return {
    arraySize: values.length,
    queryCount: queries.length,
    rangeQueries,
    updates: queries.length - rangeQueries,
    uncachedMs,
    cachedMs,
    uncachedChecksum,
    cachedChecksum,
    cache: ctx.cache.stats(),
  };
}

/**
 * Average seconds per call for each n. Every n starts from an empty cache,
 * so the first call pays the full cost and the rest are cache hits.
 */
export function runRecurrenceBenchmark(
  config: Partial<RecurrenceBenchConfig> = {},
  clock: Clock = defaultClock,
): RecurrenceBenchRow[] {
  const cfg = resolveRecurrenceBenchConfig(config);
  const rows: RecurrenceBenchRow[] = [];

  for (const n of cfg.ns) {
    const lru = createLruFibonacci(cfg.lruMaxSize);
    const lruMs = timeIt(() => {
      for (let i = 0; i < cfg.repeat; i++) lru.evaluate(n);
    }, clock);

    const splay = fibonacciBig();
    const splayMs = timeIt(() => {
      for (let i = 0; i < cfg.repeat; i++) splay.evaluate(n);
    }, clock);

    rows.push({
      n,
      lruSeconds: lruMs / 1000 / cfg.repeat,
      splaySeconds: splayMs / 1000 / cfg.repeat,
    });
  }

  return rows;
}
