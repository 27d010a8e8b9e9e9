/* ------------------------------------------------------------------
 * Range cache types
 * ------------------------------------------------------------------ */

/** Inclusive index interval `[lo, hi]`. */
export type IndexRange = { lo: number; hi: number };

export type RangeCacheStats = {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
  invalidations: number;
};

/* ------------------------------------------------------------------
 * Workloads
 * ------------------------------------------------------------------ */

export type RangeQuery =
  | { kind: "range"; lo: number; hi: number }
  | { kind: "update"; index: number; value: number };

export type RandomSource = () => number;

/* ------------------------------------------------------------------
 * Benchmark config
 * ------------------------------------------------------------------ */

export type RangeBenchConfig = {
  arraySize: number;
  queryCount: number;
  capacity: number;
  maxValue: number;
  random?: RandomSource;
};

export type RecurrenceBenchConfig = {
  /** Values of n to time, e.g. 0, 50, 100 … 950 */
  ns: number[];
  /** Calls per n; the reported time is the average */
  repeat: number;
  lruMaxSize: number;
};

export type ChartConfig = {
  width: number;
  height: number;
  title?: string;
};

/* ------------------------------------------------------------------
 * Benchmark results
 * ------------------------------------------------------------------ */

export type RangeBenchResult = {
  arraySize: number;
  queryCount: number;
  rangeQueries: number;
  updates: number;
  uncachedMs: number;
  cachedMs: number;
  /** Sum of every range answer, per mode; equal when the cache is correct */
  uncachedChecksum: number;
  cachedChecksum: number;
  cache: RangeCacheStats;
};

export type RecurrenceBenchRow = {
  n: number;
  lruSeconds: number;
  splaySeconds: number;
};
