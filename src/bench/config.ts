import type { ChartConfig, RangeBenchConfig, RecurrenceBenchConfig } from "../types";

export const DEFAULT_RANGE_BENCH: RangeBenchConfig = {
  arraySize: 100_000,
  queryCount: 50_000,
  capacity: 1000,
  maxValue: 1000,
};

export const DEFAULT_RECURRENCE_BENCH: RecurrenceBenchConfig = {
  ns: Array.from({ length: 20 }, (_, i) => i * 50),
  repeat: 200,
  lruMaxSize: 1024,
};

export const DEFAULT_CHART: ChartConfig = {
  width: 800,
  height: 500,
  title: "Execution time: LRU cache vs splay tree",
};

function requirePositiveInt(name: string, v: number): void {
  if (!Number.isInteger(v) || v < 1) throw new Error(`${name} must be a positive integer, got ${v}`);
}

export function resolveRangeBenchConfig(config: Partial<RangeBenchConfig> = {}): RangeBenchConfig {
  const resolved = { ...DEFAULT_RANGE_BENCH, ...config };
  requirePositiveInt("arraySize", resolved.arraySize);
  requirePositiveInt("queryCount", resolved.queryCount);
  requirePositiveInt("capacity", resolved.capacity);
  requirePositiveInt("maxValue", resolved.maxValue);
  return resolved;
}

export function resolveRecurrenceBenchConfig(
  config: Partial<RecurrenceBenchConfig> = {},
): RecurrenceBenchConfig {
  const resolved = { ...DEFAULT_RECURRENCE_BENCH, ...config };
  requirePositiveInt("repeat", resolved.repeat);
  requirePositiveInt("lruMaxSize", resolved.lruMaxSize);
  for (const n of resolved.ns) {
    if (!Number.isInteger(n) || n < 0) throw new Error(`ns entries must be non-negative integers, got ${n}`);
  }
  return resolved;
}
