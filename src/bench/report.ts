import type { RangeBenchResult, RecurrenceBenchRow } from "../types";

export function formatRangeReport(r: RangeBenchResult): string[] {
  const hitRate = r.cache.hits + r.cache.misses > 0 ? r.cache.hits / (r.cache.hits + r.cache.misses) : 0;

  return [
    `Queries: ${r.queryCount} (${r.rangeQueries} range, ${r.updates} update) over ${r.arraySize} elements`,
    `Execution time without caching: ${(r.uncachedMs / 1000).toFixed(3)} seconds`,
    `Execution time with LRU cache: ${(r.cachedMs / 1000).toFixed(3)} seconds`,
    `Cache: ${r.cache.size}/${r.cache.capacity} entries, ${r.cache.hits} hits, ${r.cache.misses} misses, ` +
      `hit rate ${(hitRate * 100).toFixed(1)}%`,
    `Cache: ${r.cache.evictions} evictions, ${r.cache.invalidations} invalidations`,
    r.cachedChecksum === r.uncachedChecksum
      ? `Checksums match (${r.cachedChecksum})`
      : `Checksum MISMATCH: cached ${r.cachedChecksum}, uncached ${r.uncachedChecksum}`,
  ];
}

export function formatRecurrenceTable(rows: RecurrenceBenchRow[]): string[] {
  const lines = [
    `${"n".padEnd(10)}${"LRU Cache Time (s)".padEnd(22)}Splay Tree Time (s)`,
    "-".repeat(52),
  ];
  for (const row of rows) {
    lines.push(
      `${String(row.n).padEnd(10)}${row.lruSeconds.toPrecision(8).padEnd(22)}${row.splaySeconds.toPrecision(8)}`,
    );
  }
  return lines;
}
