import { describe, it, expect } from "vitest";
import { formatRangeReport, formatRecurrenceTable } from "../src/bench/report";
import { recurrenceChartOption, renderChartSvg } from "../src/bench/chart";
import type { RangeBenchResult, RecurrenceBenchRow } from "../src/types";

const RANGE_RESULT: RangeBenchResult = {
  arraySize: 5,
  queryCount: 4,
  rangeQueries: 3,
  updates: 1,
  uncachedMs: 1500,
  cachedMs: 250,
  uncachedChecksum: 221,
  cachedChecksum: 221,
  cache: { size: 1, capacity: 8, hits: 1, misses: 2, evictions: 0, invalidations: 1 },
};

const ROWS: RecurrenceBenchRow[] = [
  { n: 0, lruSeconds: 0.5, splaySeconds: 0.25 },
  { n: 50, lruSeconds: 0.125, splaySeconds: 2 },
];

// ---------------------------------------------------------------------------
// Text reports
// ---------------------------------------------------------------------------
describe("formatRangeReport", () => {
  it("prints timings, cache stats and the checksum verdict", () => {
    expect(formatRangeReport(RANGE_RESULT)).toEqual([
      "Queries: 4 (3 range, 1 update) over 5 elements",
      "Execution time without caching: 1.500 seconds",
      "Execution time with LRU cache: 0.250 seconds",
      "Cache: 1/8 entries, 1 hits, 2 misses, hit rate 33.3%",
      "Cache: 0 evictions, 1 invalidations",
      "Checksums match (221)",
    ]);
  });

  it("flags a checksum mismatch", () => {
    const lines = formatRangeReport({ ...RANGE_RESULT, cachedChecksum: 220 });
    expect(lines[5]).toBe("Checksum MISMATCH: cached 220, uncached 221");
  });

  it("reports a 0% hit rate with no lookups", () => {
    const lines = formatRangeReport({
      ...RANGE_RESULT,
      cache: { ...RANGE_RESULT.cache, hits: 0, misses: 0 },
    });
    expect(lines[3]).toBe("Cache: 1/8 entries, 0 hits, 0 misses, hit rate 0.0%");
  });
});

describe("formatRecurrenceTable", () => {
  it("aligns columns", () => {
    expect(formatRecurrenceTable(ROWS)).toEqual([
      "n         LRU Cache Time (s)    Splay Tree Time (s)",
      "-".repeat(52),
      "0         0.50000000            0.25000000",
      "50        0.12500000            2.0000000",
    ]);
  });
});

// ---------------------------------------------------------------------------
// Chart
// ---------------------------------------------------------------------------
describe("chart", () => {
  it("builds one line series per cache", () => {
    const option = recurrenceChartOption(ROWS, "Timing");
    expect(option.title).toEqual({ text: "Timing", left: "center" });
    expect(option.series).toEqual([
      {
        name: "LRU Cache",
        type: "line",
        symbol: "circle",
        data: [
          [0, 0.5],
          [50, 0.125],
        ],
      },
      {
        name: "Splay Tree",
        type: "line",
        symbol: "triangle",
        data: [
          [0, 0.25],
          [50, 2],
        ],
      },
    ]);
  });

  it("renders an SVG document server-side", () => {
    const svg = renderChartSvg(recurrenceChartOption(ROWS), { width: 400, height: 300 });
    expect(svg.startsWith("<svg")).toBe(true);
    expect(svg).toContain('width="400"');
    expect(svg).toContain("Splay Tree");
  });
});
