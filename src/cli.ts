// src/cli.ts
//
// Usage: tsx src/cli.ts [range|recurrence|all] [--seed N] [--svg path] [--debug]

import { writeFileSync } from "node:fs";
import { recurrenceChartOption, renderChartSvg } from "./bench/chart";
import { runRangeBenchmark, runRecurrenceBenchmark } from "./bench/run";
import { formatRangeReport, formatRecurrenceTable } from "./bench/report";
import { seededRandom } from "./bench/workload";
import { parseArgs } from "./cli-args";
import { createLogger } from "./log";

function main(argv: string[]): void {
  const opts = parseArgs(argv);
  const log = createLogger({ debug: opts.debug });
  log.debug("options", opts);

  if (opts.mode !== "recurrence") {
    const random = opts.seed !== undefined ? seededRandom(opts.seed) : undefined;
    const result = runRangeBenchmark(random ? { random } : {});
    log.debug("range cache stats", result.cache);
    for (const line of formatRangeReport(result)) log.info(line);
    if (result.cachedChecksum !== result.uncachedChecksum) {
      throw new Error("cached and uncached range sums disagree");
    }
  }

  if (opts.mode !== "range") {
    if (opts.mode === "all") log.info("");
    const rows = runRecurrenceBenchmark();
    for (const line of formatRecurrenceTable(rows)) log.info(line);

    if (opts.svgPath) {
      writeFileSync(opts.svgPath, renderChartSvg(recurrenceChartOption(rows)), "utf-8");
      log.info(`Chart written to ${opts.svgPath}`);
    }
  }
}

try {
  main(process.argv.slice(2));
} catch (err) {
  createLogger().error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
}
