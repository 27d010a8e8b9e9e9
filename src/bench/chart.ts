import type { ECharts, EChartsOption } from "echarts";
import * as echarts from "echarts";
import type { ChartConfig, RecurrenceBenchRow } from "../types";
import { DEFAULT_CHART } from "./config";

/** Line chart of average time per call against n, one series per cache. */
export function recurrenceChartOption(rows: RecurrenceBenchRow[], title = DEFAULT_CHART.title): EChartsOption {
  return {
    animation: false,
    backgroundColor: "#ffffff",
    title: title ? { text: title, left: "center" } : undefined,
    legend: { data: ["LRU Cache", "Splay Tree"], top: 30 },
    grid: { left: 80, right: 30, top: 70, bottom: 50 },
    xAxis: { type: "value", name: "Fibonacci number (n)", nameLocation: "middle", nameGap: 30 },
    yAxis: { type: "value", name: "Average execution time (s)" },
    series: [
      {
        name: "LRU Cache",
        type: "line",
        symbol: "circle",
        data: rows.map((r) => [r.n, r.lruSeconds]),
      },
      {
        name: "Splay Tree",
        type: "line",
        symbol: "triangle",
        data: rows.map((r) => [r.n, r.splaySeconds]),
      },
    ],
  };
}

export function initSsrChart(width: number, height: number): ECharts {
  return echarts.init(null, null, { renderer: "svg", ssr: true, width, height });
}

export function disposeChart(chart?: ECharts): void {
  if (!chart || chart.isDisposed()) return;
  chart.dispose();
}

/** Server-side render `option` to an SVG document string. */
export function renderChartSvg(option: EChartsOption, config: Partial<ChartConfig> = {}): string {
  const { width, height } = { ...DEFAULT_CHART, ...config };
  const chart = initSsrChart(width, height);
  try {
    chart.setOption(option, { notMerge: true });
    return chart.renderToSVGString();
  } finally {
    disposeChart(chart);
  }
}
