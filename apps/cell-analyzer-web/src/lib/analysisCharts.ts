import type { Options, SeriesColumnOptions } from "highcharts";

import { CELL_TYPES } from "@/lib/cellTypes";
import type { CellAnalysis, CellType } from "@/types/cells";

export const CELL_TYPE_COLORS: Record<CellType, string> = {
  LFP: "#28a745",
  MNC: "#dc3545",
};

export type CellTypeCount = { type: CellType; count: number };

export function countCellTypes(results: ReadonlyArray<CellAnalysis>): CellTypeCount[] {
  const counts = new Map<CellType, number>();
  results.forEach((result) => {
    counts.set(result.type, (counts.get(result.type) ?? 0) + 1);
  });
  return CELL_TYPES.flatMap((type) => {
    const count = counts.get(type);
    return count ? [{ type, count }] : [];
  });
}

const baseColumnOptions = (yTitle: string, categories: string[]): Options => ({
  chart: { type: "column", height: 260 },
  legend: { enabled: false },
  xAxis: { categories },
  yAxis: { title: { text: yTitle }, min: 0, allowDecimals: true },
});

export function buildTypeDistributionOptions(results: ReadonlyArray<CellAnalysis>): Options {
  const counts = countCellTypes(results);
  const series: SeriesColumnOptions = {
    type: "column",
    name: "Cells",
    data: counts.map(({ type, count }) => ({ y: count, color: CELL_TYPE_COLORS[type] })),
  };
  return {
    ...baseColumnOptions("Cells", counts.map(({ type }) => type)),
    yAxis: { title: { text: "Cells" }, min: 0, allowDecimals: false },
    tooltip: { pointFormat: "<b>{point.y}</b> cells" },
    series: [series],
  };
}

export function buildCapacityComparisonOptions(results: ReadonlyArray<CellAnalysis>): Options {
  const series: SeriesColumnOptions = {
    type: "column",
    name: "Capacity",
    data: results.map((result) => ({ y: result.capacity, color: CELL_TYPE_COLORS[result.type] })),
  };
  return {
    ...baseColumnOptions(
      "Capacity (Wh)",
      results.map((result) => `Cell ${result.id}`),
    ),
    tooltip: { valueSuffix: " Wh" },
    series: [series],
  };
}
