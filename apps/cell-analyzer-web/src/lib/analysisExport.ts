import { format } from "date-fns";

import type { CellAnalysis } from "@/types/cells";

export const CSV_COLUMNS = [
  "Cell ID",
  "Type",
  "Voltage (V)",
  "Current (A)",
  "Temperature (°C)",
  "Capacity (Wh)",
  "Min Voltage (V)",
  "Max Voltage (V)",
] as const;

const csvEscape = (value: string): string => {
  if (!/[",\n\r]/.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
};

export function buildAnalysisCsv(results: ReadonlyArray<CellAnalysis>): string {
  const header = CSV_COLUMNS.map(csvEscape).join(",");
  const rows = results.map((result) =>
    [
      result.id,
      result.type,
      result.voltage,
      result.current,
      result.temperature,
      result.capacity,
      result.min_voltage,
      result.max_voltage,
    ]
      .map((value) => csvEscape(String(value)))
      .join(","),
  );
  return [header, ...rows].join("\n");
}

export function analysisCsvFileName(now: Date = new Date()): string {
  return `battery_cell_analysis-${format(now, "yyyyMMdd-HHmmss")}.csv`;
}

/** Returns the file name offered to the browser. */
export function downloadAnalysisCsv(results: ReadonlyArray<CellAnalysis>, now: Date = new Date()): string {
  if (!results.length) {
    throw new Error("There are no analysis results to export.");
  }
  const blob = new Blob([buildAnalysisCsv(results)], { type: "text/csv" });
  const url = URL.createObjectURL(blob);
  const fileName = analysisCsvFileName(now);
  const link = document.createElement("a");
  link.href = url;
  link.download = fileName;
  link.rel = "noopener";
  document.body.appendChild(link);
  link.click();
  link.remove();
  URL.revokeObjectURL(url);
  return fileName;
}
