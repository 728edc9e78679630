import { parseCellConfig } from "@/lib/cellSchemas";
import { getCellTypeSpec } from "@/lib/cellTypes";
import type { AnalysisSummary, CellAnalysis, CellConfig } from "@/types/cells";

/** Returns a value in [0, 1). */
export type RandomSource = () => number;

export const TEMPERATURE_MIN_C = 25;
export const TEMPERATURE_MAX_C = 40;

const FALLBACK_RANGE_PERCENT = 50;

export type AnalyzeOptions = {
  random?: RandomSource;
};

/** Rounds half to even, so 0.125 becomes 0.12 and 0.375 becomes 0.38. */
function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;
  if (diff > 0.5) return (floor + 1) / factor;
  if (diff < 0.5) return floor / factor;
  return (floor % 2 === 0 ? floor : floor + 1) / factor;
}

export function computeCapacity(voltage: number, current: number): number {
  return roundTo(voltage * current, 2);
}

/**
 * Placeholder thermal estimate: uniform between 25 and 40 °C, one decimal.
 * Out-of-range draws from a custom source are clamped into [0, 1].
 */
export function estimateTemperature(random: RandomSource = Math.random): number {
  const draw = Math.min(1, Math.max(0, random()));
  return roundTo(TEMPERATURE_MIN_C + draw * (TEMPERATURE_MAX_C - TEMPERATURE_MIN_C), 1);
}

export function voltageRangePercent(voltage: number, minVoltage: number, maxVoltage: number): number {
  if (!(maxVoltage > minVoltage)) return FALLBACK_RANGE_PERCENT;
  return roundTo(((voltage - minVoltage) / (maxVoltage - minVoltage)) * 100, 1);
}

export function analyzeCell(config: CellConfig, options: AnalyzeOptions = {}): CellAnalysis {
  const spec = getCellTypeSpec(config.type);
  const voltage = spec.nominal_voltage;
  return {
    id: config.id,
    type: config.type,
    voltage,
    current: config.current,
    capacity: computeCapacity(voltage, config.current),
    temperature: estimateTemperature(options.random),
    min_voltage: spec.min_voltage,
    max_voltage: spec.max_voltage,
    voltage_range_percent: voltageRangePercent(voltage, spec.min_voltage, spec.max_voltage),
  };
}

/**
 * Analyzes every cell in order. Each entry is checked against the cell schema
 * first; the first invalid entry raises a CellConfigError and nothing is returned.
 */
export function analyzeCells(
  configs: ReadonlyArray<unknown>,
  options: AnalyzeOptions = {},
): CellAnalysis[] {
  const validated = configs.map((config, index) => parseCellConfig(config, index));
  return validated.map((config) => analyzeCell(config, options));
}

export function summarizeAnalysis(results: ReadonlyArray<CellAnalysis>): AnalysisSummary {
  if (!results.length) {
    return { total_capacity: 0, average_temperature: 0, peak_voltage: 0, cell_count: 0 };
  }

  let totalCapacity = 0;
  let totalTemperature = 0;
  let peakVoltage = Number.NEGATIVE_INFINITY;
  for (const result of results) {
    totalCapacity += result.capacity;
    totalTemperature += result.temperature;
    peakVoltage = Math.max(peakVoltage, result.voltage);
  }

  return {
    total_capacity: roundTo(totalCapacity, 2),
    average_temperature: roundTo(totalTemperature / results.length, 1),
    peak_voltage: peakVoltage,
    cell_count: results.length,
  };
}

/** Fraction for the voltage-range progress bar. */
export function voltageRangeProgress(result: Pick<CellAnalysis, "voltage_range_percent">): number {
  return Math.max(0, Math.min(1, result.voltage_range_percent / 100));
}
