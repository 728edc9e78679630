import { describe, expect, it } from "vitest";
import {
  analyzeCell,
  analyzeCells,
  computeCapacity,
  estimateTemperature,
  summarizeAnalysis,
  voltageRangePercent,
  voltageRangeProgress,
} from "@/lib/analyzer";
import { CellConfigError } from "@/lib/cellSchemas";
import type { CellConfig } from "@/types/cells";

const half = () => 0.5;

function sequence(values: number[]): () => number {
  let index = 0;
  return () => values[index++ % values.length];
}

describe("analyzeCell", () => {
  it("reports 3.2 V for LFP and 3.6 V for MNC", () => {
    expect(analyzeCell({ id: 1, type: "LFP", current: 2 }, { random: half }).voltage).toBe(3.2);
    expect(analyzeCell({ id: 2, type: "MNC", current: 2 }, { random: half }).voltage).toBe(3.6);
  });

  it("derives capacity, temperature and range position", () => {
    expect(analyzeCell({ id: 1, type: "LFP", current: 2 }, { random: half })).toEqual({
      id: 1,
      type: "LFP",
      voltage: 3.2,
      current: 2,
      capacity: 6.4,
      temperature: 32.5,
      min_voltage: 2.8,
      max_voltage: 4.0,
      voltage_range_percent: 33.3,
    });
  });

  it("keeps the MNC range position above 100 percent", () => {
    const result = analyzeCell({ id: 1, type: "MNC", current: 2.5 }, { random: half });
    expect(result.capacity).toBe(9);
    expect(result.voltage_range_percent).toBe(200);
    expect(voltageRangeProgress(result)).toBe(1);
  });

  it("returns zero capacity for zero current", () => {
    expect(analyzeCell({ id: 1, type: "LFP", current: 0 }, { random: half }).capacity).toBe(0);
    expect(analyzeCell({ id: 1, type: "MNC", current: 0 }, { random: half }).capacity).toBe(0);
  });

  it("is deterministic for capacity regardless of the temperature draw", () => {
    const a = analyzeCell({ id: 1, type: "LFP", current: 1.5 }, { random: () => 0 });
    const b = analyzeCell({ id: 1, type: "LFP", current: 1.5 }, { random: () => 0.99 });
    expect(a.capacity).toBe(4.8);
    expect(b.capacity).toBe(4.8);
  });
});

describe("computeCapacity", () => {
  it("rounds to two decimals", () => {
    expect(computeCapacity(3.6, 1.234)).toBe(4.44);
  });

  it("rounds exact halves to the even neighbour", () => {
    expect(computeCapacity(3.2, 0.0390625)).toBe(0.12);
    expect(computeCapacity(3.2, 0.1171875)).toBe(0.38);
  });
});

describe("estimateTemperature", () => {
  it("maps the draw onto 25..40 °C", () => {
    expect(estimateTemperature(() => 0)).toBe(25);
    expect(estimateTemperature(() => 0.5)).toBe(32.5);
    expect(estimateTemperature(() => 0.9999)).toBe(40);
  });

  it("clamps draws outside [0, 1]", () => {
    expect(estimateTemperature(() => -1)).toBe(25);
    expect(estimateTemperature(() => 1.7)).toBe(40);
  });

  it("stays in range with the default source", () => {
    for (let i = 0; i < 50; i += 1) {
      const value = estimateTemperature();
      expect(value).toBeGreaterThanOrEqual(25);
      expect(value).toBeLessThanOrEqual(40);
    }
  });
});

describe("voltageRangePercent", () => {
  it("falls back to 50 when the range is empty or inverted", () => {
    expect(voltageRangePercent(3.3, 3.3, 3.3)).toBe(50);
    expect(voltageRangePercent(3.3, 3.4, 3.2)).toBe(50);
  });

  it("clamps the progress fraction at zero", () => {
    expect(voltageRangeProgress({ voltage_range_percent: -20 })).toBe(0);
  });
});

describe("analyzeCells", () => {
  it("preserves order and length", () => {
    const configs: CellConfig[] = [
      { id: 1, type: "MNC", current: 1 },
      { id: 2, type: "LFP", current: 3 },
      { id: 3, type: "MNC", current: 0 },
    ];
    const results = analyzeCells(configs, { random: half });
    expect(results).toHaveLength(3);
    expect(results.map((result) => [result.id, result.type])).toEqual([
      [1, "MNC"],
      [2, "LFP"],
      [3, "MNC"],
    ]);
  });

  it("returns an empty list for no cells", () => {
    expect(analyzeCells([])).toEqual([]);
  });

  it("rejects negative current", () => {
    let caught: unknown = null;
    try {
      analyzeCells([{ id: 1, type: "LFP", current: 2 }, { id: 2, type: "LFP", current: -1 }]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CellConfigError);
    if (!(caught instanceof CellConfigError)) return;
    expect(caught.cellIndex).toBe(1);
    expect(caught.message).toBe("Invalid configuration for cell at index 1: Current cannot be negative.");
  });

  it("rejects unrecognized cell types", () => {
    expect(() => analyzeCells([{ id: 1, type: "NMC", current: 2 }])).toThrow(
      "Invalid configuration for cell at index 0: Cell type must be LFP or MNC.",
    );
  });

  it("rejects non-finite current", () => {
    expect(() => analyzeCells([{ id: 1, type: "LFP", current: Number.POSITIVE_INFINITY }])).toThrow(
      CellConfigError,
    );
  });
});

describe("summarizeAnalysis", () => {
  it("aggregates capacity, temperature and voltage", () => {
    const results = analyzeCells(
      [
        { id: 1, type: "LFP", current: 2 },
        { id: 2, type: "MNC", current: 2.5 },
        { id: 3, type: "LFP", current: 0 },
      ],
      { random: sequence([0, 0.5, 0.9]) },
    );
    expect(results.map((result) => result.temperature)).toEqual([25, 32.5, 38.5]);
    expect(summarizeAnalysis(results)).toEqual({
      total_capacity: 15.4,
      average_temperature: 32,
      peak_voltage: 3.6,
      cell_count: 3,
    });
  });

  it("returns zeros when nothing was analyzed", () => {
    expect(summarizeAnalysis([])).toEqual({
      total_capacity: 0,
      average_temperature: 0,
      peak_voltage: 0,
      cell_count: 0,
    });
  });
});
