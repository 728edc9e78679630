export type CellType = "LFP" | "MNC";

export type CellTypeSpec = {
  type: CellType;
  name: string;
  nominal_voltage: number;
  min_voltage: number;
  max_voltage: number;
  characteristics: string;
};

export type CellConfig = {
  id: number;
  type: CellType;
  current: number;
};

/** Raw sidebar values for one cell, before validation. */
export type CellDraft = {
  type: string;
  current: string;
};

export type CellAnalysis = {
  id: number;
  type: CellType;
  voltage: number;
  current: number;
  capacity: number;
  temperature: number;
  min_voltage: number;
  max_voltage: number;
  voltage_range_percent: number;
};

export type AnalysisSummary = {
  total_capacity: number;
  average_temperature: number;
  peak_voltage: number;
  cell_count: number;
};
