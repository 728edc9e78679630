import { z } from "zod";

export type AnalyzerConfig = {
  maxCells: number;
  defaultCellCount: number;
  maxCurrent: number;
  defaultCurrent: number;
  currentStep: number;
};

export type AnalyzerConfigEnv = {
  maxCells?: string | null;
  defaultCells?: string | null;
  maxCurrent?: string | null;
  defaultCurrent?: string | null;
};

export const DEFAULT_ANALYZER_CONFIG: AnalyzerConfig = {
  maxCells: 8,
  defaultCellCount: 3,
  maxCurrent: 10,
  defaultCurrent: 2,
  currentStep: 0.1,
};

const MAX_CELLS_LIMIT = 32;

const envNumber = <T extends z.ZodTypeAny>(schema: T) =>
  z
    .string()
    .trim()
    .min(1)
    .transform((raw) => Number(raw))
    .pipe(schema);

const MaxCellsSchema = envNumber(z.number().int().min(1).max(MAX_CELLS_LIMIT));
const CellCountSchema = envNumber(z.number().int().min(1));
const MaxCurrentSchema = envNumber(z.number().finite().positive());
const CurrentSchema = envNumber(z.number().finite().nonnegative());

function readEnv<T>(schema: z.ZodType<T, z.ZodTypeDef, string>, raw: string | null | undefined, fallback: T): T {
  if (raw == null) return fallback;
  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : fallback;
}

function processEnv(): AnalyzerConfigEnv {
  // Literal references so Next inlines NEXT_PUBLIC_* values into the client bundle.
  return {
    maxCells: process.env.NEXT_PUBLIC_CELL_ANALYZER_MAX_CELLS ?? null,
    defaultCells: process.env.NEXT_PUBLIC_CELL_ANALYZER_DEFAULT_CELLS ?? null,
    maxCurrent: process.env.NEXT_PUBLIC_CELL_ANALYZER_MAX_CURRENT ?? null,
    defaultCurrent: process.env.NEXT_PUBLIC_CELL_ANALYZER_DEFAULT_CURRENT ?? null,
  };
}

export function resolveAnalyzerConfig(env: AnalyzerConfigEnv = processEnv()): AnalyzerConfig {
  const defaults = DEFAULT_ANALYZER_CONFIG;
  const maxCells = readEnv(MaxCellsSchema, env.maxCells, defaults.maxCells);
  const maxCurrent = readEnv(MaxCurrentSchema, env.maxCurrent, defaults.maxCurrent);
  const defaultCellCount = Math.min(
    maxCells,
    readEnv(CellCountSchema, env.defaultCells, defaults.defaultCellCount),
  );
  const defaultCurrent = Math.min(
    maxCurrent,
    readEnv(CurrentSchema, env.defaultCurrent, defaults.defaultCurrent),
  );

  return {
    maxCells,
    defaultCellCount,
    maxCurrent,
    defaultCurrent,
    currentStep: defaults.currentStep,
  };
}
