import { z } from "zod";

import { CELL_TYPES } from "@/lib/cellTypes";
import type { CellConfig } from "@/types/cells";

export class CellConfigError extends Error {
  issues: z.ZodIssue[];
  cellIndex: number;

  constructor(cellIndex: number, issues: z.ZodIssue[]) {
    const detail = issues.map((issue) => issue.message).join("; ");
    super(`Invalid configuration for cell at index ${cellIndex}: ${detail}`);
    this.name = "CellConfigError";
    this.cellIndex = cellIndex;
    this.issues = issues;
  }
}

export const CellTypeSchema = z.enum(CELL_TYPES, {
  errorMap: () => ({ message: "Cell type must be LFP or MNC." }),
});

export const CellConfigSchema = z.object({
  id: z.number().int().positive(),
  type: CellTypeSchema,
  current: z
    .number({ invalid_type_error: "Current must be a number." })
    .finite("Current must be a finite number.")
    .nonnegative("Current cannot be negative."),
});

export function parseCellConfig(data: unknown, cellIndex: number): CellConfig {
  const result = CellConfigSchema.safeParse(data);
  if (!result.success) {
    throw new CellConfigError(cellIndex, result.error.issues);
  }
  return result.data;
}
