import type { CellType, CellTypeSpec } from "@/types/cells";

export const CELL_TYPES = ["LFP", "MNC"] as const satisfies ReadonlyArray<CellType>;

export const CELL_TYPE_SPECS: Readonly<Record<CellType, CellTypeSpec>> = Object.freeze({
  LFP: Object.freeze({
    type: "LFP",
    name: "Lithium Iron Phosphate",
    nominal_voltage: 3.2,
    min_voltage: 2.8,
    max_voltage: 4.0,
    characteristics: "Stable, long-lasting, safer chemistry",
  }),
  MNC: Object.freeze({
    type: "MNC",
    name: "Lithium Manganese Cobalt",
    nominal_voltage: 3.6,
    min_voltage: 3.2,
    max_voltage: 3.4,
    characteristics: "Higher energy density, good performance",
  }),
});

export const DEFAULT_CELL_TYPE: CellType = "LFP";

export function normalizeCellType(value: unknown): CellType | null {
  if (typeof value !== "string") return null;
  const normalized = value.trim().toUpperCase();
  return isCellType(normalized) ? normalized : null;
}

export function isCellType(value: unknown): value is CellType {
  return typeof value === "string" && CELL_TYPES.some((type) => type === value);
}

export function getCellTypeSpec(type: CellType): CellTypeSpec {
  return CELL_TYPE_SPECS[type];
}

export function cellTypeLabel(type: CellType): string {
  return `${type} (${CELL_TYPE_SPECS[type].name})`;
}
