import { normalizeCellType } from "@/lib/cellTypes";
import type { CellConfig, CellDraft, CellType } from "@/types/cells";

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; error: string };

export type CellFieldErrors = Partial<Record<keyof CellDraft, string>>;

/** Keyed by 1-based cell id. */
export type CellDraftErrors = Record<number, CellFieldErrors>;

export type DraftValidationResult =
  | { ok: true; value: CellConfig[] }
  | { ok: false; errors: CellDraftErrors };

// Plain decimal text only: no hex, exponent or "Infinity".
const DECIMAL_PATTERN = /^-?(\d+(\.\d*)?|\.\d+)$/;

export const parseCurrent = (label: string, raw: string, max?: number): ValidationResult<number> => {
  const trimmed = raw.trim();
  const value = DECIMAL_PATTERN.test(trimmed) ? Number(trimmed) : Number.NaN;
  if (!Number.isFinite(value)) {
    return { ok: false, error: `${label} must be a number.` };
  }
  if (value < 0) {
    return { ok: false, error: `${label} cannot be negative.` };
  }
  if (typeof max === "number" && value > max) {
    return { ok: false, error: `${label} must be at most ${max} A.` };
  }
  return { ok: true, value };
};

export const parseCellType = (label: string, raw: string): ValidationResult<CellType> => {
  const type = normalizeCellType(raw);
  if (!type) {
    return { ok: false, error: `${label} must be LFP or MNC.` };
  }
  return { ok: true, value: type };
};

export function validateCellDrafts(
  drafts: ReadonlyArray<CellDraft>,
  maxCurrent?: number,
): DraftValidationResult {
  const configs: CellConfig[] = [];
  const errors: CellDraftErrors = {};

  drafts.forEach((draft, index) => {
    const id = index + 1;
    const type = parseCellType(`Cell ${id} type`, draft.type);
    const current = parseCurrent(`Cell ${id} current`, draft.current, maxCurrent);

    if (type.ok && current.ok) {
      configs.push({ id, type: type.value, current: current.value });
      return;
    }
    errors[id] = {
      ...(type.ok ? {} : { type: type.error }),
      ...(current.ok ? {} : { current: current.error }),
    };
  });

  if (Object.keys(errors).length) {
    return { ok: false, errors };
  }
  return { ok: true, value: configs };
}
