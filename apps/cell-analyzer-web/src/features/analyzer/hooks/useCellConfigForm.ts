"use client";

import { useMemo, useState } from "react";

import type { AnalyzerConfig } from "@/lib/analyzerConfig";
import { DEFAULT_CELL_TYPE } from "@/lib/cellTypes";
import { validateCellDrafts, type DraftValidationResult } from "@/lib/cellValidation";
import { formatDraftNumber } from "@/components/forms/NumericDraftInput";
import type { CellDraft } from "@/types/cells";

export type CellConfigFormModel = {
  cellCount: number;
  drafts: CellDraft[];
  validation: DraftValidationResult;
  /** Changes whenever the validated configuration changes; raw drafts when invalid. */
  signature: string;
  setCellCount: (value: number) => void;
  setCellType: (index: number, type: string) => void;
  setCellCurrent: (index: number, current: string) => void;
};

export const createInitialDrafts = (config: AnalyzerConfig): CellDraft[] =>
  Array.from({ length: config.maxCells }, () => ({
    type: DEFAULT_CELL_TYPE,
    current: formatDraftNumber(config.defaultCurrent, config.currentStep),
  }));

export const useCellConfigForm = (config: AnalyzerConfig): CellConfigFormModel => {
  const [cellCount, setCellCountState] = useState(config.defaultCellCount);
  // Every slot up to maxCells is kept so shrinking and re-growing the count keeps earlier values.
  const [allDrafts, setAllDrafts] = useState<CellDraft[]>(() => createInitialDrafts(config));

  const drafts = useMemo(() => allDrafts.slice(0, cellCount), [allDrafts, cellCount]);

  const validation = useMemo(
    () => validateCellDrafts(drafts, config.maxCurrent),
    [config.maxCurrent, drafts],
  );

  const signature = useMemo(
    () => JSON.stringify(validation.ok ? validation.value : drafts),
    [drafts, validation],
  );

  const setCellCount = (value: number) => {
    if (!Number.isFinite(value)) return;
    const next = Math.min(config.maxCells, Math.max(1, Math.round(value)));
    setCellCountState(next);
  };

  const updateDraft = (index: number, patch: Partial<CellDraft>) => {
    setAllDrafts((prev) => {
      if (index < 0 || index >= prev.length) return prev;
      const next = [...prev];
      next[index] = { ...prev[index], ...patch };
      return next;
    });
  };

  return {
    cellCount,
    drafts,
    validation,
    signature,
    setCellCount,
    setCellType: (index, type) => updateDraft(index, { type }),
    setCellCurrent: (index, current) => updateDraft(index, { current }),
  };
};
