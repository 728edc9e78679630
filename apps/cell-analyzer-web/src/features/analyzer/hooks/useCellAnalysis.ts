"use client";

import { useState } from "react";

import { analyzeCells, summarizeAnalysis, type RandomSource } from "@/lib/analyzer";
import { emitCellAnalyzerEvent } from "@/lib/analyzerEvents";
import { CellConfigError } from "@/lib/cellSchemas";
import type { AnalysisSummary, CellAnalysis, CellConfig } from "@/types/cells";

export type AnalysisRun = {
  results: CellAnalysis[];
  summary: AnalysisSummary;
  signature: string;
};

export type CellAnalysisModel = {
  run: AnalysisRun | null;
  error: string | null;
  analyze: (configs: CellConfig[], signature: string) => void;
  reject: (invalidCells: number) => void;
};

export const useCellAnalysis = (random?: RandomSource): CellAnalysisModel => {
  const [run, setRun] = useState<AnalysisRun | null>(null);
  const [error, setError] = useState<string | null>(null);

  const analyze = (configs: CellConfig[], signature: string) => {
    emitCellAnalyzerEvent("analysis_requested", { cell_count: configs.length });
    try {
      const results = analyzeCells(configs, { random });
      const summary = summarizeAnalysis(results);
      setRun({ results, summary, signature });
      setError(null);
      emitCellAnalyzerEvent("analysis_completed", {
        cell_count: summary.cell_count,
        total_capacity: summary.total_capacity,
      });
    } catch (err) {
      if (!(err instanceof CellConfigError)) throw err;
      setError(err.message);
      emitCellAnalyzerEvent("analysis_rejected", {
        cell_index: err.cellIndex,
        issues: err.issues.map((issue) => issue.message),
      });
    }
  };

  const reject = (invalidCells: number) => {
    emitCellAnalyzerEvent("analysis_rejected", { invalid_cells: invalidCells });
  };

  return { run, error, analyze, reject };
};
