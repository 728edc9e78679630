"use client";

import { NumericDraftInput } from "@/components/forms/NumericDraftInput";
import InlineBanner from "@/components/InlineBanner";
import { Button } from "@/components/ui/button";
import { Select } from "@/components/ui/select";
import type { AnalyzerConfig } from "@/lib/analyzerConfig";
import { CELL_TYPES, CELL_TYPE_SPECS } from "@/lib/cellTypes";
import type { CellDraftErrors } from "@/lib/cellValidation";
import type { CellConfigFormModel } from "@/features/analyzer/hooks/useCellConfigForm";

const RANGE_CLASS = "w-full accent-indigo-600";

const CELL_TYPE_HELP = CELL_TYPES.map((type) => `${type}: ${CELL_TYPE_SPECS[type].name}`).join(", ");

export default function CellConfigSidebar({
  config,
  form,
  onAnalyze,
}: {
  config: AnalyzerConfig;
  form: CellConfigFormModel;
  onAnalyze: () => void;
}) {
  const errors: CellDraftErrors = form.validation.ok ? {} : form.validation.errors;
  const invalidCells = Object.keys(errors).length;

  return (
    <aside
      aria-label="Cell configuration"
      className="flex w-full flex-col gap-5 border-b border-border bg-card px-5 py-6 md:w-80 md:shrink-0 md:border-b-0 md:border-r"
    >
      <div className="space-y-1">
        <h2 className="text-lg font-semibold text-card-foreground">Cell Configuration</h2>
        <p className="text-sm text-muted-foreground">
          Configure up to {config.maxCells} battery cells for analysis
        </p>
      </div>

      <div className="space-y-2">
        <label htmlFor="cell-count" className="flex items-center justify-between text-sm font-medium">
          <span>Number of cells to analyze</span>
          <span className="font-mono text-indigo-700" data-testid="cell-count-value">
            {form.cellCount}
          </span>
        </label>
        <input
          id="cell-count"
          type="range"
          min={1}
          max={config.maxCells}
          step={1}
          value={form.cellCount}
          onChange={(event) => form.setCellCount(Number(event.target.value))}
          className={RANGE_CLASS}
        />
      </div>

      <div className="space-y-4">
        <h3 className="text-sm font-semibold uppercase tracking-wide text-muted-foreground">Cell Settings</h3>
        {form.drafts.map((draft, index) => {
          const id = index + 1;
          const cellErrors = errors[id] ?? {};
          const messages = [cellErrors.type, cellErrors.current].filter(
            (message): message is string => Boolean(message),
          );
          const errorId = messages.length ? `cell-${id}-errors` : undefined;
          return (
            <fieldset key={id} className="space-y-3 border-b border-border pb-4">
              <legend className="mb-2 text-sm font-semibold text-card-foreground">Cell {id}</legend>
              <div className="space-y-1">
                <label htmlFor={`cell-${id}-type`} className="text-xs font-medium text-muted-foreground">
                  Cell {id} Type
                </label>
                <Select
                  id={`cell-${id}-type`}
                  title={CELL_TYPE_HELP}
                  value={draft.type}
                  invalid={Boolean(cellErrors.type)}
                  aria-describedby={errorId}
                  onChange={(event) => form.setCellType(index, event.target.value)}
                >
                  <option value="">Select a type</option>
                  {CELL_TYPES.map((type) => (
                    <option key={type} value={type}>
                      {type}
                    </option>
                  ))}
                </Select>
              </div>
              <div className="space-y-1">
                <label htmlFor={`cell-${id}-current`} className="text-xs font-medium text-muted-foreground">
                  Cell {id} Current (A)
                </label>
                <NumericDraftInput
                  id={`cell-${id}-current`}
                  value={draft.current}
                  min={0}
                  max={config.maxCurrent}
                  step={config.currentStep}
                  invalid={Boolean(cellErrors.current)}
                  aria-describedby={errorId}
                  onValueChange={(next) => form.setCellCurrent(index, next)}
                />
              </div>
              {messages.length ? (
                <ul id={errorId} className="space-y-0.5 text-xs text-rose-600">
                  {messages.map((message) => (
                    <li key={message}>{message}</li>
                  ))}
                </ul>
              ) : null}
            </fieldset>
          );
        })}
      </div>

      {invalidCells ? (
        <InlineBanner tone="danger">
          Fix {invalidCells === 1 ? "1 cell" : `${invalidCells} cells`} before running the analysis.
        </InlineBanner>
      ) : null}

      <Button variant="primary" fullWidth disabled={!form.validation.ok} onClick={onAnalyze}>
        Analyze Cells
      </Button>
    </aside>
  );
}
