"use client";

import type { ComponentPropsWithoutRef, KeyboardEvent } from "react";
import { Input } from "@/components/ui/input";

type Props = Omit<ComponentPropsWithoutRef<"input">, "value" | "onChange" | "type" | "min" | "max" | "step"> & {
  /** Draft text; validation happens where the draft is consumed. */
  value: string;
  onValueChange: (next: string) => void;
  min?: number;
  max?: number;
  step?: number;
  invalid?: boolean;
};

function parseDraft(raw: string): number | null {
  const trimmed = raw.trim();
  if (!trimmed) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

function clampValue(value: number, min?: number, max?: number): number {
  let next = value;
  if (typeof min === "number") next = Math.max(min, next);
  if (typeof max === "number") next = Math.min(max, next);
  return next;
}

function decimalsOf(step: number): number {
  const text = String(step);
  const dot = text.indexOf(".");
  return dot === -1 ? 0 : text.length - dot - 1;
}

export function formatDraftNumber(value: number, step?: number): string {
  if (typeof step !== "number" || step <= 0) return String(value);
  return value.toFixed(Math.max(1, decimalsOf(step)));
}

export function stepDraft(raw: string, direction: 1 | -1, step: number, min?: number, max?: number): string | null {
  const parsed = parseDraft(raw);
  if (parsed === null) return null;
  const decimals = decimalsOf(step);
  const next = Number((parsed + direction * step).toFixed(decimals));
  return formatDraftNumber(clampValue(next, min, max), step);
}

export function NumericDraftInput({
  value,
  onValueChange,
  min,
  max,
  step,
  invalid = false,
  inputMode = "decimal",
  onBlur,
  onKeyDown,
  ...rest
}: Props) {
  const handleKeyDown = (event: KeyboardEvent<HTMLInputElement>) => {
    onKeyDown?.(event);
    if (event.defaultPrevented || typeof step !== "number") return;
    if (event.key !== "ArrowUp" && event.key !== "ArrowDown") return;

    const next = stepDraft(value, event.key === "ArrowUp" ? 1 : -1, step, min, max);
    if (next === null) return;
    event.preventDefault();
    onValueChange(next);
  };

  return (
    <Input
      {...rest}
      type="text"
      inputMode={inputMode}
      invalid={invalid}
      value={value}
      onChange={(event) => onValueChange(event.target.value)}
      onKeyDown={handleKeyDown}
      onBlur={(event) => {
        const trimmed = value.trim();
        if (trimmed !== value) {
          onValueChange(trimmed);
        }
        onBlur?.(event);
      }}
    />
  );
}
