"use client";

export type CellAnalyzerEventName =
  | "analysis_requested"
  | "analysis_completed"
  | "analysis_rejected"
  | "csv_downloaded";

export type CellAnalyzerEventV1 = {
  schema: "cell_analyzer.ux.v1";
  ts: string;
  session_id: string;
  name: CellAnalyzerEventName;
  payload: Record<string, unknown>;
};

type CellAnalyzerEventWindow = Window & {
  __cell_analyzer_session_id?: string;
  __cell_analyzer_events?: CellAnalyzerEventV1[];
};

export function cellAnalyzerEventsEnabled(
  params: { nodeEnv?: string; enableFlag?: string | null } = {},
): boolean {
  if (typeof window === "undefined") return false;
  const nodeEnv = params.nodeEnv ?? process.env.NODE_ENV;
  const enableFlag = params.enableFlag ?? process.env.NEXT_PUBLIC_CELL_ANALYZER_EVENTS ?? null;
  return nodeEnv === "development" || enableFlag === "1";
}

function getSessionId(w: CellAnalyzerEventWindow): string {
  if (w.__cell_analyzer_session_id) return w.__cell_analyzer_session_id;

  const candidate =
    globalThis.crypto?.randomUUID?.() ??
    `${Date.now().toString(16)}-${Math.random().toString(16).slice(2)}`;
  w.__cell_analyzer_session_id = candidate;
  return candidate;
}

export function emitCellAnalyzerEvent(
  name: CellAnalyzerEventName,
  payload: Record<string, unknown>,
  enabled: boolean = cellAnalyzerEventsEnabled(),
): CellAnalyzerEventV1 | null {
  if (!enabled || typeof window === "undefined") return null;

  const w: CellAnalyzerEventWindow = window;
  const event: CellAnalyzerEventV1 = {
    schema: "cell_analyzer.ux.v1",
    ts: new Date().toISOString(),
    session_id: getSessionId(w),
    name,
    payload,
  };

  if (!w.__cell_analyzer_events) w.__cell_analyzer_events = [];
  w.__cell_analyzer_events.push(event);

  // One line per event so it can be grepped out of the browser console.
  console.info("[ux][cell_analyzer]", JSON.stringify(event));
  return event;
}
