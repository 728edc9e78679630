import { Badge } from "@/components/ui/badge";
import { voltageRangeProgress } from "@/lib/analyzer";
import { formatAmps, formatCelsius, formatVoltageRange, formatVolts, formatWattHours } from "@/lib/format";
import { cn } from "@/lib/utils";
import type { CellAnalysis } from "@/types/cells";
import MetricTile from "./MetricTile";

const accentClass = {
  LFP: "border-l-emerald-600",
  MNC: "border-l-rose-600",
} as const;

export default function CellResultCard({ result }: { result: CellAnalysis }) {
  const progress = voltageRangeProgress(result);
  const titleId = `cell-result-${result.id}`;

  return (
    <section
      aria-labelledby={titleId}
      data-testid={`cell-result-${result.id}`}
      className={cn(
        "space-y-4 rounded-xl border border-l-4 border-border bg-card p-5 shadow-xs",
        accentClass[result.type],
      )}
    >
      <div className="flex items-center gap-3">
        <h3 id={titleId} className="text-base font-semibold text-card-foreground">
          Cell {result.id}
        </h3>
        <Badge tone={result.type === "LFP" ? "lfp" : "mnc"}>{result.type}</Badge>
      </div>

      <dl className="grid grid-cols-2 gap-3 lg:grid-cols-4">
        <MetricTile label="Voltage" value={formatVolts(result.voltage)} />
        <MetricTile label="Current" value={formatAmps(result.current)} />
        <MetricTile label="Temperature" value={formatCelsius(result.temperature)} />
        <MetricTile label="Capacity" value={formatWattHours(result.capacity)} />
      </dl>

      <div className="space-y-2">
        <p className="text-sm font-semibold text-card-foreground">Voltage Range</p>
        <div
          role="progressbar"
          aria-label={`Cell ${result.id} voltage range position`}
          aria-valuemin={0}
          aria-valuemax={100}
          aria-valuenow={Math.round(progress * 100)}
          className="h-2 w-full overflow-hidden rounded-full bg-muted"
        >
          <div className="h-full rounded-full bg-indigo-600" style={{ width: `${progress * 100}%` }} />
        </div>
        <p className="text-xs text-muted-foreground">
          Range: {formatVoltageRange(result.min_voltage, result.max_voltage)} (Current:{" "}
          {formatVolts(result.voltage)})
        </p>
      </div>
    </section>
  );
}
