import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card";
import { formatCelsius, formatVolts, formatWattHours } from "@/lib/format";
import type { AnalysisSummary } from "@/types/cells";
import MetricTile from "./MetricTile";

export default function AnalysisSummaryCards({ summary }: { summary: AnalysisSummary }) {
  return (
    <Card>
      <CardHeader>
        <CardTitle className="text-lg">Analysis Summary</CardTitle>
      </CardHeader>
      <CardContent>
        <dl className="grid grid-cols-2 gap-3 lg:grid-cols-4" data-testid="analysis-summary">
          <MetricTile label="Total Capacity" value={formatWattHours(summary.total_capacity)} />
          <MetricTile label="Avg Temperature" value={formatCelsius(summary.average_temperature)} />
          <MetricTile label="Peak Voltage" value={formatVolts(summary.peak_voltage)} />
          <MetricTile label="Cell Count" value={String(summary.cell_count)} />
        </dl>
      </CardContent>
    </Card>
  );
}
