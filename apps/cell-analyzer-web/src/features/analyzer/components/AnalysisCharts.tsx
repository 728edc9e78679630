"use client";

import { useMemo } from "react";
import { HighchartsPanel } from "@/components/charts/HighchartsPanel";
import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card";
import { buildCapacityComparisonOptions, buildTypeDistributionOptions } from "@/lib/analysisCharts";
import type { CellAnalysis } from "@/types/cells";

export default function AnalysisCharts({ results }: { results: CellAnalysis[] }) {
  const distributionOptions = useMemo(() => buildTypeDistributionOptions(results), [results]);
  const capacityOptions = useMemo(() => buildCapacityComparisonOptions(results), [results]);

  return (
    <div className="grid gap-4 lg:grid-cols-2">
      <Card>
        <CardHeader>
          <CardTitle className="text-lg">Cell Type Distribution</CardTitle>
        </CardHeader>
        <CardContent>
          <HighchartsPanel
            options={distributionOptions}
            testId="type-distribution-chart"
            ariaLabel="Cell type distribution"
            wrapperClassName="h-[260px]"
          />
        </CardContent>
      </Card>
      <Card>
        <CardHeader>
          <CardTitle className="text-lg">Capacity Comparison</CardTitle>
        </CardHeader>
        <CardContent>
          <HighchartsPanel
            options={capacityOptions}
            testId="capacity-comparison-chart"
            ariaLabel="Capacity comparison"
            wrapperClassName="h-[260px]"
          />
        </CardContent>
      </Card>
    </div>
  );
}
