"use client";

import { useMemo } from "react";
import InlineBanner from "@/components/InlineBanner";
import PageHeaderCard from "@/components/PageHeaderCard";
import { Badge } from "@/components/ui/badge";
import AnalysisCharts from "@/features/analyzer/components/AnalysisCharts";
import AnalysisDataTable from "@/features/analyzer/components/AnalysisDataTable";
import AnalysisSummaryCards from "@/features/analyzer/components/AnalysisSummaryCards";
import AnalyzerWelcome from "@/features/analyzer/components/AnalyzerWelcome";
import CellConfigSidebar from "@/features/analyzer/components/CellConfigSidebar";
import CellResultCard from "@/features/analyzer/components/CellResultCard";
import { useCellAnalysis } from "@/features/analyzer/hooks/useCellAnalysis";
import { useCellConfigForm } from "@/features/analyzer/hooks/useCellConfigForm";
import type { RandomSource } from "@/lib/analyzer";
import { resolveAnalyzerConfig, type AnalyzerConfig } from "@/lib/analyzerConfig";

export default function AnalyzerPageClient({
  config: configOverride,
  random,
}: {
  config?: AnalyzerConfig;
  random?: RandomSource;
}) {
  const config = useMemo(() => configOverride ?? resolveAnalyzerConfig(), [configOverride]);
  const form = useCellConfigForm(config);
  const analysis = useCellAnalysis(random);

  const run = analysis.run;
  const isStale = run !== null && run.signature !== form.signature;

  const handleAnalyze = () => {
    if (!form.validation.ok) {
      analysis.reject(Object.keys(form.validation.errors).length);
      return;
    }
    analysis.analyze(form.validation.value, form.signature);
  };

  return (
    <div className="flex min-h-screen flex-col bg-card-inset md:flex-row">
      <CellConfigSidebar config={config} form={form} onAnalyze={handleAnalyze} />

      <main className="flex-1 space-y-6 px-4 py-6 md:px-8">
        <PageHeaderCard
          title="Battery Cell Analyzer"
          description="Configure your battery cells and analyze their performance"
          actions={isStale ? <Badge tone="warning" size="md">Results out of date</Badge> : null}
        />

        {analysis.error ? <InlineBanner tone="danger">{analysis.error}</InlineBanner> : null}

        {run ? (
          <>
            {isStale ? (
              <InlineBanner tone="warning">
                The configuration changed since the last analysis. Click Analyze Cells to refresh the results.
              </InlineBanner>
            ) : null}

            <AnalysisSummaryCards summary={run.summary} />

            <section aria-label="Individual cell results" className="space-y-4">
              <h2 className="text-lg font-semibold text-foreground">Individual Cell Results</h2>
              {run.results.map((result) => (
                <CellResultCard key={result.id} result={result} />
              ))}
            </section>

            <AnalysisDataTable results={run.results} />
            <AnalysisCharts results={run.results} />
          </>
        ) : (
          <AnalyzerWelcome />
        )}
      </main>
    </div>
  );
}
