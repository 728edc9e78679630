"use client";

import { useState } from "react";
import InlineBanner from "@/components/InlineBanner";
import { Button } from "@/components/ui/button";
import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card";
import { CSV_COLUMNS, downloadAnalysisCsv } from "@/lib/analysisExport";
import { emitCellAnalyzerEvent } from "@/lib/analyzerEvents";
import type { CellAnalysis } from "@/types/cells";

type Message = { type: "success" | "error"; text: string };

const HEADER_CLASS =
  "px-3 py-2 text-left text-xs font-semibold uppercase tracking-wide text-muted-foreground";

export default function AnalysisDataTable({ results }: { results: CellAnalysis[] }) {
  const [message, setMessage] = useState<Message | null>(null);

  const handleDownload = () => {
    try {
      const fileName = downloadAnalysisCsv(results);
      emitCellAnalyzerEvent("csv_downloaded", { rows: results.length });
      setMessage({ type: "success", text: `Downloading ${fileName}...` });
    } catch (err) {
      const text = err instanceof Error ? err.message : "Failed to export results.";
      setMessage({ type: "error", text });
    }
  };

  return (
    <Card>
      <CardHeader>
        <div className="flex flex-wrap items-center justify-between gap-3">
          <CardTitle className="text-lg">Data Table</CardTitle>
          <Button size="sm" onClick={handleDownload}>
            Download Results as CSV
          </Button>
        </div>
      </CardHeader>
      <CardContent className="space-y-3">
        {message ? (
          <InlineBanner tone={message.type === "error" ? "danger" : "success"}>{message.text}</InlineBanner>
        ) : null}
        <div className="overflow-x-auto">
          <table className="min-w-full divide-y divide-border text-sm">
            <thead className="bg-card-inset">
              <tr>
                {CSV_COLUMNS.map((column) => (
                  <th key={column} scope="col" className={HEADER_CLASS}>
                    {column}
                  </th>
                ))}
              </tr>
            </thead>
            <tbody className="divide-y divide-border">
              {results.map((result) => (
                <tr key={result.id}>
                  <td className="px-3 py-2 text-card-foreground">{result.id}</td>
                  <td className="px-3 py-2 text-card-foreground">{result.type}</td>
                  <td className="px-3 py-2 font-mono">{result.voltage}</td>
                  <td className="px-3 py-2 font-mono">{result.current}</td>
                  <td className="px-3 py-2 font-mono">{result.temperature}</td>
                  <td className="px-3 py-2 font-mono">{result.capacity}</td>
                  <td className="px-3 py-2 font-mono">{result.min_voltage}</td>
                  <td className="px-3 py-2 font-mono">{result.max_voltage}</td>
                </tr>
              ))}
            </tbody>
          </table>
        </div>
      </CardContent>
    </Card>
  );
}
