import InlineBanner from "@/components/InlineBanner";
import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card";
import { CELL_TYPES, CELL_TYPE_SPECS, cellTypeLabel } from "@/lib/cellTypes";
import { formatVoltageRange, formatVolts } from "@/lib/format";

const STEPS = [
  ["Configure Cells", "Use the sidebar to set up your battery cells."],
  ["Select Cell Types", "Choose between LFP (Lithium Iron Phosphate) and MNC (Lithium Manganese Cobalt)."],
  ["Set Current Values", "Enter the current for each cell in Amperes."],
  ["Analyze", "Click the Analyze Cells button to process your data."],
  ["Review Results", "View voltage, temperature and capacity for every cell."],
] as const;

export default function AnalyzerWelcome() {
  return (
    <div className="space-y-4">
      <InlineBanner tone="info">
        Configure your battery cells in the sidebar and click Analyze Cells to get started.
      </InlineBanner>

      <Card>
        <CardHeader>
          <CardTitle className="text-lg">How to Use</CardTitle>
        </CardHeader>
        <CardContent>
          <ol className="list-decimal space-y-1 pl-5 text-sm text-card-foreground">
            {STEPS.map(([title, detail]) => (
              <li key={title}>
                <span className="font-semibold">{title}:</span> {detail}
              </li>
            ))}
          </ol>
        </CardContent>
      </Card>

      <Card>
        <CardHeader>
          <CardTitle className="text-lg">Cell Type Information</CardTitle>
        </CardHeader>
        <CardContent>
          <div className="grid gap-4 md:grid-cols-2">
            {CELL_TYPES.map((type) => {
              const spec = CELL_TYPE_SPECS[type];
              return (
                <section key={type} aria-label={`${type} reference`} className="space-y-2">
                  <h4 className="text-sm font-semibold text-card-foreground">{cellTypeLabel(type)}</h4>
                  <ul className="list-disc space-y-1 pl-5 text-sm text-muted-foreground">
                    <li>Nominal Voltage: {formatVolts(spec.nominal_voltage)}</li>
                    <li>Voltage Range: {formatVoltageRange(spec.min_voltage, spec.max_voltage)}</li>
                    <li>Characteristics: {spec.characteristics}</li>
                  </ul>
                </section>
              );
            })}
          </div>
        </CardContent>
      </Card>
    </div>
  );
}
