import { cn } from "@/lib/utils";

export default function MetricTile({
  label,
  value,
  className,
}: {
  label: string;
  value: string;
  className?: string;
}) {
  return (
    <div className={cn("rounded-lg border border-border bg-card-inset px-4 py-3", className)}>
      <dt className="text-xs font-medium uppercase tracking-wide text-muted-foreground">{label}</dt>
      <dd className="mt-1 font-mono text-xl font-semibold text-card-foreground">{value}</dd>
    </div>
  );
}
