"use client";

import { cn } from "@/lib/utils";
import type { ReactNode } from "react";

type InlineBannerTone = "success" | "danger" | "info" | "warning";

const toneClasses: Record<InlineBannerTone, string> = {
  success: "border-success-surface-border bg-success-surface text-success-surface-foreground",
  danger: "border-danger-surface-border bg-danger-surface text-danger-surface-foreground",
  warning: "border-warning-surface-border bg-warning-surface text-warning-surface-foreground",
  info: "border-border bg-card-inset text-card-inset-foreground",
};

export default function InlineBanner({
  tone,
  children,
  className,
}: {
  tone: InlineBannerTone;
  children: ReactNode;
  className?: string;
}) {
  return (
    <div
      role={tone === "danger" ? "alert" : "status"}
      className={cn("rounded-xl border px-4 py-3 text-sm shadow-xs", toneClasses[tone], className)}
    >
      {children}
    </div>
  );
}
