"use client";

import type { Options } from "highcharts";
import HighchartsReact, { type HighchartsReactProps, type HighchartsReactRefObject } from "highcharts-react-official";
import { useEffect, useMemo, useRef } from "react";
import { Highcharts } from "@/components/HighchartsProvider";
import { cn } from "@/lib/utils";

export type HighchartsChartRef = HighchartsReactRefObject;

type HighchartsPanelProps = {
  options: Options;
  wrapperClassName?: string;
  containerClassName?: string;
  enableAutoReflow?: boolean;
  testId?: string;
  ariaLabel?: string;
};

export function HighchartsPanel({
  options,
  wrapperClassName,
  containerClassName,
  enableAutoReflow = true,
  testId,
  ariaLabel,
}: HighchartsPanelProps) {
  const chartRef = useRef<HighchartsChartRef | null>(null);
  const wrapperRef = useRef<HTMLDivElement | null>(null);

  const containerProps = useMemo<HighchartsReactProps["containerProps"]>(
    () => ({
      className: cn("h-full w-full", containerClassName),
      role: "img",
      "aria-label": ariaLabel,
    }),
    [ariaLabel, containerClassName],
  );

  useEffect(() => {
    if (!enableAutoReflow) return;
    if (typeof ResizeObserver === "undefined") return;

    const wrapperEl = wrapperRef.current;
    if (!wrapperEl) return;

    const observer = new ResizeObserver(() => {
      chartRef.current?.chart?.reflow();
    });

    observer.observe(wrapperEl);
    return () => observer.disconnect();
  }, [enableAutoReflow]);

  return (
    <div ref={wrapperRef} data-testid={testId} className={wrapperClassName}>
      <HighchartsReact
        ref={chartRef}
        highcharts={Highcharts}
        options={options}
        containerProps={containerProps}
      />
    </div>
  );
}

export type { HighchartsPanelProps };
