"use client";

import Highcharts from "highcharts";

// Shared light theme for every analyzer chart.
export const CHART_THEME: Highcharts.Options = {
  chart: {
    backgroundColor: "transparent",
    style: {
      fontFamily: 'system-ui, -apple-system, "Segoe UI", Roboto, sans-serif',
    },
  },
  credits: { enabled: false },
  title: { text: undefined },
  accessibility: { enabled: false },
  tooltip: {
    backgroundColor: "#ffffff",
    borderColor: "#e5e7eb",
    borderRadius: 8,
    shadow: true,
    style: { color: "#111827", fontSize: "12px" },
  },
  xAxis: {
    lineColor: "#e5e7eb",
    tickColor: "#e5e7eb",
    labels: { style: { color: "#6b7280", fontSize: "11px" } },
  },
  yAxis: {
    gridLineColor: "#f3f4f6",
    labels: { style: { color: "#6b7280", fontSize: "11px" } },
    title: { style: { color: "#6b7280", fontSize: "11px" } },
  },
  plotOptions: {
    series: {
      animation: { duration: 300 },
    },
    column: {
      borderWidth: 0,
      borderRadius: 2,
    },
  },
};

type ChartThemeTarget = {
  setOptions?: (options: Highcharts.Options) => unknown;
};

/**
 * Without a DOM the highcharts bundle exports a bare factory with no
 * `setOptions`, so the theme is only applied in the browser.
 */
export function applyChartTheme(target: ChartThemeTarget = Highcharts): boolean {
  if (typeof window === "undefined" || typeof target.setOptions !== "function") {
    return false;
  }
  target.setOptions(CHART_THEME);
  return true;
}

applyChartTheme();

export { Highcharts };
