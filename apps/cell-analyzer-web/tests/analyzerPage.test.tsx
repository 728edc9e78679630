import { fireEvent, render, screen, within } from "@testing-library/react";
import userEvent from "@testing-library/user-event";
import type { ForwardedRef } from "react";
import { beforeEach, describe, expect, it, vi } from "vitest";

import AnalyzerPageClient from "@/app/AnalyzerPageClient";
import type { AnalyzerConfig } from "@/lib/analyzerConfig";

let renderedChartOptions: Array<Record<string, unknown>> = [];

vi.mock("highcharts-react-official", async () => {
  const React = await import("react");
  const Mock = React.forwardRef(function MockHighcharts(
    props: { options: Record<string, unknown> },
    _ref: ForwardedRef<unknown>,
  ) {
    renderedChartOptions.push(props.options);
    return React.createElement("div", { "data-testid": "mock-highcharts-react" });
  });
  return { default: Mock };
});

vi.mock("@/components/HighchartsProvider", () => ({
  Highcharts: {},
}));

const config: AnalyzerConfig = {
  maxCells: 8,
  defaultCellCount: 3,
  maxCurrent: 10,
  defaultCurrent: 2,
  currentStep: 0.1,
};

const renderPage = () => render(<AnalyzerPageClient config={config} random={() => 0.5} />);

describe("AnalyzerPageClient", () => {
  beforeEach(() => {
    renderedChartOptions = [];
  });

  it("starts with three default cells and the welcome panel", () => {
    renderPage();

    expect(screen.getByTestId("cell-count-value")).toHaveTextContent("3");
    expect(screen.getAllByRole("combobox")).toHaveLength(3);
    expect(screen.getByLabelText("Cell 1 Type")).toHaveValue("LFP");
    expect(screen.getByLabelText("Cell 1 Current (A)")).toHaveValue("2.0");
    expect(screen.getByText("How to Use")).toBeInTheDocument();
    expect(screen.getByText("Nominal Voltage: 3.6 V")).toBeInTheDocument();
  });

  it("analyzes the configured cells", async () => {
    const user = userEvent.setup();
    renderPage();

    await user.click(screen.getByRole("button", { name: "Analyze Cells" }));

    const summary = screen.getByTestId("analysis-summary");
    expect(within(summary).getByText("19.2 Wh")).toBeInTheDocument();
    expect(within(summary).getByText("32.5 °C")).toBeInTheDocument();
    expect(within(summary).getByText("3.2 V")).toBeInTheDocument();
    expect(within(summary).getByText("3")).toBeInTheDocument();

    const firstCell = screen.getByTestId("cell-result-1");
    expect(within(firstCell).getByText("6.4 Wh")).toBeInTheDocument();
    expect(within(firstCell).getByText("Range: 2.8 V - 4.0 V (Current: 3.2 V)")).toBeInTheDocument();
    expect(within(firstCell).getByRole("progressbar")).toHaveAttribute("aria-valuenow", "33");

    expect(screen.getAllByRole("row")).toHaveLength(4);
    expect(screen.getAllByTestId("mock-highcharts-react")).toHaveLength(2);
    expect(renderedChartOptions).toContainEqual(
      expect.objectContaining({ xAxis: { categories: ["Cell 1", "Cell 2", "Cell 3"] } }),
    );
    expect(screen.queryByText("How to Use")).not.toBeInTheDocument();
  });

  it("marks results stale after an edit and refreshes them on the next run", async () => {
    const user = userEvent.setup();
    renderPage();

    await user.click(screen.getByRole("button", { name: "Analyze Cells" }));
    await user.selectOptions(screen.getByLabelText("Cell 2 Type"), "MNC");

    expect(screen.getByText("Results out of date")).toBeInTheDocument();

    await user.click(screen.getByRole("button", { name: "Analyze Cells" }));

    expect(screen.queryByText("Results out of date")).not.toBeInTheDocument();
    const summary = screen.getByTestId("analysis-summary");
    expect(within(summary).getByText("20.0 Wh")).toBeInTheDocument();
    expect(within(summary).getByText("3.6 V")).toBeInTheDocument();
    expect(within(screen.getByTestId("cell-result-2")).getByText("MNC")).toBeInTheDocument();
  });

  it("keeps results current when an edit leaves the configuration unchanged", async () => {
    const user = userEvent.setup();
    renderPage();

    await user.click(screen.getByRole("button", { name: "Analyze Cells" }));
    const current = screen.getByLabelText("Cell 1 Current (A)");
    await user.clear(current);
    await user.type(current, "2");

    expect(current).toHaveValue("2");
    expect(screen.queryByText("Results out of date")).not.toBeInTheDocument();
  });

  it("refuses to analyze while a current is invalid", async () => {
    const user = userEvent.setup();
    renderPage();

    const current = screen.getByLabelText("Cell 1 Current (A)");
    await user.clear(current);
    await user.type(current, "-1");

    expect(screen.getByText("Cell 1 current cannot be negative.")).toBeInTheDocument();
    expect(screen.getByText("Fix 1 cell before running the analysis.")).toBeInTheDocument();
    expect(current).toHaveAttribute("aria-invalid", "true");

    const analyze = screen.getByRole("button", { name: "Analyze Cells" });
    expect(analyze).toBeDisabled();
    await user.click(analyze);
    expect(screen.getByText("How to Use")).toBeInTheDocument();
  });

  it("reports unset cell types", async () => {
    const user = userEvent.setup();
    renderPage();

    await user.selectOptions(screen.getByLabelText("Cell 3 Type"), "");
    await user.clear(screen.getByLabelText("Cell 2 Current (A)"));

    expect(screen.getByText("Cell 3 type must be LFP or MNC.")).toBeInTheDocument();
    expect(screen.getByText("Cell 2 current must be a number.")).toBeInTheDocument();
    expect(screen.getByText("Fix 2 cells before running the analysis.")).toBeInTheDocument();
  });

  it("keeps per-cell values when the count shrinks and grows", async () => {
    const user = userEvent.setup();
    renderPage();

    await user.selectOptions(screen.getByLabelText("Cell 3 Type"), "MNC");

    const slider = screen.getByRole("slider");
    fireEvent.change(slider, { target: { value: "2" } });
    expect(screen.queryByLabelText("Cell 3 Type")).not.toBeInTheDocument();

    fireEvent.change(slider, { target: { value: "5" } });
    expect(screen.getByTestId("cell-count-value")).toHaveTextContent("5");
    expect(screen.getByLabelText("Cell 3 Type")).toHaveValue("MNC");
    expect(screen.getByLabelText("Cell 5 Type")).toHaveValue("LFP");
  });

  it("downloads the results as CSV", async () => {
    const user = userEvent.setup();
    renderPage();

    await user.click(screen.getByRole("button", { name: "Analyze Cells" }));
    await user.click(screen.getByRole("button", { name: "Download Results as CSV" }));

    expect(
      screen.getByText(/^Downloading battery_cell_analysis-\d{8}-\d{6}\.csv\.\.\.$/),
    ).toBeInTheDocument();
  });
});
