import { describe, it, expect } from "vitest";
import type { DashboardSummary } from "../models/dashboard.model.js";
import { renderSalesReport } from "./sales_report.js";

const summary: DashboardSummary = {
  kpis: {
    totalRevenue: 1234.5,
    averageOrderValue: 617.25,
    totalQuantitySold: 1500,
    averageQuantitySold: 750,
    grossProfitMargin: 23.333,
  },
  charts: {
    revenueByCategory: [{ label: "Electronics", value: 1234.5 }],
    salesTrend: [],
    channelScatter: [],
    topSalesReps: [{ label: "Ana", value: 1500 }],
    valueByRegion: [],
  },
  categories: ["Electronics"],
  recordCount: 2,
  refreshedAt: "2024-03-05T12:00:00.000Z",
  warning: null,
};

describe("renderSalesReport", () => {
  const report = renderSalesReport(
    summary,
    new Date("2024-03-06T08:00:00.000Z"),
  );

  it("should include the header", () => {
    expect(report.startsWith("# Sales KPI Report\n")).toBe(true);
    expect(report).toContain("**Generated:** 2024-03-06T08:00:00.000Z\n");
    expect(report).toContain("**Records:** 2\n");
  });

  it("should format the KPI overview", () => {
    expect(report).toContain("- **Total Revenue:** $1,234.50\n");
    expect(report).toContain("- **Gross Profit Margin:** 23.33%\n");
    expect(report).toContain("- **Total Quantity Sold:** 1,500\n");
    expect(report).toContain("- **Average Quantity Sold:** 750.00\n");
    expect(report).toContain("- **Average Order Value:** $617.25\n");
  });

  it("should list ranked sections and mark empty ones", () => {
    expect(report).toContain(
      "## Revenue by Product Category\n\n1. Electronics: $1,234.50\n",
    );
    expect(report).toContain(
      "## Top 10 Quantity Sold by Sales Representative\n\n1. Ana: 1,500\n",
    );
    expect(report).toContain("## Total Value by Sales Region\n\n*(No data)*\n");
  });

  it("should surface the connection warning", () => {
    const withWarning = renderSalesReport(
      { ...summary, warning: "Unable to connect" },
      new Date("2024-03-06T08:00:00.000Z"),
    );
    expect(withWarning).toContain("> ⚠️ Unable to connect\n");
  });
});
