import fs from "fs/promises";
import path from "path";
import { pathToFileURL } from "url";
import dotenv from "dotenv";
import { loadConfig } from "../config/app.config.js";
import { createPool, createQuery } from "../database/connection.js";
import type {
  DashboardSummary,
  LabeledValue,
} from "../models/dashboard.model.js";
import { SalesDataRepository } from "../repositories/sales-data.repository.js";
import { DashboardService } from "../services/dashboard.service.js";
import { SalesDataService } from "../services/sales-data.service.js";
//  npx tsx back/src/scripts/sales_report.ts

const money = (value: number) =>
  `$${value.toLocaleString("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;

export function renderSalesReport(
  summary: DashboardSummary,
  generatedAt: Date,
): string {
  const { kpis, charts } = summary;

  let content = `# Sales KPI Report

**Generated:** ${generatedAt.toISOString()}
**Records:** ${summary.recordCount}

`;

  if (summary.warning) {
    content += `> ⚠️ ${summary.warning}\n\n`;
  }

  content += `## KPI Overview

- **Total Revenue:** ${money(kpis.totalRevenue)}
- **Gross Profit Margin:** ${kpis.grossProfitMargin.toFixed(2)}%
- **Total Quantity Sold:** ${Math.round(kpis.totalQuantitySold).toLocaleString("en-US")}
- **Average Quantity Sold:** ${kpis.averageQuantitySold.toFixed(2)}
- **Average Order Value:** ${money(kpis.averageOrderValue)}

`;

  const sections: Array<[string, LabeledValue[], boolean]> = [
    ["Revenue by Product Category", charts.revenueByCategory, true],
    ["Top 10 Quantity Sold by Sales Representative", charts.topSalesReps, false],
    ["Total Value by Sales Region", charts.valueByRegion, true],
  ];

  for (const [title, rows, isMoney] of sections) {
    content += `## ${title}\n\n`;
    if (rows.length === 0) {
      content += "*(No data)*\n\n";
      continue;
    }
    rows.forEach((row, index) => {
      const value = isMoney ? money(row.value) : row.value.toLocaleString("en-US");
      content += `${index + 1}. ${row.label}: ${value}\n`;
    });
    content += "\n";
  }

  return content;
}

async function main() {
  dotenv.config();
  console.log("🚀 Building sales report...");

  const pool = createPool(loadConfig().database);
  try {
    const dashboardService = new DashboardService(
      new SalesDataService(new SalesDataRepository(createQuery(pool))),
    );
    const summary = await dashboardService.getDashboard();
    const outputFile = path.join(process.cwd(), "SALES_REPORT.md");

    await fs.writeFile(
      outputFile,
      renderSalesReport(summary, new Date()),
      "utf-8",
    );
    console.log(`📊 Report generated: ${outputFile}`);
  } finally {
    await pool.end();
  }
}

const isEntryPoint =
  process.argv[1] !== undefined &&
  import.meta.url === pathToFileURL(path.resolve(process.argv[1])).href;

if (isEntryPoint) {
  main().catch((err) => {
    console.error("❌ Fatal Error during execution:", err);
    process.exit(1);
  });
}
