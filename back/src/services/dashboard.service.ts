import type {
  CategoryTrend,
  DashboardSummary,
} from "../models/dashboard.model.js";
import {
  buildDashboardCharts,
  categoryTrend,
  listCategories,
} from "./chart-data.builder.js";
import { calculateKpis } from "./kpi.calculator.js";
import type { SalesDataService } from "./sales-data.service.js";

export class DashboardService {
  constructor(private readonly salesDataService: SalesDataService) {}

  async getDashboard(): Promise<DashboardSummary> {
    const { records, refreshedAt, warning } =
      await this.salesDataService.load();

    return {
      kpis: calculateKpis(records),
      charts: buildDashboardCharts(records),
      categories: listCategories(records),
      recordCount: records.length,
      refreshedAt: refreshedAt ? refreshedAt.toISOString() : null,
      warning,
    };
  }

  async getCategoryTrend(category: string): Promise<CategoryTrend | null> {
    const { records } = await this.salesDataService.load();
    if (!records.some((r) => r.productCategory === category)) {
      return null;
    }
    return { category, points: categoryTrend(records, category) };
  }
}
