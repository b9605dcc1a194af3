import type {
  ChannelPoint,
  DashboardCharts,
  LabeledValue,
  TrendPoint,
} from "../models/dashboard.model.js";
import type { SalesRecord } from "../models/sales-record.model.js";

const TOP_SALES_REPS = 10;

function sumBy(
  records: SalesRecord[],
  key: (record: SalesRecord) => string,
  amount: (record: SalesRecord) => number,
): Map<string, number> {
  const totals = new Map<string, number>();
  for (const record of records) {
    const k = key(record);
    totals.set(k, (totals.get(k) ?? 0) + amount(record));
  }
  return totals;
}

// Array.prototype.sort is stable, so ties keep first-seen order.
function descending(totals: Map<string, number>): LabeledValue[] {
  return Array.from(totals, ([label, value]) => ({ label, value })).sort(
    (a, b) => b.value - a.value,
  );
}

export function revenueByCategory(records: SalesRecord[]): LabeledValue[] {
  return descending(
    sumBy(records, (r) => r.productCategory, (r) => r.totalValue),
  );
}

export function salesTrend(records: SalesRecord[]): TrendPoint[] {
  const totals = new Map<number, number>();
  for (const record of records) {
    const time = record.saleDate.getTime();
    totals.set(time, (totals.get(time) ?? 0) + record.totalValue);
  }
  return Array.from(totals)
    .sort(([a], [b]) => a - b)
    .map(([time, totalValue]) => ({
      date: new Date(time).toISOString(),
      totalValue,
    }));
}

export function channelScatter(records: SalesRecord[]): ChannelPoint[] {
  return records.map((r) => ({
    salesChannel: r.salesChannel,
    totalValue: r.totalValue,
    grossProfit: r.grossProfit,
  }));
}

export function topSalesReps(
  records: SalesRecord[],
  limit = TOP_SALES_REPS,
): LabeledValue[] {
  return descending(
    sumBy(records, (r) => r.salesRep, (r) => r.quantitySold),
  ).slice(0, limit);
}

export function valueByRegion(records: SalesRecord[]): LabeledValue[] {
  return descending(sumBy(records, (r) => r.salesRegion, (r) => r.totalValue));
}

export function listCategories(records: SalesRecord[]): string[] {
  return Array.from(new Set(records.map((r) => r.productCategory)));
}

export function categoryTrend(
  records: SalesRecord[],
  category: string,
): TrendPoint[] {
  return salesTrend(records.filter((r) => r.productCategory === category));
}

export function buildDashboardCharts(records: SalesRecord[]): DashboardCharts {
  return {
    revenueByCategory: revenueByCategory(records),
    salesTrend: salesTrend(records),
    channelScatter: channelScatter(records),
    topSalesReps: topSalesReps(records),
    valueByRegion: valueByRegion(records),
  };
}
