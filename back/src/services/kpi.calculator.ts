import type { SalesKpis } from "../models/dashboard.model.js";
import type { SalesRecord } from "../models/sales-record.model.js";

const sum = (values: number[]): number =>
  values.reduce((total, value) => total + value, 0);

const mean = (values: number[]): number =>
  values.length === 0 ? 0 : sum(values) / values.length;

export function calculateKpis(records: SalesRecord[]): SalesKpis {
  const totalValues = records.map((r) => r.totalValue);
  const quantities = records.map((r) => r.quantitySold);

  const totalRevenue = sum(totalValues);
  const grossProfit = sum(records.map((r) => r.grossProfit));

  return {
    totalRevenue,
    averageOrderValue: mean(totalValues),
    totalQuantitySold: sum(quantities),
    averageQuantitySold: mean(quantities),
    grossProfitMargin:
      totalRevenue !== 0 ? (grossProfit / totalRevenue) * 100 : 0,
  };
}
