import type { QueryFn } from "../database/connection.js";
import { MalformedSalesRecordError } from "../errors/app.errors.js";
import type {
  SalesDataRow,
  SalesRecord,
} from "../models/sales-record.model.js";

export interface SalesRecordSource {
  findAll(): Promise<SalesRecord[]>;
}

function toText(
  value: string | null,
  column: string,
  rowIndex: number,
): string {
  if (value === null || value === undefined) {
    throw new MalformedSalesRecordError(rowIndex, `${column} is null`);
  }
  return String(value);
}

function toNumber(
  value: number | string | null,
  column: string,
  rowIndex: number,
): number {
  const parsed = value === null || value === "" ? NaN : Number(value);
  if (!Number.isFinite(parsed)) {
    throw new MalformedSalesRecordError(
      rowIndex,
      `${column} is not a number (${String(value)})`,
    );
  }
  return parsed;
}

function toDate(value: Date | string | null, rowIndex: number): Date {
  if (value === null || value === undefined) {
    throw new MalformedSalesRecordError(rowIndex, "sale_date is null");
  }
  const date = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new MalformedSalesRecordError(
      rowIndex,
      `sale_date is not a date (${String(value)})`,
    );
  }
  return date;
}

export function toSalesRecord(row: SalesDataRow, rowIndex: number): SalesRecord {
  return {
    saleDate: toDate(row.sale_date, rowIndex),
    productCategory: toText(row.product_category, "product_category", rowIndex),
    salesChannel: toText(row.sales_channel, "sales_channel", rowIndex),
    salesRep: toText(row.sales_rep, "sales_rep", rowIndex),
    salesRegion: toText(row.sales_region, "sales_region", rowIndex),
    quantitySold: toNumber(row.quantity_sold, "quantity_sold", rowIndex),
    totalValue: toNumber(row.total_value, "total_value", rowIndex),
    grossProfit: toNumber(row.gross_profit, "gross_profit", rowIndex),
  };
}

export class SalesDataRepository implements SalesRecordSource {
  constructor(private readonly query: QueryFn) {}

  async findAll(): Promise<SalesRecord[]> {
    const result = await this.query<SalesDataRow>("SELECT * FROM sales_data");
    return result.rows.map(toSalesRecord);
  }
}
