export interface SalesRecord {
  saleDate: Date;
  productCategory: string;
  salesChannel: string;
  salesRep: string;
  salesRegion: string;
  quantitySold: number;
  totalValue: number;
  grossProfit: number;
}

// Row shape as returned by pg: NUMERIC columns arrive as strings.
export interface SalesDataRow {
  sale_date: Date | string | null;
  product_category: string | null;
  sales_channel: string | null;
  sales_rep: string | null;
  sales_region: string | null;
  quantity_sold: number | string | null;
  total_value: number | string | null;
  gross_profit: number | string | null;
}
