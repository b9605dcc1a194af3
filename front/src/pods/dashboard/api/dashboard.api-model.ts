export interface SalesKpis {
  totalRevenue: number;
  averageOrderValue: number;
  totalQuantitySold: number;
  averageQuantitySold: number;
  grossProfitMargin: number;
}

export interface LabeledValue {
  label: string;
  value: number;
}

export interface TrendPoint {
  date: string;
  totalValue: number;
}

export interface ChannelPoint {
  salesChannel: string;
  totalValue: number;
  grossProfit: number;
}

export interface DashboardSummary {
  kpis: SalesKpis;
  charts: {
    revenueByCategory: LabeledValue[];
    salesTrend: TrendPoint[];
    channelScatter: ChannelPoint[];
    topSalesReps: LabeledValue[];
    valueByRegion: LabeledValue[];
  };
  categories: string[];
  recordCount: number;
  refreshedAt: string | null;
  warning: string | null;
}

export interface CategoryTrend {
  category: string;
  points: TrendPoint[];
}
