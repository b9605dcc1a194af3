export interface KpiMetricVm {
  label: string;
  value: string;
}

export type KpiColumnVm = KpiMetricVm[];

export interface BarVm {
  label: string;
  value: number;
}

export interface TrendPointVm {
  timestamp: number;
  totalValue: number;
}

export interface ChannelPointVm {
  salesChannel: string;
  totalValue: number;
  grossProfit: number;
}

export interface ChannelSeriesVm {
  channel: string;
  points: ChannelPointVm[];
}

export interface DashboardVm {
  kpiColumns: KpiColumnVm[];
  revenueByCategory: BarVm[];
  salesTrend: TrendPointVm[];
  channelSeries: ChannelSeriesVm[];
  topSalesReps: BarVm[];
  valueByRegion: BarVm[];
  categories: string[];
  recordCount: number;
  refreshedAt: string | null;
  warning: string | null;
}
