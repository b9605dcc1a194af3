import type * as apiModel from './api';
import type * as viewModel from './dashboard.vm';
import {
  formatCurrency,
  formatDecimal,
  formatInteger,
  formatPercent,
} from '../../common/format';

export const mapKpisToVm = (
  kpis: apiModel.SalesKpis,
): viewModel.KpiColumnVm[] => [
  [
    { label: 'Total Revenue', value: formatCurrency(kpis.totalRevenue) },
    {
      label: 'Gross Profit Margin',
      value: formatPercent(kpis.grossProfitMargin),
    },
  ],
  [
    {
      label: 'Total Quantity Sold',
      value: formatInteger(kpis.totalQuantitySold),
    },
    {
      label: 'Average Quantity Sold',
      value: formatDecimal(kpis.averageQuantitySold),
    },
  ],
  [
    {
      label: 'Average Order Value',
      value: formatCurrency(kpis.averageOrderValue),
    },
  ],
];

export const mapTrendPointsToVm = (
  points: apiModel.TrendPoint[],
): viewModel.TrendPointVm[] =>
  points.map((point) => ({
    timestamp: Date.parse(point.date),
    totalValue: point.totalValue,
  }));

export const mapChannelScatterToVm = (
  points: apiModel.ChannelPoint[],
): viewModel.ChannelSeriesVm[] => {
  const series = new Map<string, viewModel.ChannelSeriesVm>();
  for (const point of points) {
    const { salesChannel, totalValue, grossProfit } = point;
    let channel = series.get(salesChannel);
    if (!channel) {
      channel = { channel: salesChannel, points: [] };
      series.set(salesChannel, channel);
    }
    channel.points.push({ salesChannel, totalValue, grossProfit });
  }
  return Array.from(series.values());
};

export const mapDashboardToVm = (
  summary: apiModel.DashboardSummary,
): viewModel.DashboardVm => ({
  kpiColumns: mapKpisToVm(summary.kpis),
  revenueByCategory: summary.charts.revenueByCategory,
  salesTrend: mapTrendPointsToVm(summary.charts.salesTrend),
  channelSeries: mapChannelScatterToVm(summary.charts.channelScatter),
  topSalesReps: summary.charts.topSalesReps,
  valueByRegion: summary.charts.valueByRegion,
  categories: summary.categories,
  recordCount: summary.recordCount,
  refreshedAt: summary.refreshedAt,
  warning: summary.warning,
});
