import React from 'react';
import { formatAxisCurrency, formatInteger } from '../../common/format';
import { BarChartPanelComponent } from './components/bar-chart-panel.component';
import { CategoryTrendPanelComponent } from './components/category-trend-panel.component';
import { ChannelScatterPanelComponent } from './components/channel-scatter-panel.component';
import { KpiOverviewComponent } from './components/kpi-overview.component';
import { TrendChartPanelComponent } from './components/trend-chart-panel.component';
import type { DashboardVm, TrendPointVm } from './dashboard.vm';
import './dashboard.styles.scss';

interface Props {
  dashboard: DashboardVm;
  selectedCategory: string;
  categoryPoints: TrendPointVm[];
  onSelectCategory: (category: string) => void;
}

export const DashboardComponent: React.FC<Props> = ({
  dashboard,
  selectedCategory,
  categoryPoints,
  onSelectCategory,
}) => {
  return (
    <>
      {dashboard.warning && (
        <div className="dashboard__warning" role="alert">
          {dashboard.warning}
        </div>
      )}

      <KpiOverviewComponent columns={dashboard.kpiColumns} />

      <h2>Revenue and Profitability Insights</h2>
      <div className="dashboard__charts">
        <BarChartPanelComponent
          title="Revenue by Product Category"
          data={dashboard.revenueByCategory}
          valueLabel="Total Revenue"
          categoryLabel="Product Category"
          formatValue={formatAxisCurrency}
        />
        <TrendChartPanelComponent
          title="Sales Trend Over Time"
          points={dashboard.salesTrend}
        />
        <ChannelScatterPanelComponent series={dashboard.channelSeries} />
        <BarChartPanelComponent
          title="Top 10 Quantity Sold by Sales Representative"
          data={dashboard.topSalesReps}
          valueLabel="Quantity Sold"
          categoryLabel="Sales Representative"
          formatValue={formatInteger}
        />
        <BarChartPanelComponent
          title="Total Value by Sales Region"
          data={dashboard.valueByRegion}
          valueLabel="Total Value"
          categoryLabel="Sales Region"
          formatValue={formatAxisCurrency}
        />
      </div>

      <CategoryTrendPanelComponent
        categories={dashboard.categories}
        selectedCategory={selectedCategory}
        points={categoryPoints}
        onSelectCategory={onSelectCategory}
      />

      <footer className="dashboard__footer">
        {dashboard.recordCount} records
        {dashboard.refreshedAt && ` · refreshed ${dashboard.refreshedAt}`}
      </footer>
    </>
  );
};
