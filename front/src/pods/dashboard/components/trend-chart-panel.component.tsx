import React from 'react';
import {
  CartesianGrid,
  Line,
  LineChart,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from 'recharts';
import {
  formatAxisCurrency,
  formatCurrency,
  formatDate,
} from '../../../common/format';
import type { TrendPointVm } from '../dashboard.vm';
import { ChartPanelComponent } from './chart-panel.component';

interface Props {
  title: string;
  points: TrendPointVm[];
  controls?: React.ReactNode;
}

export const TrendChartPanelComponent: React.FC<Props> = ({
  title,
  points,
  controls,
}) => {
  return (
    <ChartPanelComponent
      title={title}
      isEmpty={points.length === 0}
      controls={controls}
    >
      <ResponsiveContainer width="100%" height={300}>
        <LineChart
          data={points}
          margin={{ top: 10, right: 20, left: 10, bottom: 20 }}
        >
          <CartesianGrid strokeDasharray="3 3" />
          <XAxis
            dataKey="timestamp"
            type="number"
            scale="time"
            domain={['dataMin', 'dataMax']}
            tickFormatter={formatDate}
            label={{ value: 'Sale Date', position: 'insideBottom', offset: -10 }}
          />
          <YAxis
            tickFormatter={formatAxisCurrency}
            label={{ value: 'Total Value', angle: -90, position: 'insideLeft' }}
          />
          <Tooltip
            labelFormatter={(label: number) => formatDate(label)}
            formatter={(value) => formatCurrency(Number(value))}
          />
          <Line
            name="Total Value"
            type="monotone"
            dataKey="totalValue"
            stroke="#4c78a8"
            strokeWidth={2}
            dot={false}
          />
        </LineChart>
      </ResponsiveContainer>
    </ChartPanelComponent>
  );
};
