import React from 'react';
import {
  CartesianGrid,
  Legend,
  ResponsiveContainer,
  Scatter,
  ScatterChart,
  Tooltip,
  XAxis,
  YAxis,
} from 'recharts';
import { formatCurrency } from '../../../common/format';
import type { ChannelPointVm, ChannelSeriesVm } from '../dashboard.vm';
import { ChartPanelComponent } from './chart-panel.component';

// Tableau 10
const CHANNEL_COLORS = [
  '#4c78a8',
  '#f58518',
  '#e45756',
  '#72b7b2',
  '#54a24b',
  '#eeca3b',
  '#b279a2',
  '#ff9da6',
  '#9d755d',
  '#bab0ac',
];

interface Props {
  series: ChannelSeriesVm[];
}

export const ChannelScatterPanelComponent: React.FC<Props> = ({ series }) => {
  return (
    <ChartPanelComponent
      title="Total Value vs Gross Profit by Sales Channel"
      isEmpty={series.length === 0}
    >
      <ResponsiveContainer width="100%" height={400}>
        <ScatterChart margin={{ top: 10, right: 20, left: 10, bottom: 20 }}>
          <CartesianGrid strokeDasharray="3 3" />
          <XAxis
            type="number"
            dataKey="totalValue"
            name="Total Value"
            tickFormatter={formatCurrency}
          />
          <YAxis
            type="number"
            dataKey="grossProfit"
            name="Gross Profit"
            tickFormatter={formatCurrency}
          />
          <Tooltip
            cursor={{ strokeDasharray: '3 3' }}
            content={<ChannelTooltip />}
          />
          <Legend />
          {series.map((channel, index) => (
            <Scatter
              key={channel.channel}
              name={channel.channel}
              data={channel.points}
              fill={CHANNEL_COLORS[index % CHANNEL_COLORS.length]}
            />
          ))}
        </ScatterChart>
      </ResponsiveContainer>
    </ChartPanelComponent>
  );
};

interface ChannelTooltipProps {
  active?: boolean;
  payload?: Array<{ payload: ChannelPointVm }>;
}

export const ChannelTooltip: React.FC<ChannelTooltipProps> = ({
  active,
  payload,
}) => {
  const point = payload?.[0]?.payload;
  if (!active || !point) {
    return null;
  }

  return (
    <div className="chart-tooltip">
      <p className="chart-tooltip__title">{point.salesChannel}</p>
      <p>Total Value: {formatCurrency(point.totalValue)}</p>
      <p>Gross Profit: {formatCurrency(point.grossProfit)}</p>
    </div>
  );
};
