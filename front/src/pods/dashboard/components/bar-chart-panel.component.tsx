import React from 'react';
import {
  Bar,
  BarChart,
  CartesianGrid,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from 'recharts';
import type { BarVm } from '../dashboard.vm';
import { ChartPanelComponent } from './chart-panel.component';

interface Props {
  title: string;
  data: BarVm[];
  valueLabel: string;
  categoryLabel: string;
  formatValue?: (value: number) => string;
}

export const BarChartPanelComponent: React.FC<Props> = ({
  title,
  data,
  valueLabel,
  categoryLabel,
  formatValue,
}) => {
  return (
    <ChartPanelComponent title={title} isEmpty={data.length === 0}>
      <ResponsiveContainer width="100%" height={300}>
        <BarChart
          data={data}
          layout="vertical"
          margin={{ top: 10, right: 20, left: 10, bottom: 20 }}
        >
          <CartesianGrid strokeDasharray="3 3" horizontal={false} />
          <XAxis
            type="number"
            tickFormatter={formatValue}
            label={{ value: valueLabel, position: 'insideBottom', offset: -10 }}
          />
          <YAxis
            type="category"
            dataKey="label"
            width={140}
            label={{ value: categoryLabel, angle: -90, position: 'insideLeft' }}
          />
          <Tooltip
            formatter={(value) =>
              formatValue ? formatValue(Number(value)) : value
            }
          />
          <Bar dataKey="value" name={valueLabel} barSize={15} fill="#4c78a8" />
        </BarChart>
      </ResponsiveContainer>
    </ChartPanelComponent>
  );
};
