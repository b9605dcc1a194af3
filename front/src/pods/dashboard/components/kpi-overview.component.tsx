import React from 'react';
import type { KpiColumnVm } from '../dashboard.vm';

interface Props {
  columns: KpiColumnVm[];
}

export const KpiOverviewComponent: React.FC<Props> = ({ columns }) => {
  return (
    <section className="kpi-overview" aria-label="KPI Overview">
      <h2>KPI Overview</h2>
      <div className="kpi-overview__columns">
        {columns.map((column, index) => (
          <div className="kpi-overview__column" key={index}>
            {column.map((metric) => (
              <div className="kpi-metric" key={metric.label}>
                <span className="kpi-metric__label">{metric.label}</span>
                <span className="kpi-metric__value" data-testid={metric.label}>
                  {metric.value}
                </span>
              </div>
            ))}
          </div>
        ))}
      </div>
    </section>
  );
};
