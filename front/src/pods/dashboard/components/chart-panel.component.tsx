import React from 'react';

interface Props {
  title: string;
  isEmpty: boolean;
  controls?: React.ReactNode;
  children: React.ReactNode;
}

export const ChartPanelComponent: React.FC<Props> = ({
  title,
  isEmpty,
  controls,
  children,
}) => {
  return (
    <section className="chart-panel" aria-label={title}>
      <h3>{title}</h3>
      {controls}
      {isEmpty ? <p className="chart-panel__empty">No data to display</p> : children}
    </section>
  );
};
