import React from 'react';
import type { TrendPointVm } from '../dashboard.vm';
import { TrendChartPanelComponent } from './trend-chart-panel.component';

interface Props {
  categories: string[];
  selectedCategory: string;
  points: TrendPointVm[];
  onSelectCategory: (category: string) => void;
}

export const CategoryTrendPanelComponent: React.FC<Props> = ({
  categories,
  selectedCategory,
  points,
  onSelectCategory,
}) => {
  const selector = (
    <label className="category-select">
      Select Product Category
      <select
        value={selectedCategory}
        disabled={categories.length === 0}
        onChange={(event) => onSelectCategory(event.target.value)}
      >
        {categories.map((category) => (
          <option key={category} value={category}>
            {category}
          </option>
        ))}
      </select>
    </label>
  );

  return (
    <>
      <h2>Interactive Sales Trend by Product Category</h2>
      <TrendChartPanelComponent
        title={selectedCategory ? `Sales Trend: ${selectedCategory}` : 'Sales Trend'}
        points={points}
        controls={selector}
      />
    </>
  );
};
