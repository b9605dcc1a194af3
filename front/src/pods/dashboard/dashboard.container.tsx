import React from 'react';
import { getCategoryTrend, getDashboard } from './api';
import { DashboardComponent } from './dashboard.component';
import { mapDashboardToVm, mapTrendPointsToVm } from './dashboard.mapper';
import type { DashboardVm, TrendPointVm } from './dashboard.vm';

export const DashboardContainer: React.FC = () => {
  const [dashboard, setDashboard] = React.useState<DashboardVm | null>(null);
  const [isLoading, setIsLoading] = React.useState(true);
  const [error, setError] = React.useState<string | null>(null);
  const [selectedCategory, setSelectedCategory] = React.useState('');
  const [categoryPoints, setCategoryPoints] = React.useState<TrendPointVm[]>(
    [],
  );

  const loadDashboard = React.useCallback(async () => {
    setIsLoading(true);
    try {
      const vm = mapDashboardToVm(await getDashboard());
      setDashboard(vm);
      setError(null);
      setSelectedCategory((current) =>
        vm.categories.includes(current) ? current : (vm.categories[0] ?? ''),
      );
    } catch (e) {
      console.error('Failed to load dashboard', e);
      setError('Failed to load the dashboard.');
    } finally {
      setIsLoading(false);
    }
  }, []);

  React.useEffect(() => {
    void loadDashboard();
  }, [loadDashboard]);

  React.useEffect(() => {
    if (!selectedCategory) {
      setCategoryPoints([]);
      return;
    }

    let cancelled = false;
    getCategoryTrend(selectedCategory)
      .then((trend) => {
        if (!cancelled) {
          setCategoryPoints(mapTrendPointsToVm(trend.points));
        }
      })
      .catch((e: unknown) => {
        console.error('Failed to load category trend', e);
        if (!cancelled) {
          setCategoryPoints([]);
        }
      });

    return () => {
      cancelled = true;
    };
  }, [selectedCategory, dashboard]);

  return (
    <main className="dashboard">
      <header className="dashboard__header">
        <h1>Interactive Sales KPI Dashboard</h1>
        <p>
          Explore sales performance, profitability, and more through varied
          visualizations.
        </p>
        <button
          type="button"
          onClick={() => void loadDashboard()}
          disabled={isLoading}
        >
          {isLoading ? 'Refreshing…' : 'Refresh'}
        </button>
      </header>

      {error && (
        <div className="dashboard__error" role="alert">
          {error}
        </div>
      )}

      {dashboard ? (
        <DashboardComponent
          dashboard={dashboard}
          selectedCategory={selectedCategory}
          categoryPoints={categoryPoints}
          onSelectCategory={setSelectedCategory}
        />
      ) : (
        isLoading && <p className="dashboard__loading">Loading sales data…</p>
      )}
    </main>
  );
};
