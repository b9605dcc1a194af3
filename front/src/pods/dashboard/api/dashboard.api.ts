import axios from 'axios';
import type { CategoryTrend, DashboardSummary } from './dashboard.api-model';

const url = '/api/dashboard';

export const getDashboard = async (): Promise<DashboardSummary> => {
  const { data } = await axios.get<DashboardSummary>(url);
  return data;
};

export const getCategoryTrend = async (
  category: string,
): Promise<CategoryTrend> => {
  const { data } = await axios.get<CategoryTrend>(`${url}/category-trend`, {
    params: { category },
  });
  return data;
};
