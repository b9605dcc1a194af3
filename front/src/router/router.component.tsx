import React from 'react';
import { Routes, Route, Navigate } from 'react-router-dom';
import { DashboardContainer } from '../pods/dashboard/dashboard.container';

export const AppRouter: React.FC = () => {
  return (
    <Routes>
      <Route path="/" element={<DashboardContainer />} />
      <Route path="*" element={<Navigate to="/" replace />} />
    </Routes>
  );
};
