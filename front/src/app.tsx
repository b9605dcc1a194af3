import React from 'react';
import { BrowserRouter } from 'react-router-dom';
import { AppRouter } from './router/router.component';

export const App: React.FC = () => {
  return (
    <BrowserRouter>
      <AppRouter />
    </BrowserRouter>
  );
};
