import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import { Dashboard } from '@ui/pages/Dashboard';
import './index.css';

const container = document.getElementById('root');
if (!container) throw new Error('Missing #root element');

createRoot(container).render(
  <StrictMode>
    <Dashboard />
  </StrictMode>,
);
