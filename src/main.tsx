import React from 'react';
import { createRoot } from 'react-dom/client';
import { configure } from 'mobx';
import App from './App';
import { Log } from './utils/Log';

configure({ enforceActions: 'observed' });
Log.enabled = import.meta.env.DEV;

const container = document.getElementById('root');
if (container) {
  createRoot(container).render(
    <React.StrictMode>
      <App />
    </React.StrictMode>
  );
}
