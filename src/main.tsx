import React from 'react';
import ReactDOM from 'react-dom/client';
import Dashboard from './components/Dashboard';
import { SessionRequired } from './components/SessionRequired';
import { RealtimeProvider } from './context/RealtimeContext';
import { RealtimeHub, loadRealtimeConfig } from './services/realtime';

// Session token written by the login flow.
const TOKEN_KEY = 'auth_token';

const hub = new RealtimeHub({
  config: loadRealtimeConfig(),
  createTransport: (url) => new WebSocket(url),
});

const token = localStorage.getItem(TOKEN_KEY);

ReactDOM.createRoot(document.getElementById('root') as HTMLElement).render(
  <React.StrictMode>
    {token ? (
      <RealtimeProvider hub={hub} token={token}>
        <Dashboard />
      </RealtimeProvider>
    ) : (
      <SessionRequired tokenKey={TOKEN_KEY} loginUrl="/login" />
    )}
  </React.StrictMode>
);
