import { afterEach, describe, expect, it, vi } from 'vitest';

import { deriveWebSocketBase, loadRealtimeConfig } from './config';

describe('deriveWebSocketBase', () => {
  it('swaps http for ws and keeps the configured port', () => {
    expect(deriveWebSocketBase('http://localhost:8000', '8000')).toBe('ws://localhost:8000');
  });

  it('uses wss for an https API', () => {
    expect(deriveWebSocketBase('https://api.example.com', '443')).toBe('wss://api.example.com:443');
  });

  it('omits port 80', () => {
    expect(deriveWebSocketBase('http://dashboard.local', '80')).toBe('ws://dashboard.local');
  });
});

describe('loadRealtimeConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('falls back to the local gateway when nothing is configured', () => {
    vi.stubEnv('VITE_API_URL', '');
    vi.stubEnv('VITE_WS_PORT', '');
    vi.stubEnv('VITE_ENABLE_HEALTH_CHECK', '');

    expect(loadRealtimeConfig()).toEqual({
      apiBaseUrl: 'http://localhost:8000',
      wsBaseUrl: 'ws://localhost:8000',
      healthCheckEnabled: false,
    });
  });

  it('reads the API URL, socket port and probe flag from the environment', () => {
    vi.stubEnv('VITE_API_URL', 'https://api.test/');
    vi.stubEnv('VITE_WS_PORT', '9443');
    vi.stubEnv('VITE_ENABLE_HEALTH_CHECK', 'true');

    expect(loadRealtimeConfig()).toEqual({
      apiBaseUrl: 'https://api.test',
      wsBaseUrl: 'wss://api.test:9443',
      healthCheckEnabled: true,
    });
  });

  it('only enables the probe for the exact value "true"', () => {
    vi.stubEnv('VITE_ENABLE_HEALTH_CHECK', 'yes');

    expect(loadRealtimeConfig().healthCheckEnabled).toBe(false);
  });
});
