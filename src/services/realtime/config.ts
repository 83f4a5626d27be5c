export interface RealtimeConfig {
  apiBaseUrl: string;
  wsBaseUrl: string;
  healthCheckEnabled: boolean;
}

export interface RealtimeTuning {
  baseReconnectIntervalMs: number;
  maxReconnectIntervalMs: number;
  reconnectDecay: number;
  maxReconnectAttempts: number;
  heartbeatIntervalMs: number;
  watchlistPushIntervalMs: number;
  availabilityTimeoutMs: number;
  markets: readonly string[];
}

export const DEFAULT_REALTIME_TUNING: RealtimeTuning = {
  baseReconnectIntervalMs: 2_000,
  maxReconnectIntervalMs: 30_000,
  reconnectDecay: 1.5,
  maxReconnectAttempts: 3,
  heartbeatIntervalMs: 30_000,
  watchlistPushIntervalMs: 5_000,
  availabilityTimeoutMs: 3_000,
  markets: ['KR', 'US'],
};

const DEFAULT_API_URL = 'http://localhost:8000';
const DEFAULT_WS_PORT = '8000';

function stripTrailingSlash(value: string): string {
  return value.replace(/\/+$/g, '');
}

/**
 * Realtime sockets live on the API host with the scheme swapped
 * (http → ws, https → wss).  Port 80 means "no explicit port".
 */
export function deriveWebSocketBase(apiBaseUrl: string, wsPort: string): string {
  const url = new URL(apiBaseUrl);
  const protocol = url.protocol === 'https:' ? 'wss:' : 'ws:';
  const port = wsPort.trim();
  if (!port || port === '80') {
    return `${protocol}//${url.hostname}`;
  }
  return `${protocol}//${url.hostname}:${port}`;
}

export function loadRealtimeConfig(): RealtimeConfig {
  const apiBaseUrl = stripTrailingSlash(String(import.meta.env.VITE_API_URL || '').trim() || DEFAULT_API_URL);
  const wsPort = String(import.meta.env.VITE_WS_PORT || '').trim() || DEFAULT_WS_PORT;

  return {
    apiBaseUrl,
    wsBaseUrl: deriveWebSocketBase(apiBaseUrl, wsPort),
    healthCheckEnabled: String(import.meta.env.VITE_ENABLE_HEALTH_CHECK || '').trim() === 'true',
  };
}
