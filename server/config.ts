export interface GatewayConfig {
  port: number;
  host: string;
  allowedOrigins: string[];
  production: boolean;
  /** Bearer key for the publish endpoints. */
  apiKeySecret: string;
  /** HS256 secret the dashboard's session tokens are signed with. */
  sessionTokenSecret: string;
  heartbeatIntervalMs: number;
  staleConnectionMs: number;
  maxWatchedSymbols: number;
}

// Dev servers are always allowed; production origins come from ALLOWED_ORIGINS.
const DEV_ORIGINS = [
  'http://localhost:5173',
  'http://localhost:5174',
  'http://127.0.0.1:5173',
  'http://127.0.0.1:5174',
];

function requireSecret(env: NodeJS.ProcessEnv, key: string): string {
  const value = String(env[key] || '').trim();
  if (!value) {
    throw new Error(`[config] Missing ${key}. Set it in .env before starting the gateway.`);
  }
  return value;
}

function positiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(String(raw || ''), 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadGatewayConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const extraOrigins = String(env.ALLOWED_ORIGINS || '')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

  return {
    port: positiveInt(env.PORT, 8000),
    host: String(env.HOST || '').trim() || '0.0.0.0',
    allowedOrigins: [...DEV_ORIGINS, ...extraOrigins],
    production: env.NODE_ENV === 'production',
    apiKeySecret: requireSecret(env, 'API_KEY_SECRET'),
    sessionTokenSecret: requireSecret(env, 'SESSION_TOKEN_SECRET'),
    heartbeatIntervalMs: positiveInt(env.HEARTBEAT_INTERVAL_MS, 30_000),
    staleConnectionMs: positiveInt(env.STALE_CONNECTION_MS, 90_000),
    maxWatchedSymbols: positiveInt(env.MAX_WATCHED_SYMBOLS, 50),
  };
}
