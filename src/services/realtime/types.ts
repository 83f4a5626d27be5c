// Shared types for the realtime channels.  Field names on the wire
// follow the gateway (snake_case), so they are kept as-is here.

export type ChannelName = 'notifications' | 'trading' | 'prices';

export const CHANNEL_NAMES: readonly ChannelName[] = ['notifications', 'trading', 'prices'];

export const ConnectionState = {
  DISCONNECTED: 'disconnected',
  CONNECTING: 'connecting',
  CONNECTED: 'connected',
  RECONNECTING: 'reconnecting',
  ERROR: 'error',
  DISABLED: 'disabled',
} as const;

export type ConnectionState = (typeof ConnectionState)[keyof typeof ConnectionState];

/** Per-channel states, always reported as a full triple. */
export type ConnectionStatus = Record<ChannelName, ConnectionState>;

// -----------------------------------------------------------------------------
// Inbound frames
// -----------------------------------------------------------------------------

export interface HeartbeatFrame {
  type: 'ping' | 'pong';
}

export interface PriceQuote {
  price: number;
  change: number;
  change_percent: number;
  symbol?: string;
  market?: string;
  timestamp?: string;
}

export type PriceMap = Record<string, PriceQuote>;

// Inbound message shapes are object type aliases (not interfaces) so they
// stay assignable to the open InboundMessage record.

export type PriceUpdateMessage = {
  type: 'price_update';
  data: PriceMap;
  timestamp?: string;
};

export type TradingUpdateKind = 'order_executed' | 'cycle_completed' | 'status' | 'system_status';

export type TradingUpdateMessage = {
  type: 'trading_update';
  update_type: TradingUpdateKind | string;
  data: Record<string, unknown>;
  timestamp?: string;
};

export type NotificationKind = 'info' | 'success' | 'warning' | 'error' | 'trade';

export type NotificationMessage = {
  type: 'notification';
  message: string;
  notification_type: NotificationKind | string;
  data?: Record<string, unknown> | null;
  timestamp?: string;
};

/**
 * Any JSON object received on a channel.  Everything that is not a
 * heartbeat reaches subscribers verbatim; use the guards in `messages.ts`
 * to narrow to the known shapes.
 */
export type InboundMessage = {
  type?: unknown;
  [key: string]: unknown;
};

// -----------------------------------------------------------------------------
// Outbound frames
// -----------------------------------------------------------------------------

export interface WatchedSymbolsFrame {
  type: 'update_watched_symbols';
  symbols: string[];
  markets: string[];
}

export interface PriceRefreshFrame {
  symbols: string[];
  markets: string[];
}

export type OutboundFrame = HeartbeatFrame | WatchedSymbolsFrame | PriceRefreshFrame;

// -----------------------------------------------------------------------------
// Transport seam
// -----------------------------------------------------------------------------

/**
 * The subset of the browser WebSocket the channels rely on, so tests can
 * substitute an in-memory transport.
 */
export interface RealtimeTransport {
  readonly readyState: number;
  onopen: ((event: Event) => void) | null;
  onmessage: ((event: MessageEvent) => void) | null;
  onclose: ((event: CloseEvent) => void) | null;
  onerror: ((event: Event) => void) | null;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export type TransportFactory = (url: string) => RealtimeTransport;

/** WebSocket readyState values. */
export const TransportReadyState = {
  CONNECTING: 0,
  OPEN: 1,
  CLOSING: 2,
  CLOSED: 3,
} as const;
