import { RawData, WebSocket } from 'ws';
import { Market, PriceBook, QuoteInput, inferMarket, normalizeSymbol } from '../prices/PriceBook';
import { Logger, serializeError } from '../utils/logger';

export const GATEWAY_CHANNELS = ['prices', 'trading', 'notifications'] as const;
export type GatewayChannel = (typeof GATEWAY_CHANNELS)[number];

export function isGatewayChannel(value: string): value is GatewayChannel {
  return GATEWAY_CHANNELS.some((channel) => channel === value);
}

type LifecycleReason = 'close' | 'error' | 'stale' | 'terminated';

/** The part of a `ws` socket the hub drives. */
export interface HubSocket {
  readonly readyState: number;
  send(data: string): void;
  terminate(): void;
  on(event: 'message', listener: (data: RawData) => void): this;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
}

type HubDeps = {
  priceBook: PriceBook;
  log: Logger;
  heartbeatIntervalMs?: number;
  staleConnectionMs?: number;
  maxWatchedSymbols?: number;
  now?: () => number;
};

type ConnectionContext = {
  subject: string;
  remoteAddress?: string | null;
};

type ClientState = {
  channel: GatewayChannel;
  subject: string;
  remoteAddress: string | null;
  lastSeenAt: number;
  watched: Set<string>;
  markets: Set<Market>;
};

const DEFAULT_HEARTBEAT_INTERVAL_MS = 30_000;
const DEFAULT_STALE_CONNECTION_MS = 90_000;
const DEFAULT_MAX_WATCHED_SYMBOLS = 50;
const DEFAULT_MARKETS: Market[] = ['KR'];

const WELCOME_MESSAGES: Record<GatewayChannel, string> = {
  prices: 'Connected to realtime price updates.',
  trading: 'Connected to trading status updates.',
  notifications: 'Connected to notifications.',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeFrame(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

function parseMarkets(raw: unknown): Set<Market> {
  const markets = new Set<Market>();
  if (Array.isArray(raw)) {
    for (const value of raw) {
      const market = normalizeSymbol(value);
      if (market === 'KR' || market === 'US') {
        markets.add(market);
      }
    }
  }
  return markets.size > 0 ? markets : new Set(DEFAULT_MARKETS);
}

/**
 * Server side of the three realtime channels.  Keeps one record per
 * socket, sweeps for dead peers, answers heartbeat and watchlist frames,
 * and fans published updates out to the sockets of a channel.
 */
export class ChannelHub {
  private readonly clients = new Map<HubSocket, ClientState>();
  private readonly heartbeatIntervalMs: number;
  private readonly staleConnectionMs: number;
  private readonly maxWatchedSymbols: number;
  private readonly now: () => number;
  private readonly timer: NodeJS.Timeout;

  constructor(private readonly deps: HubDeps) {
    this.heartbeatIntervalMs = Math.max(1_000, deps.heartbeatIntervalMs || DEFAULT_HEARTBEAT_INTERVAL_MS);
    this.staleConnectionMs = Math.max(this.heartbeatIntervalMs * 2, deps.staleConnectionMs || DEFAULT_STALE_CONNECTION_MS);
    this.maxWatchedSymbols = Math.max(1, deps.maxWatchedSymbols || DEFAULT_MAX_WATCHED_SYMBOLS);
    this.now = deps.now ?? Date.now;
    this.timer = setInterval(() => this.sweep(), this.heartbeatIntervalMs);
  }

  registerClient(channel: GatewayChannel, socket: HubSocket, context: ConnectionContext): void {
    const client: ClientState = {
      channel,
      subject: context.subject,
      remoteAddress: context.remoteAddress || null,
      lastSeenAt: this.now(),
      watched: new Set(),
      markets: new Set(DEFAULT_MARKETS),
    };
    this.clients.set(socket, client);

    socket.on('message', (data) => {
      this.handleFrame(socket, client, decodeFrame(data));
    });

    socket.on('close', (code, reasonBuffer) => {
      this.cleanupClient(socket, 'close', {
        code,
        closeReason: reasonBuffer?.toString() || '',
      });
    });

    socket.on('error', (error) => {
      this.deps.log.warn('WS_CLIENT_ERROR', {
        channel,
        subject: client.subject,
        error: serializeError(error),
      });
      this.cleanupClient(socket, 'error');
    });

    this.deps.log.info('WS_CLIENT_JOIN', {
      channel,
      subject: client.subject,
      remoteAddress: client.remoteAddress,
      activeClients: this.getClientCount(channel),
    });

    this.sendTo(socket, {
      type: 'connection_established',
      channel,
      message: WELCOME_MESSAGES[channel],
      timestamp: this.timestamp(),
    });
  }

  getClientCount(channel?: GatewayChannel): number {
    if (!channel) {
      return this.clients.size;
    }
    let count = 0;
    for (const client of this.clients.values()) {
      if (client.channel === channel) {
        count++;
      }
    }
    return count;
  }

  /** Union of every price client's watchlist. */
  getRequiredSymbols(): string[] {
    const symbols = new Set<string>();
    for (const client of this.clients.values()) {
      for (const symbol of client.watched) {
        symbols.add(symbol);
      }
    }
    return [...symbols].sort();
  }

  broadcast(channel: GatewayChannel, payload: Record<string, unknown>): number {
    const frame = JSON.stringify(payload);
    let sent = 0;

    for (const [socket, client] of [...this.clients]) {
      if (client.channel !== channel || socket.readyState !== WebSocket.OPEN) {
        continue;
      }
      if (this.sendRaw(socket, frame)) {
        sent++;
      }
    }

    return sent;
  }

  /**
   * Records the quotes and sends each price client the updated symbols it
   * watches.  Returns the number of clients that received a frame.
   */
  publishPrices(inputs: QuoteInput[]): number {
    const updated = new Set<string>();
    for (const input of inputs) {
      updated.add(this.deps.priceBook.upsert(input).symbol);
    }

    let sent = 0;
    for (const [socket, client] of [...this.clients]) {
      if (client.channel !== 'prices' || socket.readyState !== WebSocket.OPEN) {
        continue;
      }
      const symbols = [...client.watched].filter((symbol) => updated.has(symbol));
      if (symbols.length === 0) {
        continue;
      }
      if (this.sendPrices(socket, symbols, client.markets)) {
        sent++;
      }
    }
    return sent;
  }

  /** Pings live peers and terminates the ones silent past the stale limit. */
  sweep(): void {
    const now = this.now();
    const ping = JSON.stringify({ type: 'ping', timestamp: this.timestamp() });

    for (const [socket, client] of [...this.clients]) {
      if (socket.readyState === WebSocket.CLOSED) {
        this.cleanupClient(socket, 'close');
        continue;
      }

      if (socket.readyState !== WebSocket.OPEN) {
        continue;
      }

      const silentForMs = now - client.lastSeenAt;
      if (silentForMs > this.staleConnectionMs) {
        this.deps.log.warn('WS_CLIENT_STALE_CLOSE', {
          channel: client.channel,
          subject: client.subject,
          staleForMs: silentForMs,
        });
        try {
          socket.terminate();
        } finally {
          this.cleanupClient(socket, 'stale');
        }
        continue;
      }

      this.sendRaw(socket, ping);
    }
  }

  shutdown(): void {
    clearInterval(this.timer);
    for (const socket of [...this.clients.keys()]) {
      try {
        if (socket.readyState === WebSocket.OPEN || socket.readyState === WebSocket.CONNECTING) {
          socket.terminate();
        }
      } catch (error) {
        this.deps.log.warn('WS_CLIENT_TERMINATE_ERROR', { error: serializeError(error) });
      } finally {
        this.cleanupClient(socket, 'terminated');
      }
    }
  }

  private handleFrame(socket: HubSocket, client: ClientState, raw: string): void {
    client.lastSeenAt = this.now();

    let frame: unknown;
    try {
      frame = JSON.parse(raw);
    } catch {
      frame = null;
    }

    if (!isRecord(frame)) {
      this.deps.log.warn('WS_CLIENT_BAD_FRAME', { channel: client.channel, subject: client.subject });
      this.sendTo(socket, {
        type: 'error',
        message: 'Invalid message format. Send a JSON object.',
        timestamp: this.timestamp(),
      });
      return;
    }

    if (frame.type === 'ping') {
      this.sendTo(socket, { type: 'pong', timestamp: this.timestamp() });
      return;
    }
    if (frame.type === 'pong') {
      return;
    }

    if (client.channel === 'prices' && frame.type === 'update_watched_symbols') {
      client.watched = this.normalizeSymbols(frame.symbols);
      client.markets = parseMarkets(frame.markets);
      this.deps.log.debug('WS_WATCHLIST_UPDATED', {
        subject: client.subject,
        symbols: [...client.watched],
        markets: [...client.markets],
      });
      this.sendPrices(socket, [...client.watched], client.markets);
      return;
    }

    if (client.channel === 'prices' && frame.type === undefined && Array.isArray(frame.symbols)) {
      this.sendPrices(socket, [...this.normalizeSymbols(frame.symbols)], parseMarkets(frame.markets));
      return;
    }

    this.deps.log.debug('WS_CLIENT_FRAME_IGNORED', { channel: client.channel, type: frame.type ?? null });
  }

  private sendPrices(socket: HubSocket, symbols: string[], markets: Set<Market>): boolean {
    const eligible = symbols.filter((symbol) => markets.has(inferMarket(symbol)));
    const data = this.deps.priceBook.snapshot(eligible);
    if (Object.keys(data).length === 0) {
      return false;
    }
    return this.sendTo(socket, { type: 'price_update', data, timestamp: this.timestamp() });
  }

  private sendTo(socket: HubSocket, payload: Record<string, unknown>): boolean {
    return this.sendRaw(socket, JSON.stringify(payload));
  }

  private sendRaw(socket: HubSocket, frame: string): boolean {
    try {
      socket.send(frame);
      return true;
    } catch (error) {
      this.deps.log.warn('WS_CLIENT_SEND_ERROR', { error: serializeError(error) });
      this.cleanupClient(socket, 'error');
      return false;
    }
  }

  private cleanupClient(socket: HubSocket, reason: LifecycleReason, detail: Record<string, unknown> = {}): void {
    const client = this.clients.get(socket);
    if (!client) {
      return;
    }

    this.clients.delete(socket);

    this.deps.log.info('WS_CLIENT_LEAVE', {
      channel: client.channel,
      subject: client.subject,
      reason,
      activeClients: this.getClientCount(client.channel),
      ...detail,
    });
  }

  private normalizeSymbols(raw: unknown): Set<string> {
    const normalized = new Set<string>();
    if (!Array.isArray(raw)) {
      return normalized;
    }
    for (const value of raw) {
      const symbol = normalizeSymbol(value);
      if (symbol) {
        normalized.add(symbol);
      }
      if (normalized.size >= this.maxWatchedSymbols) {
        break;
      }
    }
    return normalized;
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }
}
