import { RealtimeLog } from './log';
import { ConnectionState, OutboundFrame } from './types';

/** The slice of the price channel the synchronizer drives. */
export interface WatchlistChannel {
  getState(): ConnectionState;
  isOpen(): boolean;
  send(frame: OutboundFrame): boolean;
  connect(): void;
}

export interface WatchlistSynchronizerOptions {
  channel: WatchlistChannel;
  markets: readonly string[];
  pushIntervalMs: number;
  isEnabled: () => boolean;
  log: RealtimeLog;
}

export function dedupeSymbols(symbols: readonly string[]): string[] {
  const unique = new Set<string>();
  for (const raw of symbols) {
    const symbol = String(raw ?? '').trim();
    if (symbol) {
      unique.add(symbol);
    }
  }
  return [...unique];
}

/**
 * Holds the watched symbols for the price channel and keeps the gateway
 * in sync: an immediate replace command on every update, then a refresh
 * request on a fixed period while the set is non-empty.
 */
export class WatchlistSynchronizer {
  private symbols: string[] = [];
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly options: WatchlistSynchronizerOptions) {}

  getSymbols(): string[] {
    return [...this.symbols];
  }

  isPushing(): boolean {
    return this.timer !== null;
  }

  update(symbols: readonly string[]): void {
    if (!this.options.isEnabled()) {
      return;
    }

    this.symbols = dedupeSymbols(symbols);
    const { channel } = this.options;

    if (this.symbols.length > 0 && channel.isOpen()) {
      channel.send({
        type: 'update_watched_symbols',
        symbols: [...this.symbols],
        markets: [...this.options.markets],
      });
    }

    this.restartTimer();

    const state = channel.getState();
    if (
      state !== ConnectionState.CONNECTED &&
      state !== ConnectionState.CONNECTING &&
      state !== ConnectionState.DISABLED
    ) {
      this.options.log('info', 'WATCHLIST_RECONNECT_PRICE_CHANNEL', { state });
      channel.connect();
    }
  }

  /**
   * Re-sends the replace command for the stored set.  Called whenever the
   * price channel (re)opens, since the gateway forgets the set per socket.
   */
  announce(): boolean {
    if (!this.options.isEnabled() || this.symbols.length === 0 || !this.options.channel.isOpen()) {
      return false;
    }
    return this.options.channel.send({
      type: 'update_watched_symbols',
      symbols: [...this.symbols],
      markets: [...this.options.markets],
    });
  }

  /** Restarts the periodic push for the stored set after a reconnect. */
  resume(): void {
    if (!this.options.isEnabled()) {
      return;
    }
    this.restartTimer();
  }

  /** Stops the periodic push; the symbol set is kept. */
  stop(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private restartTimer(): void {
    this.stop();
    if (this.symbols.length === 0) {
      return;
    }
    this.timer = setInterval(() => this.push(), this.options.pushIntervalMs);
  }

  private push(): void {
    if (this.symbols.length === 0 || !this.options.channel.isOpen()) {
      return;
    }
    this.options.channel.send({
      symbols: [...this.symbols],
      markets: [...this.options.markets],
    });
  }
}
