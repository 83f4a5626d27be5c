import { AvailabilityProbe, FetchLike, createAvailabilityProbe } from './availability';
import { ChannelConnection, ChannelHooks } from './ChannelConnection';
import { DEFAULT_REALTIME_TUNING, RealtimeConfig, RealtimeTuning } from './config';
import { RealtimeLog, consoleRealtimeLog, describeError } from './log';
import { SubscriberRegistry } from './SubscriberRegistry';
import {
  CHANNEL_NAMES,
  ChannelName,
  ConnectionState,
  ConnectionStatus,
  InboundMessage,
  TransportFactory,
} from './types';
import { WatchlistSynchronizer } from './WatchlistSynchronizer';

export type MessageCallback = (message: InboundMessage) => void;
export type StatusCallback = (status: ConnectionStatus) => void;

export interface RealtimeSubscribers {
  notification: MessageCallback;
  trading: MessageCallback;
  price: MessageCallback;
  status: StatusCallback;
}

type MessageConcern = Exclude<keyof RealtimeSubscribers, 'status'>;

const CHANNEL_CONCERN: Record<ChannelName, MessageConcern> = {
  notifications: 'notification',
  trading: 'trading',
  prices: 'price',
};

export interface RealtimeHubOptions {
  config: RealtimeConfig;
  createTransport: TransportFactory;
  fetchImpl?: FetchLike;
  /** Overrides the health-endpoint probe built from config + fetchImpl. */
  probe?: AvailabilityProbe;
  tuning?: Partial<RealtimeTuning>;
  log?: RealtimeLog;
}

/**
 * The three realtime channels (prices, trading, notifications) behind one
 * object.  Created once by the application's composition root and passed
 * down; `initialize` on login, `disconnectAll` on logout or unmount.
 *
 * Callers never see transport exceptions.  Failures are reported through
 * the connection-status subscriber as a full per-channel triple.
 */
export class RealtimeHub {
  private readonly channels = new Map<ChannelName, ChannelConnection>();
  private readonly subscribers: SubscriberRegistry<RealtimeSubscribers>;
  private readonly watchlist: WatchlistSynchronizer;
  private readonly probe: AvailabilityProbe;
  private readonly tuning: RealtimeTuning;
  private readonly log: RealtimeLog;

  private credential: string | null = null;
  private enabled = true;
  // Bumped by every teardown so a slow availability probe cannot resurrect
  // connections the caller has since closed or replaced.
  private generation = 0;

  constructor(private readonly options: RealtimeHubOptions) {
    this.tuning = { ...DEFAULT_REALTIME_TUNING, ...options.tuning };
    this.log = options.log ?? consoleRealtimeLog;
    this.subscribers = new SubscriberRegistry<RealtimeSubscribers>((concern) => {
      this.log('debug', 'SUBSCRIBER_REPLACED', { concern });
    });
    this.probe = options.probe ?? createAvailabilityProbe({
      apiBaseUrl: options.config.apiBaseUrl,
      enabled: options.config.healthCheckEnabled,
      timeoutMs: this.tuning.availabilityTimeoutMs,
      fetchImpl: options.fetchImpl ?? ((input, init) => fetch(input, init)),
      log: this.log,
    });

    const hooks: ChannelHooks = {
      onStateChange: (channel, state) => {
        if (channel === 'prices' && state === ConnectionState.CONNECTED) {
          this.watchlist.announce();
        }
        this.emitStatus();
      },
      onMessage: (channel, message) => this.dispatch(channel, message),
      onRetriesExhausted: (channel) => {
        void this.recheckAvailability(channel);
      },
      isEnabled: () => this.enabled,
    };

    for (const name of CHANNEL_NAMES) {
      this.channels.set(name, new ChannelConnection({
        name,
        resolveUrl: () => this.endpointFor(name),
        createTransport: options.createTransport,
        reconnect: {
          baseIntervalMs: this.tuning.baseReconnectIntervalMs,
          maxIntervalMs: this.tuning.maxReconnectIntervalMs,
          decay: this.tuning.reconnectDecay,
          maxAttempts: this.tuning.maxReconnectAttempts,
        },
        heartbeatIntervalMs: this.tuning.heartbeatIntervalMs,
        hooks,
        log: this.log,
      }));
    }

    this.watchlist = new WatchlistSynchronizer({
      channel: this.channel('prices'),
      markets: this.tuning.markets,
      pushIntervalMs: this.tuning.watchlistPushIntervalMs,
      isEnabled: () => this.enabled,
      log: this.log,
    });
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Tears down existing sockets, stores the credential and, once the
   * gateway answers the availability probe, opens all three channels.
   * Resolves to whether the gateway was considered available.
   */
  async initialize(credential: string): Promise<boolean> {
    if (!credential) {
      this.log('error', 'INITIALIZE_WITHOUT_CREDENTIAL');
      return false;
    }

    this.disconnectAll();
    const generation = this.generation;
    this.credential = credential;
    this.enabled = true;

    const available = await this.probe();
    if (generation !== this.generation) {
      this.log('debug', 'INITIALIZE_SUPERSEDED');
      return available;
    }

    if (!available) {
      this.log('warn', 'GATEWAY_UNAVAILABLE_DISABLING');
      this.disableAll();
      return false;
    }

    this.resetReconnectCounters();
    this.connectAll();
    return true;
  }

  reconnectAll(): void {
    this.resetReconnectCounters();
    this.connectAll();
  }

  disconnectAll(): void {
    this.generation++;
    this.watchlist.stop();
    for (const channel of this.channels.values()) {
      channel.disconnect();
    }
  }

  disableAll(): void {
    this.enabled = false;
    this.generation++;
    this.watchlist.stop();
    for (const channel of this.channels.values()) {
      channel.disable();
    }
  }

  // ---------------------------------------------------------------------------
  // Status
  // ---------------------------------------------------------------------------

  getConnectionStatus(): ConnectionStatus {
    return {
      notifications: this.channel('notifications').getState(),
      trading: this.channel('trading').getState(),
      prices: this.channel('prices').getState(),
    };
  }

  isConnected(): boolean {
    for (const channel of this.channels.values()) {
      if (channel.getState() === ConnectionState.CONNECTED) {
        return true;
      }
    }
    return false;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  getChannel(name: ChannelName): ChannelConnection {
    return this.channel(name);
  }

  // ---------------------------------------------------------------------------
  // Subscriptions (one callback per concern, last writer wins)
  // ---------------------------------------------------------------------------

  subscribeNotifications(callback: MessageCallback): void {
    this.subscribers.subscribe('notification', callback);
  }

  unsubscribeNotifications(callback: MessageCallback): boolean {
    return this.subscribers.unsubscribe('notification', callback);
  }

  subscribeTradingUpdates(callback: MessageCallback): void {
    this.subscribers.subscribe('trading', callback);
  }

  unsubscribeTradingUpdates(callback: MessageCallback): boolean {
    return this.subscribers.unsubscribe('trading', callback);
  }

  subscribePriceUpdates(callback: MessageCallback): void {
    this.subscribers.subscribe('price', callback);
  }

  unsubscribePriceUpdates(callback: MessageCallback): boolean {
    return this.subscribers.unsubscribe('price', callback);
  }

  subscribeConnectionStatus(callback: StatusCallback): void {
    this.subscribers.subscribe('status', callback);
  }

  unsubscribeConnectionStatus(callback: StatusCallback): boolean {
    return this.subscribers.unsubscribe('status', callback);
  }

  // ---------------------------------------------------------------------------
  // Watchlist
  // ---------------------------------------------------------------------------

  updateWatchedSymbols(symbols: readonly string[]): void {
    this.watchlist.update(symbols);
  }

  getWatchedSymbols(): string[] {
    return this.watchlist.getSymbols();
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private channel(name: ChannelName): ChannelConnection {
    const channel = this.channels.get(name);
    if (!channel) {
      throw new Error(`[realtime] Unknown channel: ${name}`);
    }
    return channel;
  }

  private endpointFor(name: ChannelName): string | null {
    if (!this.credential) {
      return null;
    }
    return `${this.options.config.wsBaseUrl}/ws/${name}/${encodeURIComponent(this.credential)}`;
  }

  private connectAll(): void {
    for (const channel of this.channels.values()) {
      channel.connect();
    }
    this.watchlist.resume();
  }

  private resetReconnectCounters(): void {
    for (const channel of this.channels.values()) {
      channel.resetBackoff();
    }
  }

  private dispatch(channel: ChannelName, message: InboundMessage): void {
    const callback = this.subscribers.get(CHANNEL_CONCERN[channel]);
    callback?.(message);
  }

  private emitStatus(): void {
    const callback = this.subscribers.get('status');
    if (!callback) return;
    try {
      callback(this.getConnectionStatus());
    } catch (error) {
      this.log('error', 'SUBSCRIBER_FAILED', { concern: 'status', error: describeError(error) });
    }
  }

  private async recheckAvailability(channel: ChannelName): Promise<void> {
    const generation = this.generation;
    this.log('warn', 'RETRIES_EXHAUSTED_RECHECKING', { channel });

    const available = await this.probe();
    if (generation !== this.generation) {
      return;
    }
    if (!available) {
      this.log('warn', 'GATEWAY_UNAVAILABLE_DISABLING', { channel });
      this.disableAll();
    }
  }
}
