import { HeartbeatMonitor } from './HeartbeatMonitor';
import { RealtimeLog, RealtimeLogLevel, describeError } from './log';
import { ReconnectPolicy, ReconnectScheduler } from './ReconnectScheduler';
import {
  ChannelName,
  ConnectionState,
  InboundMessage,
  OutboundFrame,
  RealtimeTransport,
  TransportFactory,
  TransportReadyState,
} from './types';

export const NORMAL_CLOSE_CODE = 1000;
export const NORMAL_CLOSE_REASON = 'Client closed the connection';

export interface ChannelHooks {
  onStateChange(channel: ChannelName, state: ConnectionState): void;
  onMessage(channel: ChannelName, message: InboundMessage): void;
  /** Called when a socket errors after the retry budget is already spent. */
  onRetriesExhausted(channel: ChannelName): void;
  isEnabled(): boolean;
}

export interface ChannelConnectionOptions {
  name: ChannelName;
  /** Full endpoint URL, or null when there is no credential yet. */
  resolveUrl: () => string | null;
  createTransport: TransportFactory;
  reconnect: ReconnectPolicy;
  heartbeatIntervalMs: number;
  hooks: ChannelHooks;
  log: RealtimeLog;
}

function isInboundMessage(value: unknown): value is InboundMessage {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Owns at most one transport for a single channel and drives its
 * lifecycle:
 *
 *   DISCONNECTED --connect--> CONNECTING --open--> CONNECTED
 *   CONNECTING/CONNECTED --error--> ERROR --retry--> RECONNECTING --timer--> CONNECTING
 *   CONNECTED --close(normal)--> DISCONNECTED
 *   any --retries spent--> ERROR,  any --disable--> DISABLED
 *
 * Transport faults never escape as exceptions; they show up as state
 * transitions and log lines.
 */
export class ChannelConnection {
  readonly name: ChannelName;

  private state: ConnectionState = ConnectionState.DISCONNECTED;
  private transport: RealtimeTransport | null = null;
  private readonly scheduler: ReconnectScheduler;
  private readonly heartbeat: HeartbeatMonitor;

  constructor(private readonly options: ChannelConnectionOptions) {
    this.name = options.name;
    this.scheduler = new ReconnectScheduler(options.reconnect);
    this.heartbeat = new HeartbeatMonitor(options.heartbeatIntervalMs);
  }

  getState(): ConnectionState {
    return this.state;
  }

  getReconnectAttempts(): number {
    return this.scheduler.getAttempts();
  }

  getReconnectIntervalMs(): number {
    return this.scheduler.getIntervalMs();
  }

  hasPendingReconnect(): boolean {
    return this.scheduler.isPending();
  }

  isHeartbeatRunning(): boolean {
    return this.heartbeat.isRunning();
  }

  isOpen(): boolean {
    return this.transport !== null && this.transport.readyState === TransportReadyState.OPEN;
  }

  connect(): void {
    if (!this.options.hooks.isEnabled()) {
      this.log('debug', 'CONNECT_SKIPPED_DISABLED');
      return;
    }
    if (this.state === ConnectionState.CONNECTING || this.state === ConnectionState.CONNECTED) {
      return;
    }

    const url = this.options.resolveUrl();
    if (!url) {
      this.log('warn', 'CONNECT_SKIPPED_NO_CREDENTIAL');
      return;
    }

    // A retry can fire while a socket that errored without closing is still around.
    this.releaseTransport();
    this.setState(ConnectionState.CONNECTING);

    try {
      const transport = this.options.createTransport(url);
      this.transport = transport;
      transport.onopen = () => this.handleOpen(transport);
      transport.onmessage = (event) => this.handleMessage(transport, event);
      transport.onclose = (event) => this.handleClose(transport, event);
      transport.onerror = () => this.handleError(transport);
    } catch (error) {
      this.log('error', 'CONNECT_FAILED', { error: describeError(error) });
      this.transport = null;
      this.setState(ConnectionState.ERROR);
      this.scheduleReconnect();
    }
  }

  disconnect(): void {
    this.teardown();
    this.setState(ConnectionState.DISCONNECTED);
  }

  /** Terminal until the owning hub is initialized again. */
  disable(): void {
    this.scheduler.reset();
    this.teardown();
    this.setState(ConnectionState.DISABLED);
  }

  resetBackoff(): void {
    this.scheduler.reset();
  }

  /** Serializes and sends when open; otherwise logs and returns false. */
  send(frame: OutboundFrame): boolean {
    const transport = this.transport;
    if (!transport || transport.readyState !== TransportReadyState.OPEN) {
      this.log('warn', 'SEND_SKIPPED_NOT_OPEN', { state: this.state });
      return false;
    }
    try {
      transport.send(JSON.stringify(frame));
      return true;
    } catch (error) {
      this.log('error', 'SEND_FAILED', { error: describeError(error) });
      return false;
    }
  }

  private handleOpen(transport: RealtimeTransport): void {
    if (transport !== this.transport) return;

    this.log('info', 'CONNECTED');
    this.setState(ConnectionState.CONNECTED);
    this.scheduler.reset();
    this.heartbeat.start(() => {
      this.send({ type: 'ping' });
    });
  }

  private handleMessage(transport: RealtimeTransport, event: MessageEvent): void {
    if (transport !== this.transport) return;

    let payload: unknown;
    try {
      payload = JSON.parse(String(event.data));
    } catch (error) {
      this.log('warn', 'MESSAGE_PARSE_FAILED', { error: describeError(error) });
      return;
    }

    if (!isInboundMessage(payload)) {
      this.log('warn', 'MESSAGE_NOT_AN_OBJECT', { payloadType: typeof payload });
      return;
    }

    if (payload.type === 'ping') {
      this.send({ type: 'pong' });
      return;
    }
    if (payload.type === 'pong') {
      return;
    }

    try {
      this.options.hooks.onMessage(this.name, payload);
    } catch (error) {
      this.log('error', 'SUBSCRIBER_FAILED', { error: describeError(error) });
    }
  }

  private handleClose(transport: RealtimeTransport, event: CloseEvent): void {
    if (transport !== this.transport) return;

    this.heartbeat.stop();
    this.detach(transport);
    this.transport = null;
    this.log('info', 'CLOSED', { code: event.code, reason: event.reason });

    if (event.code === NORMAL_CLOSE_CODE && event.reason === NORMAL_CLOSE_REASON) {
      this.setState(ConnectionState.DISCONNECTED);
      return;
    }

    // Browsers fire error before close; the error already booked this retry.
    if (this.scheduler.isPending()) {
      this.setState(ConnectionState.RECONNECTING);
      return;
    }

    if (this.scheduler.isExhausted()) {
      this.log('warn', 'RECONNECT_BUDGET_EXHAUSTED', { attempts: this.scheduler.getAttempts() });
      this.setState(ConnectionState.ERROR);
      return;
    }

    this.setState(ConnectionState.RECONNECTING);
    this.scheduleReconnect();
  }

  private handleError(transport: RealtimeTransport): void {
    if (transport !== this.transport) return;

    this.log('warn', 'SOCKET_ERROR', { attempts: this.scheduler.getAttempts() });
    const exhausted = this.scheduler.isExhausted();
    this.setState(ConnectionState.ERROR);
    this.scheduleReconnect();

    if (exhausted) {
      this.options.hooks.onRetriesExhausted(this.name);
    }
  }

  private scheduleReconnect(): void {
    const delayMs = this.scheduler.schedule(() => this.connect());
    if (delayMs === null) {
      this.log('warn', 'RECONNECT_BUDGET_EXHAUSTED', { attempts: this.scheduler.getAttempts() });
      this.setState(ConnectionState.ERROR);
      return;
    }
    this.log('info', 'RECONNECT_SCHEDULED', {
      attempt: this.scheduler.getAttempts(),
      delayMs,
    });
  }

  private teardown(): void {
    this.scheduler.cancel();
    this.heartbeat.stop();
    this.releaseTransport();
  }

  private releaseTransport(): void {
    const transport = this.transport;
    if (!transport) return;

    this.transport = null;
    this.detach(transport);
    if (transport.readyState === TransportReadyState.OPEN) {
      try {
        transport.close(NORMAL_CLOSE_CODE, NORMAL_CLOSE_REASON);
      } catch (error) {
        this.log('warn', 'CLOSE_FAILED', { error: describeError(error) });
      }
    }
  }

  private detach(transport: RealtimeTransport): void {
    transport.onopen = null;
    transport.onmessage = null;
    transport.onclose = null;
    transport.onerror = null;
  }

  private setState(next: ConnectionState): void {
    if (this.state === next) return;
    this.state = next;
    this.options.hooks.onStateChange(this.name, next);
  }

  private log(level: RealtimeLogLevel, event: string, context: Record<string, unknown> = {}): void {
    this.options.log(level, `CHANNEL_${event}`, { channel: this.name, ...context });
  }
}
