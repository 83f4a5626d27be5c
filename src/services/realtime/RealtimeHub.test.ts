import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { FakeTransport, createFakeTransportFactory } from '../../test/FakeTransport';
import { AvailabilityProbe, FetchLike } from './availability';
import { RealtimeConfig } from './config';
import { RealtimeHub, StatusCallback } from './RealtimeHub';
import { ChannelName } from './types';

const CONFIG: RealtimeConfig = {
  apiBaseUrl: 'http://api.test',
  wsBaseUrl: 'ws://gw.test',
  healthCheckEnabled: false,
};

function setup(options: { probe?: AvailabilityProbe; config?: RealtimeConfig; fetchImpl?: FetchLike } = {}) {
  const { factory, created } = createFakeTransportFactory();
  const log = vi.fn();
  const hub = new RealtimeHub({
    config: options.config ?? CONFIG,
    createTransport: factory,
    fetchImpl: options.fetchImpl,
    probe: options.probe,
    log,
  });
  const latest = (channel: ChannelName): FakeTransport => {
    const matching = created.filter((transport) => transport.url.includes(`/ws/${channel}/`));
    return matching[matching.length - 1];
  };
  return { hub, created, latest, log };
}

async function flushMicrotasks(): Promise<void> {
  for (let i = 0; i < 5; i++) {
    await Promise.resolve();
  }
}

describe('RealtimeHub', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('initialize', () => {
    it('opens all three channels without fetching when probing is disabled', async () => {
      const fetchImpl = vi.fn<FetchLike>();
      const { hub, created } = setup({ fetchImpl });

      await expect(hub.initialize('test-token')).resolves.toBe(true);

      expect(fetchImpl).not.toHaveBeenCalled();
      expect(created.map((transport) => transport.url)).toEqual([
        'ws://gw.test/ws/notifications/test-token',
        'ws://gw.test/ws/trading/test-token',
        'ws://gw.test/ws/prices/test-token',
      ]);
    });

    it('probes the health endpoint when enabled', async () => {
      const fetchImpl = vi.fn<FetchLike>(async () => ({ ok: true, status: 200 }));
      const { hub, created } = setup({ fetchImpl, config: { ...CONFIG, healthCheckEnabled: true } });

      await hub.initialize('test-token');

      expect(fetchImpl).toHaveBeenCalledWith('http://api.test/api/health', expect.objectContaining({ method: 'GET' }));
      expect(created).toHaveLength(3);
    });

    it('escapes the credential in the endpoint path', async () => {
      const { hub, created } = setup();

      await hub.initialize('user 1');

      expect(created[0].url).toBe('ws://gw.test/ws/notifications/user%201');
    });

    it('refuses an empty credential', async () => {
      const probe = vi.fn<AvailabilityProbe>(async () => true);
      const { hub, created, log } = setup({ probe });

      await expect(hub.initialize('')).resolves.toBe(false);

      expect(probe).not.toHaveBeenCalled();
      expect(created).toHaveLength(0);
      expect(log).toHaveBeenCalledWith('error', 'INITIALIZE_WITHOUT_CREDENTIAL');
    });

    it('disables every channel when the gateway is unavailable', async () => {
      const { hub, created } = setup({ probe: async () => false });

      await expect(hub.initialize('test-token')).resolves.toBe(false);

      expect(created).toHaveLength(0);
      expect(hub.isEnabled()).toBe(false);
      expect(hub.getConnectionStatus()).toEqual({
        notifications: 'disabled',
        trading: 'disabled',
        prices: 'disabled',
      });

      hub.updateWatchedSymbols(['AAPL']);
      hub.reconnectAll();
      expect(hub.getWatchedSymbols()).toEqual([]);
      expect(created).toHaveLength(0);
    });

    it('re-enables a disabled hub on the next successful initialize', async () => {
      const probe = vi.fn<AvailabilityProbe>().mockResolvedValueOnce(false).mockResolvedValue(true);
      const { hub, created } = setup({ probe });

      await hub.initialize('test-token');
      await hub.initialize('test-token');

      expect(hub.isEnabled()).toBe(true);
      expect(created).toHaveLength(3);
    });

    it('does not open channels when torn down while the probe is in flight', async () => {
      let resolveProbe: (available: boolean) => void = () => {};
      const probe = vi.fn<AvailabilityProbe>(() => new Promise<boolean>((resolve) => {
        resolveProbe = resolve;
      }));
      const { hub, created } = setup({ probe });

      const pending = hub.initialize('test-token');
      hub.disconnectAll();
      resolveProbe(true);

      await expect(pending).resolves.toBe(true);
      expect(created).toHaveLength(0);
    });
  });

  describe('connection status', () => {
    it('reports the full triple on every transition', async () => {
      const { hub, latest } = setup();
      const onStatus = vi.fn<StatusCallback>();
      hub.subscribeConnectionStatus(onStatus);

      await hub.initialize('test-token');

      expect(onStatus.mock.calls).toEqual([
        [{ notifications: 'connecting', trading: 'disconnected', prices: 'disconnected' }],
        [{ notifications: 'connecting', trading: 'connecting', prices: 'disconnected' }],
        [{ notifications: 'connecting', trading: 'connecting', prices: 'connecting' }],
      ]);

      latest('trading').open();
      expect(onStatus).toHaveBeenLastCalledWith({ notifications: 'connecting', trading: 'connected', prices: 'connecting' });
      expect(hub.isConnected()).toBe(true);
    });

    it('keeps connecting when the status subscriber throws', async () => {
      const { hub, created, log } = setup();
      hub.subscribeConnectionStatus(() => {
        throw new Error('render failed');
      });

      await expect(hub.initialize('test-token')).resolves.toBe(true);

      expect(created).toHaveLength(3);
      expect(log).toHaveBeenCalledWith('error', 'SUBSCRIBER_FAILED', { concern: 'status', error: 'render failed' });
    });

    it('is not connected until some channel opens', async () => {
      const { hub } = setup();

      await hub.initialize('test-token');

      expect(hub.isConnected()).toBe(false);
    });
  });

  describe('subscriptions', () => {
    it('routes each channel to its own subscriber', async () => {
      const { hub, latest } = setup();
      const onNotification = vi.fn();
      const onTrading = vi.fn();
      const onPrice = vi.fn();
      hub.subscribeNotifications(onNotification);
      hub.subscribeTradingUpdates(onTrading);
      hub.subscribePriceUpdates(onPrice);
      await hub.initialize('test-token');
      latest('trading').open();

      const frame = { type: 'trading_update', update_type: 'status', data: { running: true } };
      latest('trading').receive(frame);

      expect(onTrading).toHaveBeenCalledWith(frame);
      expect(onNotification).not.toHaveBeenCalled();
      expect(onPrice).not.toHaveBeenCalled();
    });

    it('lets a second subscriber replace the first', async () => {
      const { hub, latest, log } = setup();
      const first = vi.fn();
      const second = vi.fn();
      hub.subscribeNotifications(first);
      hub.subscribeNotifications(second);
      await hub.initialize('test-token');
      latest('notifications').open();

      latest('notifications').receive({ type: 'notification', message: 'Order filled' });

      expect(first).not.toHaveBeenCalled();
      expect(second).toHaveBeenCalledTimes(1);
      expect(log).toHaveBeenCalledWith('debug', 'SUBSCRIBER_REPLACED', { concern: 'notification' });
    });

    it('ignores an unsubscribe with a stale callback', async () => {
      const { hub, latest } = setup();
      const first = vi.fn();
      const second = vi.fn();
      hub.subscribePriceUpdates(first);
      hub.subscribePriceUpdates(second);

      expect(hub.unsubscribePriceUpdates(first)).toBe(false);

      await hub.initialize('test-token');
      latest('prices').open();
      latest('prices').receive({ type: 'price_update', data: {} });
      expect(second).toHaveBeenCalledTimes(1);

      expect(hub.unsubscribePriceUpdates(second)).toBe(true);
      latest('prices').receive({ type: 'price_update', data: {} });
      expect(second).toHaveBeenCalledTimes(1);
    });
  });

  describe('disconnectAll', () => {
    it('brings every channel to DISCONNECTED and leaves no timers behind', async () => {
      const { hub, created, latest } = setup();
      await hub.initialize('test-token');
      latest('notifications').open();
      latest('trading').drop();
      hub.updateWatchedSymbols(['AAPL']);
      expect(hub.getConnectionStatus()).toEqual({
        notifications: 'connected',
        trading: 'reconnecting',
        prices: 'connecting',
      });

      hub.disconnectAll();

      expect(hub.getConnectionStatus()).toEqual({
        notifications: 'disconnected',
        trading: 'disconnected',
        prices: 'disconnected',
      });
      expect(vi.getTimerCount()).toBe(0);
      vi.advanceTimersByTime(120000);
      expect(created).toHaveLength(3);
    });

    it('is safe to call repeatedly on an idle hub', () => {
      const { hub } = setup();
      const onStatus = vi.fn<StatusCallback>();
      hub.subscribeConnectionStatus(onStatus);

      hub.disconnectAll();
      hub.disconnectAll();

      expect(onStatus).not.toHaveBeenCalled();
      expect(hub.isConnected()).toBe(false);
    });
  });

  describe('watchlist', () => {
    it('pushes the deduplicated set over the price channel', async () => {
      const { hub, latest } = setup();
      await hub.initialize('test-token');
      const prices = latest('prices');
      prices.open();

      hub.updateWatchedSymbols(['005930', 'AAPL', '005930']);

      expect(prices.sentFrames()).toEqual([
        { type: 'update_watched_symbols', symbols: ['005930', 'AAPL'], markets: ['KR', 'US'] },
      ]);

      vi.advanceTimersByTime(5000);
      expect(prices.sentFrames()[1]).toEqual({ symbols: ['005930', 'AAPL'], markets: ['KR', 'US'] });
    });

    it('resumes pushing the stored set after re-initialize', async () => {
      const { hub, latest } = setup();
      await hub.initialize('test-token');
      latest('prices').open();
      hub.updateWatchedSymbols(['AAPL']);

      hub.disconnectAll();
      await hub.initialize('test-token');
      const prices = latest('prices');
      prices.open();
      vi.advanceTimersByTime(5000);

      expect(hub.getWatchedSymbols()).toEqual(['AAPL']);
      expect(prices.sentFrames()).toEqual([
        { type: 'update_watched_symbols', symbols: ['AAPL'], markets: ['KR', 'US'] },
        { symbols: ['AAPL'], markets: ['KR', 'US'] },
      ]);
    });

    it('announces symbols chosen before initialize once the price channel opens', async () => {
      const { hub, created, latest } = setup();
      hub.updateWatchedSymbols(['005930', 'AAPL']);
      expect(created).toHaveLength(0);

      await hub.initialize('test-token');
      const prices = latest('prices');
      expect(prices.sentFrames()).toEqual([]);
      prices.open();

      expect(prices.sentFrames()).toEqual([
        { type: 'update_watched_symbols', symbols: ['005930', 'AAPL'], markets: ['KR', 'US'] },
      ]);
    });

    it('re-announces the set on the new socket after a drop and reconnect', async () => {
      const { hub, latest } = setup();
      await hub.initialize('test-token');
      const first = latest('prices');
      first.open();
      hub.updateWatchedSymbols(['AAPL']);

      first.drop();
      vi.advanceTimersByTime(2000);
      const second = latest('prices');
      expect(second).not.toBe(first);
      second.open();

      expect(second.sentFrames()).toEqual([
        { type: 'update_watched_symbols', symbols: ['AAPL'], markets: ['KR', 'US'] },
      ]);
    });
  });

  describe('recovery', () => {
    it('reconnectAll reopens a channel that gave up', async () => {
      const { hub, created, latest } = setup();
      await hub.initialize('test-token');
      latest('notifications').open();
      latest('trading').open();
      for (let i = 0; i < 3; i++) {
        latest('prices').drop();
        vi.runOnlyPendingTimers();
      }
      latest('prices').drop();
      expect(hub.getChannel('prices').getState()).toBe('error');
      const before = created.length;

      hub.reconnectAll();

      expect(created).toHaveLength(before + 1);
      expect(hub.getChannel('prices').getState()).toBe('connecting');
      expect(hub.getChannel('prices').getReconnectAttempts()).toBe(0);
    });

    it('disables the hub when a recheck after spent retries fails', async () => {
      const probe = vi.fn<AvailabilityProbe>().mockResolvedValueOnce(true).mockResolvedValue(false);
      const { hub, latest } = setup({ probe });
      await hub.initialize('test-token');
      for (let i = 0; i < 3; i++) {
        latest('prices').drop();
        vi.runOnlyPendingTimers();
      }

      latest('prices').fail();
      await flushMicrotasks();

      expect(probe).toHaveBeenCalledTimes(2);
      expect(hub.isEnabled()).toBe(false);
      expect(hub.getConnectionStatus()).toEqual({
        notifications: 'disabled',
        trading: 'disabled',
        prices: 'disabled',
      });
    });

    it('stays enabled when the recheck finds the gateway up', async () => {
      const probe = vi.fn<AvailabilityProbe>(async () => true);
      const { hub, latest } = setup({ probe });
      await hub.initialize('test-token');
      for (let i = 0; i < 3; i++) {
        latest('prices').drop();
        vi.runOnlyPendingTimers();
      }

      latest('prices').fail();
      await flushMicrotasks();

      expect(probe).toHaveBeenCalledTimes(2);
      expect(hub.isEnabled()).toBe(true);
      expect(hub.getChannel('prices').getState()).toBe('error');
    });
  });
});
