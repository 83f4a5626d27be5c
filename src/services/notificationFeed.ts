import { InboundMessage, isNotification, isTradingUpdate } from './realtime';

export type FeedKind = 'info' | 'success' | 'warning' | 'error' | 'trade';

export interface FeedItem {
  id: string;
  message: string;
  kind: FeedKind;
  timestamp: string;
  data: Record<string, unknown> | null;
}

export type FeedDraft = Omit<FeedItem, 'id' | 'timestamp'>;

const FEED_KINDS: readonly FeedKind[] = ['info', 'success', 'warning', 'error', 'trade'];

function toFeedKind(value: unknown): FeedKind {
  return FEED_KINDS.find((kind) => kind === value) ?? 'info';
}

function asNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function describeOrder(data: Record<string, unknown>): string {
  const symbol = String(data.symbol ?? '?');
  const side = data.order_type === 'buy' ? 'Buy' : 'Sell';
  const quantity = asNumber(data.quantity) ?? 0;
  const price = asNumber(data.price);
  const priceText = price === null ? 'market price' : price.toLocaleString('en-US');
  return `${symbol} ${side} order executed (${quantity} shares @ ${priceText})`;
}

/** Notification frame → feed entry; null when there is nothing to show. */
export function draftFromNotification(message: InboundMessage): FeedDraft | null {
  if (!isNotification(message)) {
    return null;
  }
  return {
    message: message.message,
    kind: toFeedKind(message.notification_type),
    data: message.data ?? null,
  };
}

/**
 * Trading frames only produce an entry for executed orders and for
 * automation cycles that actually traded.
 */
export function draftFromTradingUpdate(message: InboundMessage): FeedDraft | null {
  if (!isTradingUpdate(message)) {
    return null;
  }

  if (message.update_type === 'order_executed') {
    return { message: describeOrder(message.data), kind: 'trade', data: message.data };
  }

  if (message.update_type === 'cycle_completed') {
    const trades = asNumber(message.data.trades_count) ?? 0;
    if (trades <= 0) {
      return null;
    }
    return {
      message: `Trading cycle completed with ${trades} trade${trades === 1 ? '' : 's'}.`,
      kind: 'success',
      data: message.data,
    };
  }

  return null;
}
