import { InboundMessage, NotificationMessage, PriceUpdateMessage, TradingUpdateMessage } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isPriceUpdate(message: InboundMessage): message is PriceUpdateMessage {
  return message.type === 'price_update' && isRecord(message.data);
}

export function isTradingUpdate(message: InboundMessage): message is TradingUpdateMessage {
  return message.type === 'trading_update' && typeof message.update_type === 'string' && isRecord(message.data);
}

export function isNotification(message: InboundMessage): message is NotificationMessage {
  return message.type === 'notification' && typeof message.message === 'string' && message.message.length > 0;
}
