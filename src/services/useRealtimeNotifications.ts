import { useCallback, useEffect, useRef, useState } from 'react';
import { useRealtime } from '../context/RealtimeContext';
import { FeedDraft, FeedItem, draftFromNotification, draftFromTradingUpdate } from './notificationFeed';
import { InboundMessage } from './realtime';

const MAX_FEED_ITEMS = 100;

export interface RealtimeNotifications {
  items: FeedItem[];
  unread: number;
  dismiss: (id: string) => void;
  clear: () => void;
  markAllRead: () => void;
}

/**
 * Feed of notification-channel messages plus executed orders and
 * completed cycles from the trading channel, newest first.
 */
export function useRealtimeNotifications(): RealtimeNotifications {
  const { hub } = useRealtime();
  const [items, setItems] = useState<FeedItem[]>([]);
  const [unread, setUnread] = useState(0);
  const sequence = useRef(0);

  const push = useCallback((draft: FeedDraft | null) => {
    if (!draft) return;
    sequence.current += 1;
    const item: FeedItem = {
      ...draft,
      id: `feed-${sequence.current}`,
      timestamp: new Date().toISOString(),
    };
    setItems((prev) => [item, ...prev].slice(0, MAX_FEED_ITEMS));
    setUnread((count) => count + 1);
  }, []);

  useEffect(() => {
    const onNotification = (message: InboundMessage) => push(draftFromNotification(message));
    const onTrading = (message: InboundMessage) => push(draftFromTradingUpdate(message));

    hub.subscribeNotifications(onNotification);
    hub.subscribeTradingUpdates(onTrading);
    return () => {
      hub.unsubscribeNotifications(onNotification);
      hub.unsubscribeTradingUpdates(onTrading);
    };
  }, [hub, push]);

  const dismiss = useCallback((id: string) => {
    setItems((prev) => prev.filter((item) => item.id !== id));
  }, []);

  const clear = useCallback(() => {
    setItems([]);
    setUnread(0);
  }, []);

  const markAllRead = useCallback(() => setUnread(0), []);

  return { items, unread, dismiss, clear, markAllRead };
}
