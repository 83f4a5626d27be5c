import React from 'react';
import { FeedKind } from '../services/notificationFeed';
import { useRealtimeNotifications } from '../services/useRealtimeNotifications';

const KIND_CLASSES: Record<FeedKind, string> = {
  info: 'border-zinc-700 text-zinc-300',
  success: 'border-green-500/40 text-green-300',
  warning: 'border-yellow-500/40 text-yellow-300',
  error: 'border-red-500/40 text-red-300',
  trade: 'border-blue-500/40 text-blue-300',
};

const NotificationList: React.FC = () => {
  const { items, unread, dismiss, clear, markAllRead } = useRealtimeNotifications();

  return (
    <div className="bg-zinc-900 border border-zinc-800 rounded-lg p-4 space-y-3">
      <div className="flex items-center justify-between border-b border-zinc-800 pb-2">
        <h2 className="text-sm font-semibold text-zinc-300">
          ALERTS {unread > 0 && <span className="ml-1 text-xs text-blue-400">({unread} new)</span>}
        </h2>
        <div className="space-x-2 text-xs">
          <button type="button" className="text-zinc-400 hover:text-zinc-200" onClick={markAllRead}>Mark read</button>
          <button type="button" className="text-zinc-400 hover:text-zinc-200" onClick={clear}>Clear</button>
        </div>
      </div>
      {items.length === 0 ? (
        <p className="text-xs text-zinc-500">No alerts yet.</p>
      ) : (
        <ul className="space-y-2">
          {items.map((item) => (
            <li key={item.id} className={`rounded border px-3 py-2 text-xs flex justify-between ${KIND_CLASSES[item.kind]}`}>
              <span>{item.message}</span>
              <button type="button" className="ml-3 text-zinc-500 hover:text-zinc-300" onClick={() => dismiss(item.id)}>
                ×
              </button>
            </li>
          ))}
        </ul>
      )}
    </div>
  );
};

export default NotificationList;
