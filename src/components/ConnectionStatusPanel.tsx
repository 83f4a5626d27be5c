import React from 'react';
import { useRealtime } from '../context/RealtimeContext';
import { CHANNEL_NAMES, ChannelName, ConnectionState } from '../services/realtime';
import { useConnectionStatus } from '../services/useConnectionStatus';
import { Badge } from './ui/Badge';

const CHANNEL_LABELS: Record<ChannelName, string> = {
  notifications: 'Notifications',
  trading: 'Trading',
  prices: 'Prices',
};

/**
 * Per-channel connection badges.  When any channel is disabled or has
 * given up retrying, an offline banner with a retry action is shown
 * instead of failing the surrounding page.
 */
const ConnectionStatusPanel: React.FC = () => {
  const { retry } = useRealtime();
  const status = useConnectionStatus();

  const offline = CHANNEL_NAMES.some(
    (name) => status[name] === ConnectionState.DISABLED || status[name] === ConnectionState.ERROR,
  );

  return (
    <div className="bg-zinc-900 border border-zinc-800 rounded-lg p-4 space-y-3">
      <h2 className="text-sm font-semibold text-zinc-300 border-b border-zinc-800 pb-2">REALTIME</h2>
      <ul className="space-y-2 text-sm">
        {CHANNEL_NAMES.map((name) => (
          <li key={name} className="flex items-center justify-between" data-testid={`channel-${name}`}>
            <span className="text-zinc-400">{CHANNEL_LABELS[name]}</span>
            <Badge state={status[name]} />
          </li>
        ))}
      </ul>
      {offline && (
        <div role="alert" className="rounded border border-red-500/40 bg-red-950/40 p-3 text-xs text-red-300 flex items-center justify-between">
          <span>Realtime service appears offline. Prices and alerts may be stale.</span>
          <button
            type="button"
            className="ml-3 rounded border border-red-400/60 px-2 py-1 text-red-200 hover:bg-red-900/50"
            onClick={retry}
          >
            Retry
          </button>
        </div>
      )}
    </div>
  );
};

export default ConnectionStatusPanel;
