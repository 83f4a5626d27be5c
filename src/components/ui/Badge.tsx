import React from 'react';

interface BadgeProps {
  state: string;
}

const STATE_CLASSES: Record<string, string> = {
  connected: 'text-green-400 border-green-500/40',
  connecting: 'text-yellow-400 border-yellow-500/40',
  reconnecting: 'text-yellow-400 border-yellow-500/40',
  error: 'text-red-400 border-red-500/40',
  disabled: 'text-zinc-500 border-zinc-700',
};

const NEUTRAL_CLASSES = 'text-zinc-400 border-zinc-700';

/** Small pill showing a channel connection state. */
export const Badge: React.FC<BadgeProps> = ({ state }) => {
  const colour = STATE_CLASSES[state.toLowerCase()] ?? NEUTRAL_CLASSES;
  return (
    <span className={`text-[10px] uppercase px-1.5 py-0.5 rounded border ${colour}`}>
      {state}
    </span>
  );
};
