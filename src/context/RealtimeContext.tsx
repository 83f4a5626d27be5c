import React, { createContext, useCallback, useContext, useEffect, useMemo } from 'react';
import { RealtimeHub } from '../services/realtime';

interface RealtimeContextValue {
  hub: RealtimeHub;
  /** Re-initializes a disabled hub, otherwise resets backoff and reconnects. */
  retry: () => void;
}

const RealtimeContext = createContext<RealtimeContextValue | null>(null);

interface RealtimeProviderProps {
  hub: RealtimeHub;
  token: string | null;
  children: React.ReactNode;
}

/**
 * Composition root for the realtime layer.  The hub is created once by the
 * caller and handed in; this provider only ties its lifecycle to the
 * session token: initialize on login, tear everything down on logout or
 * unmount.
 */
export const RealtimeProvider: React.FC<RealtimeProviderProps> = ({ hub, token, children }) => {
  useEffect(() => {
    if (!token) {
      return;
    }
    void hub.initialize(token);
    return () => {
      hub.disconnectAll();
    };
  }, [hub, token]);

  const retry = useCallback(() => {
    if (!hub.isEnabled() && token) {
      void hub.initialize(token);
      return;
    }
    hub.reconnectAll();
  }, [hub, token]);

  const value = useMemo(() => ({ hub, retry }), [hub, retry]);

  return <RealtimeContext.Provider value={value}>{children}</RealtimeContext.Provider>;
};

export function useRealtime(): RealtimeContextValue {
  const value = useContext(RealtimeContext);
  if (!value) {
    throw new Error('useRealtime must be used inside <RealtimeProvider>');
  }
  return value;
}
