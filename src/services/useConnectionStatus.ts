import { useEffect, useState } from 'react';
import { useRealtime } from '../context/RealtimeContext';
import { ConnectionStatus } from './realtime';

/**
 * Current state of the three realtime channels.  Holds the hub's single
 * status slot while mounted; a second mounted consumer takes the slot
 * over (see SubscriberRegistry).
 */
export function useConnectionStatus(): ConnectionStatus {
  const { hub } = useRealtime();
  const [status, setStatus] = useState<ConnectionStatus>(() => hub.getConnectionStatus());

  useEffect(() => {
    const onStatus = (next: ConnectionStatus) => setStatus(next);
    hub.subscribeConnectionStatus(onStatus);
    setStatus(hub.getConnectionStatus());
    return () => {
      hub.unsubscribeConnectionStatus(onStatus);
    };
  }, [hub]);

  return status;
}
