import { act, renderHook, waitFor } from '@testing-library/react';
import React from 'react';
import { describe, expect, it } from 'vitest';

import { RealtimeProvider } from '../context/RealtimeContext';
import { createTestHub } from '../test/testHub';
import { useRealtimeNotifications } from './useRealtimeNotifications';

describe('useRealtimeNotifications', () => {
  it('collects notifications and executed orders newest first', async () => {
    const { hub, created, latest } = createTestHub();
    const wrapper = ({ children }: { children: React.ReactNode }) => (
      <RealtimeProvider hub={hub} token="test-token">{children}</RealtimeProvider>
    );
    const { result } = renderHook(() => useRealtimeNotifications(), { wrapper });
    await waitFor(() => {
      expect(created).toHaveLength(3);
    });

    act(() => {
      latest('notifications').open();
      latest('trading').open();
      latest('notifications').receive({ type: 'notification', message: 'Market opens in 5 minutes', notification_type: 'info' });
      latest('trading').receive({
        type: 'trading_update',
        update_type: 'order_executed',
        data: { symbol: 'MSFT', order_type: 'sell', quantity: 2, price: 415.2 },
      });
    });

    expect(result.current.unread).toBe(2);
    expect(result.current.items.map((item) => [item.id, item.message])).toEqual([
      ['feed-2', 'MSFT Sell order executed (2 shares @ 415.2)'],
      ['feed-1', 'Market opens in 5 minutes'],
    ]);

    act(() => {
      result.current.markAllRead();
      result.current.dismiss('feed-1');
    });

    expect(result.current.unread).toBe(0);
    expect(result.current.items.map((item) => item.id)).toEqual(['feed-2']);
  });
});
