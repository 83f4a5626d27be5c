import { fireEvent, render, screen, waitFor, within } from '@testing-library/react';
import { describe, expect, it, vi } from 'vitest';

import { RealtimeProvider } from '../context/RealtimeContext';
import { AvailabilityProbe } from '../services/realtime';
import { createTestHub } from '../test/testHub';
import ConnectionStatusPanel from './ConnectionStatusPanel';

describe('ConnectionStatusPanel', () => {
  it('shows a badge per channel once the hub starts connecting', async () => {
    const { hub } = createTestHub();

    render(
      <RealtimeProvider hub={hub} token="test-token">
        <ConnectionStatusPanel />
      </RealtimeProvider>,
    );

    for (const channel of ['notifications', 'trading', 'prices']) {
      expect(await within(screen.getByTestId(`channel-${channel}`)).findByText('connecting')).toBeInTheDocument();
    }
    expect(screen.queryByRole('alert')).toBeNull();
  });

  it('shows the offline banner when the gateway is unavailable and retries on click', async () => {
    const probe = vi.fn<AvailabilityProbe>().mockResolvedValueOnce(false).mockResolvedValue(true);
    const { hub, created } = createTestHub(probe);

    render(
      <RealtimeProvider hub={hub} token="test-token">
        <ConnectionStatusPanel />
      </RealtimeProvider>,
    );

    const banner = await screen.findByRole('alert');
    expect(banner).toHaveTextContent('Realtime service appears offline. Prices and alerts may be stale.');
    expect(within(screen.getByTestId('channel-prices')).getByText('disabled')).toBeInTheDocument();
    expect(created).toHaveLength(0);

    fireEvent.click(within(banner).getByRole('button', { name: 'Retry' }));

    await waitFor(() => {
      expect(screen.queryByRole('alert')).toBeNull();
    });
    expect(probe).toHaveBeenCalledTimes(2);
    expect(created).toHaveLength(3);
  });

  it('throws when rendered outside the provider', () => {
    expect(() => render(<ConnectionStatusPanel />)).toThrow('useRealtime must be used inside <RealtimeProvider>');
  });
});
