import { useEffect, useState } from 'react';
import { useRealtime } from '../context/RealtimeContext';
import { InboundMessage, PriceMap, isPriceUpdate } from './realtime';

/**
 * Pushes `symbols` as the price-channel watchlist and accumulates the
 * latest quote per symbol.  The watchlist is re-sent whenever the symbol
 * list changes; quotes for symbols no longer watched are kept until the
 * component unmounts.
 */
export function usePriceFeed(symbols: string[]): PriceMap {
  const { hub } = useRealtime();
  const [prices, setPrices] = useState<PriceMap>({});
  const symbolsKey = symbols.join(',');

  useEffect(() => {
    hub.updateWatchedSymbols(symbolsKey ? symbolsKey.split(',') : []);
  }, [hub, symbolsKey]);

  useEffect(() => {
    const onPrice = (message: InboundMessage) => {
      if (!isPriceUpdate(message)) return;
      setPrices((prev) => ({ ...prev, ...message.data }));
    };
    hub.subscribePriceUpdates(onPrice);
    return () => {
      hub.unsubscribePriceUpdates(onPrice);
    };
  }, [hub]);

  return prices;
}
