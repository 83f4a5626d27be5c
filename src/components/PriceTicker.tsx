import React from 'react';
import { PriceQuote } from '../services/realtime';
import { usePriceFeed } from '../services/usePriceFeed';

interface PriceTickerProps {
  symbols: string[];
}

const formatNum = (n: number, d = 2) => n.toLocaleString('en-US', { minimumFractionDigits: d, maximumFractionDigits: d });

const PriceRow: React.FC<{ symbol: string; quote: PriceQuote | undefined }> = ({ symbol, quote }) => {
  if (!quote) {
    return (
      <tr className="border-b border-zinc-800/50 animate-pulse">
        <td className="py-2 font-bold text-zinc-500">{symbol}</td>
        <td className="py-2 text-right text-zinc-600" colSpan={3}>Waiting for quote...</td>
      </tr>
    );
  }

  const tone = quote.change >= 0 ? 'text-green-400' : 'text-red-400';
  const sign = quote.change >= 0 ? '+' : '';
  return (
    <tr className="border-b border-zinc-800/50">
      <td className="py-2 font-bold text-white">{symbol}</td>
      <td className="py-2 text-right font-mono">{formatNum(quote.price)}</td>
      <td className={`py-2 text-right font-mono ${tone}`}>{sign}{formatNum(quote.change)}</td>
      <td className={`py-2 text-right font-mono ${tone}`}>{sign}{formatNum(quote.change_percent)}%</td>
    </tr>
  );
};

/** Live quotes for the watched symbols, fed by the price channel. */
const PriceTicker: React.FC<PriceTickerProps> = ({ symbols }) => {
  const prices = usePriceFeed(symbols);

  return (
    <div className="bg-zinc-900 border border-zinc-800 rounded-lg p-4">
      <h2 className="text-sm font-semibold text-zinc-300 border-b border-zinc-800 pb-2">WATCHLIST</h2>
      <table className="w-full text-sm">
        <thead>
          <tr className="text-zinc-500 text-xs">
            <th className="py-2 text-left">Symbol</th>
            <th className="py-2 text-right">Price</th>
            <th className="py-2 text-right">Change</th>
            <th className="py-2 text-right">Change %</th>
          </tr>
        </thead>
        <tbody>
          {symbols.map((symbol) => (
            <PriceRow key={symbol} symbol={symbol} quote={prices[symbol]} />
          ))}
        </tbody>
      </table>
    </div>
  );
};

export default PriceTicker;
