import React, { useState } from 'react';
import ConnectionStatusPanel from './ConnectionStatusPanel';
import NotificationList from './NotificationList';
import PriceTicker from './PriceTicker';

const DEFAULT_WATCHLIST = ['005930', '000660', 'AAPL', 'MSFT'];

export const Dashboard: React.FC = () => {
  const [watchlist, setWatchlist] = useState<string[]>(DEFAULT_WATCHLIST);
  const [draft, setDraft] = useState('');

  const addSymbol = () => {
    const symbol = draft.trim().toUpperCase();
    if (symbol && !watchlist.includes(symbol)) {
      setWatchlist([...watchlist, symbol]);
    }
    setDraft('');
  };

  const removeSymbol = (symbol: string) => {
    setWatchlist(watchlist.filter((s) => s !== symbol));
  };

  return (
    <div className="min-h-screen bg-[#09090b] text-zinc-200 font-sans p-6">
      <div className="max-w-7xl mx-auto space-y-6">
        <div>
          <h1 className="text-2xl font-bold text-white tracking-tight">Market Monitor</h1>
          <p className="text-zinc-500 text-sm mt-1">MARKETS: KR | US</p>
        </div>

        <div className="grid grid-cols-1 lg:grid-cols-3 gap-4">
          <div className="lg:col-span-2 space-y-3">
            <PriceTicker symbols={watchlist} />
            <div className="flex items-center gap-2 text-sm">
              <input
                className="flex-1 rounded border border-zinc-700 bg-zinc-900 px-3 py-2"
                placeholder="Add symbol (e.g. 035420, NVDA)"
                value={draft}
                onChange={(e) => setDraft(e.target.value)}
                onKeyDown={(e) => {
                  if (e.key === 'Enter') addSymbol();
                }}
              />
              <button type="button" className="rounded border border-zinc-700 px-3 py-2 hover:bg-zinc-800" onClick={addSymbol}>
                Add
              </button>
            </div>
            <div className="flex flex-wrap gap-2 text-xs">
              {watchlist.map((symbol) => (
                <button
                  key={symbol}
                  type="button"
                  className="rounded bg-zinc-800 px-2 py-1 text-zinc-300 hover:bg-zinc-700"
                  onClick={() => removeSymbol(symbol)}
                >
                  {symbol} ×
                </button>
              ))}
            </div>
          </div>
          <div className="space-y-4">
            <ConnectionStatusPanel />
            <NotificationList />
          </div>
        </div>
      </div>
    </div>
  );
};

export default Dashboard;
