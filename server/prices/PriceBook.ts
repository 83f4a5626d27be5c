export type Market = 'KR' | 'US';

export interface Quote {
  symbol: string;
  market: Market;
  price: number;
  change: number;
  change_percent: number;
  volume: number;
  timestamp: string;
}

export interface QuoteInput {
  symbol: string;
  price: number;
  prevClose?: number;
  volume?: number;
}

const KR_SYMBOL = /^\d{6}$/;

/** Six-digit codes trade in Korea; everything else is treated as US. */
export function inferMarket(symbol: string): Market {
  return KR_SYMBOL.test(symbol) ? 'KR' : 'US';
}

export function normalizeSymbol(raw: unknown): string {
  return String(raw ?? '').trim().toUpperCase();
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Latest quote per symbol plus the reference close its change is measured from. */
export class PriceBook {
  private readonly quotes = new Map<string, Quote>();
  private readonly prevCloses = new Map<string, number>();

  constructor(private readonly now: () => number = Date.now) {}

  upsert(input: QuoteInput): Quote {
    const symbol = normalizeSymbol(input.symbol);
    if (input.prevClose !== undefined && input.prevClose > 0) {
      this.prevCloses.set(symbol, input.prevClose);
    }
    const reference = this.prevCloses.get(symbol) ?? input.price;
    const change = input.price - reference;

    const quote: Quote = {
      symbol,
      market: inferMarket(symbol),
      price: input.price,
      change: round2(change),
      change_percent: reference > 0 ? round2((change / reference) * 100) : 0,
      volume: input.volume ?? this.quotes.get(symbol)?.volume ?? 0,
      timestamp: new Date(this.now()).toISOString(),
    };
    this.quotes.set(symbol, quote);
    return quote;
  }

  get(symbol: string): Quote | undefined {
    return this.quotes.get(normalizeSymbol(symbol));
  }

  /** Known quotes among `symbols`, keyed by symbol; unknown symbols are left out. */
  snapshot(symbols: Iterable<string>): Record<string, Quote> {
    const result: Record<string, Quote> = {};
    for (const raw of symbols) {
      const quote = this.get(raw);
      if (quote) {
        result[quote.symbol] = quote;
      }
    }
    return result;
  }

  size(): number {
    return this.quotes.size;
  }
}
