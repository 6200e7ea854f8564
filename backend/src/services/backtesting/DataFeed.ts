import { DividendEvent, FeedEvent, MarketDataEvent } from './types';

/**
 * Chronological source of market and corporate-action events.
 * streamNext returns an empty batch only once the feed is exhausted.
 */
export interface DataFeed {
  streamNext(): FeedEvent[];
  getLatestPrice(symbol: string, asOf: Date): number | null;
  subscribe?(symbols: readonly string[]): void;
}

// In-memory feed over historical bars and dividends, one batch per distinct timestamp
export class HistoricalDataFeed implements DataFeed {
  private events: FeedEvent[];
  private bars: Map<string, MarketDataEvent[]> = new Map();
  private subscriptions: Set<string> = new Set();
  private cursor = 0;

  constructor(bars: MarketDataEvent[], dividends: DividendEvent[] = []) {
    const combined: FeedEvent[] = [...bars, ...dividends];
    // Array#sort is stable, so same-timestamp events keep their input order
    this.events = combined.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());

    for (const bar of bars) {
      const series = this.bars.get(bar.symbol) ?? [];
      series.push(bar);
      this.bars.set(bar.symbol, series);
    }
    this.bars.forEach(series => series.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime()));
  }

  // An empty subscription set means every ticker is streamed
  subscribe(symbols: readonly string[]): void {
    symbols.forEach(symbol => this.subscriptions.add(symbol));
  }

  getSubscriptions(): string[] {
    return Array.from(this.subscriptions);
  }

  streamNext(): FeedEvent[] {
    while (this.cursor < this.events.length) {
      const time = this.events[this.cursor].timestamp.getTime();
      const batch: FeedEvent[] = [];

      while (this.cursor < this.events.length && this.events[this.cursor].timestamp.getTime() === time) {
        const event = this.events[this.cursor];
        if (this.isSubscribed(event.symbol)) batch.push(event);
        this.cursor++;
      }

      if (batch.length > 0) return batch;
    }
    return [];
  }

  hasNext(): boolean {
    return this.cursor < this.events.length;
  }

  reset(): void {
    this.cursor = 0;
  }

  getLatestPrice(symbol: string, asOf: Date): number | null {
    const bar = this.getBarAt(symbol, asOf);
    return bar ? bar.price : null;
  }

  // Latest bar at or before the timestamp
  getBarAt(symbol: string, asOf: Date): MarketDataEvent | null {
    const series = this.bars.get(symbol);
    if (!series || series.length === 0) return null;

    const target = asOf.getTime();
    let lo = 0;
    let hi = series.length - 1;
    let found = -1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      if (series[mid].timestamp.getTime() <= target) {
        found = mid;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    return found >= 0 ? series[found] : null;
  }

  getSymbols(): string[] {
    return Array.from(this.bars.keys());
  }

  private isSubscribed(symbol: string): boolean {
    return this.subscriptions.size === 0 || this.subscriptions.has(symbol);
  }
}
