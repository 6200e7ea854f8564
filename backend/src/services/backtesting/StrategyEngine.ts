import { MarketDataEvent, SignalEvent } from './types';
import { createSignalEvent } from './events';
import { logger } from '../../utils/logger';

/**
 * Anything that maps a market update to zero or more signals.
 * Implementations must not mutate the event they receive.
 */
export interface Strategy {
  calculateSignals(event: MarketDataEvent): SignalEvent[];
  readonly subscribedTickers?: readonly string[];
}

export abstract class BaseStrategy implements Strategy {
  readonly strategyId: string;
  readonly description: string;
  protected params: Record<string, unknown>;
  private tickers: string[] = [];

  constructor(strategyId: string, description?: string, params: Record<string, unknown> = {}) {
    this.strategyId = strategyId;
    this.description = description ?? new.target.name;
    this.params = { ...params };
  }

  get subscribedTickers(): readonly string[] {
    return this.tickers;
  }

  subscribeTickers(tickers: string[]): void {
    this.tickers = Array.from(new Set([...this.tickers, ...tickers]));
  }

  abstract calculateSignals(event: MarketDataEvent): SignalEvent[];
}

// Buys a fixed quantity of each configured ticker on its first market update and holds
export class BuyAndHoldStrategy extends BaseStrategy {
  private allocations: Map<string, number>;
  private bought: Set<string> = new Set();

  constructor(strategyId: string, allocations: Record<string, number>, description?: string) {
    super(strategyId, description ?? 'Buys the configured tickers on the first data event and holds', {
      allocations: { ...allocations }
    });
    this.allocations = new Map(Object.entries(allocations));
    this.subscribeTickers(Object.keys(allocations));
  }

  calculateSignals(event: MarketDataEvent): SignalEvent[] {
    const quantity = this.allocations.get(event.symbol);
    if (quantity === undefined || this.bought.has(event.symbol)) return [];

    this.bought.add(event.symbol);
    logger.debug(`${this.strategyId}: BUY signal for ${quantity} ${event.symbol} at ${event.timestamp.toISOString()}`);

    return [
      createSignalEvent({
        timestamp: event.timestamp,
        symbol: event.symbol,
        direction: 'BUY',
        suggested_quantity: quantity,
        strength: 1
      })
    ];
  }
}
