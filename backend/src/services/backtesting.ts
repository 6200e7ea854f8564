import { EventDrivenBacktestEngine } from './backtesting/EventDrivenBacktestEngine';
import { HistoricalDataFeed } from './backtesting/DataFeed';
import { SimpleExecutionHandler } from './backtesting/ExecutionHandler';
import { BuyAndHoldStrategy, Strategy } from './backtesting/StrategyEngine';
import { loadBarsFromCsv, loadDividendsFromCsv } from './backtesting/CsvBarLoader';
import {
  BacktestConfig,
  BacktestResult,
  CommissionModel,
  DividendEvent,
  MarketDataEvent
} from './backtesting/types';
import { createError } from '../middleware/errorHandler';

export interface BuyAndHoldDefinition {
  type: 'buy_and_hold';
  id: string;
  allocations: Record<string, number>;
}

export type StrategyDefinition = BuyAndHoldDefinition;

export interface BacktestRequest {
  config: BacktestConfig;
  commission: CommissionModel;
  strategy: StrategyDefinition;
  bars: MarketDataEvent[];
  dividends: DividendEvent[];
}

export interface CsvBacktestRequest {
  config: BacktestConfig;
  commission: CommissionModel;
  strategy: StrategyDefinition;
  barsPath: string;
  dividendsPath?: string;
}

export class BacktestingService {

  buildStrategy(definition: StrategyDefinition): Strategy {
    switch (definition.type) {
      case 'buy_and_hold':
        if (Object.keys(definition.allocations).length === 0) {
          throw createError('Buy-and-hold strategy needs at least one allocation', 400);
        }
        return new BuyAndHoldStrategy(definition.id, definition.allocations);
    }
  }

  runBacktest(request: BacktestRequest): BacktestResult {
    if (request.bars.length === 0) {
      throw createError('At least one market data bar is required', 400);
    }

    const engine = new EventDrivenBacktestEngine({
      config: request.config,
      feed: new HistoricalDataFeed(request.bars, request.dividends),
      strategy: this.buildStrategy(request.strategy),
      executionHandler: new SimpleExecutionHandler(request.commission)
    });

    return engine.run();
  }

  async runFromCsv(request: CsvBacktestRequest): Promise<BacktestResult> {
    const bars = await loadBarsFromCsv(request.barsPath);
    const dividends = request.dividendsPath ? await loadDividendsFromCsv(request.dividendsPath) : [];

    return this.runBacktest({
      config: request.config,
      commission: request.commission,
      strategy: request.strategy,
      bars,
      dividends
    });
  }
}
