import { EventQueue } from './EventQueue';
import { PortfolioManager, PortfolioView } from './PortfolioManager';
import { ExecutionPolicy } from './ExecutionHandler';
import { Strategy } from './StrategyEngine';
import { DataFeed } from './DataFeed';
import { PerformanceAnalyzer } from './PerformanceAnalyzer';
import { transactionFromFill } from './Transaction';
import { createOrderEvent, dateKey, isAfter } from './events';
import { ContractViolationError, assertNonNegative, assertValidDate, isDomainRejection } from './errors';
import {
  BacktestConfig,
  BacktestEvent,
  BacktestResult,
  BacktestStats,
  DividendEvent,
  EngineState,
  FillEvent,
  MarketDataEvent,
  OrderEvent,
  SignalEvent
} from './types';
import { logger } from '../../utils/logger';

export interface BacktestEngineOptions {
  config: BacktestConfig;
  feed: DataFeed;
  strategy: Strategy;
  executionHandler: ExecutionPolicy;
}

function emptyStats(): BacktestStats {
  return {
    events_processed: 0,
    market_events: 0,
    signals: 0,
    orders: 0,
    fills: 0,
    dividends: 0,
    rejected_signals: 0,
    rejected_orders: 0,
    rejected_fills: 0,
    skipped_feed_events: 0
  };
}

/**
 * Single-threaded simulation loop.
 *
 * Each iteration pulls one batch from the feed, enqueues what falls inside
 * the end boundary, drains the queue (market -> signal -> order -> fill can
 * resolve within one pass) and records at most one snapshot per calendar day.
 */
export class EventDrivenBacktestEngine {
  private readonly eventQueue = new EventQueue();
  private readonly portfolio: PortfolioManager;
  private readonly feed: DataFeed;
  private readonly strategy: Strategy;
  private readonly executionHandler: ExecutionPolicy;

  private readonly startDate: Date;
  private readonly endDate: Date;
  private readonly endDateKey: string;
  private readonly benchmarkTicker?: string;
  private readonly riskFreeRate: number;

  private state: EngineState = 'RUNNING';
  private hasRun = false;
  private clock: Date;
  private lastRecordedDate: string | null = null;
  private orderSequence = 0;
  private stats: BacktestStats = emptyStats();

  constructor(options: BacktestEngineOptions) {
    const { config } = options;
    assertValidDate(config.start_date, 'start_date');
    assertValidDate(config.end_date, 'end_date');
    if (isAfter(config.start_date, config.end_date)) {
      throw new ContractViolationError('INVALID_ARGUMENT', 'start_date must not be after end_date');
    }
    assertNonNegative(config.initial_cash, 'initial_cash');

    this.startDate = new Date(config.start_date.getTime());
    this.endDate = new Date(config.end_date.getTime());
    this.endDateKey = dateKey(this.endDate);
    this.benchmarkTicker = config.benchmark_ticker;
    this.riskFreeRate = config.risk_free_rate ?? 0.02;

    this.feed = options.feed;
    this.strategy = options.strategy;
    this.executionHandler = options.executionHandler;
    this.portfolio = new PortfolioManager(config.initial_cash, this.startDate);
    this.clock = new Date(this.startDate.getTime());

    this.subscribeStrategyTickers();
  }

  private subscribeStrategyTickers(): void {
    const tickers = this.strategy.subscribedTickers;
    if (!tickers || tickers.length === 0 || !this.feed.subscribe) return;

    this.feed.subscribe(tickers);
    if (this.benchmarkTicker) {
      this.feed.subscribe([this.benchmarkTicker]);
    }
  }

  run(): BacktestResult {
    if (this.hasRun) {
      throw new ContractViolationError('INVALID_STATE', 'A backtest engine can only be run once');
    }
    this.hasRun = true;

    logger.info(`Starting backtest from ${this.startDate.toISOString()} to ${this.endDate.toISOString()}`);

    while (this.state !== 'STOPPED') {
      this.step();
    }
    this.finalize();

    logger.info(
      `Backtest finished at ${this.clock.toISOString()}: ${this.stats.events_processed} events, ` +
      `${this.stats.fills} fills, net value ${this.portfolio.getNetValue().toFixed(2)}`
    );
    return this.buildResult();
  }

  private step(): void {
    this.state = 'RUNNING';

    const batch = this.feed.streamNext();
    if (batch.length === 0 && this.eventQueue.isEmpty()) {
      this.state = 'STOPPED';
      return;
    }

    let boundaryReached = false;
    for (const event of batch) {
      if (isAfter(event.timestamp, this.endDate)) {
        logger.debug(`Feed reached end boundary at ${event.timestamp.toISOString()}`);
        boundaryReached = true;
        break;
      }
      if (event.timestamp.getTime() < this.clock.getTime()) {
        this.stats.skipped_feed_events++;
        logger.warn(
          `Feed timestamp regression for ${event.symbol}: ${event.timestamp.toISOString()} ` +
          `is before ${this.clock.toISOString()}, event skipped`
        );
        continue;
      }
      this.eventQueue.enqueue(event);
      this.clock = new Date(event.timestamp.getTime());
    }

    this.drainQueue();
    this.recordDailySnapshot();

    if (boundaryReached || (!isAfter(this.endDate, this.clock) && this.eventQueue.isEmpty())) {
      this.state = 'STOPPED';
    }
  }

  private drainQueue(): void {
    this.state = 'DRAINING_QUEUE';

    while (!this.eventQueue.isEmpty()) {
      const event = this.eventQueue.dequeue();
      if (!event) break;

      if (isAfter(event.timestamp, this.endDate)) {
        logger.debug(`Skipping ${event.type} event beyond end boundary`);
        continue;
      }
      this.processEvent(event);
    }
  }

  private processEvent(event: BacktestEvent): void {
    this.stats.events_processed++;
    this.portfolio.advanceTime(event.timestamp);

    switch (event.type) {
      case 'MARKET_DATA':
        this.handleMarketData(event);
        break;
      case 'SIGNAL':
        this.handleSignal(event);
        break;
      case 'ORDER':
        this.handleOrder(event);
        break;
      case 'FILL':
        this.handleFill(event);
        break;
      case 'DIVIDEND':
        this.handleDividend(event);
        break;
      default: {
        const unhandled: never = event;
        throw new ContractViolationError('TYPE_CONTRACT', `Unhandled event: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private handleMarketData(event: MarketDataEvent): void {
    this.stats.market_events++;
    this.portfolio.updateHoldingPrice(event.symbol, event.price);

    const signals = this.strategy.calculateSignals(event);
    for (const signal of signals) {
      this.eventQueue.enqueue(signal);
    }
  }

  // Pass-through sizing: the suggested quantity becomes a MARKET order as-is
  private handleSignal(signal: SignalEvent): void {
    this.stats.signals++;

    const quantity = signal.suggested_quantity;
    if (quantity === undefined || !Number.isFinite(quantity) || quantity <= 0) {
      this.stats.rejected_signals++;
      logger.warn(`Signal for ${signal.symbol} has no or invalid quantity (${String(quantity)}), ignoring`);
      return;
    }

    const order = createOrderEvent({
      timestamp: signal.timestamp,
      symbol: signal.symbol,
      direction: signal.direction,
      quantity,
      order_type: 'MARKET',
      order_id: this.nextOrderId(signal)
    });
    this.eventQueue.enqueue(order);
  }

  private handleOrder(order: OrderEvent): void {
    this.stats.orders++;

    const referencePrice = this.feed.getLatestPrice(order.symbol, order.timestamp);
    if (referencePrice === null) {
      this.stats.rejected_orders++;
      logger.warn(`No price available for ${order.symbol} at ${order.timestamp.toISOString()}, order ${order.order_id} ignored`);
      return;
    }

    const fill = this.executionHandler.execute(order, referencePrice);
    if (!fill) {
      this.stats.rejected_orders++;
      return;
    }
    this.eventQueue.enqueue(fill);
  }

  private handleFill(fill: FillEvent): void {
    this.stats.fills++;

    try {
      this.portfolio.applyTransaction(transactionFromFill(fill));
    } catch (error) {
      if (!isDomainRejection(error)) throw error;

      this.stats.rejected_fills++;
      logger.warn(`Fill rejected (${error.reason}): ${error.message}`);
    }
  }

  private handleDividend(event: DividendEvent): void {
    this.stats.dividends++;
    this.portfolio.applyDividend(event);
  }

  private recordDailySnapshot(): void {
    const today = dateKey(this.clock);
    const isNewDay = this.lastRecordedDate === null || today > this.lastRecordedDate;

    if (isNewDay && today <= this.endDateKey) {
      this.portfolio.recordSnapshot(this.clock);
      this.lastRecordedDate = today;
    }
  }

  // Closing snapshot for a run that never recorded its final day
  private finalize(): void {
    if (this.lastRecordedDate !== null && this.lastRecordedDate >= this.endDateKey) return;

    const current = this.portfolio.getCurrentTime();
    const currentKey = dateKey(current);
    const alreadyRecorded = this.lastRecordedDate !== null && currentKey <= this.lastRecordedDate;

    if (!alreadyRecorded && !isAfter(current, this.endDate)) {
      this.portfolio.recordSnapshot(current);
      this.lastRecordedDate = currentKey;
    }
  }

  private nextOrderId(signal: SignalEvent): string {
    this.orderSequence++;
    return `${signal.symbol}_${signal.timestamp.getTime()}_${this.orderSequence}`;
  }

  private buildResult(): BacktestResult {
    const snapshots = this.portfolio.getSnapshots();
    const transactions = this.portfolio.getTransactions();
    const finalNetValue = this.portfolio.getNetValue();

    const metrics = PerformanceAnalyzer.calculateMetrics({
      snapshots,
      transactions,
      initial_cash: this.portfolio.getInitialCash(),
      final_net_value: finalNetValue,
      realized_pnl: this.portfolio.getRealizedPnl(),
      dividend_income: this.portfolio.getDividendsReceived()
    }, this.riskFreeRate);

    return {
      snapshots,
      transactions,
      dividends: this.portfolio.getDividends(),
      final_cash: this.portfolio.getCash(),
      final_net_value: finalNetValue,
      metrics,
      stats: { ...this.stats },
      benchmark_ticker: this.benchmarkTicker
    };
  }

  getState(): EngineState {
    return this.state;
  }

  getPortfolio(): PortfolioView {
    return this.portfolio;
  }

  getQueueSize(): number {
    return this.eventQueue.size();
  }
}
