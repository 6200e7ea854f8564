// Event-Driven Backtesting Engine Core Types

export type TradeDirection = 'BUY' | 'SELL';

export type OrderType = 'MARKET' | 'LIMIT';

export type EventType = 'MARKET_DATA' | 'SIGNAL' | 'ORDER' | 'FILL' | 'DIVIDEND';

export interface MarketDataEvent {
  readonly type: 'MARKET_DATA';
  readonly timestamp: Date;
  readonly symbol: string;
  readonly price: number; // close of the bar, used as the mark
  readonly open?: number;
  readonly high?: number;
  readonly low?: number;
  readonly volume?: number;
}

export interface SignalEvent {
  readonly type: 'SIGNAL';
  readonly timestamp: Date;
  readonly symbol: string;
  readonly direction: TradeDirection;
  readonly suggested_quantity?: number;
  readonly strength?: number; // 0-1 confidence
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export interface OrderEvent {
  readonly type: 'ORDER';
  readonly timestamp: Date;
  readonly symbol: string;
  readonly direction: TradeDirection;
  readonly quantity: number;
  readonly order_type: OrderType;
  readonly limit_price?: number;
  readonly order_id: string;
}

export interface FillEvent {
  readonly type: 'FILL';
  readonly timestamp: Date;
  readonly symbol: string;
  readonly direction: TradeDirection;
  readonly quantity: number;
  readonly fill_price: number;
  readonly commission: number;
  readonly order_id?: string;
}

export interface DividendEvent {
  readonly type: 'DIVIDEND';
  readonly timestamp: Date; // ex-date for simulation purposes
  readonly symbol: string;
  readonly dividend_per_share: number;
  readonly ex_date: Date;
  readonly payment_date: Date;
}

export type BacktestEvent =
  | MarketDataEvent
  | SignalEvent
  | OrderEvent
  | FillEvent
  | DividendEvent;

// Events the data feed is allowed to produce
export type FeedEvent = MarketDataEvent | DividendEvent;

export interface Transaction {
  readonly timestamp: Date;
  readonly symbol: string;
  readonly direction: TradeDirection;
  readonly quantity: number;
  readonly price: number;
  readonly commission: number;
  readonly order_id?: string;
}

export interface DividendRecord {
  readonly timestamp: Date;
  readonly symbol: string;
  readonly quantity: number;
  readonly dividend_per_share: number;
  readonly amount: number;
  readonly payment_date: Date;
}

export interface HoldingSnapshot {
  quantity: number;
  average_cost: number;
  last_price: number;
  market_value: number;
}

export interface PortfolioSnapshot {
  timestamp: Date;
  net_value: number;
  cash: number;
  holdings_value: number;
  holdings: Record<string, HoldingSnapshot>;
}

export interface CommissionModel {
  per_share: number;
  pct: number;
  minimum: number;
}

export interface BacktestConfig {
  start_date: Date;
  end_date: Date; // inclusive upper bound
  initial_cash: number;
  benchmark_ticker?: string; // informational only
  risk_free_rate?: number;
}

export type EngineState = 'RUNNING' | 'DRAINING_QUEUE' | 'STOPPED';

export interface BacktestStats {
  events_processed: number;
  market_events: number;
  signals: number;
  orders: number;
  fills: number;
  dividends: number;
  rejected_signals: number;
  rejected_orders: number;
  rejected_fills: number;
  skipped_feed_events: number;
}

export interface PerformanceMetrics {
  // Returns
  total_return: number;
  annualized_return: number;
  daily_returns: number[];

  // Risk
  volatility: number;
  sharpe_ratio: number;
  max_drawdown: number;

  // Trading activity
  total_trades: number;
  total_commission: number;
  realized_pnl: number;
  dividend_income: number;
}

export interface BacktestResult {
  snapshots: PortfolioSnapshot[];
  transactions: Transaction[];
  dividends: DividendRecord[];
  final_cash: number;
  final_net_value: number;
  metrics: PerformanceMetrics;
  stats: BacktestStats;
  benchmark_ticker?: string;
}
