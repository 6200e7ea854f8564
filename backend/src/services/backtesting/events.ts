import {
  BacktestEvent,
  DividendEvent,
  EventType,
  FillEvent,
  MarketDataEvent,
  OrderEvent,
  SignalEvent,
  TradeDirection
} from './types';
import {
  ContractViolationError,
  assertNonNegative,
  assertPositive,
  assertValidDate
} from './errors';

const EVENT_TYPES: ReadonlySet<string> = new Set<EventType>([
  'MARKET_DATA',
  'SIGNAL',
  'ORDER',
  'FILL',
  'DIVIDEND'
]);

const DIRECTIONS: ReadonlySet<string> = new Set<TradeDirection>(['BUY', 'SELL']);

type EventInput<T extends BacktestEvent> = Omit<T, 'type'>;

// Events keep epoch milliseconds and hand out a fresh Date on every read
function epochOf(value: unknown, label: string): number {
  assertValidDate(value, label);
  return value.getTime();
}

function assertSymbol(symbol: unknown): void {
  if (typeof symbol !== 'string' || symbol.trim() === '') {
    throw new ContractViolationError('INVALID_ARGUMENT', 'symbol must be a non-empty string');
  }
}

function assertDirection(direction: unknown): void {
  if (typeof direction !== 'string' || !DIRECTIONS.has(direction)) {
    throw new ContractViolationError('INVALID_ARGUMENT', `direction must be BUY or SELL, got ${String(direction)}`);
  }
}

function assertOptionalNonNegative(value: number | undefined, label: string): void {
  if (value !== undefined) assertNonNegative(value, label);
}

export function createMarketDataEvent(input: EventInput<MarketDataEvent>): MarketDataEvent {
  assertSymbol(input.symbol);
  assertNonNegative(input.price, 'price');
  assertOptionalNonNegative(input.open, 'open');
  assertOptionalNonNegative(input.high, 'high');
  assertOptionalNonNegative(input.low, 'low');
  assertOptionalNonNegative(input.volume, 'volume');
  const time = epochOf(input.timestamp, 'timestamp');

  return Object.freeze({
    ...input,
    type: 'MARKET_DATA' as const,
    get timestamp() { return new Date(time); }
  });
}

// Signals are allowed to carry a missing or non-positive quantity; the engine rejects those
export function createSignalEvent(input: EventInput<SignalEvent>): SignalEvent {
  assertSymbol(input.symbol);
  assertDirection(input.direction);
  if (input.strength !== undefined && (input.strength < 0 || input.strength > 1)) {
    throw new ContractViolationError('INVALID_ARGUMENT', `strength must be within [0, 1], got ${input.strength}`);
  }

  const time = epochOf(input.timestamp, 'timestamp');

  return Object.freeze({
    ...input,
    type: 'SIGNAL' as const,
    get timestamp() { return new Date(time); },
    metadata: input.metadata ? Object.freeze({ ...input.metadata }) : undefined
  });
}

export function createOrderEvent(input: EventInput<OrderEvent>): OrderEvent {
  assertSymbol(input.symbol);
  assertDirection(input.direction);
  assertPositive(input.quantity, 'quantity');
  if (input.order_type === 'LIMIT' && input.limit_price === undefined) {
    throw new ContractViolationError('INVALID_ARGUMENT', 'LIMIT orders require a limit_price');
  }
  assertOptionalNonNegative(input.limit_price, 'limit_price');
  const time = epochOf(input.timestamp, 'timestamp');

  return Object.freeze({
    ...input,
    type: 'ORDER' as const,
    get timestamp() { return new Date(time); }
  });
}

export function createFillEvent(input: EventInput<FillEvent>): FillEvent {
  assertSymbol(input.symbol);
  assertDirection(input.direction);
  assertPositive(input.quantity, 'quantity');
  assertNonNegative(input.fill_price, 'fill_price');
  assertNonNegative(input.commission, 'commission');
  const time = epochOf(input.timestamp, 'timestamp');

  return Object.freeze({
    ...input,
    type: 'FILL' as const,
    get timestamp() { return new Date(time); }
  });
}

export interface DividendInput {
  timestamp: Date;
  symbol: string;
  dividend_per_share: number;
  ex_date?: Date;
  payment_date?: Date;
}

export function createDividendEvent(input: DividendInput): DividendEvent {
  assertSymbol(input.symbol);
  assertNonNegative(input.dividend_per_share, 'dividend_per_share');
  const time = epochOf(input.timestamp, 'timestamp');
  const exTime = input.ex_date ? epochOf(input.ex_date, 'ex_date') : time;
  const paymentTime = input.payment_date ? epochOf(input.payment_date, 'payment_date') : time;

  return Object.freeze({
    type: 'DIVIDEND' as const,
    get timestamp() { return new Date(time); },
    symbol: input.symbol,
    dividend_per_share: input.dividend_per_share,
    get ex_date() { return new Date(exTime); },
    get payment_date() { return new Date(paymentTime); }
  });
}

export function isBacktestEvent(value: unknown): value is BacktestEvent {
  if (typeof value !== 'object' || value === null) return false;
  if (!('type' in value) || !('timestamp' in value) || !('symbol' in value)) return false;

  return (
    typeof value.type === 'string' &&
    EVENT_TYPES.has(value.type) &&
    value.timestamp instanceof Date &&
    !Number.isNaN(value.timestamp.getTime()) &&
    typeof value.symbol === 'string'
  );
}

export function isAfter(a: Date, b: Date): boolean {
  return a.getTime() > b.getTime();
}

// UTC calendar date, e.g. 2023-01-05
export function dateKey(timestamp: Date): string {
  return timestamp.toISOString().split('T')[0];
}
