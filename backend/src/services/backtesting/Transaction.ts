import { FillEvent, Transaction, TradeDirection } from './types';
import { assertNonNegative, assertPositive, assertValidDate } from './errors';

export interface TransactionInput {
  timestamp: Date;
  symbol: string;
  direction: TradeDirection;
  quantity: number;
  price: number;
  commission?: number;
  order_id?: string;
}

// Ledger records are frozen on creation and never mutated afterwards
export function createTransaction(input: TransactionInput): Transaction {
  assertValidDate(input.timestamp, 'transaction timestamp');
  assertPositive(input.quantity, 'transaction quantity');
  assertNonNegative(input.price, 'transaction price');
  const commission = input.commission ?? 0;
  assertNonNegative(commission, 'transaction commission');

  return Object.freeze({
    timestamp: new Date(input.timestamp.getTime()),
    symbol: input.symbol,
    direction: input.direction,
    quantity: input.quantity,
    price: input.price,
    commission,
    order_id: input.order_id
  });
}

export function transactionFromFill(fill: FillEvent): Transaction {
  return createTransaction({
    timestamp: fill.timestamp,
    symbol: fill.symbol,
    direction: fill.direction,
    quantity: fill.quantity,
    price: fill.fill_price,
    commission: fill.commission,
    order_id: fill.order_id
  });
}
