import Big from 'big.js';
import { Holding } from './Holding';
import {
  DividendEvent,
  DividendRecord,
  HoldingSnapshot,
  PortfolioSnapshot,
  Transaction
} from './types';
import {
  ContractViolationError,
  DomainRejectionError,
  assertNonNegative,
  assertValidDate
} from './errors';
import { logger } from '../../utils/logger';

// Read side handed out by the engine; mutation stays with the owner
export interface PortfolioView {
  getCash(): number;
  getInitialCash(): number;
  getNetValue(): number;
  getTotalHoldingsValue(): number;
  getHolding(symbol: string): HoldingSnapshot | null;
  getHoldings(): Record<string, HoldingSnapshot>;
  getTransactions(): Transaction[];
  getDividends(): DividendRecord[];
  getDividendsReceived(): number;
  getRealizedPnl(): number;
  getSnapshots(): PortfolioSnapshot[];
  getStartTime(): Date;
  getCurrentTime(): Date;
}

/**
 * Cash, holdings, trade ledger and daily snapshot series for one run.
 *
 * State changes only through applyTransaction / applyDividend and the two
 * cash mutators. Every transaction is validated in full before the first
 * mutation, so a rejected transaction leaves the portfolio untouched.
 */
export class PortfolioManager implements PortfolioView {
  private cash: Big;
  private holdings: Map<string, Holding> = new Map();
  private transactions: Transaction[] = [];
  private dividends: DividendRecord[] = [];
  private snapshots: PortfolioSnapshot[] = [];
  private realizedPnl: Big = new Big(0);

  private readonly initialCash: number;
  private readonly startTime: Date;
  private currentTime: Date;

  constructor(initialCash: number, startTime: Date = new Date()) {
    assertNonNegative(initialCash, 'initial cash');
    assertValidDate(startTime, 'start time');

    this.initialCash = initialCash;
    this.cash = new Big(initialCash);
    this.startTime = new Date(startTime.getTime());
    this.currentTime = new Date(startTime.getTime());
  }

  // Cash mutators

  addCash(amount: number | Big): void {
    this.cash = this.cash.plus(this.toAmount(amount, 'amount to add'));
  }

  removeCash(amount: number | Big): void {
    const value = this.toAmount(amount, 'amount to remove');
    if (value.gt(this.cash)) {
      throw new DomainRejectionError(
        'INSUFFICIENT_FUNDS',
        `Cannot remove ${value.toFixed(2)}: insufficient cash. Available: ${this.cash.toFixed(2)}`
      );
    }
    this.cash = this.cash.minus(value);
  }

  private toAmount(amount: number | Big, label: string): Big {
    if (typeof amount === 'number') {
      assertNonNegative(amount, label);
      return new Big(amount);
    }
    if (amount.lt(0)) {
      throw new ContractViolationError('INVALID_ARGUMENT', `${label} must be non-negative, got ${amount.toString()}`);
    }
    return amount;
  }

  // Valuation

  updateHoldingPrice(symbol: string, price: number): void {
    assertNonNegative(price, 'price');
    this.holdings.get(symbol)?.updatePrice(price);
  }

  getTotalHoldingsValue(): number {
    return this.holdingsValueDecimal().toNumber();
  }

  getNetValue(): number {
    return this.holdingsValueDecimal().plus(this.cash).toNumber();
  }

  private holdingsValueDecimal(): Big {
    let total = new Big(0);
    this.holdings.forEach(holding => {
      total = total.plus(holding.marketValueDecimal());
    });
    return total;
  }

  // Transactions

  applyTransaction(tx: Transaction): void {
    switch (tx.direction) {
      case 'BUY':
        this.applyBuy(tx);
        break;
      case 'SELL':
        this.applySell(tx);
        break;
      default: {
        const side: never = tx.direction;
        throw new DomainRejectionError('UNKNOWN_TRANSACTION_SIDE', `Unknown transaction type: ${String(side)}`);
      }
    }

    this.transactions.push(tx);
  }

  private applyBuy(tx: Transaction): void {
    const commission = new Big(tx.commission);
    const cost = new Big(tx.quantity).times(tx.price);
    const total = commission.plus(cost);

    if (total.gt(this.cash)) {
      throw new DomainRejectionError(
        'INSUFFICIENT_FUNDS',
        `Cannot buy ${tx.quantity} ${tx.symbol} @ ${tx.price}: needs ${total.toFixed(2)}, available ${this.cash.toFixed(2)}`
      );
    }

    this.removeCash(commission);
    this.removeCash(cost);

    let holding = this.holdings.get(tx.symbol);
    if (!holding) {
      holding = new Holding(tx.symbol);
      this.holdings.set(tx.symbol, holding);
    }
    holding.addShares(tx.quantity, tx.price);
  }

  private applySell(tx: Transaction): void {
    const holding = this.holdings.get(tx.symbol);
    if (!holding) {
      throw new DomainRejectionError('NOT_HELD', `Attempted to sell ${tx.symbol} but not in holdings`);
    }
    if (!holding.canRemove(tx.quantity)) {
      throw new DomainRejectionError(
        'INSUFFICIENT_POSITION',
        `Cannot sell ${tx.quantity} ${tx.symbol}: only ${holding.quantity} held`
      );
    }

    const commission = new Big(tx.commission);
    if (commission.gt(this.cash)) {
      throw new DomainRejectionError(
        'INSUFFICIENT_FUNDS',
        `Cannot pay commission ${commission.toFixed(2)} on ${tx.symbol} sale. Available: ${this.cash.toFixed(2)}`
      );
    }

    const proceeds = new Big(tx.quantity).times(tx.price);
    this.removeCash(commission);
    this.addCash(proceeds);

    const costBasis = holding.removeShares(tx.quantity);
    this.realizedPnl = this.realizedPnl.plus(proceeds).minus(costBasis).minus(commission);

    if (holding.quantity === 0) {
      this.holdings.delete(tx.symbol);
    }
  }

  applyDividend(event: DividendEvent): void {
    const holding = this.holdings.get(event.symbol);
    if (!holding) {
      logger.debug(`Dividend for ${event.symbol} ignored: not held`);
      return;
    }

    const amount = new Big(holding.quantity).times(event.dividend_per_share);
    this.addCash(amount);
    this.dividends.push(Object.freeze({
      timestamp: new Date(event.timestamp.getTime()),
      symbol: event.symbol,
      quantity: holding.quantity,
      dividend_per_share: event.dividend_per_share,
      amount: amount.toNumber(),
      payment_date: new Date(event.payment_date.getTime())
    }));
  }

  // Time and snapshots

  advanceTime(timestamp: Date): void {
    assertValidDate(timestamp, 'timestamp');
    if (timestamp.getTime() > this.currentTime.getTime()) {
      this.currentTime = new Date(timestamp.getTime());
    }
  }

  // Callers decide the cadence; no per-date deduplication happens here
  recordSnapshot(timestamp: Date): PortfolioSnapshot {
    assertValidDate(timestamp, 'snapshot timestamp');

    const holdings: Record<string, HoldingSnapshot> = {};
    this.holdings.forEach((holding, symbol) => {
      holdings[symbol] = holding.toSnapshot();
    });

    const snapshot: PortfolioSnapshot = {
      timestamp: new Date(timestamp.getTime()),
      net_value: this.getNetValue(),
      cash: this.getCash(),
      holdings_value: this.getTotalHoldingsValue(),
      holdings
    };
    this.snapshots.push(snapshot);
    return copySnapshot(snapshot);
  }

  // Accessors

  getCash(): number {
    return this.cash.toNumber();
  }

  getInitialCash(): number {
    return this.initialCash;
  }

  getHolding(symbol: string): HoldingSnapshot | null {
    const holding = this.holdings.get(symbol);
    return holding ? holding.toSnapshot() : null;
  }

  getHoldings(): Record<string, HoldingSnapshot> {
    const result: Record<string, HoldingSnapshot> = {};
    this.holdings.forEach((holding, symbol) => {
      result[symbol] = holding.toSnapshot();
    });
    return result;
  }

  getTransactions(): Transaction[] {
    return [...this.transactions];
  }

  getDividends(): DividendRecord[] {
    return [...this.dividends];
  }

  getDividendsReceived(): number {
    return this.dividends.reduce((sum, record) => sum.plus(record.amount), new Big(0)).toNumber();
  }

  getRealizedPnl(): number {
    return this.realizedPnl.toNumber();
  }

  getSnapshots(): PortfolioSnapshot[] {
    return this.snapshots.map(copySnapshot);
  }

  getStartTime(): Date {
    return new Date(this.startTime.getTime());
  }

  getCurrentTime(): Date {
    return new Date(this.currentTime.getTime());
  }
}

function copySnapshot(snapshot: PortfolioSnapshot): PortfolioSnapshot {
  const holdings: Record<string, HoldingSnapshot> = {};
  Object.entries(snapshot.holdings).forEach(([symbol, detail]) => {
    holdings[symbol] = { ...detail };
  });
  return { ...snapshot, timestamp: new Date(snapshot.timestamp.getTime()), holdings };
}
