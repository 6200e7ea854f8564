import Big from 'big.js';
import { HoldingSnapshot } from './types';
import {
  ContractViolationError,
  DomainRejectionError,
  assertNonNegative,
  assertPositive
} from './errors';

/**
 * Position state for one security. Market value is always derived from
 * quantity and last price, never stored.
 */
export class Holding {
  readonly symbol: string;
  private qty: Big;
  private avgCost: Big;
  private lastPrice: Big;

  constructor(symbol: string, initialQuantity: number = 0, initialAvgCost: number = 0) {
    if (typeof symbol !== 'string' || symbol.trim() === '') {
      throw new ContractViolationError('INVALID_ARGUMENT', 'Holding symbol must be a non-empty string');
    }
    assertNonNegative(initialQuantity, 'initial quantity');
    assertNonNegative(initialAvgCost, 'initial average cost');

    this.symbol = symbol;
    this.qty = new Big(initialQuantity);
    this.avgCost = initialQuantity > 0 ? new Big(initialAvgCost) : new Big(0);
    this.lastPrice = new Big(initialAvgCost);
  }

  get quantity(): number {
    return this.qty.toNumber();
  }

  get averageCost(): number {
    return this.avgCost.toNumber();
  }

  get lastKnownPrice(): number {
    return this.lastPrice.toNumber();
  }

  get marketValue(): number {
    return this.marketValueDecimal().toNumber();
  }

  marketValueDecimal(): Big {
    return this.qty.times(this.lastPrice);
  }

  updatePrice(price: number): void {
    assertNonNegative(price, 'price');
    this.lastPrice = new Big(price);
  }

  addShares(quantity: number, price: number): void {
    assertPositive(quantity, 'quantity to add');
    assertNonNegative(price, 'price');

    const added = new Big(quantity);
    const newQty = this.qty.plus(added);
    this.avgCost = this.avgCost.times(this.qty).plus(added.times(price)).div(newQty);
    this.qty = newQty;
    this.lastPrice = new Big(price);
  }

  /**
   * Returns the cost basis of the removed shares, computed before any reset.
   */
  removeShares(quantity: number): number {
    assertPositive(quantity, 'quantity to remove');
    if (this.qty.lt(quantity)) {
      throw new DomainRejectionError(
        'INSUFFICIENT_POSITION',
        `Cannot remove ${quantity} shares of ${this.symbol}: only ${this.quantity} held`
      );
    }

    const costBasis = this.avgCost.times(quantity);
    this.qty = this.qty.minus(quantity);
    if (this.qty.eq(0)) {
      this.avgCost = new Big(0);
    }
    return costBasis.toNumber();
  }

  canRemove(quantity: number): boolean {
    return this.qty.gte(quantity);
  }

  toSnapshot(): HoldingSnapshot {
    return Object.freeze({
      quantity: this.quantity,
      average_cost: this.averageCost,
      last_price: this.lastKnownPrice,
      market_value: this.marketValue
    });
  }
}
