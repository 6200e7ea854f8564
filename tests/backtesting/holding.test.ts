import { describe, test, expect } from '@jest/globals';
import { Holding } from '../../backend/src/services/backtesting/Holding';
import { ContractViolationError, DomainRejectionError } from '../../backend/src/services/backtesting/errors';
import { catchError } from '../utils/testHelpers';

describe('Holding', () => {
  test('starts flat', () => {
    const holding = new Holding('AAPL');
    expect(holding.toSnapshot()).toEqual({ quantity: 0, average_cost: 0, last_price: 0, market_value: 0 });
  });

  test('rejects an empty symbol', () => {
    expect(() => new Holding('')).toThrow(ContractViolationError);
  });

  test('addShares updates weighted average cost and the mark', () => {
    const holding = new Holding('AAPL');
    holding.addShares(10, 150);
    expect(holding.quantity).toBe(10);
    expect(holding.averageCost).toBe(150);
    expect(holding.lastKnownPrice).toBe(150);
    expect(holding.marketValue).toBe(1500);

    holding.addShares(10, 160);
    expect(holding.quantity).toBe(20);
    expect(holding.averageCost).toBe(155);
    expect(holding.lastKnownPrice).toBe(160);
    expect(holding.marketValue).toBe(3200);
  });

  test('average cost equals the quantity-weighted mean of fill prices', () => {
    const fills: Array<[number, number]> = [[3, 101.25], [7, 99.5], [2, 103.75], [0.5, 98]];
    const holding = new Holding('MSFT');
    fills.forEach(([qty, price]) => holding.addShares(qty, price));

    const totalQty = fills.reduce((sum, [qty]) => sum + qty, 0);
    const weighted = fills.reduce((sum, [qty, price]) => sum + qty * price, 0) / totalQty;
    expect(holding.quantity).toBe(12.5);
    expect(holding.averageCost).toBeCloseTo(weighted, 10);
  });

  test('updatePrice re-marks market value and rejects negatives', () => {
    const holding = new Holding('AAPL');
    holding.addShares(20, 155);
    holding.updatePrice(170);
    expect(holding.marketValue).toBe(3400);
    expect(() => holding.updatePrice(-1)).toThrow(ContractViolationError);
    expect(holding.lastKnownPrice).toBe(170);
  });

  test('removeShares returns the removed cost basis and keeps average cost', () => {
    const holding = new Holding('AAPL');
    holding.addShares(20, 155);
    holding.updatePrice(170);

    expect(holding.removeShares(5)).toBe(775);
    expect(holding.quantity).toBe(15);
    expect(holding.averageCost).toBe(155);
    expect(holding.marketValue).toBe(2550);
  });

  test('removing the whole position resets average cost but keeps the mark', () => {
    const holding = new Holding('AAPL');
    holding.addShares(15, 155);
    holding.updatePrice(170);

    expect(holding.removeShares(15)).toBe(2325);
    expect(holding.toSnapshot()).toEqual({ quantity: 0, average_cost: 0, last_price: 170, market_value: 0 });
  });

  test('removing more than held is an insufficient position rejection', () => {
    const holding = new Holding('AAPL');
    holding.addShares(5, 100);

    const error = catchError(() => holding.removeShares(6));
    expect(error).toBeInstanceOf(DomainRejectionError);
    expect(error).toMatchObject({ reason: 'INSUFFICIENT_POSITION' });
    expect(holding.quantity).toBe(5);
    expect(holding.averageCost).toBe(100);
  });

  test('rejects non-positive quantities and negative prices', () => {
    const holding = new Holding('AAPL');
    expect(() => holding.addShares(0, 10)).toThrow(ContractViolationError);
    expect(() => holding.addShares(1, -10)).toThrow(ContractViolationError);
    expect(() => holding.removeShares(0)).toThrow(ContractViolationError);
    expect(() => holding.removeShares(-2)).toThrow(ContractViolationError);
  });
});
