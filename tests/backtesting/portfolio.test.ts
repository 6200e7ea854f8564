import { describe, test, expect, beforeEach } from '@jest/globals';
import { PortfolioManager } from '../../backend/src/services/backtesting/PortfolioManager';
import { createTransaction } from '../../backend/src/services/backtesting/Transaction';
import { createDividendEvent } from '../../backend/src/services/backtesting/events';
import { ContractViolationError, DomainRejectionError } from '../../backend/src/services/backtesting/errors';
import { TradeDirection } from '../../backend/src/services/backtesting/types';
import { catchError, day } from '../utils/testHelpers';

function trade(direction: TradeDirection, symbol: string, quantity: number, price: number, commission: number = 0) {
  return createTransaction({ timestamp: day('2023-01-03', 10), symbol, direction, quantity, price, commission });
}

function stateOf(portfolio: PortfolioManager) {
  return {
    cash: portfolio.getCash(),
    holdings: portfolio.getHoldings(),
    transactions: portfolio.getTransactions().length,
    net: portfolio.getNetValue()
  };
}

describe('PortfolioManager', () => {
  let portfolio: PortfolioManager;

  beforeEach(() => {
    portfolio = new PortfolioManager(100000, day('2023-01-03', 9));
  });

  describe('cash mutators', () => {
    test('addCash and removeCash adjust the balance', () => {
      portfolio.addCash(250.5);
      portfolio.removeCash(0.5);
      expect(portfolio.getCash()).toBe(100250);
    });

    test('negative amounts are contract violations', () => {
      expect(() => portfolio.addCash(-1)).toThrow(ContractViolationError);
      expect(() => portfolio.removeCash(-1)).toThrow(ContractViolationError);
    });

    test('removing more than available is an insufficient funds rejection', () => {
      const error = catchError(() => portfolio.removeCash(100000.01));
      expect(error).toBeInstanceOf(DomainRejectionError);
      expect(error).toMatchObject({ reason: 'INSUFFICIENT_FUNDS' });
      expect(portfolio.getCash()).toBe(100000);
    });

    test('rejects a negative initial balance', () => {
      expect(() => new PortfolioManager(-5)).toThrow(ContractViolationError);
    });
  });

  test('buy, mark and partial sell scenario', () => {
    portfolio.applyTransaction(trade('BUY', 'AAPL', 10, 150, 5));
    expect(portfolio.getCash()).toBe(98495);
    expect(portfolio.getHolding('AAPL')?.quantity).toBe(10);
    expect(portfolio.getHolding('AAPL')?.average_cost).toBe(150);

    portfolio.updateHoldingPrice('AAPL', 152);
    expect(portfolio.getNetValue()).toBe(100015);

    portfolio.applyTransaction(trade('SELL', 'AAPL', 5, 155, 5));
    expect(portfolio.getCash()).toBe(99265);
    expect(portfolio.getHolding('AAPL')?.quantity).toBe(5);
    expect(portfolio.getHolding('AAPL')?.average_cost).toBe(150);
    // the sale does not re-mark the holding
    expect(portfolio.getTotalHoldingsValue()).toBe(760);
    expect(portfolio.getNetValue()).toBe(100025);
    expect(portfolio.getRealizedPnl()).toBe(20);
    expect(portfolio.getTransactions()).toHaveLength(2);
  });

  test('selling a ticker never held leaves state unchanged', () => {
    portfolio.applyTransaction(trade('BUY', 'AAPL', 10, 150, 5));
    const before = stateOf(portfolio);

    const error = catchError(() => portfolio.applyTransaction(trade('SELL', 'MSFT', 1, 300, 1)));
    expect(error).toBeInstanceOf(DomainRejectionError);
    expect(error).toMatchObject({ reason: 'NOT_HELD' });
    expect(stateOf(portfolio)).toEqual(before);
  });

  test('overselling is rejected without touching cash or the holding', () => {
    portfolio.applyTransaction(trade('BUY', 'AAPL', 5, 100, 1));
    const before = stateOf(portfolio);

    const error = catchError(() => portfolio.applyTransaction(trade('SELL', 'AAPL', 6, 100, 1)));
    expect(error).toMatchObject({ reason: 'INSUFFICIENT_POSITION' });
    expect(stateOf(portfolio)).toEqual(before);
  });

  test('a buy that cannot be afforded is rejected atomically', () => {
    const small = new PortfolioManager(1000);
    const error = catchError(() => small.applyTransaction(trade('BUY', 'AAPL', 10, 100, 1)));

    expect(error).toMatchObject({ reason: 'INSUFFICIENT_FUNDS' });
    expect(small.getCash()).toBe(1000);
    expect(small.getHolding('AAPL')).toBeNull();
    expect(small.getTransactions()).toHaveLength(0);
  });

  test('a buy costing exactly the available cash is allowed', () => {
    const exact = new PortfolioManager(1001);
    exact.applyTransaction(trade('BUY', 'AAPL', 10, 100, 1));
    expect(exact.getCash()).toBe(0);
  });

  test('an unknown transaction side is rejected', () => {
    const before = stateOf(portfolio);
    const tx = trade('SHORT' as unknown as TradeDirection, 'AAPL', 1, 10);

    const error = catchError(() => portfolio.applyTransaction(tx));
    expect(error).toMatchObject({ reason: 'UNKNOWN_TRANSACTION_SIDE', message: 'Unknown transaction type: SHORT' });
    expect(stateOf(portfolio)).toEqual(before);
  });

  test('round trip at the same price with zero commission restores cash exactly', () => {
    const account = new PortfolioManager(12345.67);
    account.applyTransaction(trade('BUY', 'XYZ', 7, 13.37));
    account.applyTransaction(trade('SELL', 'XYZ', 7, 13.37));

    expect(account.getCash()).toBe(12345.67);
    expect(account.getHolding('XYZ')).toBeNull();
    expect(Object.keys(account.getHoldings())).toEqual([]);
  });

  test('cash stays non-negative and net value stays consistent over a trade sequence', () => {
    let seed = 42;
    const next = () => {
      seed = (seed * 1103515245 + 12345) % 2147483648;
      return seed / 2147483648;
    };
    const symbols = ['AAA', 'BBB', 'CCC'];
    const account = new PortfolioManager(5000);

    for (let i = 0; i < 300; i++) {
      const symbol = symbols[Math.floor(next() * symbols.length)];
      const price = Math.round((5 + next() * 95) * 100) / 100;
      const quantity = 1 + Math.floor(next() * 20);
      const direction: TradeDirection = next() < 0.55 ? 'BUY' : 'SELL';

      try {
        account.applyTransaction(trade(direction, symbol, quantity, price, 1));
      } catch (error) {
        expect(error).toBeInstanceOf(DomainRejectionError);
      }
      account.updateHoldingPrice(symbol, price);

      const holdings = account.getHoldings();
      const marked = Object.values(holdings).reduce((sum, h) => sum + h.quantity * h.last_price, 0);
      expect(account.getCash()).toBeGreaterThanOrEqual(0);
      expect(account.getNetValue()).toBeCloseTo(account.getCash() + marked, 6);
      Object.values(holdings).forEach(h => expect(h.quantity).toBeGreaterThan(0));
    }
  });

  test('getHolding returns a frozen copy that cannot change the position', () => {
    const account = new PortfolioManager(1000);
    account.applyTransaction(trade('BUY', 'AAPL', 2, 100));

    const held = account.getHolding('AAPL');
    expect(held).toEqual({ quantity: 2, average_cost: 100, last_price: 100, market_value: 200 });
    expect(() => {
      if (held) held.quantity = 50;
    }).toThrow(TypeError);

    expect(account.getHoldings()).toEqual({
      AAPL: { quantity: 2, average_cost: 100, last_price: 100, market_value: 200 }
    });
    expect(account.getCash()).toBe(800);
    expect(account.getNetValue()).toBe(1000);
  });

  test('marking an unheld ticker has no effect', () => {
    portfolio.updateHoldingPrice('TSLA', 200);
    expect(portfolio.getHoldings()).toEqual({});
    expect(portfolio.getNetValue()).toBe(100000);
  });

  describe('dividends', () => {
    test('credit quantity times dividend per share without a ledger entry', () => {
      portfolio.applyTransaction(trade('BUY', 'AAPL', 5, 100, 0));
      portfolio.applyDividend(createDividendEvent({
        timestamp: day('2023-02-10'), symbol: 'AAPL', dividend_per_share: 0.24, payment_date: day('2023-02-16')
      }));

      expect(portfolio.getCash()).toBe(99501.2);
      expect(portfolio.getTransactions()).toHaveLength(1);
      expect(portfolio.getDividendsReceived()).toBe(1.2);
      expect(portfolio.getDividends()[0]).toMatchObject({ symbol: 'AAPL', quantity: 5, amount: 1.2 });
    });

    test('are ignored for tickers not held', () => {
      portfolio.applyDividend(createDividendEvent({ timestamp: day('2023-02-10'), symbol: 'MSFT', dividend_per_share: 1 }));
      expect(portfolio.getCash()).toBe(100000);
      expect(portfolio.getDividends()).toEqual([]);
    });
  });

  describe('time and snapshots', () => {
    test('advanceTime only moves forward', () => {
      portfolio.advanceTime(day('2023-01-05'));
      portfolio.advanceTime(day('2023-01-04'));
      expect(portfolio.getCurrentTime().toISOString()).toBe('2023-01-05T16:00:00.000Z');
      expect(portfolio.getStartTime().toISOString()).toBe('2023-01-03T09:00:00.000Z');
    });

    test('advanceTime rejects an invalid timestamp', () => {
      expect(() => portfolio.advanceTime(new Date('garbage'))).toThrow(ContractViolationError);
    });

    test('recordSnapshot captures valuation and per-holding detail', () => {
      portfolio.applyTransaction(trade('BUY', 'AAPL', 10, 150, 5));
      portfolio.updateHoldingPrice('AAPL', 152);

      const snapshot = portfolio.recordSnapshot(day('2023-01-03'));
      expect(snapshot).toEqual({
        timestamp: day('2023-01-03'),
        net_value: 100015,
        cash: 98495,
        holdings_value: 1520,
        holdings: {
          AAPL: { quantity: 10, average_cost: 150, last_price: 152, market_value: 1520 }
        }
      });
      expect(portfolio.getSnapshots()).toHaveLength(1);
    });

    test('snapshots handed out are copies of the recorded series', () => {
      portfolio.applyTransaction(trade('BUY', 'AAPL', 10, 150, 5));
      const recorded = portfolio.recordSnapshot(day('2023-01-03'));

      recorded.net_value = 0;
      recorded.timestamp.setTime(0);
      const listed = portfolio.getSnapshots()[0];
      listed.cash = 0;
      listed.holdings.AAPL = { quantity: 1, average_cost: 1, last_price: 1, market_value: 1 };

      const stored = portfolio.getSnapshots()[0];
      expect(stored.net_value).toBe(99995);
      expect(stored.cash).toBe(98495);
      expect(stored.timestamp.toISOString()).toBe('2023-01-03T16:00:00.000Z');
      expect(stored.holdings.AAPL.quantity).toBe(10);
    });
  });
});
