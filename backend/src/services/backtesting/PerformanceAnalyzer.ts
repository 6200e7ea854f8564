import { PerformanceMetrics, PortfolioSnapshot, Transaction } from './types';

const TRADING_DAYS_PER_YEAR = 252;

export interface PerformanceInput {
  snapshots: PortfolioSnapshot[];
  transactions: Transaction[];
  initial_cash: number;
  final_net_value: number;
  realized_pnl: number;
  dividend_income: number;
}

export class PerformanceAnalyzer {

  // Metrics over the daily snapshot series and the trade ledger
  static calculateMetrics(
    input: PerformanceInput,
    riskFreeRate: number = 0.02 // 2% annual risk-free rate
  ): PerformanceMetrics {
    const { snapshots, transactions, initial_cash, final_net_value } = input;

    const totalReturn = initial_cash > 0 ? (final_net_value - initial_cash) / initial_cash : 0;
    const dailyReturns = this.calculateDailyReturns(snapshots, initial_cash);
    const periods = dailyReturns.length;

    const annualizedReturn = periods > 0 && 1 + totalReturn > 0
      ? Math.pow(1 + totalReturn, TRADING_DAYS_PER_YEAR / periods) - 1
      : periods > 0 ? -1 : 0;

    const meanReturn = periods > 0
      ? dailyReturns.reduce((sum, r) => sum + r, 0) / periods : 0;
    const variance = periods > 0
      ? dailyReturns.reduce((sum, r) => sum + Math.pow(r - meanReturn, 2), 0) / periods : 0;
    const volatility = Math.sqrt(variance * TRADING_DAYS_PER_YEAR); // Annualized

    const sharpeRatio = volatility > 0 ? (annualizedReturn - riskFreeRate) / volatility : 0;

    return {
      total_return: totalReturn,
      annualized_return: annualizedReturn,
      daily_returns: dailyReturns,
      volatility,
      sharpe_ratio: sharpeRatio,
      max_drawdown: this.calculateMaxDrawdown(snapshots, initial_cash),
      total_trades: transactions.length,
      total_commission: transactions.reduce((sum, tx) => sum + tx.commission, 0),
      realized_pnl: input.realized_pnl,
      dividend_income: input.dividend_income
    };
  }

  // Period-over-period returns, the first one measured against the starting cash
  static calculateDailyReturns(snapshots: PortfolioSnapshot[], initialValue: number): number[] {
    const returns: number[] = [];
    let previous = initialValue;

    for (const snapshot of snapshots) {
      if (previous > 0) {
        returns.push((snapshot.net_value - previous) / previous);
      }
      previous = snapshot.net_value;
    }
    return returns;
  }

  static calculateMaxDrawdown(snapshots: PortfolioSnapshot[], initialValue: number): number {
    let peak = initialValue;
    let maxDrawdown = 0;

    for (const snapshot of snapshots) {
      if (snapshot.net_value > peak) peak = snapshot.net_value;
      if (peak > 0) {
        maxDrawdown = Math.max(maxDrawdown, (peak - snapshot.net_value) / peak);
      }
    }
    return maxDrawdown;
  }
}
