import dotenv from 'dotenv';

dotenv.config();

import { loadBacktestConfigFromEnv } from '../config/backtest';
import { BacktestingService } from '../services/backtesting';
import { logger } from '../utils/logger';

// BACKTEST_ALLOCATIONS="AAPL:10,MSFT:5"
export function parseAllocations(raw: string | undefined): Record<string, number> {
  const allocations: Record<string, number> = {};
  if (!raw) return allocations;

  for (const entry of raw.split(',')) {
    const [symbol, quantity] = entry.split(':').map(part => part.trim());
    const value = Number(quantity);
    if (!symbol || !Number.isFinite(value) || value <= 0) {
      throw new Error(`Invalid allocation entry "${entry}", expected SYMBOL:QUANTITY`);
    }
    allocations[symbol] = value;
  }
  return allocations;
}

async function main(): Promise<void> {
  const [barsPath, dividendsPath] = process.argv.slice(2);
  if (!barsPath) {
    throw new Error('Usage: runBacktest <bars.csv> [dividends.csv]');
  }

  const { config, commission } = loadBacktestConfigFromEnv();
  const service = new BacktestingService();

  const result = await service.runFromCsv({
    config,
    commission,
    strategy: {
      type: 'buy_and_hold',
      id: 'cli-buy-and-hold',
      allocations: parseAllocations(process.env.BACKTEST_ALLOCATIONS)
    },
    barsPath,
    dividendsPath
  });

  logger.info('\n=== BACKTEST RESULTS ===');
  logger.info(`Snapshots: ${result.snapshots.length}`);
  logger.info(`Transactions: ${result.transactions.length}`);
  logger.info(`Final cash: ${result.final_cash.toFixed(2)}`);
  logger.info(`Final net value: ${result.final_net_value.toFixed(2)}`);
  logger.info(`Total return: ${(result.metrics.total_return * 100).toFixed(2)}%`);
  logger.info(`Max drawdown: ${(result.metrics.max_drawdown * 100).toFixed(2)}%`);
}

if (require.main === module) {
  main().catch(error => {
    logger.error('Backtest failed:', error);
    process.exitCode = 1;
  });
}
