import fs from 'fs';
import { pipeline } from 'stream';
import csv from 'csv-parser';
import { DividendEvent, MarketDataEvent } from './types';
import { createDividendEvent, createMarketDataEvent } from './events';
import { ContractViolationError } from './errors';
import { logger } from '../../utils/logger';

type CsvRow = Record<string, string>;

function readCsvRows(filePath: string): Promise<CsvRow[]> {
  if (!fs.existsSync(filePath)) {
    return Promise.reject(new ContractViolationError('INVALID_ARGUMENT', `CSV file not found: ${filePath}`));
  }

  return new Promise((resolve, reject) => {
    const rows: CsvRow[] = [];
    const parser = csv({ mapHeaders: ({ header }) => header.trim().toLowerCase() })
      .on('data', (row: CsvRow) => rows.push(row))
      .on('end', () => resolve(rows));

    // pipeline reports read errors (EISDIR, EACCES) as well as parse errors
    pipeline(fs.createReadStream(filePath), parser, error => {
      if (error) {
        reject(new ContractViolationError('INVALID_ARGUMENT', `Cannot read CSV file ${filePath}: ${error.message}`));
      }
    });
  });
}

function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

function parseDate(raw: string | undefined): Date | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = new Date(raw.trim());
  return Number.isNaN(value.getTime()) ? undefined : value;
}

/**
 * Reads `date,symbol,open,high,low,close,volume` rows into market data events.
 * Rows without a usable date, symbol or close are skipped.
 */
export async function loadBarsFromCsv(filePath: string): Promise<MarketDataEvent[]> {
  const rows = await readCsvRows(filePath);
  const bars: MarketDataEvent[] = [];
  let skipped = 0;

  for (const row of rows) {
    const timestamp = parseDate(row['date']);
    const symbol = row['symbol']?.trim();
    const close = parseNumber(row['close']);

    if (!timestamp || !symbol || close === undefined || close < 0) {
      skipped++;
      continue;
    }

    bars.push(createMarketDataEvent({
      timestamp,
      symbol,
      price: close,
      open: parseNumber(row['open']),
      high: parseNumber(row['high']),
      low: parseNumber(row['low']),
      volume: parseNumber(row['volume'])
    }));
  }

  if (skipped > 0) {
    logger.warn(`Skipped ${skipped} malformed rows in ${filePath}`);
  }
  logger.info(`Loaded ${bars.length} bars from ${filePath}`);
  return bars;
}

// `date,symbol,dividend_per_share[,payment_date]`
export async function loadDividendsFromCsv(filePath: string): Promise<DividendEvent[]> {
  const rows = await readCsvRows(filePath);
  const dividends: DividendEvent[] = [];

  for (const row of rows) {
    const timestamp = parseDate(row['date']);
    const symbol = row['symbol']?.trim();
    const amount = parseNumber(row['dividend_per_share']);

    if (!timestamp || !symbol || amount === undefined || amount < 0) {
      logger.warn(`Skipping malformed dividend row in ${filePath}`, row);
      continue;
    }

    dividends.push(createDividendEvent({
      timestamp,
      symbol,
      dividend_per_share: amount,
      payment_date: parseDate(row['payment_date'])
    }));
  }

  return dividends;
}
