import express from 'express';
import { z } from 'zod';
import { BacktestingService } from '../services/backtesting';
import { backtestConfigSchema } from '../config/backtest';
import { createDividendEvent, createMarketDataEvent } from '../services/backtesting/events';

const router = express.Router();
const backtestingService = new BacktestingService();

// Request validation schemas
const isoDate = z.string().min(1).refine(value => !Number.isNaN(new Date(value).getTime()), 'Invalid date');

const barSchema = z.object({
  date: isoDate,
  symbol: z.string().trim().min(1),
  open: z.number().min(0).optional(),
  high: z.number().min(0).optional(),
  low: z.number().min(0).optional(),
  close: z.number().min(0),
  volume: z.number().min(0).optional()
});

const dividendSchema = z.object({
  date: isoDate,
  symbol: z.string().trim().min(1),
  dividend_per_share: z.number().min(0),
  payment_date: isoDate.optional()
});

const strategySchema = z.object({
  type: z.literal('buy_and_hold'),
  id: z.string().min(1).default('buy-and-hold'),
  allocations: z.record(z.number().positive())
});

const runBacktestSchema = z.object({
  config: backtestConfigSchema,
  strategy: strategySchema,
  bars: z.array(barSchema).min(1),
  dividends: z.array(dividendSchema).default([])
});

// Run a backtest synchronously and return snapshots, ledger and metrics
router.post('/run', (req, res, next) => {
  try {
    const body = runBacktestSchema.parse(req.body);

    const bars = body.bars.map(bar => createMarketDataEvent({
      timestamp: new Date(bar.date),
      symbol: bar.symbol,
      price: bar.close,
      open: bar.open,
      high: bar.high,
      low: bar.low,
      volume: bar.volume
    }));

    const dividends = body.dividends.map(dividend => createDividendEvent({
      timestamp: new Date(dividend.date),
      symbol: dividend.symbol,
      dividend_per_share: dividend.dividend_per_share,
      payment_date: dividend.payment_date ? new Date(dividend.payment_date) : undefined
    }));

    const result = backtestingService.runBacktest({
      config: body.config.config,
      commission: body.config.commission,
      strategy: body.strategy,
      bars,
      dividends
    });

    res.json({ success: true, result });
  } catch (error) {
    next(error);
  }
});

export default router;
