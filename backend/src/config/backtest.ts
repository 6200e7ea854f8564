import { z } from 'zod';
import { BacktestConfig, CommissionModel } from '../services/backtesting/types';

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

// A bare YYYY-MM-DD end date covers the whole day (inclusive boundary)
function parseTimestamp(value: string | Date, endOfDay: boolean): Date {
  if (value instanceof Date) return new Date(value.getTime());
  if (DATE_ONLY.test(value)) {
    return new Date(`${value}T${endOfDay ? '23:59:59.999' : '00:00:00.000'}Z`);
  }
  return new Date(value);
}

const timestampInput = z.union([z.string().trim().min(1), z.date()]);

export const commissionSchema = z.object({
  per_share: z.coerce.number().finite().min(0).default(0.005),
  pct: z.coerce.number().finite().min(0).default(0),
  minimum: z.coerce.number().finite().min(0).default(1.0)
});

export const backtestConfigSchema = z.object({
  start_date: timestampInput,
  end_date: timestampInput,
  initial_cash: z.coerce.number().finite().min(0).default(100000),
  benchmark_ticker: z.string().trim().min(1).optional(),
  risk_free_rate: z.coerce.number().finite().optional(),
  commission: commissionSchema.default({})
}).transform((input, ctx) => {
  const start = parseTimestamp(input.start_date, false);
  const end = parseTimestamp(input.end_date, true);

  if (Number.isNaN(start.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['start_date'], message: 'Invalid start_date' });
    return z.NEVER;
  }
  if (Number.isNaN(end.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['end_date'], message: 'Invalid end_date' });
    return z.NEVER;
  }
  if (start.getTime() > end.getTime()) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['end_date'], message: 'Start date must not be after end date' });
    return z.NEVER;
  }

  const config: BacktestConfig = {
    start_date: start,
    end_date: end,
    initial_cash: input.initial_cash,
    benchmark_ticker: input.benchmark_ticker,
    risk_free_rate: input.risk_free_rate
  };
  const commission: CommissionModel = input.commission;

  return { config, commission };
});

export type ParsedBacktestConfig = z.output<typeof backtestConfigSchema>;

export function parseBacktestConfig(input: unknown): ParsedBacktestConfig {
  return backtestConfigSchema.parse(input);
}

function optional(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

// Reads BACKTEST_* and COMMISSION_* variables (load .env with dotenv first)
export function loadBacktestConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ParsedBacktestConfig {
  return parseBacktestConfig({
    start_date: env.BACKTEST_START,
    end_date: env.BACKTEST_END,
    initial_cash: optional(env.BACKTEST_INITIAL_CASH),
    benchmark_ticker: optional(env.BACKTEST_BENCHMARK),
    risk_free_rate: optional(env.BACKTEST_RISK_FREE_RATE),
    commission: {
      per_share: optional(env.COMMISSION_PER_SHARE),
      pct: optional(env.COMMISSION_PCT),
      minimum: optional(env.COMMISSION_MIN)
    }
  });
}
