import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ContractViolationError, DomainRejectionError } from '../services/backtesting/errors';
import { logger } from '../utils/logger';

export interface AppError extends Error {
  statusCode?: number;
  details?: unknown;
}

export function createError(message: string, statusCode: number = 500, details?: unknown): AppError {
  const error: AppError = new Error(message);
  error.statusCode = statusCode;
  error.details = details;
  return error;
}

export function errorHandler(err: AppError, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ZodError) {
    res.status(400).json({
      error: 'Validation failed',
      details: err.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
    });
    return;
  }

  if (err instanceof ContractViolationError) {
    res.status(400).json({ error: err.message, code: err.code });
    return;
  }

  if (err instanceof DomainRejectionError) {
    res.status(422).json({ error: err.message, code: err.reason });
    return;
  }

  const statusCode = err.statusCode ?? 500;
  if (statusCode >= 500) {
    logger.error(`${req.method} ${req.path} failed:`, err);
  }

  res.status(statusCode).json({
    error: statusCode >= 500 ? 'Internal server error' : err.message,
    ...(err.details !== undefined && statusCode < 500 ? { details: err.details } : {})
  });
}
