// Error taxonomy for the simulation core.
//
// Contract violations are programmer/configuration errors and always propagate.
// Domain rejections drop a single event; the engine logs them and keeps going.

export type ContractViolationCode =
  | 'TYPE_CONTRACT'
  | 'INVALID_ARGUMENT'
  | 'INVALID_TIMESTAMP'
  | 'INVALID_STATE';

export type DomainRejectionReason =
  | 'INSUFFICIENT_FUNDS'
  | 'INSUFFICIENT_POSITION'
  | 'NOT_HELD'
  | 'UNKNOWN_TRANSACTION_SIDE';

export abstract class BacktestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ContractViolationError extends BacktestError {
  readonly code: ContractViolationCode;

  constructor(code: ContractViolationCode, message: string) {
    super(message);
    this.code = code;
  }
}

export class DomainRejectionError extends BacktestError {
  readonly reason: DomainRejectionReason;

  constructor(reason: DomainRejectionReason, message: string) {
    super(message);
    this.reason = reason;
  }
}

export function isDomainRejection(error: unknown): error is DomainRejectionError {
  return error instanceof DomainRejectionError;
}

// Shared argument guards
export function assertNonNegative(value: number, label: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ContractViolationError('INVALID_ARGUMENT', `${label} must be a non-negative number, got ${value}`);
  }
}

export function assertPositive(value: number, label: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ContractViolationError('INVALID_ARGUMENT', `${label} must be a positive number, got ${value}`);
  }
}

export function assertValidDate(value: unknown, label: string): asserts value is Date {
  if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
    throw new ContractViolationError('INVALID_TIMESTAMP', `${label} must be a valid Date`);
  }
}
