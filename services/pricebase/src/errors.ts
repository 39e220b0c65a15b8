export type ErrorCode =
  | 'INVALID_SYMBOL'
  | 'INVALID_BAR'
  | 'INVALID_TICK'
  | 'INVALID_ARGUMENT'
  | 'CONFLICT'
  | 'STORAGE_UNAVAILABLE'
  | 'INSUFFICIENT_BALANCE'
  | 'INVALID_STATE_TRANSITION'
  | 'NOT_FOUND'
  | 'CANCELLED';

/**
 * Base of every engine error. `retryable` tells callers whether the same call may
 * succeed later; the engine itself never retries.
 */
export class PricebaseError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;

  constructor(code: ErrorCode, message: string, opts: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = opts.retryable ?? false;
  }
}

export class InvalidSymbolError extends PricebaseError {
  constructor(message: string) {
    super('INVALID_SYMBOL', message);
  }
}

export class InvalidBarError extends PricebaseError {
  constructor(message: string, cause?: unknown) {
    super('INVALID_BAR', message, { cause });
  }
}

export class InvalidTickError extends PricebaseError {
  constructor(message: string, cause?: unknown) {
    super('INVALID_TICK', message, { cause });
  }
}

export class InvalidArgumentError extends PricebaseError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
  }
}

export class ConflictError extends PricebaseError {
  constructor(message: string) {
    super('CONFLICT', message);
  }
}

export class StorageUnavailableError extends PricebaseError {
  constructor(message: string, cause?: unknown) {
    super('STORAGE_UNAVAILABLE', message, { retryable: true, cause });
  }
}

export class InsufficientBalanceError extends PricebaseError {
  readonly currency: string;
  readonly requested: string;
  readonly available: string;

  constructor(currency: string, requested: string, available: string) {
    super('INSUFFICIENT_BALANCE', `tried to remove ${requested} ${currency} while having ${available} ${currency}`);
    this.currency = currency;
    this.requested = requested;
    this.available = available;
  }
}

export class InvalidStateTransitionError extends PricebaseError {
  constructor(message: string) {
    super('INVALID_STATE_TRANSITION', message);
  }
}

export class NotFoundError extends PricebaseError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

export class CancelledError extends PricebaseError {
  constructor(message: string, cause?: unknown) {
    super('CANCELLED', message, { cause });
  }
}

export function isPricebaseError(err: unknown): err is PricebaseError {
  return err instanceof PricebaseError;
}

export function isRetryable(err: unknown): boolean {
  return isPricebaseError(err) && err.retryable;
}

export function errorCode(err: unknown): ErrorCode | 'INTERNAL_ERROR' {
  return isPricebaseError(err) ? err.code : 'INTERNAL_ERROR';
}
