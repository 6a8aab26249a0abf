/**
 * Error taxonomy for the trading core
 *
 * Policy rejections (risk, slippage, duplicates) are NOT errors - they come
 * back as structured results. Everything here is a fault the caller has to
 * handle: storage down, placement failed, or a broken caller contract.
 */

import type { ExecutionOrder } from './execution/types.js';

export type ErrorCode =
  | 'persistence_failure'
  | 'placement_failure'
  | 'needs_reconciliation'
  | 'contract_violation'
  | 'retry_exhausted';

export class TradingCoreError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Storage unreachable or a statement failed
 */
export class PersistenceError extends TradingCoreError {
  constructor(message: string, cause?: unknown) {
    super('persistence_failure', message, { cause });
  }
}

/**
 * The order-placement sink rejected or failed to answer
 */
export class PlacementError extends TradingCoreError {
  constructor(message: string, cause?: unknown) {
    super('placement_failure', message, { cause });
  }
}

/**
 * The idempotency key is consumed but the order did not make it all the way
 * through. Resubmitting the same signal will come back as a duplicate, so an
 * operator has to look at the ledger and the venue.
 */
export class ReconciliationRequiredError extends TradingCoreError {
  readonly idempotencyKey: string;
  readonly order: ExecutionOrder | null;

  constructor(idempotencyKey: string, order: ExecutionOrder | null, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('needs_reconciliation', `Manual reconciliation required for ${idempotencyKey}: ${detail}`, { cause });
    this.idempotencyKey = idempotencyKey;
    this.order = order;
  }
}

export class ContractViolationError extends TradingCoreError {
  constructor(message: string) {
    super('contract_violation', message);
  }
}

export class RetryError extends TradingCoreError {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(message: string, attempts: number, lastError: unknown) {
    super('retry_exhausted', message, { cause: lastError });
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Map any thrown value to a short, stable reason string for display
 */
export function describeError(error: unknown): string {
  if (error instanceof TradingCoreError) {
    return error.code;
  }
  return 'internal_error';
}
