/**
 * Retry with exponential backoff and jitter
 * Whether an error is worth retrying is the caller's call (isRetryable).
 */

import { RetryError } from '../errors.js';
import { createLogger } from './logger.js';

const log = createLogger('retry');

export interface RetryOptions {
  attempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  exponential?: boolean;
  jitter?: boolean;                         // scale each delay by 0.5x-1.5x
  isRetryable?: (error: unknown) => boolean;  // default: retry everything
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Delay before the retry that follows attempt number `attempt` (0-based)
 */
export function backoffDelay(attempt: number, options: RetryOptions = {}, random: () => number = Math.random): number {
  const base = options.baseDelayMs ?? 500;
  const max = options.maxDelayMs ?? 30_000;
  let delay = (options.exponential ?? true) ? Math.min(base * 2 ** attempt, max) : base;
  if (options.jitter ?? true) {
    delay *= 0.5 + random();
  }
  return delay;
}

export async function retry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = options.attempts ?? 3;
  let lastError: unknown;

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (options.isRetryable && !options.isRetryable(error)) {
        throw error;
      }

      lastError = error;
      if (attempt >= attempts - 1) {
        break;
      }

      const delay = backoffDelay(attempt, options);
      log.warn({ attempt: attempt + 1, maxAttempts: attempts, delayMs: Math.round(delay), err: error }, 'retry attempt');
      await sleep(delay);
    }
  }

  throw new RetryError(`Operation failed after ${attempts} attempts`, attempts, lastError);
}

/**
 * Keep retrying until the time budget runs out
 */
export async function retryWithTimeout<T>(
  operation: () => Promise<T>,
  timeoutMs: number,
  options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'isRetryable'> = {},
): Promise<T> {
  const startedAt = Date.now();
  const base = options.baseDelayMs ?? 500;
  const max = options.maxDelayMs ?? 5_000;
  let attempt = 0;
  let lastError: unknown;

  while (Date.now() - startedAt < timeoutMs) {
    try {
      return await operation();
    } catch (error) {
      if (options.isRetryable && !options.isRetryable(error)) {
        throw error;
      }

      lastError = error;
      attempt++;

      const remaining = timeoutMs - (Date.now() - startedAt);
      if (remaining <= 0) {
        break;
      }

      const delay = Math.min(base * 2 ** (attempt - 1), max, remaining) * (0.5 + Math.random());
      log.warn({ attempt, remainingMs: remaining, delayMs: Math.round(delay), err: error }, 'retry attempt (timeout budget)');
      await sleep(Math.min(delay, remaining));
    }
  }

  throw new RetryError(`Operation timed out after ${timeoutMs}ms (${attempt} attempts)`, attempt, lastError);
}
