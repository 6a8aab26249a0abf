import { describe, expect, it, vi } from 'vitest';

import { RetryError } from '../errors.js';
import { backoffDelay, retry, retryWithTimeout } from './retry.js';

describe('retry', () => {
  it('returns the first success without retrying', async () => {
    const operation = vi.fn(async () => 'ok');
    await expect(retry(operation)).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('retries until the operation succeeds', async () => {
    let calls = 0;
    const operation = vi.fn(async () => {
      calls++;
      if (calls < 3) throw new Error(`attempt ${calls} failed`);
      return calls;
    });

    await expect(retry(operation, { attempts: 3, baseDelayMs: 1, jitter: false })).resolves.toBe(3);
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('gives up with a RetryError carrying the last failure', async () => {
    const last = new Error('still down');
    const operation = vi.fn(async (): Promise<string> => {
      throw last;
    });

    const error = await retry(operation, { attempts: 3, baseDelayMs: 1, jitter: false }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryError);
    if (error instanceof RetryError) {
      expect(error.attempts).toBe(3);
      expect(error.lastError).toBe(last);
      expect(error.code).toBe('retry_exhausted');
    }
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('rethrows non-retryable errors immediately', async () => {
    const fatal = new Error('invalid order');
    const operation = vi.fn(async (): Promise<string> => {
      throw fatal;
    });

    await expect(retry(operation, { attempts: 5, baseDelayMs: 1, isRetryable: () => false })).rejects.toBe(fatal);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe('backoffDelay', () => {
  it('doubles from the base delay', () => {
    const options = { baseDelayMs: 100, jitter: false };
    expect([0, 1, 2, 3].map(attempt => backoffDelay(attempt, options))).toEqual([100, 200, 400, 800]);
  });

  it('caps at the max delay', () => {
    expect(backoffDelay(10, { baseDelayMs: 100, maxDelayMs: 1_000, jitter: false })).toBe(1_000);
  });

  it('stays flat without exponential growth', () => {
    expect(backoffDelay(4, { baseDelayMs: 250, exponential: false, jitter: false })).toBe(250);
  });

  it('scales by 0.5x to 1.5x with jitter', () => {
    expect(backoffDelay(1, { baseDelayMs: 100 }, () => 0)).toBe(100);
    expect(backoffDelay(1, { baseDelayMs: 100 }, () => 0.5)).toBe(200);
  });
});

describe('retryWithTimeout', () => {
  it('returns as soon as the operation succeeds', async () => {
    let calls = 0;
    const result = await retryWithTimeout(async () => {
      calls++;
      if (calls === 1) throw new Error('transient');
      return 'done';
    }, 1_000, { baseDelayMs: 1 });

    expect(result).toBe('done');
    expect(calls).toBe(2);
  });

  it('rethrows non-retryable errors', async () => {
    const fatal = new Error('bad request');
    await expect(
      retryWithTimeout(async () => {
        throw fatal;
      }, 1_000, { isRetryable: () => false }),
    ).rejects.toBe(fatal);
  });
});
