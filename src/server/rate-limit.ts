/**
 * Sliding-window rate limiter, keyed by caller id
 * In-memory only; a restart starts every caller with a full window.
 */

import type { Clock } from '../execution/idempotency.js';

// Sweep idle callers every N checks
const CLEANUP_INTERVAL = 100;

export class RateLimiter {
  private requests = new Map<string, number[]>();   // caller -> request times (epoch ms)
  private checks = 0;

  constructor(
    readonly maxRequests: number = 10,
    readonly windowMs: number = 60_000,
    private readonly now: Clock = Date.now,
  ) {}

  /**
   * Record a request if the caller still has room in the window
   */
  isAllowed(key: string): boolean {
    const now = this.now();

    if (++this.checks >= CLEANUP_INTERVAL) {
      this.cleanup(now);
      this.checks = 0;
    }

    const recent = this.recent(key, now);
    if (recent.length >= this.maxRequests) {
      this.requests.set(key, recent);
      return false;
    }

    recent.push(now);
    this.requests.set(key, recent);
    return true;
  }

  remaining(key: string): number {
    return Math.max(0, this.maxRequests - this.recent(key, this.now()).length);
  }

  reset(key: string): void {
    this.requests.delete(key);
  }

  /**
   * Callers currently tracked
   */
  activeKeys(): number {
    return this.requests.size;
  }

  private recent(key: string, now: number): number[] {
    return (this.requests.get(key) ?? []).filter(time => now - time < this.windowMs);
  }

  // Drop callers idle for more than two windows
  private cleanup(now: number): void {
    for (const [key, times] of this.requests) {
      const last = times[times.length - 1];
      if (last === undefined || now - last > this.windowMs * 2) {
        this.requests.delete(key);
      }
    }
  }
}
