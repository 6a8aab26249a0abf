/**
 * Idempotency Store
 * Backs at-most-once submission: a recorded, unexpired key maps to at most
 * one order. Expired keys are indistinguishable from keys never seen.
 */

import type Database from 'better-sqlite3';
import { persist } from '../db/client.js';
import type { Signal } from '../signals/types.js';

export const DEFAULT_IDEMPOTENCY_TTL_MS = 24 * 60 * 60 * 1000;

export type Clock = () => number;

export interface IdempotencyStore {
  /** True if the key is recorded and unexpired */
  has(key: string): boolean;
  /** Record the key, replacing any prior entry */
  add(key: string, ttlMs?: number): void;
  /**
   * Record the key only if absent or expired
   * @returns true if this call recorded it, false if someone already holds it
   */
  claim(key: string, ttlMs?: number): boolean;
  /** Drop expired keys, returning how many went */
  purgeExpired(): number;
}

/**
 * Deterministic fingerprint of a signal's identity
 * Size, price and confidence are deliberately not part of it.
 */
export function idempotencyKey(signal: Pick<Signal, 'strategy' | 'marketId' | 'outcomeId' | 'action'>): string {
  return `${signal.strategy}:${signal.marketId}:${signal.outcomeId}:${signal.action}`;
}

/**
 * Process-local store. Single process, not durable.
 */
export class MemoryIdempotencyStore implements IdempotencyStore {
  private keys = new Map<string, number>();   // key -> expires at (epoch ms)

  constructor(private readonly now: Clock = Date.now) {}

  has(key: string): boolean {
    this.purgeExpired();
    return this.keys.has(key);
  }

  add(key: string, ttlMs = DEFAULT_IDEMPOTENCY_TTL_MS): void {
    this.keys.set(key, this.now() + ttlMs);
  }

  claim(key: string, ttlMs = DEFAULT_IDEMPOTENCY_TTL_MS): boolean {
    if (this.has(key)) {
      return false;
    }
    this.add(key, ttlMs);
    return true;
  }

  purgeExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, expiresAt] of this.keys) {
      if (expiresAt <= now) {
        this.keys.delete(key);
        removed++;
      }
    }
    return removed;
  }
}

/**
 * Durable store on the idempotency_keys table
 * claim() is a single insert-or-reject statement, so two writers racing on
 * the same key cannot both win.
 */
export class SqliteIdempotencyStore implements IdempotencyStore {
  constructor(
    private readonly db: Database.Database,
    private readonly now: Clock = Date.now,
  ) {}

  has(key: string): boolean {
    return persist('idempotency check', () => {
      this.purgeExpired();
      const row = this.db
        .prepare<[string], { key: string }>('SELECT key FROM idempotency_keys WHERE key = ?')
        .get(key);
      return row !== undefined;
    });
  }

  add(key: string, ttlMs = DEFAULT_IDEMPOTENCY_TTL_MS): void {
    const now = this.now();
    persist('idempotency add', () => {
      this.db.prepare(`
        INSERT INTO idempotency_keys (key, created_at, expires_at)
        VALUES (@key, @now, @expiresAt)
        ON CONFLICT(key) DO UPDATE SET
          created_at = excluded.created_at,
          expires_at = excluded.expires_at
      `).run({ key, now, expiresAt: now + ttlMs });
    });
  }

  claim(key: string, ttlMs = DEFAULT_IDEMPOTENCY_TTL_MS): boolean {
    const now = this.now();
    return persist('idempotency claim', () => {
      const result = this.db.prepare(`
        INSERT INTO idempotency_keys (key, created_at, expires_at)
        VALUES (@key, @now, @expiresAt)
        ON CONFLICT(key) DO UPDATE SET
          created_at = excluded.created_at,
          expires_at = excluded.expires_at
        WHERE idempotency_keys.expires_at <= @now
      `).run({ key, now, expiresAt: now + ttlMs });
      return result.changes === 1;
    });
  }

  purgeExpired(): number {
    return persist('idempotency purge', () =>
      this.db.prepare('DELETE FROM idempotency_keys WHERE expires_at <= ?').run(this.now()).changes,
    );
  }
}
