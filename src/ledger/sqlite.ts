/**
 * Durable ledger on better-sqlite3
 * Every write is a single statement committed immediately.
 */

import type Database from 'better-sqlite3';
import { persist } from '../db/client.js';
import type { AuditLogRow, DailyPnlRow, OrderRow, RiskStateRow, StrategyStateRow } from '../db/schema.js';
import type { ExecutionOrder, OrderStatus } from '../execution/types.js';
import { todayUtc, type AuditInput, type AuditLogEntry, type Ledger } from './types.js';

const OPEN_STATUS_SQL = `('submitted', 'pending', 'paper')`;
const POSITION_STATUS_SQL = `('submitted', 'pending', 'paper', 'filled')`;

function toOrder(row: OrderRow): ExecutionOrder {
  return {
    orderId: row.order_id,
    marketId: row.market_id,
    outcomeId: row.outcome_id,
    side: row.side,
    price: row.price,
    size: row.size,
    status: row.status,
    createdAt: new Date(row.created_at),
    strategy: row.strategy,
  };
}

function toAuditEntry(row: AuditLogRow): AuditLogEntry {
  return {
    id: row.id,
    actorId: row.actor_id,
    action: row.action,
    details: row.details,
    correlationId: row.correlation_id,
    createdAt: new Date(row.created_at),
  };
}

export class SqliteLedger implements Ledger {
  constructor(private readonly db: Database.Database) {}

  // ============================================
  // Orders
  // ============================================

  saveOrder(order: ExecutionOrder): void {
    const now = new Date().toISOString();
    persist('save order', () => {
      this.db.prepare(`
        INSERT INTO orders (order_id, market_id, outcome_id, side, price, size, status, strategy, created_at, updated_at)
        VALUES (@orderId, @marketId, @outcomeId, @side, @price, @size, @status, @strategy, @createdAt, @updatedAt)
      `).run({
        orderId: order.orderId,
        marketId: order.marketId,
        outcomeId: order.outcomeId,
        side: order.side,
        price: order.price,
        size: order.size,
        status: order.status,
        strategy: order.strategy,
        createdAt: order.createdAt.toISOString(),
        updatedAt: now,
      });
    });
  }

  getOrder(orderId: string): ExecutionOrder | undefined {
    const row = persist('get order', () =>
      this.db.prepare<[string], OrderRow>('SELECT * FROM orders WHERE order_id = ?').get(orderId),
    );
    return row ? toOrder(row) : undefined;
  }

  updateOrderStatus(orderId: string, status: OrderStatus): boolean {
    return persist('update order status', () =>
      this.db.prepare(`
        UPDATE orders SET status = ?, updated_at = ? WHERE order_id = ?
      `).run(status, new Date().toISOString(), orderId).changes > 0,
    );
  }

  cancelOrder(orderId: string): boolean {
    return persist('cancel order', () =>
      this.db.prepare(`
        UPDATE orders SET status = 'cancelled', updated_at = ?
        WHERE order_id = ? AND status IN ${OPEN_STATUS_SQL}
      `).run(new Date().toISOString(), orderId).changes > 0,
    );
  }

  getOpenOrders(): ExecutionOrder[] {
    const rows = persist('get open orders', () =>
      this.db.prepare<[], OrderRow>(`
        SELECT * FROM orders
        WHERE status IN ${OPEN_STATUS_SQL}
        ORDER BY created_at ASC, rowid ASC
      `).all(),
    );
    return rows.map(toOrder);
  }

  countOpenPositions(): number {
    const row = persist('count open positions', () =>
      this.db.prepare<[], { count: number }>(`
        SELECT COUNT(*) as count FROM orders WHERE status IN ${POSITION_STATUS_SQL}
      `).get(),
    );
    return row?.count ?? 0;
  }

  openPositionSizes(): Record<string, number> {
    const rows = persist('open position sizes', () =>
      this.db.prepare<[], { market_id: string; total: number }>(`
        SELECT market_id, SUM(size) as total FROM orders
        WHERE status IN ${POSITION_STATUS_SQL}
        GROUP BY market_id
      `).all(),
    );
    return Object.fromEntries(rows.map((row): [string, number] => [row.market_id, row.total]));
  }

  // ============================================
  // Switches
  // ============================================

  private riskState(): RiskStateRow | undefined {
    return persist('read risk state', () =>
      this.db.prepare<[], RiskStateRow>('SELECT * FROM risk_state WHERE id = 1').get(),
    );
  }

  getTradingEnabled(): boolean {
    return this.riskState()?.trading_enabled === 1;
  }

  setTradingEnabled(enabled: boolean): void {
    persist('set trading enabled', () => {
      this.db.prepare(`
        INSERT INTO risk_state (id, trading_enabled) VALUES (1, @value)
        ON CONFLICT(id) DO UPDATE SET trading_enabled = @value, updated_at = datetime('now')
      `).run({ value: enabled ? 1 : 0 });
    });
  }

  getPaperMode(): boolean {
    const row = this.riskState();
    return row ? row.paper_mode === 1 : true;
  }

  setPaperMode(paper: boolean): void {
    persist('set paper mode', () => {
      this.db.prepare(`
        INSERT INTO risk_state (id, paper_mode) VALUES (1, @value)
        ON CONFLICT(id) DO UPDATE SET paper_mode = @value, updated_at = datetime('now')
      `).run({ value: paper ? 1 : 0 });
    });
  }

  // ============================================
  // Strategies
  // ============================================

  getStrategyEnabled(name: string): boolean {
    const row = persist('get strategy state', () =>
      this.db.prepare<[string], StrategyStateRow>('SELECT * FROM strategy_state WHERE name = ?').get(name),
    );
    return row ? row.enabled === 1 : true;
  }

  setStrategyEnabled(name: string, enabled: boolean): void {
    persist('set strategy state', () => {
      this.db.prepare(`
        INSERT INTO strategy_state (name, enabled) VALUES (@name, @enabled)
        ON CONFLICT(name) DO UPDATE SET enabled = @enabled, updated_at = datetime('now')
      `).run({ name, enabled: enabled ? 1 : 0 });
    });
  }

  getStrategyStates(): Record<string, boolean> {
    const rows = persist('list strategy states', () =>
      this.db.prepare<[], StrategyStateRow>('SELECT * FROM strategy_state ORDER BY name').all(),
    );
    return Object.fromEntries(rows.map((row): [string, boolean] => [row.name, row.enabled === 1]));
  }

  // ============================================
  // Watchlist
  // ============================================

  getWatchlist(): Set<string> {
    const rows = persist('get watchlist', () =>
      this.db.prepare<[], { market_id: string }>('SELECT market_id FROM watchlist').all(),
    );
    return new Set(rows.map(row => row.market_id));
  }

  addToWatchlist(marketId: string): void {
    persist('add to watchlist', () => {
      this.db.prepare('INSERT OR IGNORE INTO watchlist (market_id) VALUES (?)').run(marketId);
    });
  }

  removeFromWatchlist(marketId: string): void {
    persist('remove from watchlist', () => {
      this.db.prepare('DELETE FROM watchlist WHERE market_id = ?').run(marketId);
    });
  }

  // ============================================
  // Daily P&L
  // ============================================

  getDailyPnl(date: string = todayUtc()): number {
    const row = persist('get daily pnl', () =>
      this.db.prepare<[string], DailyPnlRow>('SELECT * FROM daily_pnl WHERE date = ?').get(date),
    );
    return row ? row.realized + row.unrealized : 0;
  }

  updateDailyPnl(realized: number, unrealized: number, date: string = todayUtc()): void {
    persist('update daily pnl', () => {
      this.db.prepare(`
        INSERT INTO daily_pnl (date, realized, unrealized) VALUES (@date, @realized, @unrealized)
        ON CONFLICT(date) DO UPDATE SET
          realized = realized + excluded.realized,
          unrealized = unrealized + excluded.unrealized
      `).run({ date, realized, unrealized });
    });
  }

  // ============================================
  // Audit
  // ============================================

  logAction(entry: AuditInput): void {
    persist('write audit log', () => {
      this.db.prepare(`
        INSERT INTO audit_log (actor_id, action, details, correlation_id, created_at)
        VALUES (@actorId, @action, @details, @correlationId, @createdAt)
      `).run({
        actorId: entry.actorId,
        action: entry.action,
        details: entry.details,
        correlationId: entry.correlationId ?? null,
        createdAt: new Date().toISOString(),
      });
    });
  }

  getAuditLog(limit = 50): AuditLogEntry[] {
    const rows = persist('read audit log', () =>
      this.db.prepare<[number], AuditLogRow>('SELECT * FROM audit_log ORDER BY id DESC LIMIT ?').all(limit),
    );
    return rows.map(toAuditEntry);
  }
}
