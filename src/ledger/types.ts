/**
 * Ledger capability interface
 *
 * The execution engine and admin layer depend only on this. Two variants:
 * - SqliteLedger: durable, the one production runs on
 * - MemoryLedger: process-local, for tests and demos; never durable
 */

import type { ExecutionOrder, OrderStatus } from '../execution/types.js';

export interface AuditLogEntry {
  id: number;
  actorId: string;
  action: string;
  details: string;
  correlationId: string | null;
  createdAt: Date;
}

export interface AuditInput {
  actorId: string;
  action: string;
  details: string;
  correlationId?: string | null;
}

export interface Ledger {
  // ----- Orders -----
  saveOrder(order: ExecutionOrder): void;
  getOrder(orderId: string): ExecutionOrder | undefined;
  /** @returns false if no such order */
  updateOrderStatus(orderId: string, status: OrderStatus): boolean;
  /** @returns false if no open order with this id */
  cancelOrder(orderId: string): boolean;
  /** Orders still working: submitted, pending, paper */
  getOpenOrders(): ExecutionOrder[];
  /** Working orders plus fills - the exposure risk limits bind against */
  countOpenPositions(): number;
  /** Position size per market id, same statuses as countOpenPositions */
  openPositionSizes(): Record<string, number>;

  // ----- Switches -----
  getTradingEnabled(): boolean;
  setTradingEnabled(enabled: boolean): void;
  getPaperMode(): boolean;
  setPaperMode(paper: boolean): void;

  // ----- Strategies -----
  /** Strategies are enabled unless explicitly disabled */
  getStrategyEnabled(name: string): boolean;
  setStrategyEnabled(name: string, enabled: boolean): void;
  getStrategyStates(): Record<string, boolean>;

  // ----- Watchlist -----
  getWatchlist(): Set<string>;
  addToWatchlist(marketId: string): void;
  removeFromWatchlist(marketId: string): void;

  // ----- Daily P&L -----
  /** realized + unrealized for the UTC day, 0 when nothing recorded */
  getDailyPnl(date?: string): number;
  /** Accumulate into the UTC day's totals */
  updateDailyPnl(realized: number, unrealized: number, date?: string): void;

  // ----- Audit -----
  logAction(entry: AuditInput): void;
  /** Most recent first */
  getAuditLog(limit?: number): AuditLogEntry[];
}

/**
 * UTC calendar day, YYYY-MM-DD
 */
export function todayUtc(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}
