/**
 * Process-local ledger
 * For tests and demos only - nothing survives the process. Cancelling an
 * order removes it outright instead of keeping a cancelled record.
 */

import { OPEN_ORDER_STATUSES, POSITION_STATUSES, type ExecutionOrder, type OrderStatus } from '../execution/types.js';
import { todayUtc, type AuditInput, type AuditLogEntry, type Ledger } from './types.js';

export class MemoryLedger implements Ledger {
  private orders = new Map<string, ExecutionOrder>();
  private tradingEnabled = false;
  private paperMode = true;
  private strategies = new Map<string, boolean>();
  private watchlist = new Set<string>();
  private pnl = new Map<string, { realized: number; unrealized: number }>();
  private audit: AuditLogEntry[] = [];

  saveOrder(order: ExecutionOrder): void {
    this.orders.set(order.orderId, order);
  }

  getOrder(orderId: string): ExecutionOrder | undefined {
    return this.orders.get(orderId);
  }

  updateOrderStatus(orderId: string, status: OrderStatus): boolean {
    const order = this.orders.get(orderId);
    if (!order) return false;
    this.orders.set(orderId, { ...order, status });
    return true;
  }

  cancelOrder(orderId: string): boolean {
    const order = this.orders.get(orderId);
    if (!order || !OPEN_ORDER_STATUSES.includes(order.status)) return false;
    return this.orders.delete(orderId);
  }

  getOpenOrders(): ExecutionOrder[] {
    return [...this.orders.values()]
      .filter(order => OPEN_ORDER_STATUSES.includes(order.status))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  private positions(): ExecutionOrder[] {
    return [...this.orders.values()].filter(order => POSITION_STATUSES.includes(order.status));
  }

  countOpenPositions(): number {
    return this.positions().length;
  }

  openPositionSizes(): Record<string, number> {
    const sizes = new Map<string, number>();
    for (const order of this.positions()) {
      sizes.set(order.marketId, (sizes.get(order.marketId) ?? 0) + order.size);
    }
    return Object.fromEntries(sizes);
  }

  getTradingEnabled(): boolean {
    return this.tradingEnabled;
  }

  setTradingEnabled(enabled: boolean): void {
    this.tradingEnabled = enabled;
  }

  getPaperMode(): boolean {
    return this.paperMode;
  }

  setPaperMode(paper: boolean): void {
    this.paperMode = paper;
  }

  getStrategyEnabled(name: string): boolean {
    return this.strategies.get(name) ?? true;
  }

  setStrategyEnabled(name: string, enabled: boolean): void {
    this.strategies.set(name, enabled);
  }

  getStrategyStates(): Record<string, boolean> {
    return Object.fromEntries([...this.strategies.entries()].sort(([a], [b]) => a.localeCompare(b)));
  }

  getWatchlist(): Set<string> {
    return new Set(this.watchlist);
  }

  addToWatchlist(marketId: string): void {
    this.watchlist.add(marketId);
  }

  removeFromWatchlist(marketId: string): void {
    this.watchlist.delete(marketId);
  }

  getDailyPnl(date: string = todayUtc()): number {
    const day = this.pnl.get(date);
    return day ? day.realized + day.unrealized : 0;
  }

  updateDailyPnl(realized: number, unrealized: number, date: string = todayUtc()): void {
    const day = this.pnl.get(date) ?? { realized: 0, unrealized: 0 };
    this.pnl.set(date, { realized: day.realized + realized, unrealized: day.unrealized + unrealized });
  }

  logAction(entry: AuditInput): void {
    this.audit.push({
      id: this.audit.length + 1,
      actorId: entry.actorId,
      action: entry.action,
      details: entry.details,
      correlationId: entry.correlationId ?? null,
      createdAt: new Date(),
    });
  }

  getAuditLog(limit = 50): AuditLogEntry[] {
    return this.audit.slice(-limit).reverse();
  }
}
