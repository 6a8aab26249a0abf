/**
 * Admin service
 * Every state change an operator can make goes through here and is journaled
 * to the audit log with who did it and what changed.
 *
 * Bad input (unknown limit, malformed name, negative value) returns false and
 * changes nothing - it is never thrown.
 */

import type { RiskEngine } from '../risk/engine.js';
import type { RiskLimits } from '../risk/limits.js';
import type { ExecutionEngine } from '../execution/engine.js';
import type { ExecutionOrder } from '../execution/types.js';
import type { Ledger } from '../ledger/types.js';
import { createLogger } from '../utils/logger.js';
import { isValidMarketId, isValidParamName, isValidStrategyName, sanitizeForLog } from './validation.js';

const log = createLogger('admin');

export interface AdminContext {
  actorId: string;
  correlationId?: string | null;
}

export type WatchlistAction = 'add' | 'remove';

export interface SystemStatus {
  tradingEnabled: boolean;
  paperMode: boolean;
  limits: RiskLimits;
  openOrders: ExecutionOrder[];
  watchlist: string[];
  strategies: Record<string, boolean>;
  dailyPnl: number;
}

export class AdminService {
  constructor(
    private readonly risk: RiskEngine,
    private readonly execution: ExecutionEngine,
    private readonly ledger: Ledger,
  ) {}

  /**
   * Kill switch. The durable flag and the journal entry are written before
   * the in-memory engine flips, so a storage failure leaves trading as it was.
   */
  setTrading(ctx: AdminContext, enabled: boolean): void {
    this.ledger.setTradingEnabled(enabled);
    this.journal(ctx, 'trade_toggle', `enabled=${enabled}`);
    this.risk.setTrading(enabled);
  }

  setPaper(ctx: AdminContext, paper: boolean): void {
    this.execution.setPaper(paper);
    this.journal(ctx, 'paper_toggle', `paper=${paper}`);
  }

  setLimit(ctx: AdminContext, param: string, value: number): boolean {
    if (!isValidParamName(param) || !this.risk.setLimit(param, value)) {
      log.warn({ actorId: ctx.actorId, param: sanitizeForLog(param), value }, 'risk param rejected');
      return false;
    }
    this.journal(ctx, 'risk_param_set', `${param}=${value}`);
    return true;
  }

  setStrategyEnabled(ctx: AdminContext, name: string, enabled: boolean): boolean {
    if (!isValidStrategyName(name)) {
      return false;
    }
    this.ledger.setStrategyEnabled(name, enabled);
    this.journal(ctx, 'strategy_toggle', `strategy=${name} enabled=${enabled}`);
    return true;
  }

  updateWatchlist(ctx: AdminContext, action: WatchlistAction, marketId: string): boolean {
    if (!isValidMarketId(marketId)) {
      return false;
    }
    if (action === 'add') {
      this.ledger.addToWatchlist(marketId);
    } else {
      this.ledger.removeFromWatchlist(marketId);
    }
    this.journal(ctx, 'watchlist_update', `${action} market=${marketId}`);
    return true;
  }

  cancelOrder(ctx: AdminContext, orderId: string): boolean {
    const cancelled = this.execution.cancelOrder(orderId);
    if (cancelled) {
      this.journal(ctx, 'order_cancel', `order=${orderId}`);
    }
    return cancelled;
  }

  /**
   * Add realized/unrealized P&L to today's total
   * @returns today's total after the update
   */
  recordPnl(ctx: AdminContext, realized: number, unrealized: number): number {
    this.ledger.updateDailyPnl(realized, unrealized);
    this.journal(ctx, 'pnl_update', `realized=${realized} unrealized=${unrealized}`);
    return this.ledger.getDailyPnl();
  }

  status(): SystemStatus {
    return {
      tradingEnabled: this.risk.isTradingEnabled(),
      paperMode: this.execution.isPaper(),
      limits: this.risk.getLimits(),
      openOrders: this.execution.getOpenOrders(),
      watchlist: [...this.ledger.getWatchlist()].sort(),
      strategies: this.ledger.getStrategyStates(),
      dailyPnl: this.ledger.getDailyPnl(),
    };
  }

  private journal(ctx: AdminContext, action: string, details: string): void {
    this.ledger.logAction({
      actorId: ctx.actorId,
      action,
      details: sanitizeForLog(details),
      correlationId: ctx.correlationId ?? null,
    });
    log.info({ actorId: ctx.actorId, action, details, correlationId: ctx.correlationId }, 'admin action');
  }
}
