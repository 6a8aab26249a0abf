/**
 * Execution Engine
 * Turns an approved signal into a durable, deduplicated order - or says why not
 *
 * PIPELINE (each step can short-circuit):
 * 1. Risk decision gate - rejections pass through verbatim
 * 2. Idempotency check - same strategy/market/outcome/action = duplicate
 * 3. Target price from the signal's explanation
 * 4. Order size from confidence, strategy cap and sizing bounds
 * 5. Slippage guard against the live price, if one was given
 * 6. Claim the idempotency key - BEFORE the order exists
 * 7. Build the order (paper or submitted)
 * 8. Persist to the ledger
 * 9. Live mode: hand the order to the placement sink
 *
 * Steps 2-8 run without yielding, and the claim in step 6 is an atomic
 * insert-or-reject in the store, so concurrent duplicates cannot both win.
 * Once the key is claimed it stays claimed: a failure after step 6 is raised
 * as ReconciliationRequiredError and never retried here.
 */

import { randomBytes } from 'crypto';
import type { RiskDecision } from '../risk/engine.js';
import { capForStrategy, createRiskLimits, type RiskLimits } from '../risk/limits.js';
import { numericField, type Signal } from '../signals/types.js';
import type { Ledger } from '../ledger/types.js';
import { MemoryLedger } from '../ledger/memory.js';
import { PlacementError, ReconciliationRequiredError } from '../errors.js';
import { retry, type RetryOptions } from '../utils/retry.js';
import { createLogger } from '../utils/logger.js';
import { DEFAULT_IDEMPOTENCY_TTL_MS, MemoryIdempotencyStore, idempotencyKey, type IdempotencyStore } from './idempotency.js';
import { computeOrderSize } from './sizing.js';
import { DEFAULT_MAX_SLIPPAGE, withinSlippage } from './slippage.js';
import {
  DEFAULT_ORDER_SIZING,
  type ExecutionOrder,
  type ExecutionResult,
  type OrderPlacer,
  type OrderSizing,
} from './types.js';

const log = createLogger('execution');

// Fair value every market is priced around when only an edge is known
const FAIR_VALUE = 0.5;

export interface ExecutionEngineConfig {
  ledger: Ledger;
  idempotency: IdempotencyStore;
  limits: () => RiskLimits;       // live view, so admin cap changes apply immediately
  sizing: OrderSizing;
  maxSlippage: number;
  idempotencyTtlMs: number;
  placer?: OrderPlacer;           // live venue; absent = orders are recorded only
  placementRetry?: RetryOptions;
}

/**
 * Price the order should go in at
 * explicit target_price > fair value +/- edge > fair value
 */
export function targetPrice(signal: Signal): number {
  const explicit = numericField(signal.explanation, 'target_price');
  if (explicit !== undefined) {
    return explicit;
  }

  const edge = numericField(signal.explanation, 'edge');
  if (edge !== undefined) {
    const price = signal.action === 'buy' ? FAIR_VALUE + edge : FAIR_VALUE - edge;
    return Math.round(price * 10_000) / 10_000;
  }

  return FAIR_VALUE;
}

function newOrderId(): string {
  return `order-${randomBytes(8).toString('hex')}`;
}

function rejected(reason: string): ExecutionResult {
  return { order: null, status: 'rejected', reason };
}

const DUPLICATE: ExecutionResult = Object.freeze({ order: null, status: 'duplicate', reason: 'idempotent_key' });

export class ExecutionEngine {
  private ledger: Ledger;
  private idempotency: IdempotencyStore;
  private config: ExecutionEngineConfig;

  constructor(config: Partial<ExecutionEngineConfig> = {}) {
    const defaultLimits = createRiskLimits();
    this.config = {
      ledger: config.ledger ?? new MemoryLedger(),
      idempotency: config.idempotency ?? new MemoryIdempotencyStore(),
      limits: config.limits ?? (() => defaultLimits),
      sizing: config.sizing ?? DEFAULT_ORDER_SIZING,
      maxSlippage: config.maxSlippage ?? DEFAULT_MAX_SLIPPAGE,
      idempotencyTtlMs: config.idempotencyTtlMs ?? DEFAULT_IDEMPOTENCY_TTL_MS,
      placer: config.placer,
      placementRetry: config.placementRetry,
    };
    this.ledger = this.config.ledger;
    this.idempotency = this.config.idempotency;
  }

  /**
   * Paper mode lives in the ledger, so it survives a restart
   */
  isPaper(): boolean {
    return this.ledger.getPaperMode();
  }

  setPaper(paper: boolean): void {
    this.ledger.setPaperMode(paper);
    log.info({ paper }, 'execution mode changed');
  }

  /**
   * Submit an order for a signal the risk engine has already judged
   */
  async submit(signal: Signal, decision: RiskDecision, currentPrice?: number): Promise<ExecutionResult> {
    // ===== GATE: risk decision =====
    if (!decision.approved) {
      return rejected(decision.reason);
    }

    // ===== SAFETY CHECK 1: Idempotency =====
    const key = idempotencyKey(signal);
    if (this.idempotency.has(key)) {
      log.info({ key }, 'duplicate signal ignored');
      return DUPLICATE;
    }

    // ===== PRICE AND SIZE =====
    const price = targetPrice(signal);
    const size = computeOrderSize(signal, this.config.sizing, capForStrategy(this.config.limits(), signal.strategy));

    // ===== SAFETY CHECK 2: Slippage =====
    // No key is recorded here - a retry with a fresh price must go through
    if (currentPrice !== undefined && !withinSlippage(price, currentPrice, this.config.maxSlippage)) {
      log.info({ key, target: price, current: currentPrice }, 'slippage exceeded');
      return rejected(`slippage_exceeded: target=${price}, current=${currentPrice}`);
    }

    // ===== CONSUME THE KEY =====
    if (!this.idempotency.claim(key, this.config.idempotencyTtlMs)) {
      log.info({ key }, 'lost idempotency race');
      return DUPLICATE;
    }

    // ===== BUILD AND PERSIST =====
    let order: ExecutionOrder;
    try {
      order = Object.freeze({
        orderId: newOrderId(),
        marketId: signal.marketId,
        outcomeId: signal.outcomeId,
        side: signal.action,
        price,
        size,
        status: this.ledger.getPaperMode() ? 'paper' : 'submitted',
        createdAt: new Date(),
        strategy: signal.strategy,
      });
      this.ledger.saveOrder(order);
    } catch (error) {
      log.error({ key, err: error }, 'order not persisted after key was consumed');
      throw new ReconciliationRequiredError(key, null, error);
    }

    log.info(
      { orderId: order.orderId, key, side: order.side, price, size, status: order.status },
      'order recorded',
    );

    // ===== LIVE PLACEMENT =====
    if (order.status === 'submitted' && this.config.placer) {
      order = await this.place(this.config.placer, order, key);
    }

    return { order, status: 'submitted', reason: 'ok' };
  }

  /**
   * Hand a live order to the venue
   * On failure the order is parked as 'pending' for reconciliation. The
   * signal is NOT resubmitted - only placement may be retried.
   */
  private async place(placer: OrderPlacer, order: ExecutionOrder, key: string): Promise<ExecutionOrder> {
    try {
      const ack = await retry(() => placer.place(order), this.config.placementRetry);
      if (ack.status === order.status) {
        return order;
      }
      this.ledger.updateOrderStatus(order.orderId, ack.status);
      return Object.freeze({ ...order, status: ack.status });
    } catch (error) {
      const pending: ExecutionOrder = Object.freeze({ ...order, status: 'pending' });
      try {
        this.ledger.updateOrderStatus(order.orderId, 'pending');
      } catch (markError) {
        log.error({ orderId: order.orderId, err: markError }, 'could not mark order pending');
      }
      log.error({ orderId: order.orderId, key, err: error }, 'order placement failed');
      const cause = error instanceof PlacementError ? error : new PlacementError(`Placement failed for ${order.orderId}`, error);
      throw new ReconciliationRequiredError(key, pending, cause);
    }
  }

  /**
   * Cancel a tracked order. Does not touch idempotency keys.
   * @returns whether an open order was found
   */
  cancelOrder(orderId: string): boolean {
    const cancelled = this.ledger.cancelOrder(orderId);
    if (cancelled) {
      log.info({ orderId }, 'order cancelled');
    }
    return cancelled;
  }

  /**
   * Orders still open (submitted, pending, paper) - read from the ledger every time
   */
  getOpenOrders(): ExecutionOrder[] {
    return this.ledger.getOpenOrders();
  }
}
