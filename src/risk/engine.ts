/**
 * Risk Engine
 * Gates every signal before execution
 *
 * KILL SWITCH:
 * Trading starts DISABLED and only an explicit admin action enables it.
 * There is no other initial state and no third state.
 *
 * CHECK ORDER (first failure wins - callers rely on this for diagnostics):
 * 1. kill switch
 * 2. daily loss
 * 3. order size
 * 4. position size in the market
 * 5. open position count
 * 6. strategy cap
 * 7. confidence threshold
 */

import type { Signal } from '../signals/types.js';
import { ContractViolationError } from '../errors.js';
import { applyLimit, capForStrategy, createRiskLimits, type RiskLimits } from './limits.js';

export const MIN_CONFIDENCE_THRESHOLD = 0.6;

export type RiskReason =
  | 'global_kill_switch'
  | 'max_daily_loss_exceeded'
  | 'order_size_exceeded'
  | 'max_position_size_exceeded'
  | 'max_open_positions'
  | 'strategy_cap_exceeded'
  | 'confidence_below_threshold'
  | 'approved';

export interface RiskDecision {
  readonly approved: boolean;
  readonly reason: RiskReason;
}

/**
 * Live portfolio state, supplied fresh by the caller on every evaluation
 */
export interface RiskState {
  currentPositions: number;
  dailyPnl: number;                          // negative = loss
  positionSizes?: Record<string, number>;    // marketId -> open size
}

export type TradingState = 'disabled' | 'enabled';

export function emptyRiskState(): RiskState {
  return { currentPositions: 0, dailyPnl: 0 };
}

export function positionSize(state: RiskState, marketId: string): number {
  const sizes = state.positionSizes;
  return sizes && Object.hasOwn(sizes, marketId) ? sizes[marketId] : 0;
}

function reject(reason: RiskReason): RiskDecision {
  return { approved: false, reason };
}

const APPROVED: RiskDecision = Object.freeze({ approved: true, reason: 'approved' });

export class RiskEngine {
  private limits: RiskLimits;
  private state: TradingState = 'disabled';

  constructor(limits?: RiskLimits) {
    this.limits = limits ?? createRiskLimits();
  }

  getLimits(): RiskLimits {
    return this.limits;
  }

  getTradingState(): TradingState {
    return this.state;
  }

  isTradingEnabled(): boolean {
    return this.state === 'enabled';
  }

  setTrading(enabled: boolean): void {
    this.state = enabled ? 'enabled' : 'disabled';
  }

  /**
   * Change one limit by admin parameter name
   * The limits record is swapped whole, so a concurrent reader sees either
   * the old or the new record, never a mix.
   * @returns false (and no change) for unknown names or invalid values
   */
  setLimit(param: string, value: number): boolean {
    const next = applyLimit(this.limits, param, value);
    if (!next) {
      return false;
    }
    this.limits = next;
    return true;
  }

  /**
   * Evaluate one signal
   * @param orderSize proposed size if already known, 0 when not
   */
  evaluate(signal: Signal, riskState: RiskState, orderSize = 0): RiskDecision {
    if (!signal) {
      throw new ContractViolationError('evaluate() called without a signal');
    }

    const limits = this.limits;

    if (this.state !== 'enabled') {
      return reject('global_kill_switch');
    }

    if (riskState.dailyPnl <= -limits.maxDailyLoss) {
      return reject('max_daily_loss_exceeded');
    }

    if (orderSize > 0 && orderSize > limits.maxOrderSize) {
      return reject('order_size_exceeded');
    }

    if (positionSize(riskState, signal.marketId) + orderSize > limits.maxPositionSize) {
      return reject('max_position_size_exceeded');
    }

    if (riskState.currentPositions >= limits.maxOpenPositions) {
      return reject('max_open_positions');
    }

    if (orderSize > 0 && orderSize > capForStrategy(limits, signal.strategy)) {
      return reject('strategy_cap_exceeded');
    }

    if (signal.confidence < MIN_CONFIDENCE_THRESHOLD) {
      return reject('confidence_below_threshold');
    }

    return APPROVED;
  }

  /**
   * Evaluate signals in order against one shared snapshot
   */
  batchEvaluate(
    signals: readonly Signal[],
    riskState: RiskState = emptyRiskState(),
    orderSizeFor?: (signal: Signal) => number,
  ): RiskDecision[] {
    return signals.map(signal => this.evaluate(signal, riskState, orderSizeFor ? orderSizeFor(signal) : 0));
  }
}
