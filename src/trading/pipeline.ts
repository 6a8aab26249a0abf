/**
 * Trading pipeline
 * Signal -> live risk state -> risk decision -> execution
 *
 * The risk engine never tracks the portfolio itself; the state it judges
 * against is rebuilt from the ledger for every signal.
 */

import type { RiskEngine, RiskState } from '../risk/engine.js';
import { capForStrategy } from '../risk/limits.js';
import type { ExecutionEngine } from '../execution/engine.js';
import { computeOrderSize } from '../execution/sizing.js';
import type { ExecutionResult, OrderSizing } from '../execution/types.js';
import type { Ledger } from '../ledger/types.js';
import type { Signal } from '../signals/types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('pipeline');

export class TradingPipeline {
  constructor(
    private readonly risk: RiskEngine,
    private readonly execution: ExecutionEngine,
    private readonly ledger: Ledger,
    private readonly sizing: OrderSizing,
  ) {}

  /**
   * Current portfolio snapshot for risk evaluation
   */
  riskState(): RiskState {
    return {
      currentPositions: this.ledger.countOpenPositions(),
      dailyPnl: this.ledger.getDailyPnl(),
      positionSizes: this.ledger.openPositionSizes(),
    };
  }

  /**
   * Size the signal as execution would, so the risk engine judges the real order
   */
  proposedSize(signal: Signal): number {
    return computeOrderSize(signal, this.sizing, capForStrategy(this.risk.getLimits(), signal.strategy));
  }

  async process(signal: Signal, currentPrice?: number): Promise<ExecutionResult> {
    if (!this.ledger.getStrategyEnabled(signal.strategy)) {
      log.info({ strategy: signal.strategy, marketId: signal.marketId }, 'strategy disabled, signal skipped');
      return { order: null, status: 'rejected', reason: 'strategy_disabled' };
    }

    const decision = this.risk.evaluate(signal, this.riskState(), this.proposedSize(signal));
    const result = await this.execution.submit(signal, decision, currentPrice);

    log.info(
      {
        strategy: signal.strategy,
        marketId: signal.marketId,
        action: signal.action,
        status: result.status,
        reason: result.reason,
        orderId: result.order?.orderId,
      },
      'signal processed',
    );
    return result;
  }

  /**
   * Process signals one after another, in input order. Each sees the
   * positions opened by the ones before it.
   */
  async processBatch(signals: readonly Signal[], prices: Readonly<Record<string, number>> = {}): Promise<ExecutionResult[]> {
    const results: ExecutionResult[] = [];
    for (const signal of signals) {
      results.push(await this.process(signal, prices[signal.marketId]));
    }
    return results;
  }

  /**
   * Feed realized/unrealized P&L from fills and marks into today's total
   */
  recordPnl(realized: number, unrealized: number): void {
    this.ledger.updateDailyPnl(realized, unrealized);
  }
}
