import { describe, expect, it } from 'vitest';

import { createSignal, type Signal } from '../signals/types.js';
import { ContractViolationError } from '../errors.js';
import { MIN_CONFIDENCE_THRESHOLD, RiskEngine, emptyRiskState, positionSize } from './engine.js';
import { createRiskLimits } from './limits.js';

function makeSignal(overrides: Partial<Signal> = {}): Signal {
  return createSignal({
    strategy: 'test_strategy',
    marketId: 'test-market',
    outcomeId: 'yes',
    action: 'buy',
    confidence: 0.7,
    explanation: { test: 'data' },
    ...overrides,
  });
}

function enabledEngine(limits = createRiskLimits()): RiskEngine {
  const engine = new RiskEngine(limits);
  engine.setTrading(true);
  return engine;
}

describe('RiskEngine defaults', () => {
  it('starts with trading disabled', () => {
    const engine = new RiskEngine();
    expect(engine.isTradingEnabled()).toBe(false);
    expect(engine.getTradingState()).toBe('disabled');
  });

  it('uses 0.6 as the confidence threshold', () => {
    expect(MIN_CONFIDENCE_THRESHOLD).toBe(0.6);
  });

  it('rejects even a maximally favorable signal while disabled', () => {
    const engine = new RiskEngine();
    const decision = engine.evaluate(makeSignal({ confidence: 1 }), emptyRiskState());
    expect(decision).toEqual({ approved: false, reason: 'global_kill_switch' });
  });
});

describe('RiskEngine.evaluate', () => {
  it('approves when trading is enabled and limits hold', () => {
    const decision = enabledEngine().evaluate(makeSignal(), emptyRiskState());
    expect(decision).toEqual({ approved: true, reason: 'approved' });
  });

  it('rejects low confidence whatever the other state', () => {
    const engine = enabledEngine();
    for (const confidence of [0, 0.3, 0.59, 0.5999]) {
      const decision = engine.evaluate(makeSignal({ confidence }), { currentPositions: 3, dailyPnl: 40 }, 5);
      expect(decision.reason).toBe('confidence_below_threshold');
    }
  });

  it('accepts confidence exactly at the threshold', () => {
    const decision = enabledEngine().evaluate(makeSignal({ confidence: 0.6 }), emptyRiskState());
    expect(decision.approved).toBe(true);
  });

  it('rejects at the open position limit', () => {
    const engine = enabledEngine(createRiskLimits({ maxOpenPositions: 5 }));
    const decision = engine.evaluate(makeSignal({ confidence: 0.7 }), { currentPositions: 5, dailyPnl: 0 });
    expect(decision).toEqual({ approved: false, reason: 'max_open_positions' });
  });

  it('rejects once the daily loss limit is reached', () => {
    const engine = enabledEngine(createRiskLimits({ maxDailyLoss: 100 }));
    const decision = engine.evaluate(makeSignal(), { currentPositions: 0, dailyPnl: -100 });
    expect(decision.reason).toBe('max_daily_loss_exceeded');
  });

  it('rejects orders above the max order size', () => {
    const engine = enabledEngine(createRiskLimits({ maxOrderSize: 50 }));
    const decision = engine.evaluate(makeSignal(), emptyRiskState(), 60);
    expect(decision.reason).toBe('order_size_exceeded');
  });

  it('rejects when the market position would exceed its limit', () => {
    const engine = enabledEngine(createRiskLimits({ maxPositionSize: 100 }));
    const state = { currentPositions: 0, dailyPnl: 0, positionSizes: { 'test-market': 80 } };
    const decision = engine.evaluate(makeSignal(), state, 30);
    expect(decision.reason).toBe('max_position_size_exceeded');
  });

  it('applies strategy caps', () => {
    const engine = enabledEngine(createRiskLimits({ strategyCaps: { test_strategy: 20 } }));
    const decision = engine.evaluate(makeSignal(), emptyRiskState(), 25);
    expect(decision.reason).toBe('strategy_cap_exceeded');
  });

  it('reports the first failing check only', () => {
    const engine = enabledEngine(createRiskLimits({ maxOpenPositions: 1, maxDailyLoss: 10 }));
    const decision = engine.evaluate(makeSignal({ confidence: 0.1 }), { currentPositions: 4, dailyPnl: -50 }, 500);
    expect(decision.reason).toBe('max_daily_loss_exceeded');
  });

  it('treats a missing signal as a contract violation', () => {
    const engine = enabledEngine();
    // callers outside the type system (JSON, plain JS) can still pass nothing
    expect(() => Reflect.apply(engine.evaluate, engine, [undefined, emptyRiskState()])).toThrow(ContractViolationError);
  });
});

describe('RiskEngine.setLimit', () => {
  it('rejects negative values', () => {
    const engine = new RiskEngine();
    expect(engine.setLimit('max_order_size', -1)).toBe(false);
    expect(engine.getLimits().maxOrderSize).toBe(50);
  });

  it('truncates integer limits', () => {
    const engine = new RiskEngine();
    expect(engine.setLimit('max_open_positions', 7.8)).toBe(true);
    expect(engine.getLimits().maxOpenPositions).toBe(7);
  });

  it('sets strategy caps and keeps them on a later invalid update', () => {
    const engine = new RiskEngine();
    expect(engine.setLimit('strategy.vegas_value', 12.5)).toBe(true);
    expect(engine.setLimit('strategy.vegas_value', -1)).toBe(false);
    expect(engine.getLimits().strategyCaps).toEqual({ vegas_value: 12.5 });
  });

  it('rejects unknown parameter names', () => {
    const engine = new RiskEngine();
    const before = engine.getLimits();
    expect(engine.setLimit('unknown_param', 10)).toBe(false);
    expect(engine.getLimits()).toBe(before);
  });

  it('replaces the limits record instead of mutating it', () => {
    const engine = new RiskEngine();
    const before = engine.getLimits();
    engine.setLimit('max_daily_loss', 250);
    expect(before.maxDailyLoss).toBe(100);
    expect(engine.getLimits().maxDailyLoss).toBe(250);
  });
});

describe('RiskEngine.batchEvaluate', () => {
  it('evaluates every signal in order against one snapshot', () => {
    const engine = enabledEngine();
    const decisions = engine.batchEvaluate([
      makeSignal({ confidence: 0.7 }),
      makeSignal({ confidence: 0.4 }),
      makeSignal({ confidence: 0.8 }),
    ]);
    expect(decisions.map(d => d.reason)).toEqual(['approved', 'confidence_below_threshold', 'approved']);
  });

  it('passes proposed sizes through', () => {
    const engine = enabledEngine(createRiskLimits({ maxOrderSize: 50 }));
    const signals = [makeSignal({ strategy: 'small' }), makeSignal({ strategy: 'large' })];
    const decisions = engine.batchEvaluate(signals, emptyRiskState(), s => (s.strategy === 'large' ? 80 : 10));
    expect(decisions.map(d => d.reason)).toEqual(['approved', 'order_size_exceeded']);
  });
});

describe('positionSize', () => {
  it('defaults to zero', () => {
    expect(positionSize(emptyRiskState(), 'any-market')).toBe(0);
    expect(positionSize({ currentPositions: 0, dailyPnl: 0, positionSizes: { 'market-1': 50 } }, 'market-1')).toBe(50);
  });

  it('ignores built-in object members', () => {
    const state = { currentPositions: 0, dailyPnl: 0, positionSizes: { 'market-1': 50 } };
    expect(positionSize(state, 'constructor')).toBe(0);
    expect(positionSize(state, 'hasOwnProperty')).toBe(0);
  });
});
