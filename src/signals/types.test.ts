import { describe, expect, it } from 'vitest';

import { createSignal, numericField, parseSignal } from './types.js';

describe('createSignal', () => {
  it('returns a frozen signal with an empty explanation by default', () => {
    const signal = createSignal({ strategy: 'momentum', marketId: 'market-a', outcomeId: 'yes', action: 'buy', confidence: 0.7 });
    expect(Object.isFrozen(signal)).toBe(true);
    expect(Object.isFrozen(signal.explanation)).toBe(true);
    expect(signal.explanation).toEqual({});
    expect(signal.createdAt).toBeInstanceOf(Date);
  });
});

describe('parseSignal', () => {
  const valid = {
    strategy: 'momentum',
    marketId: 'market-a',
    outcomeId: 'yes',
    action: 'sell',
    confidence: 0.8,
    explanation: { edge: 0.04, note: 'breakout' },
    createdAt: '2026-03-01T12:00:00.000Z',
  };

  it('builds a signal from valid input', () => {
    const result = parseSignal(valid);
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.signal.action).toBe('sell');
      expect(result.signal.explanation).toEqual({ edge: 0.04, note: 'breakout' });
      expect(result.signal.createdAt.toISOString()).toBe('2026-03-01T12:00:00.000Z');
    }
  });

  it('ignores extra fields', () => {
    const result = parseSignal({ ...valid, currentPrice: 0.5 });
    expect(result.success).toBe(true);
  });

  it('reports each invalid field', () => {
    const result = parseSignal({ ...valid, action: 'hold', confidence: 1.5 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toContain('action:');
      expect(result.error).toContain('confidence:');
    }
  });

  it('rejects a missing market', () => {
    const { marketId: _marketId, ...rest } = valid;
    expect(parseSignal(rest).success).toBe(false);
  });
});

describe('numericField', () => {
  it('reads finite numbers only', () => {
    const explanation = { edge: 0.05, label: 'x', bad: Number.NaN };
    expect(numericField(explanation, 'edge')).toBe(0.05);
    expect(numericField(explanation, 'label')).toBeUndefined();
    expect(numericField(explanation, 'bad')).toBeUndefined();
    expect(numericField(explanation, 'missing')).toBeUndefined();
  });
});
