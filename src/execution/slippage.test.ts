import { describe, expect, it } from 'vitest';

import { DEFAULT_MAX_SLIPPAGE, slippageOf, withinSlippage } from './slippage.js';

describe('withinSlippage', () => {
  it('accepts an unchanged price', () => {
    expect(withinSlippage(0.5, 0.5, 0.02)).toBe(true);
  });

  it('rejects a 20% move against a 2% tolerance', () => {
    expect(withinSlippage(0.5, 0.6, 0.02)).toBe(false);
    expect(withinSlippage(0.5, 0.4, 0.02)).toBe(false);
  });

  it('accepts small moves in either direction', () => {
    expect(withinSlippage(0.5, 0.505, 0.02)).toBe(true);
    expect(withinSlippage(0.5, 0.495, 0.02)).toBe(true);
  });

  it('always fails for a non-positive expected price', () => {
    for (const actual of [0, 0.5, 1, -1]) {
      expect(withinSlippage(0, actual, 1)).toBe(false);
      expect(withinSlippage(-0.1, actual, 1)).toBe(false);
    }
  });

  it('defaults to a 2% tolerance', () => {
    expect(DEFAULT_MAX_SLIPPAGE).toBe(0.02);
    expect(withinSlippage(1, 1.015)).toBe(true);
    expect(withinSlippage(1, 1.03)).toBe(false);
  });
});

describe('slippageOf', () => {
  it('is relative to the expected price', () => {
    expect(slippageOf(0.5, 0.6)).toBeCloseTo(0.2);
  });
});
