export const DEFAULT_MAX_SLIPPAGE = 0.02;

/**
 * Relative deviation of the observed price from the expected one
 */
export function slippageOf(expected: number, actual: number): number {
  return Math.abs(actual - expected) / expected;
}

/**
 * Slippage guard. A non-positive expected price has no defined relative
 * slippage and always fails.
 */
export function withinSlippage(expected: number, actual: number, maxSlippage = DEFAULT_MAX_SLIPPAGE): boolean {
  if (expected <= 0) {
    return false;
  }
  return slippageOf(expected, actual) <= maxSlippage;
}
