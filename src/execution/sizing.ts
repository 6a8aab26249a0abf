import type { Signal } from '../signals/types.js';
import type { OrderSizing } from './types.js';

const MIN_FACTOR = 0.5;
const MAX_FACTOR = 2.0;
const SCALE_FROM = 0.6;
const SCALE_TO = 1.0;

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Size multiplier: 0.5x at confidence 0.6 rising linearly to 2.0x at 1.0,
 * clamped outside that range
 */
export function confidenceFactor(confidence: number): number {
  const t = (confidence - SCALE_FROM) / (SCALE_TO - SCALE_FROM);
  return clamp(MIN_FACTOR + t * (MAX_FACTOR - MIN_FACTOR), MIN_FACTOR, MAX_FACTOR);
}

/**
 * Compute a bounded order size for a signal
 * Never fails - out-of-range inputs are clamped. Rejection is the risk engine's job.
 */
export function computeOrderSize(signal: Signal, sizing: OrderSizing, strategyCap: number): number {
  let size = sizing.baseSize;

  if (sizing.confidenceScaling) {
    size *= confidenceFactor(signal.confidence);
  }

  size = Math.min(size, strategyCap);
  size = clamp(size, sizing.minSize, sizing.maxSize);

  return Math.round(size * 100) / 100;
}
