/**
 * Signal types
 * A signal is one proposed trade from a strategy. Strategies live outside
 * this package; they only hand us values of this shape.
 */

import { z } from 'zod';

export type SignalAction = 'buy' | 'sell';

export type Explanation = Readonly<Record<string, number | string>>;

export interface Signal {
  readonly strategy: string;
  readonly marketId: string;
  readonly outcomeId: string;
  readonly action: SignalAction;
  readonly confidence: number;          // 0..1
  readonly explanation: Explanation;    // strategy diagnostics, e.g. edge, target_price
  readonly createdAt: Date;
}

// Schema for signals arriving as JSON (HTTP, queues)
export const SignalSchema = z.object({
  strategy: z.string().min(1),
  marketId: z.string().min(1),
  outcomeId: z.string().min(1),
  action: z.enum(['buy', 'sell']),
  confidence: z.number().min(0).max(1),
  explanation: z.record(z.union([z.number(), z.string()])).optional().default({}),
  createdAt: z.string().datetime().optional(),
});

export type SignalInput = z.input<typeof SignalSchema>;

/**
 * Build an immutable signal
 */
export function createSignal(input: Omit<Signal, 'createdAt' | 'explanation'> & {
  explanation?: Record<string, number | string>;
  createdAt?: Date;
}): Signal {
  return Object.freeze({
    strategy: input.strategy,
    marketId: input.marketId,
    outcomeId: input.outcomeId,
    action: input.action,
    confidence: input.confidence,
    explanation: Object.freeze({ ...(input.explanation ?? {}) }),
    createdAt: input.createdAt ?? new Date(),
  });
}

/**
 * Validate untrusted input and build a signal from it
 */
export function parseSignal(raw: unknown): { success: true; signal: Signal } | { success: false; error: string } {
  const result = SignalSchema.safeParse(raw);
  if (!result.success) {
    const error = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    return { success: false, error };
  }
  const data = result.data;
  return {
    success: true,
    signal: createSignal({
      ...data,
      createdAt: data.createdAt ? new Date(data.createdAt) : undefined,
    }),
  };
}

/**
 * Read a numeric diagnostic field, ignoring strings and non-finite values
 */
export function numericField(explanation: Explanation, field: string): number | undefined {
  const value = explanation[field];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}
