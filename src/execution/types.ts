/**
 * Execution types
 */

import type { SignalAction } from '../signals/types.js';

export type OrderStatus = 'paper' | 'submitted' | 'pending' | 'cancelled' | 'filled';

// Statuses that still count as open
export const OPEN_ORDER_STATUSES: readonly OrderStatus[] = ['submitted', 'pending', 'paper'];

// Statuses that hold exposure: open orders plus fills
export const POSITION_STATUSES: readonly OrderStatus[] = [...OPEN_ORDER_STATUSES, 'filled'];

export interface ExecutionOrder {
  readonly orderId: string;
  readonly marketId: string;
  readonly outcomeId: string;
  readonly side: SignalAction;
  readonly price: number;
  readonly size: number;
  readonly status: OrderStatus;
  readonly createdAt: Date;
  readonly strategy: string;
}

export type ExecutionStatus = 'submitted' | 'duplicate' | 'rejected';

export interface ExecutionResult {
  readonly order: ExecutionOrder | null;
  readonly status: ExecutionStatus;
  readonly reason: string;
}

export interface OrderSizing {
  readonly baseSize: number;
  readonly confidenceScaling: boolean;
  readonly minSize: number;
  readonly maxSize: number;
}

export const DEFAULT_ORDER_SIZING: OrderSizing = Object.freeze({
  baseSize: 10,
  confidenceScaling: true,
  minSize: 1,
  maxSize: 100,
});

/**
 * Venue acknowledgement for a live order
 */
export interface PlacementAck {
  status: Extract<OrderStatus, 'submitted' | 'filled'>;
  externalId?: string;
}

/**
 * Order-placement sink (live mode only)
 */
export interface OrderPlacer {
  place(order: ExecutionOrder): Promise<PlacementAck>;
}
