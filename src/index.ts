export { RiskEngine, MIN_CONFIDENCE_THRESHOLD, emptyRiskState, positionSize } from './risk/engine.js';
export type { RiskDecision, RiskReason, RiskState, TradingState } from './risk/engine.js';
export { applyLimit, capForStrategy, createRiskLimits, DEFAULT_RISK_LIMITS, LIMIT_PARAMS } from './risk/limits.js';
export type { RiskLimits } from './risk/limits.js';

export { ExecutionEngine, targetPrice, type ExecutionEngineConfig } from './execution/engine.js';
export { computeOrderSize, confidenceFactor } from './execution/sizing.js';
export { withinSlippage, slippageOf, DEFAULT_MAX_SLIPPAGE } from './execution/slippage.js';
export {
  idempotencyKey,
  MemoryIdempotencyStore,
  SqliteIdempotencyStore,
  DEFAULT_IDEMPOTENCY_TTL_MS,
  type IdempotencyStore,
} from './execution/idempotency.js';
export { DEFAULT_ORDER_SIZING, OPEN_ORDER_STATUSES, POSITION_STATUSES } from './execution/types.js';
export type {
  ExecutionOrder,
  ExecutionResult,
  ExecutionStatus,
  OrderPlacer,
  OrderSizing,
  OrderStatus,
  PlacementAck,
} from './execution/types.js';

export { MemoryLedger, SqliteLedger, todayUtc } from './ledger/index.js';
export type { Ledger, AuditInput, AuditLogEntry } from './ledger/index.js';

export { AdminService, type AdminContext, type SystemStatus, type WatchlistAction } from './admin/service.js';
export { TradingPipeline, createTradingCore, type TradingCore, type TradingCoreOptions } from './trading/index.js';

export { createSignal, parseSignal, SignalSchema } from './signals/types.js';
export type { Signal, SignalAction, SignalInput } from './signals/types.js';

export { openDb, getDb, closeDb } from './db/client.js';
export { loadConfig, parseConfig, getConfig, clearConfigCache, loadEnv, type Config, type EnvConfig } from './config/index.js';
export { retry, retryWithTimeout, backoffDelay, type RetryOptions } from './utils/retry.js';
export {
  TradingCoreError,
  PersistenceError,
  PlacementError,
  ReconciliationRequiredError,
  ContractViolationError,
  RetryError,
  describeError,
  type ErrorCode,
} from './errors.js';
