/**
 * Composition root
 * Wires risk, execution, ledger and admin from config. With a database the
 * ledger and idempotency keys are durable; without one everything is
 * process-local (tests, demos).
 */

import type Database from 'better-sqlite3';
import type { Config } from '../config/index.js';
import { RiskEngine } from '../risk/engine.js';
import { createRiskLimits } from '../risk/limits.js';
import { ExecutionEngine } from '../execution/engine.js';
import { MemoryIdempotencyStore, SqliteIdempotencyStore, type IdempotencyStore } from '../execution/idempotency.js';
import type { OrderPlacer, OrderSizing } from '../execution/types.js';
import type { Ledger } from '../ledger/types.js';
import { SqliteLedger } from '../ledger/sqlite.js';
import { MemoryLedger } from '../ledger/memory.js';
import { AdminService } from '../admin/service.js';
import type { RetryOptions } from '../utils/retry.js';
import { createLogger } from '../utils/logger.js';
import { TradingPipeline } from './pipeline.js';

const log = createLogger('core');

const SYSTEM_ACTOR = 'system';

export interface TradingCoreOptions {
  config: Config;
  db?: Database.Database;
  forcePaper?: boolean;
  placer?: OrderPlacer;
  placementRetry?: RetryOptions;
}

export interface TradingCore {
  risk: RiskEngine;
  execution: ExecutionEngine;
  ledger: Ledger;
  idempotency: IdempotencyStore;
  admin: AdminService;
  pipeline: TradingPipeline;
}

export function createTradingCore(options: TradingCoreOptions): TradingCore {
  const { config, db } = options;

  const ledger: Ledger = db ? new SqliteLedger(db) : new MemoryLedger();
  const idempotency: IdempotencyStore = db ? new SqliteIdempotencyStore(db) : new MemoryIdempotencyStore();

  const risk = new RiskEngine(createRiskLimits(config.risk));
  const sizing: OrderSizing = { ...config.sizing };

  const execution = new ExecutionEngine({
    ledger,
    idempotency,
    limits: () => risk.getLimits(),
    sizing,
    maxSlippage: config.execution.maxSlippage,
    idempotencyTtlMs: config.execution.idempotencyTtlHours * 60 * 60 * 1000,
    placer: options.placer,
    placementRetry: options.placementRetry,
  });

  const admin = new AdminService(risk, execution, ledger);
  const pipeline = new TradingPipeline(risk, execution, ledger, sizing);

  // The kill switch always boots disabled. A flag left on by a previous
  // process is turned off on record so the ledger matches the engine.
  if (ledger.getTradingEnabled()) {
    admin.setTrading({ actorId: SYSTEM_ACTOR }, false);
    log.warn('trading was enabled before restart - disabled until an admin re-enables it');
  }

  if (options.forcePaper && !execution.isPaper()) {
    admin.setPaper({ actorId: SYSTEM_ACTOR }, true);
  }

  log.info(
    { durable: Boolean(db), paper: execution.isPaper(), live: Boolean(options.placer) },
    'trading core ready',
  );

  return { risk, execution, ledger, idempotency, admin, pipeline };
}
