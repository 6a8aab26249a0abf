/**
 * SQLite database schema definitions
 */

export const SCHEMA_VERSION = 1;

/**
 * SQL statements to create the database schema
 */
export const CREATE_TABLES = `
-- Schema version tracking for migrations
CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER PRIMARY KEY,
  applied_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Orders: one row per accepted signal, never deleted, only superseded in status
CREATE TABLE IF NOT EXISTS orders (
  order_id TEXT PRIMARY KEY,
  market_id TEXT NOT NULL,
  outcome_id TEXT NOT NULL,
  side TEXT NOT NULL CHECK (side IN ('buy', 'sell')),
  price REAL NOT NULL,
  size REAL NOT NULL,
  status TEXT NOT NULL CHECK (status IN ('paper', 'submitted', 'pending', 'cancelled', 'filled')),
  strategy TEXT NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_orders_status ON orders(status);
CREATE INDEX IF NOT EXISTS idx_orders_market ON orders(market_id);

-- Idempotency keys: at most one live order per key until expiry
CREATE TABLE IF NOT EXISTS idempotency_keys (
  key TEXT PRIMARY KEY,
  created_at INTEGER NOT NULL,    -- epoch ms
  expires_at INTEGER NOT NULL     -- epoch ms
);

CREATE INDEX IF NOT EXISTS idx_idempotency_expires ON idempotency_keys(expires_at);

-- Audit log: append-only journal of admin actions
CREATE TABLE IF NOT EXISTS audit_log (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  actor_id TEXT NOT NULL,
  action TEXT NOT NULL,
  details TEXT NOT NULL,
  correlation_id TEXT,
  created_at TEXT NOT NULL
);

-- Process-wide switches (singleton row)
CREATE TABLE IF NOT EXISTS risk_state (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  trading_enabled INTEGER NOT NULL DEFAULT 0,
  paper_mode INTEGER NOT NULL DEFAULT 1,
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

INSERT OR IGNORE INTO risk_state (id, trading_enabled, paper_mode) VALUES (1, 0, 1);

CREATE TABLE IF NOT EXISTS strategy_state (
  name TEXT PRIMARY KEY,
  enabled INTEGER NOT NULL,
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS watchlist (
  market_id TEXT PRIMARY KEY,
  added_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS daily_pnl (
  date TEXT PRIMARY KEY,          -- YYYY-MM-DD (UTC)
  realized REAL NOT NULL DEFAULT 0,
  unrealized REAL NOT NULL DEFAULT 0
);
`;

/**
 * Row types matching the database schema
 */
export interface OrderRow {
  order_id: string;
  market_id: string;
  outcome_id: string;
  side: 'buy' | 'sell';
  price: number;
  size: number;
  status: 'paper' | 'submitted' | 'pending' | 'cancelled' | 'filled';
  strategy: string;
  created_at: string;
  updated_at: string;
}

export interface IdempotencyKeyRow {
  key: string;
  created_at: number;
  expires_at: number;
}

export interface AuditLogRow {
  id: number;
  actor_id: string;
  action: string;
  details: string;
  correlation_id: string | null;
  created_at: string;
}

export interface RiskStateRow {
  id: 1;
  trading_enabled: number;
  paper_mode: number;
  updated_at: string;
}

export interface StrategyStateRow {
  name: string;
  enabled: number;
  updated_at: string;
}

export interface DailyPnlRow {
  date: string;
  realized: number;
  unrealized: number;
}
