import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { CREATE_TABLES, SCHEMA_VERSION } from './schema.js';
import { createLogger } from '../utils/logger.js';
import { PersistenceError } from '../errors.js';

// Get absolute path relative to this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const DEFAULT_DB_PATH = resolve(__dirname, '..', '..', 'data', 'trade-gate.db');

const log = createLogger('db');

let db: Database.Database | null = null;

/**
 * Open a new database connection with the schema in place
 * Pass ':memory:' for a throwaway database (tests).
 */
export function openDb(path: string): Database.Database {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const database = new Database(path);

  // WAL lets readers proceed while a write commits
  database.pragma('journal_mode = WAL');
  database.pragma('busy_timeout = 5000');

  initializeSchema(database);
  return database;
}

/**
 * Get or create the shared database connection
 */
export function getDb(dbPath?: string): Database.Database {
  if (db) return db;
  db = openDb(dbPath || DEFAULT_DB_PATH);
  return db;
}

/**
 * Initialize database schema if not exists
 */
function initializeSchema(database: Database.Database): void {
  const tableExists = database
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='schema_version'")
    .get();

  if (!tableExists) {
    database.exec(CREATE_TABLES);
    database.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
    log.info({ version: SCHEMA_VERSION }, 'database initialized');
    return;
  }

  const row = database
    .prepare<[], { version: number }>('SELECT MAX(version) as version FROM schema_version')
    .get();
  if (row && row.version < SCHEMA_VERSION) {
    log.warn({ from: row.version, to: SCHEMA_VERSION }, 'database migration needed');
  }
}

/**
 * Close the shared database connection
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Run a statement, turning driver errors into PersistenceError
 */
export function persist<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PersistenceError(`${operation} failed: ${message}`, error);
  }
}
