export type { Ledger, AuditInput, AuditLogEntry } from './types.js';
export { todayUtc } from './types.js';
export { SqliteLedger } from './sqlite.js';
export { MemoryLedger } from './memory.js';
