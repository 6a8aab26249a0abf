import { z } from 'zod';
import { readFileSync } from 'fs';
import { resolve } from 'path';

// Schema for risk limits
const RiskSchema = z.object({
  maxPositionSize: z.number().nonnegative(),
  maxOrderSize: z.number().nonnegative(),
  maxOpenPositions: z.number().int().nonnegative(),
  maxDailyLoss: z.number().nonnegative(),
  strategyCaps: z.record(z.number().nonnegative()).optional().default({}),
});

// Schema for order sizing
const SizingSchema = z.object({
  baseSize: z.number().positive(),
  confidenceScaling: z.boolean().optional().default(true),
  minSize: z.number().nonnegative(),
  maxSize: z.number().positive(),
});

// Schema for execution settings
const ExecutionSchema = z.object({
  maxSlippage: z.number().min(0).max(1).optional().default(0.02),
  idempotencyTtlHours: z.number().positive().optional().default(24),
});

// Schema for the admin API
const AdminSchema = z.object({
  rateLimit: z.number().int().positive().optional().default(10),        // requests per admin per window
  rateWindowSeconds: z.number().positive().optional().default(60),
});

// Complete config schema
const ConfigSchema = z.object({
  risk: RiskSchema,
  sizing: SizingSchema,
  execution: ExecutionSchema.optional().default({}),
  admin: AdminSchema.optional().default({}),
});

// Process environment (loaded from .env by the entry point)
const EnvSchema = z.object({
  DB_PATH: z.string().optional(),
  FORCE_PAPER: z.enum(['true', 'false']).optional().default('false'),
  ADMIN_IDS: z.string().optional().default(''),
  PORT: z.coerce.number().int().positive().optional().default(3000),
});

export type Config = z.infer<typeof ConfigSchema>;

export interface EnvConfig {
  dbPath: string | undefined;
  forcePaper: boolean;        // switch to paper mode at boot, whatever was persisted
  adminIds: Set<string>;
  port: number;
}

let cachedConfig: Config | null = null;

function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map(issue => `  - ${issue.path.join('.')}: ${issue.message}`)
    .join('\n');
}

/**
 * Validate a raw config object
 * @throws Error listing every invalid field
 */
export function parseConfig(rawConfig: unknown): Config {
  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new Error(`Invalid configuration:\n${formatIssues(result.error.issues)}`);
  }

  // Validate logical constraints
  const config = result.data;

  if (config.sizing.minSize > config.sizing.maxSize) {
    throw new Error('sizing.minSize must not exceed sizing.maxSize');
  }

  if (config.risk.maxOrderSize > config.risk.maxPositionSize) {
    throw new Error('risk.maxOrderSize must not exceed risk.maxPositionSize');
  }

  return config;
}

/**
 * Load and validate configuration from config.json
 * @param configPath Path to config file (defaults to project root config.json)
 * @throws Error if config is invalid or missing
 */
export function loadConfig(configPath?: string): Config {
  if (cachedConfig && !configPath) {
    return cachedConfig;
  }

  const path = configPath || resolve(process.cwd(), 'config.json');

  let rawConfig: unknown;
  try {
    const content = readFileSync(path, 'utf-8');
    rawConfig = JSON.parse(content);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new Error(`Config file not found: ${path}`);
    }
    throw new Error(`Failed to parse config file: ${error}`);
  }

  const config = parseConfig(rawConfig);

  if (!configPath) {
    cachedConfig = config;
  }

  return config;
}

/**
 * Get cached config or load it
 */
export function getConfig(): Config {
  return loadConfig();
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}

/**
 * Read process settings from the environment
 */
export function loadEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new Error(`Invalid environment:\n${formatIssues(result.error.issues)}`);
  }

  const adminIds = new Set(
    result.data.ADMIN_IDS.split(',')
      .map(id => id.trim())
      .filter(id => id.length > 0),
  );

  return {
    dbPath: result.data.DB_PATH,
    forcePaper: result.data.FORCE_PAPER === 'true',
    adminIds,
    port: result.data.PORT,
  };
}
