/**
 * Application configuration, read once from environment variables.
 *
 * Env vars:
 * - `EXPENSE_PORT`: HTTP port (default: 3000)
 * - `EXPENSE_STORAGE`: 'memory' | 'sqlite' (default: 'memory')
 * - `EXPENSE_SQLITE_PATH`: SQLite file (default: './expense-workflow.db')
 * - `EXPENSE_RECEIPT_THRESHOLD` / `EXPENSE_APPROVAL_CEILING` / `EXPENSE_LOOKBACK_DAYS`
 * - `EXPENSE_AUTH_ENABLED`: 'true' to require a Bearer JWT (default: 'false')
 * - `EXPENSE_JWT_SECRET`: HS256 key, required when auth is enabled (`_FILE` supported)
 * - `EXPENSE_JWT_ISSUER` / `EXPENSE_JWT_AUDIENCE`: expected claims
 * - `EXPENSE_JWT_ROLE_CLAIM`: claim holding the role (default: 'role')
 * - `EXPENSE_SEED_DEMO_DATA`: 'true' to seed demo users and categories
 * - `EXPENSE_METRICS_PORT`: start a dedicated metrics server
 *
 * Logging env vars are read by `createLogger`.
 */

import { z } from 'zod';
import { resolveSecret, type Env } from './secrets.js';
import type { ExpensePolicy } from './core/expense-policy.js';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

const envSchema = z.object({
  EXPENSE_PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  EXPENSE_STORAGE: z.enum(['memory', 'sqlite']).default('memory'),
  EXPENSE_SQLITE_PATH: z.string().min(1).default('./expense-workflow.db'),
  EXPENSE_RECEIPT_THRESHOLD: z.coerce.number().nonnegative().default(100),
  EXPENSE_APPROVAL_CEILING: z.coerce.number().positive().default(1000),
  EXPENSE_LOOKBACK_DAYS: z.coerce.number().int().nonnegative().default(90),
  EXPENSE_AUTH_ENABLED: booleanFlag,
  EXPENSE_JWT_ISSUER: z.string().min(1).optional(),
  EXPENSE_JWT_AUDIENCE: z.string().min(1).optional(),
  EXPENSE_JWT_ROLE_CLAIM: z.string().min(1).default('role'),
  EXPENSE_SEED_DEMO_DATA: booleanFlag,
  EXPENSE_METRICS_PORT: z.coerce.number().int().min(1).max(65535).optional(),
});

export interface JwtSettings {
  secret: string;
  issuer?: string;
  audience?: string;
  roleClaim: string;
}

export type StorageSettings =
  | { kind: 'memory' }
  | { kind: 'sqlite'; dbPath: string };

export interface AppConfig {
  port: number;
  storage: StorageSettings;
  policy: ExpensePolicy;
  /** null when auth is disabled */
  jwt: JwtSettings | null;
  seedDemoData: boolean;
  metricsPort?: number;
}

/** Blank values count as unset so `FOO=` falls back to the default */
function withoutBlanks(env: Env): Env {
  const result: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Load and validate configuration.
 *
 * @throws ZodError if a variable is malformed
 * @throws Error if auth is enabled without a JWT secret
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = envSchema.parse(withoutBlanks(env));

  let jwt: JwtSettings | null = null;
  if (parsed.EXPENSE_AUTH_ENABLED) {
    const secret = resolveSecret('EXPENSE_JWT_SECRET', env);
    if (!secret) {
      throw new Error(
        'EXPENSE_AUTH_ENABLED=true requires EXPENSE_JWT_SECRET to be set'
      );
    }
    jwt = {
      secret,
      issuer: parsed.EXPENSE_JWT_ISSUER,
      audience: parsed.EXPENSE_JWT_AUDIENCE,
      roleClaim: parsed.EXPENSE_JWT_ROLE_CLAIM,
    };
  }

  return {
    port: parsed.EXPENSE_PORT,
    storage:
      parsed.EXPENSE_STORAGE === 'sqlite'
        ? { kind: 'sqlite', dbPath: parsed.EXPENSE_SQLITE_PATH }
        : { kind: 'memory' },
    policy: {
      receiptThreshold: parsed.EXPENSE_RECEIPT_THRESHOLD,
      approvalCeiling: parsed.EXPENSE_APPROVAL_CEILING,
      lookbackDays: parsed.EXPENSE_LOOKBACK_DAYS,
    },
    jwt,
    seedDemoData: parsed.EXPENSE_SEED_DEMO_DATA,
    metricsPort: parsed.EXPENSE_METRICS_PORT,
  };
}
