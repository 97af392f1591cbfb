import { z } from 'zod';
import Decimal from 'decimal.js';

const DEV_JWT_SECRET = 'deposit-pool-dev-secret-change-in-production';

const decimalString = z
  .string()
  .refine((v) => {
    try {
      return new Decimal(v).gte(0);
    } catch {
      return false;
    }
  }, 'must be a non-negative decimal');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3200),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // ─── Persistence ──────────────────────────────────────────────────────
  STORE_BACKEND: z.enum(['postgres', 'memory']).default('postgres'),
  DATABASE_URL: z.string().url().optional(),
  REDIS_URL: z.string().optional(),

  // ─── Auth ─────────────────────────────────────────────────────────────
  JWT_SECRET: z.string().min(16).default(DEV_JWT_SECRET),
  ADMIN_USER_IDS: z.string().default(''),
  CORS_ORIGINS: z.string().default(''),

  // ─── Address Pool (no defaults: operator must choose) ────────────────
  POOL_MIN_SIZE: z.coerce.number().int().nonnegative(),
  POOL_LOW_THRESHOLD: z.coerce.number().int().nonnegative(),
  ADDRESS_COOLDOWN_MINUTES: z.coerce.number().nonnegative(),
  STRANDED_GRACE_MINUTES: z.coerce.number().positive().default(5),
  ADDRESS_XPUB: z.string().optional(),

  // ─── Deposit Monitoring (no defaults) ────────────────────────────────
  CONFIRMATION_THRESHOLD: z.coerce.number().int().positive(),
  DEPOSIT_EXPIRY_MINUTES: z.coerce.number().positive(),
  POLL_INTERVAL_MS: z.coerce.number().int().positive(),
  CHAIN_QUERY_TIMEOUT_MS: z.coerce.number().int().positive(),
  MONITOR_CONCURRENCY: z.coerce.number().int().positive().default(4),
  BACKOFF_BASE_MS: z.coerce.number().int().positive().default(5_000),
  BACKOFF_MAX_MS: z.coerce.number().int().positive().default(300_000),
  AMOUNT_TOLERANCE: decimalString.default('0'),

  // ─── Deposit Limits ──────────────────────────────────────────────────
  MIN_DEPOSIT_AMOUNT: decimalString.default('1'),
  MAX_DEPOSIT_AMOUNT: decimalString.default('10000'),

  // ─── Chain Provider (TronGrid) ────────────────────────────────────────
  TRON_API_URL: z.string().url(),
  TRON_API_KEY: z.string().optional(),
  TOKEN_CONTRACT: z.string().min(1),
  TOKEN_SYMBOL: z.string().default('USDT'),
  TOKEN_DECIMALS: z.coerce.number().int().min(0).max(30).default(6),
  CHAIN_WEBHOOK_SECRET: z.string().min(16).optional(),
  EVENT_DELIVERY_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse and validate the process environment. Throws a ZodError listing every
 * missing or malformed variable.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const env = envSchema.parse(source);

  if (env.STORE_BACKEND === 'postgres' && !env.DATABASE_URL) {
    throw new Error('DATABASE_URL is required when STORE_BACKEND=postgres');
  }

  if (env.NODE_ENV === 'production' && env.JWT_SECRET === DEV_JWT_SECRET) {
    throw new Error('FATAL: JWT_SECRET is using the default dev secret. Set a real secret in production.');
  }

  if (new Decimal(env.MIN_DEPOSIT_AMOUNT).gt(env.MAX_DEPOSIT_AMOUNT)) {
    throw new Error('MIN_DEPOSIT_AMOUNT must not exceed MAX_DEPOSIT_AMOUNT');
  }

  return env;
}

export function adminIds(env: Pick<Env, 'ADMIN_USER_IDS'>): string[] {
  return env.ADMIN_USER_IDS.split(',').map((s) => s.trim()).filter(Boolean);
}
