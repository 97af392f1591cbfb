import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { adminIds, loadEnv } from '../env.js';

const required = {
  POOL_MIN_SIZE: '50',
  POOL_LOW_THRESHOLD: '10',
  ADDRESS_COOLDOWN_MINUTES: '30',
  CONFIRMATION_THRESHOLD: '19',
  DEPOSIT_EXPIRY_MINUTES: '60',
  POLL_INTERVAL_MS: '15000',
  CHAIN_QUERY_TIMEOUT_MS: '10000',
  TRON_API_URL: 'https://trongrid.test',
  TOKEN_CONTRACT: 'TR7NHqjeKQxGTCi8q8ZY4pL8otSzgjLj6t',
  STORE_BACKEND: 'memory',
};

describe('loadEnv', () => {
  it('coerces required values and fills operational defaults', () => {
    const env = loadEnv(required);

    expect(env).toMatchObject({
      NODE_ENV: 'development',
      PORT: 3200,
      POOL_MIN_SIZE: 50,
      CONFIRMATION_THRESHOLD: 19,
      DEPOSIT_EXPIRY_MINUTES: 60,
      MONITOR_CONCURRENCY: 4,
      BACKOFF_BASE_MS: 5_000,
      BACKOFF_MAX_MS: 300_000,
      AMOUNT_TOLERANCE: '0',
      TOKEN_SYMBOL: 'USDT',
      TOKEN_DECIMALS: 6,
      STRANDED_GRACE_MINUTES: 5,
      EVENT_DELIVERY_TIMEOUT_MS: 5_000,
    });
    expect(env.CHAIN_WEBHOOK_SECRET).toBeUndefined();
  });

  it('has no default for core pool and monitor settings', () => {
    const { CONFIRMATION_THRESHOLD: _omitted, ...rest } = required;

    expect(() => loadEnv(rest)).toThrow(ZodError);
  });

  it('needs a database URL for the postgres backend', () => {
    expect(() => loadEnv({ ...required, STORE_BACKEND: 'postgres' })).toThrow(
      'DATABASE_URL is required when STORE_BACKEND=postgres',
    );
  });

  it('refuses the development JWT secret in production', () => {
    expect(() => loadEnv({ ...required, NODE_ENV: 'production' })).toThrow(/JWT_SECRET is using the default dev secret/);
  });

  it('checks the deposit limits against each other', () => {
    expect(() => loadEnv({ ...required, MIN_DEPOSIT_AMOUNT: '50', MAX_DEPOSIT_AMOUNT: '10' })).toThrow(
      'MIN_DEPOSIT_AMOUNT must not exceed MAX_DEPOSIT_AMOUNT',
    );
  });
});

describe('adminIds', () => {
  it('splits and trims the comma-separated list', () => {
    expect(adminIds({ ADMIN_USER_IDS: ' a, b ,,c' })).toEqual(['a', 'b', 'c']);
  });
});
