import { adminIds, loadEnv } from './config/env.js';
import { logger } from './config/logger.js';
import { createDb } from './db/index.js';
import { buildApp } from './app.js';
import { XpubAddressGenerator } from './services/address-generator.js';
import { PoolManager } from './services/address-pool.js';
import { TronGridClient } from './services/chain-client.js';
import { DepositMonitor } from './services/deposit-monitor.js';
import { DepositService } from './services/deposits.js';
import { DepositEventEmitter, LogEventSink, RedisEventSink, type EventSink } from './services/events.js';
import { MemoryStore } from './services/memory-store.js';
import { PgStore } from './services/pg-store.js';
import { createRedis } from './services/redis.js';
import type { Store } from './services/store.js';
import { systemClock } from './services/types.js';

const MINUTE_MS = 60_000;

async function main() {
  const env = loadEnv();

  // ─── Persistence ──────────────────────────────────────────────────────
  let store: Store;
  let closeDb = async () => {};
  if (env.STORE_BACKEND === 'postgres' && env.DATABASE_URL) {
    const { db, client } = createDb(env.DATABASE_URL, { ssl: env.NODE_ENV === 'production' });
    store = new PgStore(db);
    closeDb = async () => {
      await client.end({ timeout: 5 });
    };
  } else {
    logger.warn('Using the in-memory store: state is lost on restart');
    store = new MemoryStore();
  }

  // ─── Events ───────────────────────────────────────────────────────────
  const sinks: EventSink[] = [new LogEventSink()];
  const redis = env.REDIS_URL ? createRedis(env.REDIS_URL) : null;
  if (redis) sinks.push(new RedisEventSink(redis));
  const events = new DepositEventEmitter(store, sinks, systemClock, logger, env.EVENT_DELIVERY_TIMEOUT_MS);

  // ─── Core Services ────────────────────────────────────────────────────
  const generator = env.ADDRESS_XPUB ? new XpubAddressGenerator(env.ADDRESS_XPUB, store) : null;
  const pool = new PoolManager(
    store,
    events,
    {
      minSize: env.POOL_MIN_SIZE,
      lowThreshold: env.POOL_LOW_THRESHOLD,
      cooldownMs: env.ADDRESS_COOLDOWN_MINUTES * MINUTE_MS,
      strandedGraceMs: env.STRANDED_GRACE_MINUTES * MINUTE_MS,
    },
    generator,
  );

  const chain = new TronGridClient({
    baseUrl: env.TRON_API_URL,
    apiKey: env.TRON_API_KEY,
    tokenContract: env.TOKEN_CONTRACT,
    tokenDecimals: env.TOKEN_DECIMALS,
    timeoutMs: env.CHAIN_QUERY_TIMEOUT_MS,
  });

  const monitor = new DepositMonitor(
    { store, pool, chain, events },
    {
      confirmationThreshold: env.CONFIRMATION_THRESHOLD,
      pollIntervalMs: env.POLL_INTERVAL_MS,
      queryTimeoutMs: env.CHAIN_QUERY_TIMEOUT_MS,
      concurrency: env.MONITOR_CONCURRENCY,
      amountTolerance: env.AMOUNT_TOLERANCE,
      backoff: { baseDelayMs: env.BACKOFF_BASE_MS, maxDelayMs: env.BACKOFF_MAX_MS },
    },
  );

  const deposits = new DepositService(store, pool, {
    currency: env.TOKEN_SYMBOL,
    decimals: env.TOKEN_DECIMALS,
    minAmount: env.MIN_DEPOSIT_AMOUNT,
    maxAmount: env.MAX_DEPOSIT_AMOUNT,
    expiryMs: env.DEPOSIT_EXPIRY_MINUTES * MINUTE_MS,
    confirmationThreshold: env.CONFIRMATION_THRESHOLD,
  });

  // ─── HTTP ─────────────────────────────────────────────────────────────
  const corsOrigins = env.CORS_ORIGINS.split(',').map((s) => s.trim()).filter(Boolean);
  const app = await buildApp({
    jwtSecret: env.JWT_SECRET,
    adminIds: adminIds(env),
    corsOrigins: env.NODE_ENV === 'development' ? true : corsOrigins,
    logLevel: env.NODE_ENV === 'development' ? 'info' : 'warn',
    deposits,
    pool,
    monitor,
    webhook: env.CHAIN_WEBHOOK_SECRET
      ? { secret: env.CHAIN_WEBHOOK_SECRET, tokenContract: env.TOKEN_CONTRACT }
      : undefined,
    environment: env.NODE_ENV,
  });

  // ─── Start Server FIRST (so health check responds immediately) ───────
  await app.listen({ port: env.PORT, host: env.HOST });
  logger.info({ host: env.HOST, port: env.PORT, env: env.NODE_ENV, store: env.STORE_BACKEND }, 'Deposit pool server running');

  // ─── Background Jobs ──────────────────────────────────────────────────
  const initial = await pool.replenish();
  if (initial.error) logger.warn({ error: initial.error }, 'Initial pool replenish failed (will retry)');

  monitor.start();

  // Pool check: warn when low, top up when below minimum
  const poolTimer = setInterval(async () => {
    try {
      const status = await pool.getStatus();
      if (status.health === 'critical' || status.health === 'warning') {
        logger.warn({ available: status.available, lowThreshold: status.lowThreshold, health: status.health }, 'Low address pool');
      }
      await pool.replenish();
    } catch (err: unknown) {
      logger.error({ err }, 'Error checking address pool status');
    }
  }, env.POLL_INTERVAL_MS);

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');
    clearInterval(poolTimer);
    await monitor.stop();
    await app.close();
    await events.settle();
    if (redis) await redis.quit();
    await closeDb();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }
}

main().catch((err) => {
  logger.fatal({ err }, 'FATAL startup error');
  process.exit(1);
});
