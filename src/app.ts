import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import jwt from '@fastify/jwt';
import { ZodError } from 'zod';
import { adminRoutes } from './routes/admin.js';
import { depositRoutes } from './routes/deposits.js';
import { webhookRoutes } from './routes/webhooks.js';
import type { PoolManager } from './services/address-pool.js';
import type { DepositMonitor } from './services/deposit-monitor.js';
import type { DepositService } from './services/deposits.js';
import { AppError } from './services/errors.js';

export interface AppOptions {
  jwtSecret: string;
  adminIds: readonly string[];
  /** `true` reflects any origin (development). */
  corsOrigins: string[] | true;
  /** Omit to disable request logging. */
  logLevel?: string;
  rateLimitPerMinute?: number;
  deposits: DepositService;
  pool: PoolManager;
  monitor: Pick<DepositMonitor, 'failDeposit' | 'confirmDeposit' | 'acceptNotification'>;
  /** Enables the chain notification intake. */
  webhook?: { secret: string; tokenContract: string };
  environment: string;
}

export async function buildApp(options: AppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logLevel ? { level: options.logLevel } : false,
  });

  // ─── Plugins ──────────────────────────────────────────────────────────
  await app.register(cors, {
    origin: options.corsOrigins,
    credentials: true,
  });

  await app.register(rateLimit, {
    max: options.rateLimitPerMinute ?? 100,
    timeWindow: '1 minute',
  });

  await app.register(jwt, {
    secret: options.jwtSecret,
  });

  app.decorateRequest('userId', '');

  // ─── Error Handler ────────────────────────────────────────────────────
  app.setErrorHandler((error: Error & { statusCode?: number }, request, reply) => {
    // Zod validation errors: strip to field + message only
    if (error instanceof ZodError) {
      return reply.status(400).send({
        error: 'Validation Error',
        details: error.issues.map((i) => ({
          field: i.path.join('.'),
          message: i.message,
        })),
      });
    }

    if (error instanceof AppError) {
      if (error.statusCode >= 500) request.log.warn({ err: error }, error.message);
      return reply.status(error.statusCode).send({ error: error.message, code: error.code });
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
      return reply.status(statusCode).send({ error: 'Internal Server Error' });
    }

    return reply.status(statusCode).send({
      error: error.message || 'Request Error',
    });
  });

  // ─── Routes ───────────────────────────────────────────────────────────
  await app.register(depositRoutes, { deposits: options.deposits });
  await app.register(adminRoutes, {
    pool: options.pool,
    deposits: options.deposits,
    monitor: options.monitor,
    adminIds: options.adminIds,
  });
  if (options.webhook) {
    await app.register(webhookRoutes, { monitor: options.monitor, ...options.webhook });
  }

  // ─── Health Check ─────────────────────────────────────────────────────
  app.get('/api/health', async () => {
    const pool = await options.pool.getStatus();
    return {
      status: 'ok',
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      env: options.environment,
      pool: { health: pool.health, available: pool.available },
    };
  });

  return app;
}
