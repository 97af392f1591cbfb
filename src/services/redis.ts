import { Redis, type RedisOptions } from 'ioredis';
import { logger } from '../config/logger.js';

export function createRedis(url: string, role = 'publisher'): Redis {
  const opts: RedisOptions = {
    maxRetriesPerRequest: 3,
    enableReadyCheck: false,
  };

  // Managed Redis uses rediss:// (TLS)
  if (url.startsWith('rediss://')) {
    opts.tls = { rejectUnauthorized: false };
  }

  const redis = new Redis(url, opts);
  redis.on('error', (err) => logger.error({ err, role }, 'Redis connection error'));
  return redis;
}

export const KEYS = {
  depositEventsChannel: 'channel:deposit-events', // pub/sub for deposit lifecycle events
} as const;
