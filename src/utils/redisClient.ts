/**
 * Shared Redis Client
 *
 * One ioredis connection for health checks, plus the connection options
 * BullMQ opens its own connections with. Both come from `REDIS_URL`.
 */

import Redis from 'ioredis';
import type { ConnectionOptions } from 'bullmq';
import { env } from '../config/env';
import { errorMessage } from '../errors';
import { createLogger } from './logger';

const logger = createLogger('redis');

/** Maximum reconnect attempts before giving up. */
const MAX_RECONNECT_RETRIES = 20;

const BASE_RECONNECT_DELAY_MS = 500;
const MAX_RECONNECT_DELAY_MS = 30_000;

let sharedRedis: Redis | null = null;

export function reconnectDelay(times: number): number | null {
  if (times > MAX_RECONNECT_RETRIES) return null;
  return Math.min(BASE_RECONNECT_DELAY_MS * Math.pow(2, times - 1), MAX_RECONNECT_DELAY_MS);
}

function buildRedis(): Redis {
  const client = new Redis(env.REDIS_URL, {
    retryStrategy(times: number): number | null {
      const delay = reconnectDelay(times);
      if (delay === null) {
        logger.error({ attempts: times }, 'max reconnect retries exceeded, giving up');
      } else {
        logger.warn({ attempt: times, delayMs: delay }, 'reconnecting');
      }
      return delay;
    },
    maxRetriesPerRequest: null,
  });
  client.on('error', (err: unknown) => {
    logger.error({ error: errorMessage(err) }, 'connection error');
  });
  logger.info({}, 'client initialized');
  return client;
}

export function getRedisClient(): Redis {
  if (!sharedRedis) sharedRedis = buildRedis();
  return sharedRedis;
}

export async function closeRedisClient(): Promise<void> {
  if (!sharedRedis) return;
  const client = sharedRedis;
  sharedRedis = null;
  try {
    await client.quit();
  } catch (err) {
    logger.error({ error: errorMessage(err) }, 'quit error');
  }
}

/** BullMQ connection options parsed from a redis:// or rediss:// URL. */
export function getRedisConnection(redisUrl: string = env.REDIS_URL): ConnectionOptions {
  const parsed = new URL(redisUrl);
  return {
    host: parsed.hostname,
    port: parseInt(parsed.port || '6379', 10),
    password: parsed.password || undefined,
    username: parsed.username || undefined,
    maxRetriesPerRequest: null,
    ...(parsed.protocol === 'rediss:' && { tls: {} }),
  };
}
