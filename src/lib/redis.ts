import { createClient } from 'redis';

import type { AppConfig } from '@/config';
import logger from '@/lib/logger';

// createClient's inferred type carries the bundled modules; RedisClientType alone does not
export type RedisClient = ReturnType<typeof createClient>;

let redisClient: RedisClient | null = null;

/**
 * Opens the shared Redis connection used by the rate limiter and the token
 * rotation/revocation tracking. Safe to call more than once.
 */
export async function initializeRedis(
  config: Pick<AppConfig, 'REDIS_HOST' | 'REDIS_PORT' | 'REDIS_PASSWORD' | 'REDIS_DB'>,
): Promise<RedisClient> {
  if (redisClient?.isOpen) {
    return redisClient;
  }

  const client = createClient({
    socket: {
      host: config.REDIS_HOST,
      port: config.REDIS_PORT,
      connectTimeout: 5000,
      reconnectStrategy: (retries: number) => Math.min(retries * 100, 2000),
    },
    password: config.REDIS_PASSWORD || undefined,
    database: config.REDIS_DB,
  });

  client.on('error', (err: unknown) => {
    logger.error({ err }, 'Redis client error');
  });
  client.on('reconnecting', () => {
    logger.warn('Redis client reconnecting...');
  });

  await client.connect();
  redisClient = client;
  logger.info({ host: config.REDIS_HOST, port: config.REDIS_PORT }, 'Redis connected');
  return client;
}

export async function closeRedis(): Promise<void> {
  if (!redisClient) return;
  const client = redisClient;
  redisClient = null;
  if (client.isOpen) {
    await client.quit();
  }
}
