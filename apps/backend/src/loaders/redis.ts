import { Redis } from 'ioredis';
import { env } from '../config/env.js';
import { logger } from '../lib/logger.js';

let client: Redis | null = null;

/**
 * Connect to Redis when `REDIS_URL` is configured.
 *
 * @returns The connected client, or null when the key-value tier should stay in memory
 */
export async function connectRedis(): Promise<Redis | null> {
  if (!env.REDIS_URL) {
    logger.warn('REDIS_URL not set; cache, quota counters and request limits live in process memory');
    return null;
  }

  const instance = new Redis(env.REDIS_URL, {
    keyPrefix: `${env.REDIS_NAMESPACE}:`,
    lazyConnect: true,
    maxRetriesPerRequest: 3
  });

  instance.on('connect', () => logger.info('Redis connected'));
  instance.on('error', (error: Error) => logger.error({ error }, 'Redis error'));

  await instance.connect();
  client = instance;
  return instance;
}

export async function disconnectRedis(): Promise<void> {
  if (client) {
    await client.quit();
    client = null;
  }
}
