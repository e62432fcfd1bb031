import type { Redis as RedisClient } from 'ioredis';
import type { IKeyValueStore } from '@tubepulse/types';

/**
 * Key-value store over ioredis.
 *
 * Key namespacing comes from the client's `keyPrefix` (see loaders/redis.ts).
 * Redis expires keys itself, so `sweep()` has nothing to do.
 */
export class RedisKeyValueStore implements IKeyValueStore {
  constructor(private readonly redis: RedisClient) {}

  async get(key: string): Promise<string | null> {
    return await this.redis.get(key);
  }

  async set(key: string, value: string, ttlMs?: number): Promise<void> {
    if (ttlMs !== undefined) {
      await this.redis.set(key, value, 'PX', Math.max(Math.ceil(ttlMs), 1));
    } else {
      await this.redis.set(key, value);
    }
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    const reply = await this.redis.set(key, value, 'PX', Math.max(Math.ceil(ttlMs), 1), 'NX');
    return reply === 'OK';
  }

  async del(key: string): Promise<number> {
    return await this.redis.del(key);
  }

  /**
   * INCRBY and PEXPIRE run in one MULTI so the counter is never left without
   * an expiry.
   */
  async incrBy(key: string, amount: number, ttlMs?: number): Promise<number> {
    const pipeline = this.redis.multi().incrby(key, amount);
    if (ttlMs !== undefined) {
      pipeline.pexpire(key, Math.max(Math.ceil(ttlMs), 1));
    }

    const results = await pipeline.exec();
    const first = results?.[0];
    if (!first) {
      throw new Error(`INCRBY ${key} returned no result`);
    }

    const [error, value] = first;
    if (error) {
      throw error;
    }
    if (typeof value !== 'number') {
      throw new Error(`INCRBY ${key} returned a non-numeric value`);
    }
    return value;
  }

  async sweep(): Promise<number> {
    return 0;
  }
}
