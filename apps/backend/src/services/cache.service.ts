import type { ICacheService, ICacheStats, IDatabaseService, IKeyValueStore, ILogger, ResourceKind } from '@tubepulse/types';
import { CacheModel, type CacheFields } from '../database/models/cache-model.js';
import { RESOURCE_KINDS } from '../config/stats.js';

/**
 * Shape stored in the key-value tier. The expiry travels with the value so a
 * read can enforce it even if the store keeps the key a little longer.
 */
interface CacheRecord<T> {
  value: T;
  kind: ResourceKind;
  expiresAt: number;
}

/**
 * CacheService
 *
 * Two-tier expiring cache: the key-value store (Redis or memory) answers most
 * reads, MongoDB keeps a durable copy so a restart does not throw away every
 * cached upstream response and spend quota refilling it.
 *
 * An entry is served only while `now < expiresAt`. Expired durable entries are
 * neither served nor copied back into the fast tier; `clearExpired()` removes
 * them in the background.
 *
 * Database access pattern:
 * Uses IDatabaseService for all MongoDB operations, enabling testability
 * through mock implementations. The CacheModel is registered for its indexes.
 */
export class CacheService implements ICacheService {
  private readonly COLLECTION_NAME = 'caches';
  private readonly KEY_PREFIX = 'cache:';

  /**
   * Create a cache service instance.
   *
   * @param store - Fast key-value tier
   * @param database - Database service for the durable tier
   * @param ttlSeconds - Resolved TTL per resource kind
   * @param logger - Scoped logger
   * @param clock - Time source in epoch ms
   */
  constructor(
    private readonly store: IKeyValueStore,
    private readonly database: IDatabaseService,
    private readonly ttlSeconds: Readonly<Record<ResourceKind, number>>,
    private readonly logger: ILogger,
    private readonly clock: () => number = Date.now
  ) {
    this.database.registerModel(this.COLLECTION_NAME, CacheModel);
  }

  /**
   * Retrieve a cached value by key.
   *
   * Checks the key-value tier first, falls back to MongoDB and repopulates the
   * fast tier from an unexpired durable hit.
   *
   * @param key - Cache key to retrieve
   * @returns Parsed value if found and not expired, null otherwise
   */
  async get<T>(key: string): Promise<T | null> {
    const now = this.clock();

    const cached = await this.store.get(this.KEY_PREFIX + key);
    if (cached) {
      const record = JSON.parse(cached) as CacheRecord<T>;
      if (now < record.expiresAt) {
        return record.value;
      }
      await this.store.del(this.KEY_PREFIX + key);
    }

    const doc = await this.database.findOne<CacheFields>(this.COLLECTION_NAME, { key });
    if (!doc) {
      return null;
    }

    const expiresAt = doc.expiresAt.getTime();
    if (now >= expiresAt) {
      return null;
    }

    const record: CacheRecord<unknown> = { value: doc.value, kind: doc.kind, expiresAt };
    await this.store.set(this.KEY_PREFIX + key, JSON.stringify(record), expiresAt - now);
    this.logger.debug({ key }, 'Cache entry restored from durable tier');
    return doc.value as T;
  }

  /**
   * Store a value in both tiers.
   *
   * @param key - Cache key to store under
   * @param value - Value to cache (must be JSON-serializable)
   * @param kind - Resource kind selecting the default TTL
   * @param ttlSeconds - Explicit TTL in seconds, overriding the kind default
   */
  async set<T>(key: string, value: T, kind: ResourceKind, ttlSeconds?: number): Promise<void> {
    const ttlMs = (ttlSeconds ?? this.ttlSeconds[kind]) * 1000;
    if (ttlMs <= 0) {
      return;
    }

    const now = this.clock();
    const expiresAt = now + ttlMs;

    await this.database.updateOne<CacheFields>(
      this.COLLECTION_NAME,
      { key },
      { $set: { value, kind, expiresAt: new Date(expiresAt), updatedAt: new Date(now) } },
      { upsert: true }
    );

    const record: CacheRecord<T> = { value, kind, expiresAt };
    await this.store.set(this.KEY_PREFIX + key, JSON.stringify(record), ttlMs);
  }

  /**
   * Delete a cache entry from both tiers.
   *
   * @returns Number of entries removed from the fast tier (0 or 1)
   */
  async del(key: string): Promise<number> {
    await this.database.deleteMany<CacheFields>(this.COLLECTION_NAME, { key });
    return await this.store.del(this.KEY_PREFIX + key);
  }

  /**
   * Remove expired entries from the durable tier and let the fast tier sweep.
   *
   * @returns Total entries removed across both tiers
   */
  async clearExpired(): Promise<number> {
    const now = new Date(this.clock());
    const durable = await this.database.deleteMany<CacheFields>(this.COLLECTION_NAME, { expiresAt: { $lte: now } });
    const fast = await this.store.sweep();

    if (durable + fast > 0) {
      this.logger.info({ durable, fast }, 'Expired cache entries removed');
    }
    return durable + fast;
  }

  /**
   * Occupancy of the durable tier, per kind.
   */
  async getStats(): Promise<ICacheStats> {
    const now = new Date(this.clock());
    const stats: ICacheStats = { total: 0, active: 0, expired: 0, byKind: {} };

    for (const kind of RESOURCE_KINDS) {
      const total = await this.database.count<CacheFields>(this.COLLECTION_NAME, { kind });
      if (total === 0) {
        continue;
      }
      const active = await this.database.count<CacheFields>(this.COLLECTION_NAME, { kind, expiresAt: { $gt: now } });
      stats.byKind[kind] = { total, active, expired: total - active };
      stats.total += total;
      stats.active += active;
      stats.expired += total - active;
    }

    return stats;
  }
}
