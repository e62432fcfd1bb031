/**
 * Minimal key-value contract behind the cache, quota and request-limit tiers.
 *
 * Implemented by a Redis adapter for deployments with Redis and by an
 * in-process map otherwise. Values are strings; callers serialise.
 */
export interface IKeyValueStore {
    get(key: string): Promise<string | null>;

    /**
     * Store a value, optionally expiring after `ttlMs` milliseconds.
     */
    set(key: string, value: string, ttlMs?: number): Promise<void>;

    /**
     * Store a value expiring after `ttlMs` only when the key is absent, as one
     * atomic step.
     *
     * @returns true when this call stored the value
     */
    setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;

    /**
     * @returns Number of keys removed (0 or 1)
     */
    del(key: string): Promise<number>;

    /**
     * Atomically add `amount` (which may be negative) to an integer counter and
     * return the new value. A missing key counts as zero. When `ttlMs` is given
     * the key expires `ttlMs` after this call.
     */
    incrBy(key: string, amount: number, ttlMs?: number): Promise<number>;

    /**
     * Drop entries whose expiry has passed.
     *
     * @returns Number of entries removed; stores that expire keys natively return 0
     */
    sweep(): Promise<number>;
}
