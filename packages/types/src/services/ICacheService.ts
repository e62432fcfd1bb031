import type { ResourceKind } from '../stats/ResourceKind.js';

/**
 * Per-kind cache occupancy, as reported to the operator status command.
 */
export interface ICacheKindStats {
    total: number;
    active: number;
    expired: number;
}

export interface ICacheStats {
    total: number;
    active: number;
    expired: number;
    byKind: Partial<Record<ResourceKind, ICacheKindStats>>;
}

/**
 * Expiring cache for upstream responses and computed results.
 *
 * Entries carry their resource kind so the TTL defaults to the value configured
 * for that kind. An entry is never returned at or after its expiry instant.
 */
export interface ICacheService {
    /**
     * Retrieve a cached value.
     *
     * @returns The value while it is unexpired, otherwise null
     */
    get<T>(key: string): Promise<T | null>;

    /**
     * Store a value under `key`.
     *
     * @param kind - Resource kind, selects the default TTL
     * @param ttlSeconds - Explicit TTL overriding the kind default
     */
    set<T>(key: string, value: T, kind: ResourceKind, ttlSeconds?: number): Promise<void>;

    del(key: string): Promise<number>;

    /**
     * Remove expired entries from durable storage.
     *
     * @returns Number of entries removed
     */
    clearExpired(): Promise<number>;

    getStats(): Promise<ICacheStats>;
}
