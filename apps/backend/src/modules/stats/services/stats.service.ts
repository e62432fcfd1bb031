import type {
    CurrentStatsResult,
    EntityType,
    ICacheService,
    ICommentSummary,
    ICurrentStats,
    ILogger,
    IMetricsUpstream,
    IQuotaTracker,
    ISnapshot,
    ISnapshotMetrics,
    ISnapshotStore,
    IStatsService,
    IStatsStatus,
    IStatsSummary,
    ITopContent,
    ITopVideo,
    ITrend,
    IUpstreamEntityStats,
    IVideoSummary,
    ListingResult,
    ResourceKind,
    StaleReason,
    TrendComputation,
    TrendingResult,
    TrendResult
} from '@tubepulse/types';
import type { StatsConfig } from '../../../config/stats.js';
import { dayStart } from '../../../lib/dates.js';
import { StorageError, ValidationError } from '../../../lib/errors.js';
import { withTimeout } from '../../../lib/timeout.js';
import type { Aggregator } from './aggregator.js';
import type { EntityRegistry } from './entity-registry.js';
import { analyzeTrending } from './trending-analysis.js';

/**
 * Cached form of current stats. Cache values round-trip through JSON, so the
 * capture instant travels as an ISO string.
 */
interface CachedStats {
    entityId: string;
    entityType: EntityType;
    displayName?: string;
    capturedAt: string;
    metrics: ISnapshotMetrics;
}

type CachedTrend = Omit<ITrend, 'computedAt'> & { computedAt: string };

/**
 * Entity waiting for an upstream refresh, with whatever history it already has.
 */
interface PendingEntity {
    entityId: string;
    latest: ISnapshot | null;
}

export interface StatsServiceDependencies {
    store: ISnapshotStore;
    cache: ICacheService;
    quota: IQuotaTracker;
    upstream: IMetricsUpstream;
    aggregator: Aggregator;
    registry: EntityRegistry;
    config: StatsConfig;
    logger: ILogger;
    clock?: () => number;
}

/** Listings keep a last-known copy this long for stale fallbacks. */
const SHADOW_TTL_SECONDS = 7 * 24 * 60 * 60;
const FORECAST_DAYS = 3;

/**
 * StatsService
 *
 * Read path for every consumer: cache first, then stored snapshots, then a
 * quota-gated, batched upstream fetch bounded by a timeout. Every successful
 * fetch is written back as a snapshot and a cache entry.
 *
 * Failures of the upstream, the quota or the storage tiers never escape:
 * callers receive `stale` data (the last snapshot or listing) or an
 * `unavailable` status. Only invalid arguments throw.
 */
export class StatsService implements IStatsService {
    private readonly store: ISnapshotStore;
    private readonly cache: ICacheService;
    private readonly quota: IQuotaTracker;
    private readonly upstream: IMetricsUpstream;
    private readonly aggregator: Aggregator;
    private readonly registry: EntityRegistry;
    private readonly config: StatsConfig;
    private readonly logger: ILogger;
    private readonly clock: () => number;

    constructor(deps: StatsServiceDependencies) {
        this.store = deps.store;
        this.cache = deps.cache;
        this.quota = deps.quota;
        this.upstream = deps.upstream;
        this.aggregator = deps.aggregator;
        this.registry = deps.registry;
        this.config = deps.config;
        this.logger = deps.logger;
        this.clock = deps.clock ?? Date.now;
    }

    async getCurrent(entityIds: readonly string[]): Promise<CurrentStatsResult[]> {
        return await this.collect(entityIds, false);
    }

    /**
     * Poll every active tracked entity, skipping the cache and the stored
     * freshness check so each poll produces a new snapshot when quota allows.
     */
    async refreshTracked(): Promise<CurrentStatsResult[]> {
        const ids = this.registry.list().map(entity => entity.entityId);
        const results = await this.collect(ids, true);

        const counts = { fresh: 0, stale: 0, unavailable: 0, notFound: 0 };
        for (const result of results) {
            if (result.status === 'not-found') {
                counts.notFound += 1;
            } else {
                counts[result.status] += 1;
            }
        }
        this.logger.info({ entities: ids.length, ...counts }, 'Tracked entities refreshed');
        return results;
    }

    /**
     * Growth over `windowDays` days.
     *
     * @throws ValidationError when the window is not a whole number of days within the configured maximum
     */
    async getTrend(entityId: string, windowDays: number): Promise<TrendResult> {
        if (!Number.isInteger(windowDays) || windowDays <= 0 || windowDays > this.config.maxTrendWindowDays) {
            throw new ValidationError(`Trend window must be between 1 and ${this.config.maxTrendWindowDays} days`, { windowDays });
        }

        const key = `trend:${entityId}:${windowDays}`;
        const cached = await this.readCache<CachedTrend>(key);
        if (cached) {
            return { status: 'ok', cached: true, trend: { ...cached, computedAt: new Date(cached.computedAt) } };
        }

        let computation: TrendComputation;
        try {
            computation = await this.aggregator.computeTrend(entityId, windowDays);
        } catch (error) {
            this.logger.error({ error, entityId, windowDays }, 'Trend computation failed');
            return { status: 'unavailable', reason: 'storage-unavailable' };
        }

        if (computation.status === 'no-data') {
            if (computation.points === 0 && !this.registry.get(entityId)) {
                return { status: 'not-found' };
            }
            return computation;
        }

        const trend = computation.trend;
        await this.writeCache<CachedTrend>(key, { ...trend, computedAt: trend.computedAt.toISOString() }, 'trend');
        return { status: 'ok', cached: false, trend };
    }

    /**
     * @throws ValidationError when the id does not belong to a channel
     */
    async getRecentVideos(channelId: string): Promise<ListingResult<IVideoSummary>> {
        if (this.registry.typeOf(channelId) !== 'channel') {
            throw new ValidationError('Recent videos are only available for channels', { channelId });
        }

        return await this.listing(
            `videos:${channelId}`,
            'video_list',
            this.upstream.costs.listRecentVideos,
            () => this.upstream.listRecentVideos(channelId, this.config.recentVideosLimit)
        );
    }

    async getTopComments(videoId: string): Promise<ListingResult<ICommentSummary>> {
        return await this.listing(
            `comments:${videoId}`,
            'comments',
            this.upstream.costs.listTopComments,
            () => this.upstream.listTopComments(videoId, this.config.topCommentsLimit)
        );
    }

    /**
     * Growth summary over the active entities, or null when aggregates cannot be read.
     */
    async getSummary(days: number): Promise<IStatsSummary | null> {
        const ids = this.registry.list().map(entity => entity.entityId);
        try {
            return await this.aggregator.summarize(ids, days);
        } catch (error) {
            if (error instanceof StorageError) {
                this.logger.error({ error, days }, 'Summary unavailable');
                return null;
            }
            throw error;
        }
    }

    /**
     * Best performing tracked content over the last `days` days: channels by
     * views gained, and uploads published in the period by view count. Uploads
     * come from each channel's cached recent-videos listing, so a channel whose
     * listing cannot be refreshed contributes its last known copy or nothing.
     *
     * @returns null when aggregates cannot be read
     * @throws ValidationError when `days` is not a positive whole number
     */
    async getTopContent(days: number): Promise<ITopContent | null> {
        const summary = await this.getSummary(days);
        if (!summary) {
            return null;
        }

        const since = dayStart(summary.fromDate).getTime();
        const videos: ITopVideo[] = [];
        const incomplete = new Set<StaleReason>();

        for (const channel of this.registry.list().filter(entity => entity.entityType === 'channel')) {
            const listing = await this.getRecentVideos(channel.entityId);
            if (listing.status !== 'fresh') {
                incomplete.add(listing.reason);
            }
            if (listing.status === 'unavailable') {
                continue;
            }
            for (const item of listing.items) {
                if (Date.parse(item.publishedAt) >= since) {
                    videos.push({ ...item, channelId: channel.entityId, channelName: channel.displayName });
                }
            }
        }

        const limit = this.config.topContentLimit;
        return {
            days: summary.days,
            fromDate: summary.fromDate,
            toDate: summary.toDate,
            videos: videos.sort((a, b) => b.viewCount - a.viewCount).slice(0, limit),
            channels: summary.entities
                .filter(entity => entity.entityType === 'channel')
                .slice(0, limit)
                .map(entity => {
                    const displayName = this.registry.displayNameOf(entity.entityId);
                    return displayName ? { ...entity, displayName } : entity;
                }),
            incomplete: Array.from(incomplete)
        };
    }

    /**
     * Analysis of the configured region's most-popular chart. The chart is
     * cached as a listing; the analysis is recomputed from it on every call.
     */
    async getTrending(): Promise<TrendingResult> {
        const { region, utcOffsetHours, limit } = this.config.trending;
        const result = await this.listing(
            `trending:${region}`,
            'trending',
            this.upstream.costs.listTrending,
            () => this.upstream.listTrending(region, limit)
        );

        switch (result.status) {
            case 'fresh':
                return { status: 'fresh', source: result.source, analysis: analyzeTrending(result.items, region, utcOffsetHours) };
            case 'stale':
                return { status: 'stale', reason: result.reason, analysis: analyzeTrending(result.items, region, utcOffsetHours) };
            case 'unavailable':
                return result;
        }
    }

    async getStatus(): Promise<IStatsStatus> {
        const [quota, forecast, cache, snapshotCount] = await Promise.all([
            this.optional('quota status', () => this.quota.remaining()),
            this.optional('quota forecast', () => this.quota.forecast(FORECAST_DAYS)),
            this.optional('cache stats', () => this.cache.getStats()),
            this.optional('snapshot count', () => this.store.count())
        ]);

        return {
            quota,
            forecast,
            cache,
            snapshotCount,
            trackedEntities: this.registry.list().length
        };
    }

    private async collect(entityIds: readonly string[], bypassCache: boolean): Promise<CurrentStatsResult[]> {
        const unique = Array.from(new Set(entityIds));
        const results = new Map<string, CurrentStatsResult>();
        const pending: PendingEntity[] = [];

        for (const entityId of unique) {
            if (!bypassCache) {
                const cached = await this.readCache<CachedStats>(statsKey(entityId));
                if (cached) {
                    results.set(entityId, {
                        entityId,
                        status: 'fresh',
                        source: 'cache',
                        stats: { ...cached, capturedAt: new Date(cached.capturedAt) }
                    });
                    continue;
                }
            }

            const latest = await this.readLatest(entityId);
            const remainingSeconds = latest ? this.remainingTtlSeconds(latest) : 0;
            if (!bypassCache && latest && remainingSeconds > 0) {
                const stats = toCurrentStats(latest, this.registry);
                await this.writeStatsCache(stats, remainingSeconds);
                results.set(entityId, { entityId, status: 'fresh', source: 'store', stats });
                continue;
            }

            pending.push({ entityId, latest });
        }

        const groups = new Map<EntityType, PendingEntity[]>();
        for (const entity of pending) {
            const type = this.registry.typeOf(entity.entityId);
            groups.set(type, [...(groups.get(type) ?? []), entity]);
        }

        await Promise.all(
            Array.from(groups.entries()).map(async ([type, entities]) => {
                for (const batch of chunk(entities, this.upstream.maxBatchSize)) {
                    for (const result of await this.fetchBatch(type, batch)) {
                        results.set(result.entityId, result);
                    }
                }
            })
        );

        return entityIds.map(
            entityId => results.get(entityId) ?? { entityId, status: 'unavailable', reason: 'upstream-unavailable' }
        );
    }

    /**
     * One quota-gated upstream call for a batch of same-typed entities.
     */
    private async fetchBatch(type: EntityType, batch: readonly PendingEntity[]): Promise<CurrentStatsResult[]> {
        const ids = batch.map(entity => entity.entityId);

        let acquired: boolean;
        try {
            acquired = await this.quota.tryAcquire(this.upstream.costs.fetchMetrics);
        } catch (error) {
            this.logger.error({ error, entityType: type, count: ids.length }, 'Quota tracker unavailable');
            return batch.map(entity => fallback(entity, 'storage-unavailable', this.registry));
        }

        if (!acquired) {
            this.logger.warn({ entityType: type, count: ids.length }, 'Upstream quota exhausted, serving stored data');
            return batch.map(entity => fallback(entity, 'quota-exhausted', this.registry));
        }

        let fetched: IUpstreamEntityStats[];
        try {
            fetched = await withTimeout(
                this.upstream.fetchMetrics(type, ids),
                this.config.upstreamTimeoutMs,
                'fetchMetrics'
            );
        } catch (error) {
            this.logger.warn({ error, entityType: type, count: ids.length }, 'Upstream fetch failed, serving stored data');
            return batch.map(entity => fallback(entity, 'upstream-unavailable', this.registry));
        }

        const byId = new Map(fetched.map(item => [item.entityId, item]));
        const results: CurrentStatsResult[] = [];

        for (const entity of batch) {
            const item = byId.get(entity.entityId);
            if (!item) {
                results.push(
                    entity.latest
                        ? fallback(entity, 'upstream-unavailable', this.registry)
                        : { entityId: entity.entityId, status: 'not-found' }
                );
                continue;
            }
            results.push({ entityId: item.entityId, status: 'fresh', source: 'upstream', stats: await this.persist(item) });
        }

        return results;
    }

    /**
     * Write a fetched observation as a snapshot and a cache entry. Either write
     * may fail; the fetched values are returned regardless.
     */
    private async persist(item: IUpstreamEntityStats): Promise<ICurrentStats> {
        const capturedAt = new Date(this.clock());

        try {
            await this.store.record({
                entityId: item.entityId,
                entityType: item.entityType,
                capturedAt,
                metrics: item.metrics
            });
        } catch (error) {
            this.logger.error({ error, entityId: item.entityId }, 'Failed to record snapshot');
        }

        try {
            await this.registry.recordDisplayName(item.entityId, item.title);
        } catch (error) {
            this.logger.warn({ error, entityId: item.entityId }, 'Failed to update display name');
        }

        const stats: ICurrentStats = {
            entityId: item.entityId,
            entityType: item.entityType,
            displayName: this.registry.displayNameOf(item.entityId) ?? item.title,
            capturedAt,
            metrics: item.metrics
        };
        await this.writeStatsCache(stats);
        return stats;
    }

    private async listing<T>(
        key: string,
        kind: ResourceKind,
        cost: number,
        fetch: () => Promise<T[]>
    ): Promise<ListingResult<T>> {
        const cached = await this.readCache<T[]>(key);
        if (cached) {
            return { status: 'fresh', source: 'cache', items: cached };
        }

        let reason: StaleReason | null = null;
        try {
            if (!(await this.quota.tryAcquire(cost))) {
                reason = 'quota-exhausted';
            }
        } catch (error) {
            this.logger.error({ error, key }, 'Quota tracker unavailable');
            reason = 'storage-unavailable';
        }

        if (!reason) {
            try {
                const items = await withTimeout(fetch(), this.config.upstreamTimeoutMs, key);
                await this.writeCache(key, items, kind);
                await this.writeCache(shadowKey(key), items, kind, SHADOW_TTL_SECONDS);
                return { status: 'fresh', source: 'upstream', items };
            } catch (error) {
                this.logger.warn({ error, key }, 'Upstream listing failed');
                reason = 'upstream-unavailable';
            }
        }

        const shadow = await this.readCache<T[]>(shadowKey(key));
        return shadow ? { status: 'stale', reason, items: shadow } : { status: 'unavailable', reason };
    }

    /**
     * Seconds a stored snapshot stays fresh, counted from its capture; 0 once expired.
     */
    private remainingTtlSeconds(snapshot: ISnapshot): number {
        const age = this.clock() - snapshot.capturedAt.getTime();
        const ttlMs = this.config.cacheTtlSeconds[statsKind(snapshot.entityType)] * 1000;
        return Math.max(0, Math.ceil((ttlMs - age) / 1000));
    }

    private async readLatest(entityId: string): Promise<ISnapshot | null> {
        try {
            return await this.store.latest(entityId);
        } catch (error) {
            this.logger.error({ error, entityId }, 'Failed to read latest snapshot');
            return null;
        }
    }

    private async readCache<T>(key: string): Promise<T | null> {
        try {
            return await this.cache.get<T>(key);
        } catch (error) {
            this.logger.warn({ error, key }, 'Cache read failed');
            return null;
        }
    }

    private async writeCache<T>(key: string, value: T, kind: ResourceKind, ttlSeconds?: number): Promise<void> {
        try {
            await this.cache.set(key, value, kind, ttlSeconds);
        } catch (error) {
            this.logger.warn({ error, key }, 'Cache write failed');
        }
    }

    private async writeStatsCache(stats: ICurrentStats, ttlSeconds?: number): Promise<void> {
        await this.writeCache<CachedStats>(
            statsKey(stats.entityId),
            { ...stats, capturedAt: stats.capturedAt.toISOString() },
            statsKind(stats.entityType),
            ttlSeconds
        );
    }

    private async optional<T>(label: string, read: () => Promise<T>): Promise<T | null> {
        try {
            return await read();
        } catch (error) {
            this.logger.warn({ error }, `Status: ${label} unavailable`);
            return null;
        }
    }
}

function statsKey(entityId: string): string {
    return `stats:${entityId}`;
}

function statsKind(entityType: EntityType): ResourceKind {
    return entityType === 'video' ? 'video_stats' : 'channel_stats';
}

function shadowKey(key: string): string {
    return `${key}:last`;
}

function toCurrentStats(snapshot: ISnapshot, registry: EntityRegistry): ICurrentStats {
    const displayName = registry.displayNameOf(snapshot.entityId);
    return {
        entityId: snapshot.entityId,
        entityType: snapshot.entityType,
        ...(displayName ? { displayName } : {}),
        capturedAt: snapshot.capturedAt,
        metrics: {
            viewCount: snapshot.viewCount,
            likeCount: snapshot.likeCount,
            commentCount: snapshot.commentCount,
            ...(snapshot.subscriberCount !== undefined ? { subscriberCount: snapshot.subscriberCount } : {}),
            ...(snapshot.videoCount !== undefined ? { videoCount: snapshot.videoCount } : {})
        }
    };
}

function fallback(entity: PendingEntity, reason: StaleReason, registry: EntityRegistry): CurrentStatsResult {
    if (!entity.latest) {
        return { entityId: entity.entityId, status: 'unavailable', reason };
    }
    return { entityId: entity.entityId, status: 'stale', reason, stats: toCurrentStats(entity.latest, registry) };
}

function chunk<T>(items: readonly T[], size: number): T[][] {
    const batches: T[][] = [];
    for (let index = 0; index < items.length; index += size) {
        batches.push(items.slice(index, index + size));
    }
    return batches;
}
