import type { ICacheStats } from '../services/ICacheService.js';
import type { IStatsSummary } from './IDailyAggregate.js';
import type { EntityType } from './IEntity.js';
import type { ICommentSummary, IVideoSummary } from './IMetricsUpstream.js';
import type { IQuotaStatus, QuotaForecast } from './IQuotaTracker.js';
import type { ISnapshotMetrics } from './ISnapshot.js';
import type { ITrend } from './ITrend.js';
import type { ITopContent, TrendingResult } from './ITrending.js';

/**
 * Where a fresh value came from.
 */
export type FreshSource = 'cache' | 'store' | 'upstream';

/**
 * Why a value could not be refreshed.
 */
export type StaleReason = 'quota-exhausted' | 'upstream-unavailable' | 'storage-unavailable';

/**
 * Counters for one entity as served to callers.
 */
export interface ICurrentStats {
    entityId: string;
    entityType: EntityType;
    displayName?: string;
    capturedAt: Date;
    metrics: ISnapshotMetrics;
}

/**
 * Per-entity outcome of a current-stats request.
 *
 * `stale` carries the most recent stored data when a refresh was needed but
 * failed; `unavailable` means a refresh failed and nothing is stored yet.
 */
export type CurrentStatsResult =
    | { entityId: string; status: 'fresh'; source: FreshSource; stats: ICurrentStats }
    | { entityId: string; status: 'stale'; reason: StaleReason; stats: ICurrentStats }
    | { entityId: string; status: 'unavailable'; reason: StaleReason }
    | { entityId: string; status: 'not-found' };

export type TrendResult =
    | { status: 'ok'; cached: boolean; trend: ITrend }
    | { status: 'no-data'; points: number }
    | { status: 'not-found' }
    | { status: 'unavailable'; reason: StaleReason };

/**
 * Outcome of a cached listing (recent videos, top comments).
 */
export type ListingResult<T> =
    | { status: 'fresh'; source: 'cache' | 'upstream'; items: T[] }
    | { status: 'stale'; reason: StaleReason; items: T[] }
    | { status: 'unavailable'; reason: StaleReason };

export interface IStatsStatus {
    quota: IQuotaStatus | null;
    forecast: QuotaForecast | null;
    cache: ICacheStats | null;
    snapshotCount: number | null;
    trackedEntities: number;
}

/**
 * Entry point for every consumer of statistics (chat commands, HTTP routes,
 * scheduled polling). Never throws for stats-domain failures: they come back
 * as statuses.
 */
export interface IStatsService {
    getCurrent(entityIds: readonly string[]): Promise<CurrentStatsResult[]>;

    getTrend(entityId: string, windowDays: number): Promise<TrendResult>;

    getRecentVideos(channelId: string): Promise<ListingResult<IVideoSummary>>;

    getTopComments(videoId: string): Promise<ListingResult<ICommentSummary>>;

    getSummary(days: number): Promise<IStatsSummary | null>;

    getTopContent(days: number): Promise<ITopContent | null>;

    getTrending(): Promise<TrendingResult>;

    getStatus(): Promise<IStatsStatus>;

    refreshTracked(): Promise<CurrentStatsResult[]>;
}
