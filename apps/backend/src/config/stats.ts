import type { ResourceKind } from '@tubepulse/types';
import type { EnvConfig } from './env.js';
import { ValidationError } from '../lib/errors.js';

/**
 * Every cacheable resource kind.
 */
export const RESOURCE_KINDS = [
    'channel_stats',
    'video_stats',
    'video_list',
    'comments',
    'trend',
    'trending'
] as const satisfies readonly ResourceKind[];

/**
 * Immutable runtime settings for the statistics core.
 *
 * Built once from the validated environment and handed to each component's
 * constructor. Core components never read the environment themselves.
 */
export interface StatsConfig {
    readonly cacheTtlSeconds: Readonly<Record<ResourceKind, number>>;
    readonly quota: {
        readonly limit: number;
        readonly windowMs: number;
        /** Instant (epoch ms) the fixed windows are aligned on. */
        readonly anchorMs: number;
    };
    readonly upstreamTimeoutMs: number;
    readonly retentionDays: number;
    readonly maxTrendWindowDays: number;
    readonly snapshotPageSize: number;
    readonly recentVideosLimit: number;
    readonly topCommentsLimit: number;
    readonly topContentLimit: number;
    readonly trending: {
        readonly region: string;
        readonly utcOffsetHours: number;
        readonly limit: number;
    };
}

export type StatsEnv = Pick<
    EnvConfig,
    | 'CACHE_TTL_CHANNEL_STATS'
    | 'CACHE_TTL_VIDEO_STATS'
    | 'CACHE_TTL_VIDEO_LIST'
    | 'CACHE_TTL_COMMENTS'
    | 'CACHE_TTL_TREND'
    | 'CACHE_TTL_TRENDING'
    | 'TRENDING_REGION'
    | 'TRENDING_UTC_OFFSET_HOURS'
    | 'QUOTA_LIMIT'
    | 'QUOTA_WINDOW_HOURS'
    | 'QUOTA_WINDOW_ANCHOR'
    | 'UPSTREAM_TIMEOUT_MS'
    | 'SNAPSHOT_RETENTION_DAYS'
>;

/**
 * Resolve the statistics configuration.
 *
 * The TTL table must keep `channel_stats >= video_list >= comments`; slower
 * changing resources are never cached for less time than faster ones.
 *
 * @throws ValidationError when the TTL ordering or the window anchor is invalid
 */
export function buildStatsConfig(source: StatsEnv): StatsConfig {
    const cacheTtlSeconds = {
        channel_stats: source.CACHE_TTL_CHANNEL_STATS,
        video_stats: source.CACHE_TTL_VIDEO_STATS,
        video_list: source.CACHE_TTL_VIDEO_LIST,
        comments: source.CACHE_TTL_COMMENTS,
        trend: source.CACHE_TTL_TREND,
        trending: source.CACHE_TTL_TRENDING
    } satisfies Record<ResourceKind, number>;

    if (cacheTtlSeconds.channel_stats < cacheTtlSeconds.video_list || cacheTtlSeconds.video_list < cacheTtlSeconds.comments) {
        throw new ValidationError('Cache TTLs must satisfy channel_stats >= video_list >= comments', cacheTtlSeconds);
    }

    const anchorMs = Date.parse(source.QUOTA_WINDOW_ANCHOR);
    if (Number.isNaN(anchorMs)) {
        throw new ValidationError('QUOTA_WINDOW_ANCHOR is not a valid timestamp', { anchor: source.QUOTA_WINDOW_ANCHOR });
    }

    return Object.freeze({
        cacheTtlSeconds: Object.freeze(cacheTtlSeconds),
        quota: Object.freeze({
            limit: source.QUOTA_LIMIT,
            windowMs: Math.round(source.QUOTA_WINDOW_HOURS * 60 * 60 * 1000),
            anchorMs
        }),
        upstreamTimeoutMs: source.UPSTREAM_TIMEOUT_MS,
        retentionDays: source.SNAPSHOT_RETENTION_DAYS,
        maxTrendWindowDays: 365,
        snapshotPageSize: 500,
        recentVideosLimit: 5,
        topCommentsLimit: 3,
        topContentLimit: 10,
        trending: Object.freeze({
            region: source.TRENDING_REGION,
            utcOffsetHours: source.TRENDING_UTC_OFFSET_HOURS,
            limit: 50
        })
    });
}
