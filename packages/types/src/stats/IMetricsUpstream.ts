import type { EntityType } from './IEntity.js';
import type { ISnapshotMetrics } from './ISnapshot.js';

/**
 * Current counters for one entity as returned by the upstream API.
 */
export interface IUpstreamEntityStats {
    entityId: string;
    entityType: EntityType;
    title: string;
    metrics: ISnapshotMetrics;
}

export interface IVideoSummary {
    videoId: string;
    title: string;
    publishedAt: string;
    viewCount: number;
    likeCount: number;
    commentCount: number;
}

/**
 * Entry of the platform's most-popular chart for a region.
 */
export interface ITrendingVideo {
    videoId: string;
    title: string;
    channelTitle: string;
    categoryId: string;
    publishedAt: string;
    viewCount: number;
    likeCount: number;
    commentCount: number;
    tags: string[];
    /** Hashtags found in the description, in order of appearance. */
    hashtags: string[];
    /** 0 when the platform reports no duration (live streams, premieres). */
    durationSeconds: number;
}

export interface ICommentSummary {
    author: string;
    text: string;
    likeCount: number;
}

/**
 * Quota units each upstream operation consumes.
 */
export interface IUpstreamCosts {
    fetchMetrics: number;
    listRecentVideos: number;
    listTopComments: number;
    listTrending: number;
}

/**
 * Read-only client for the video platform's statistics API.
 *
 * Every failure (network, non-success status, quota response, malformed
 * payload) is raised as `UpstreamUnavailableError`.
 */
export interface IMetricsUpstream {
    /** Largest number of ids accepted by one `fetchMetrics` call. */
    readonly maxBatchSize: number;

    readonly costs: IUpstreamCosts;

    /**
     * Fetch counters for up to `maxBatchSize` entities of one type in a single call.
     * Ids unknown upstream are absent from the result.
     */
    fetchMetrics(entityType: EntityType, ids: readonly string[]): Promise<IUpstreamEntityStats[]>;

    listRecentVideos(channelId: string, limit: number): Promise<IVideoSummary[]>;

    listTopComments(videoId: string, limit: number): Promise<ICommentSummary[]>;

    /** Most popular videos in a region (ISO 3166-1 alpha-2 code), chart order. */
    listTrending(regionCode: string, limit: number): Promise<ITrendingVideo[]>;
}
