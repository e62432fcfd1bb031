import type { IEntitySummary } from './IDailyAggregate.js';
import type { ITrendingVideo, IVideoSummary } from './IMetricsUpstream.js';
import type { StaleReason } from './IStatsService.js';

export interface ICategoryStats {
    category: string;
    count: number;
    totalViews: number;
    totalLikes: number;
}

export interface ITermCount {
    term: string;
    count: number;
}

export interface IHourCount {
    /** Hour of day in the configured reporting offset, 0-23. */
    hour: number;
    count: number;
}

/**
 * Length bucket the chart favours: under a minute, under five minutes, or longer.
 */
export type VideoFormat = 'short' | 'medium' | 'long';

/**
 * What a region's most-popular chart has in common.
 */
export interface ITrendingAnalysis {
    region: string;
    utcOffsetHours: number;
    videoCount: number;
    /** Sorted by total views, highest first. */
    categories: ICategoryStats[];
    topHashtags: ITermCount[];
    topTags: ITermCount[];
    averageDurationSeconds: number | null;
    bestHours: IHourCount[];
    viralVideos: ITrendingVideo[];
    recommendedFormat: VideoFormat | null;
}

export type TrendingResult =
    | { status: 'fresh'; source: 'cache' | 'upstream'; analysis: ITrendingAnalysis }
    | { status: 'stale'; reason: StaleReason; analysis: ITrendingAnalysis }
    | { status: 'unavailable'; reason: StaleReason };

export interface ITopVideo extends IVideoSummary {
    channelId: string;
    channelName?: string;
}

export interface ITopChannel extends IEntitySummary {
    displayName?: string;
}

/**
 * Best performing tracked content over the last `days` days.
 *
 * `incomplete` lists why some channels' uploads could not be refreshed; their
 * last known listing is used when one exists.
 */
export interface ITopContent {
    days: number;
    fromDate: string;
    toDate: string;
    videos: ITopVideo[];
    channels: ITopChannel[];
    incomplete: StaleReason[];
}
