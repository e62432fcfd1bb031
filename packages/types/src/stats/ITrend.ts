import type { EntityType } from './IEntity.js';

/**
 * Growth of an entity's counters over a window of days.
 */
export interface ITrend {
    entityType: EntityType;
    entityId: string;
    windowDays: number;
    /** Baseline day. */
    fromDate: string;
    /** Day of the latest data point. */
    toDate: string;
    deltaViewCount: number;
    deltaLikeCount: number;
    deltaCommentCount: number;
    deltaSubscriberCount: number | null;
    /** View growth relative to the baseline, percent rounded to two decimals; 0 when the baseline is 0. */
    viewGrowthPercent: number;
    computedAt: Date;
}

/**
 * Trend computation outcome. `no-data` means fewer than two data points exist
 * for the window; `points` says how many were found.
 */
export type TrendComputation =
    | { status: 'ok'; trend: ITrend }
    | { status: 'no-data'; points: number };
