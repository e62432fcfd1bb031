import type { EntityType } from './IEntity.js';

/**
 * Representative counters for one entity on one UTC day, with growth against
 * the nearest earlier day that has data.
 *
 * Rows exist only for days with at least one snapshot. Deltas are null when no
 * earlier day is available. Once `closed` (the day is over) and persisted, the
 * row is never recomputed.
 */
export interface IDailyAggregate {
    entityId: string;
    entityType: EntityType;
    /** UTC calendar day, `YYYY-MM-DD`. */
    date: string;
    viewCount: number;
    likeCount: number;
    commentCount: number;
    subscriberCount: number | null;
    deltaViewCount: number | null;
    deltaLikeCount: number | null;
    deltaCommentCount: number | null;
    deltaSubscriberCount: number | null;
    /** Day the deltas were measured against. */
    baselineDate: string | null;
    snapshotCount: number;
    closed: boolean;
    computedAt: Date;
}

/**
 * Growth totals for one entity across a summary period.
 */
export interface IEntitySummary {
    entityId: string;
    entityType: EntityType;
    viewsGained: number;
    likesGained: number;
    commentsGained: number;
    subscribersGained: number;
    daysWithData: number;
}

export interface IBestDay {
    date: string;
    viewsGained: number;
}

/**
 * Growth across every tracked entity for the last `days` days.
 */
export interface IStatsSummary {
    days: number;
    fromDate: string;
    toDate: string;
    entities: IEntitySummary[];
    totals: {
        viewsGained: number;
        likesGained: number;
        commentsGained: number;
        subscribersGained: number;
    };
    bestDay: IBestDay | null;
}
