import type {
    EntityType,
    IBestDay,
    IDailyAggregate,
    IDatabaseService,
    IEntitySummary,
    ILogger,
    ISnapshot,
    ISnapshotStore,
    IStatsSummary,
    ITrend,
    TrendComputation
} from '@tubepulse/types';
import { DailyAggregateModel } from '../../../database/models/daily-aggregate-model.js';
import { TrendModel } from '../../../database/models/trend-model.js';
import { addDays, dayStart, daysBetween, isDayKey, toDayKey } from '../../../lib/dates.js';
import { toStorageError, ValidationError } from '../../../lib/errors.js';

/**
 * Per-metric maxima of one day's snapshots. Counters are cumulative, so the
 * highest observation of the day is its representative value.
 */
interface Representative {
    date: string;
    entityType: EntityType;
    viewCount: number;
    likeCount: number;
    commentCount: number;
    subscriberCount: number | null;
    snapshotCount: number;
}

/**
 * Aggregator
 *
 * Derives daily aggregates and trends from raw snapshots.
 *
 * A day's representative values are the per-metric maxima of its snapshots;
 * its deltas are measured against the nearest earlier day that has data.
 * Days without snapshots produce no row. A day before today is closed: once
 * its aggregate is persisted it is returned as stored and never recomputed,
 * so reported totals for past days cannot drift.
 *
 * Runs hourly from the scheduler and on demand from the stats facade.
 */
export class Aggregator {
    private readonly AGGREGATES = 'dailyAggregates';
    private readonly TRENDS = 'trends';

    constructor(
        private readonly store: ISnapshotStore,
        private readonly database: IDatabaseService,
        private readonly logger: ILogger,
        private readonly clock: () => number = Date.now
    ) {
        this.database.registerModel(this.AGGREGATES, DailyAggregateModel);
        this.database.registerModel(this.TRENDS, TrendModel);
    }

    /**
     * Aggregate for one entity on one UTC day.
     *
     * @param date - Day key `YYYY-MM-DD`
     * @returns The aggregate, or null when the day has no snapshots
     * @throws StorageError when snapshots or aggregates cannot be read
     */
    async computeDaily(entityId: string, date: string): Promise<IDailyAggregate | null> {
        if (!isDayKey(date)) {
            throw new ValidationError('Date must be YYYY-MM-DD', { date });
        }

        const stored = await this.findAggregate(entityId, date);
        if (stored?.closed) {
            return stored;
        }

        const representative = await this.representativeFor(entityId, date);
        if (!representative) {
            return stored;
        }

        const baseline = await this.baselineBefore(entityId, date);
        const now = this.clock();
        const aggregate: IDailyAggregate = {
            entityId,
            entityType: representative.entityType,
            date,
            viewCount: representative.viewCount,
            likeCount: representative.likeCount,
            commentCount: representative.commentCount,
            subscriberCount: representative.subscriberCount,
            deltaViewCount: baseline ? representative.viewCount - baseline.viewCount : null,
            deltaLikeCount: baseline ? representative.likeCount - baseline.likeCount : null,
            deltaCommentCount: baseline ? representative.commentCount - baseline.commentCount : null,
            deltaSubscriberCount: subscriberDelta(representative, baseline),
            baselineDate: baseline?.date ?? null,
            snapshotCount: representative.snapshotCount,
            closed: date < toDayKey(new Date(now)),
            computedAt: new Date(now)
        };

        if (stored && sameTotals(stored, aggregate)) {
            return stored;
        }

        try {
            await this.database.updateOne<IDailyAggregate>(
                this.AGGREGATES,
                { entityId, date },
                { $set: { ...aggregate } },
                { upsert: true }
            );
        } catch (error) {
            throw toStorageError(error, 'Failed to persist daily aggregate', { entityId, date });
        }

        return aggregate;
    }

    /**
     * Growth over the last `windowDays` days, ending on the day of the latest
     * snapshot.
     *
     * The baseline is the latest day with data on or before `latestDay - windowDays`,
     * aggregated from its snapshots when no aggregate is stored yet; when history
     * is shorter than the window, the earliest day inside the window is used
     * instead. Fewer than two data points yields `no-data`.
     */
    async computeTrend(entityId: string, windowDays: number): Promise<TrendComputation> {
        if (!Number.isInteger(windowDays) || windowDays <= 0) {
            throw new ValidationError('Trend window must be a positive whole number of days', { windowDays });
        }

        const latestDay = await this.latestDay(entityId);
        if (!latestDay) {
            return { status: 'no-data', points: 0 };
        }

        const targetDay = addDays(latestDay, -windowDays);
        const beforeWindow = await this.store.latest(entityId, dayStart(addDays(targetDay, 1)));
        if (beforeWindow) {
            await this.computeDaily(entityId, toDayKey(beforeWindow.capturedAt));
        }
        for (const day of daysBetween(targetDay, latestDay)) {
            await this.computeDaily(entityId, day);
        }

        const latest = await this.findAggregate(entityId, latestDay);
        if (!latest) {
            return { status: 'no-data', points: 0 };
        }

        const baseline =
            (await this.findAggregateWhere(entityId, { $lte: targetDay }, -1)) ??
            (await this.findAggregateWhere(entityId, { $gt: targetDay, $lt: latestDay }, 1));

        if (!baseline) {
            return { status: 'no-data', points: 1 };
        }

        const deltaViewCount = latest.viewCount - baseline.viewCount;
        const trend: ITrend = {
            entityType: latest.entityType,
            entityId,
            windowDays,
            fromDate: baseline.date,
            toDate: latest.date,
            deltaViewCount,
            deltaLikeCount: latest.likeCount - baseline.likeCount,
            deltaCommentCount: latest.commentCount - baseline.commentCount,
            deltaSubscriberCount:
                latest.subscriberCount !== null && baseline.subscriberCount !== null
                    ? latest.subscriberCount - baseline.subscriberCount
                    : null,
            viewGrowthPercent: growthPercent(deltaViewCount, baseline.viewCount),
            computedAt: new Date(this.clock())
        };

        try {
            await this.database.updateOne<ITrend>(
                this.TRENDS,
                { entityId, windowDays },
                { $set: { ...trend } },
                { upsert: true }
            );
        } catch (error) {
            this.logger.warn({ error, entityId, windowDays }, 'Failed to persist trend');
        }

        return { status: 'ok', trend };
    }

    /**
     * Recompute yesterday and today for each entity. Yesterday is closed by
     * this run, so late snapshots from just before midnight are included
     * before its totals freeze.
     *
     * @returns Number of aggregates written or confirmed
     */
    async runScheduled(entityIds: readonly string[]): Promise<number> {
        const today = toDayKey(new Date(this.clock()));
        const days = [addDays(today, -1), today];
        let computed = 0;

        for (const entityId of entityIds) {
            for (const day of days) {
                try {
                    if (await this.computeDaily(entityId, day)) {
                        computed += 1;
                    }
                } catch (error) {
                    this.logger.error({ error, entityId, date: day }, 'Daily aggregation failed');
                }
            }
        }

        this.logger.info({ entities: entityIds.length, computed }, 'Scheduled aggregation complete');
        return computed;
    }

    /**
     * Growth per entity over the last `days` days (today included), summed
     * from daily deltas, plus grand totals and the best day by views gained.
     */
    async summarize(entityIds: readonly string[], days: number): Promise<IStatsSummary> {
        if (!Number.isInteger(days) || days <= 0) {
            throw new ValidationError('Summary period must be a positive whole number of days', { days });
        }

        const toDate = toDayKey(new Date(this.clock()));
        const fromDate = addDays(toDate, -(days - 1));

        let rows: IDailyAggregate[];
        try {
            rows = await this.database.find<IDailyAggregate>(
                this.AGGREGATES,
                { entityId: { $in: [...entityIds] }, date: { $gte: fromDate, $lte: toDate } },
                { sort: { date: 1 } }
            );
        } catch (error) {
            throw toStorageError(error, 'Failed to read daily aggregates');
        }

        const perEntity = new Map<string, IEntitySummary>();
        const perDay = new Map<string, number>();

        for (const row of rows) {
            const summary = perEntity.get(row.entityId) ?? {
                entityId: row.entityId,
                entityType: row.entityType,
                viewsGained: 0,
                likesGained: 0,
                commentsGained: 0,
                subscribersGained: 0,
                daysWithData: 0
            };

            summary.viewsGained += row.deltaViewCount ?? 0;
            summary.likesGained += row.deltaLikeCount ?? 0;
            summary.commentsGained += row.deltaCommentCount ?? 0;
            summary.subscribersGained += row.deltaSubscriberCount ?? 0;
            summary.daysWithData += 1;
            perEntity.set(row.entityId, summary);

            if (row.deltaViewCount !== null) {
                perDay.set(row.date, (perDay.get(row.date) ?? 0) + row.deltaViewCount);
            }
        }

        const entities = Array.from(perEntity.values()).sort((a, b) => b.viewsGained - a.viewsGained);

        let bestDay: IBestDay | null = null;
        for (const [date, viewsGained] of perDay) {
            if (!bestDay || viewsGained > bestDay.viewsGained) {
                bestDay = { date, viewsGained };
            }
        }

        return {
            days,
            fromDate,
            toDate,
            entities,
            totals: {
                viewsGained: sum(entities, entity => entity.viewsGained),
                likesGained: sum(entities, entity => entity.likesGained),
                commentsGained: sum(entities, entity => entity.commentsGained),
                subscribersGained: sum(entities, entity => entity.subscribersGained)
            },
            bestDay
        };
    }

    /**
     * Per-metric maxima over the snapshots of one day, or null for an empty day.
     */
    private async representativeFor(entityId: string, date: string): Promise<Representative | null> {
        const from = dayStart(date);
        const to = dayStart(addDays(date, 1));

        let representative: Representative | null = null;
        for await (const snapshot of this.store.range(entityId, from, to)) {
            representative = representative ? fold(representative, snapshot) : seed(date, snapshot);
        }
        return representative;
    }

    /**
     * Representative values of the nearest earlier day with data: its stored
     * aggregate when one exists, otherwise the maxima of its raw snapshots.
     */
    private async baselineBefore(entityId: string, date: string): Promise<Representative | null> {
        const stored = await this.findAggregateWhere(entityId, { $lt: date }, -1);
        const previous = await this.store.latest(entityId, dayStart(date));
        const previousDay = previous ? toDayKey(previous.capturedAt) : null;

        if (stored && (!previousDay || stored.date >= previousDay)) {
            return {
                date: stored.date,
                entityType: stored.entityType,
                viewCount: stored.viewCount,
                likeCount: stored.likeCount,
                commentCount: stored.commentCount,
                subscriberCount: stored.subscriberCount,
                snapshotCount: stored.snapshotCount
            };
        }

        return previousDay ? await this.representativeFor(entityId, previousDay) : null;
    }

    private async latestDay(entityId: string): Promise<string | null> {
        const latest = await this.store.latest(entityId);
        if (latest) {
            return toDayKey(latest.capturedAt);
        }
        const stored = await this.findAggregateWhere(entityId, undefined, -1);
        return stored?.date ?? null;
    }

    private async findAggregate(entityId: string, date: string): Promise<IDailyAggregate | null> {
        try {
            const doc = await this.database.findOne<IDailyAggregate>(this.AGGREGATES, { entityId, date });
            return doc ? toAggregate(doc) : null;
        } catch (error) {
            throw toStorageError(error, 'Failed to read daily aggregate', { entityId, date });
        }
    }

    private async findAggregateWhere(
        entityId: string,
        date: { $lt?: string; $lte?: string; $gt?: string } | undefined,
        order: 1 | -1
    ): Promise<IDailyAggregate | null> {
        try {
            const doc = await this.database.findOne<IDailyAggregate>(
                this.AGGREGATES,
                date ? { entityId, date } : { entityId },
                { sort: { date: order } }
            );
            return doc ? toAggregate(doc) : null;
        } catch (error) {
            throw toStorageError(error, 'Failed to read daily aggregates', { entityId });
        }
    }
}

function seed(date: string, snapshot: ISnapshot): Representative {
    return {
        date,
        entityType: snapshot.entityType,
        viewCount: snapshot.viewCount,
        likeCount: snapshot.likeCount,
        commentCount: snapshot.commentCount,
        subscriberCount: snapshot.subscriberCount ?? null,
        snapshotCount: 1
    };
}

function fold(current: Representative, snapshot: ISnapshot): Representative {
    return {
        ...current,
        viewCount: Math.max(current.viewCount, snapshot.viewCount),
        likeCount: Math.max(current.likeCount, snapshot.likeCount),
        commentCount: Math.max(current.commentCount, snapshot.commentCount),
        subscriberCount:
            snapshot.subscriberCount === undefined
                ? current.subscriberCount
                : Math.max(current.subscriberCount ?? 0, snapshot.subscriberCount),
        snapshotCount: current.snapshotCount + 1
    };
}

/**
 * Copy the aggregate fields of a stored document, dropping `_id`.
 */
function toAggregate(doc: IDailyAggregate): IDailyAggregate {
    return {
        entityId: doc.entityId,
        entityType: doc.entityType,
        date: doc.date,
        viewCount: doc.viewCount,
        likeCount: doc.likeCount,
        commentCount: doc.commentCount,
        subscriberCount: doc.subscriberCount ?? null,
        deltaViewCount: doc.deltaViewCount ?? null,
        deltaLikeCount: doc.deltaLikeCount ?? null,
        deltaCommentCount: doc.deltaCommentCount ?? null,
        deltaSubscriberCount: doc.deltaSubscriberCount ?? null,
        baselineDate: doc.baselineDate ?? null,
        snapshotCount: doc.snapshotCount,
        closed: doc.closed,
        computedAt: doc.computedAt
    };
}

/**
 * True when two aggregates of the same day agree on everything but `computedAt`.
 */
function sameTotals(a: IDailyAggregate, b: IDailyAggregate): boolean {
    return (
        a.entityType === b.entityType &&
        a.viewCount === b.viewCount &&
        a.likeCount === b.likeCount &&
        a.commentCount === b.commentCount &&
        a.subscriberCount === b.subscriberCount &&
        a.deltaViewCount === b.deltaViewCount &&
        a.deltaLikeCount === b.deltaLikeCount &&
        a.deltaCommentCount === b.deltaCommentCount &&
        a.deltaSubscriberCount === b.deltaSubscriberCount &&
        a.baselineDate === b.baselineDate &&
        a.snapshotCount === b.snapshotCount &&
        a.closed === b.closed
    );
}

function subscriberDelta(current: Representative, baseline: Representative | null): number | null {
    if (!baseline || current.subscriberCount === null || baseline.subscriberCount === null) {
        return null;
    }
    return current.subscriberCount - baseline.subscriberCount;
}

/**
 * Percentage growth over the baseline, two decimals; 0 when the baseline is 0.
 */
export function growthPercent(delta: number, baseline: number): number {
    if (baseline <= 0) {
        return 0;
    }
    return Math.round((delta / baseline) * 10000) / 100;
}

function sum<T>(items: readonly T[], pick: (item: T) => number): number {
    return items.reduce((total, item) => total + pick(item), 0);
}
