import type { IDatabaseService, IKeyValueStore, ILogger, IQuotaStatus, IQuotaTracker, IQuotaWindow, QuotaForecast } from '@tubepulse/types';
import { QuotaWindowModel } from '../../../database/models/quota-window-model.js';
import { ValidationError } from '../../../lib/errors.js';
import { forecastUsage } from './quota-forecast.js';

export interface QuotaTrackerOptions {
    limit: number;
    windowMs: number;
    /** Epoch ms the fixed windows are aligned on. */
    anchorMs: number;
}

/**
 * Counter of upstream quota units per fixed wall-clock window.
 *
 * The window is derived from the clock on every call, so rollover needs no
 * timer: the first call in a new window simply lands on a new counter key.
 * Acquisition is one atomic increment on that key; an increment that crosses
 * the limit is undone and refused, so successful acquisitions in a window
 * never sum above the limit.
 *
 * Usage is also accumulated in MongoDB per window for history and forecasting.
 * That write is best effort and never affects an acquisition. The first call
 * in a window raises the live counter to the persisted count, so a restart
 * with an in-process key-value tier does not hand out the window's budget
 * a second time.
 */
export class QuotaTracker implements IQuotaTracker {
    private readonly COLLECTION_NAME = 'quotaWindows';
    private readonly KEY_PREFIX = 'quota:';
    private readonly restored = new Map<number, Promise<void>>();

    /**
     * @param store - Key-value tier holding the live counters
     * @param database - Database service for usage history
     * @param options - Limit and window geometry
     * @param logger - Scoped logger
     * @param clock - Time source in epoch ms
     */
    constructor(
        private readonly store: IKeyValueStore,
        private readonly database: IDatabaseService,
        private readonly options: QuotaTrackerOptions,
        private readonly logger: ILogger,
        private readonly clock: () => number = Date.now
    ) {
        if (options.limit <= 0 || options.windowMs <= 0) {
            throw new ValidationError('Quota limit and window must be positive', options);
        }
        this.database.registerModel(this.COLLECTION_NAME, QuotaWindowModel);
    }

    /**
     * Reserve `n` units in the current window. Never waits and never retries.
     *
     * @returns true when reserved, false when the window cannot fit `n` more units
     * @throws ValidationError when `n` is not a positive integer
     */
    async tryAcquire(n = 1): Promise<boolean> {
        if (!Number.isInteger(n) || n <= 0) {
            throw new ValidationError('Quota units must be a positive integer', { n });
        }

        const now = this.clock();
        const window = this.windowAt(now);
        if (n > this.options.limit) {
            return false;
        }

        await this.restoreWindow(window, now);

        const key = this.keyFor(window.start);
        const ttlMs = this.counterTtl(window, now);
        const used = await this.store.incrBy(key, n, ttlMs);

        if (used > this.options.limit) {
            await this.store.incrBy(key, -n, ttlMs);
            this.logger.warn(
                { requested: n, limit: this.options.limit, windowStart: new Date(window.start).toISOString() },
                'Upstream quota exhausted for current window'
            );
            return false;
        }

        await this.recordUsage(window, n);
        return true;
    }

    async remaining(): Promise<IQuotaStatus> {
        const now = this.clock();
        const window = this.windowAt(now);
        await this.restoreWindow(window, now);
        const raw = await this.store.get(this.keyFor(window.start));
        const parsed = raw === null ? 0 : Number.parseInt(raw, 10);
        const used = Number.isNaN(parsed) ? 0 : Math.min(Math.max(parsed, 0), this.options.limit);

        return {
            windowStart: new Date(window.start),
            windowEnd: new Date(window.end),
            used,
            limit: this.options.limit,
            remaining: this.options.limit - used
        };
    }

    /**
     * Persisted usage of the most recent windows, oldest first, current window
     * included.
     */
    async history(windows: number): Promise<IQuotaWindow[]> {
        const rows = await this.database.find<IQuotaWindow>(
            this.COLLECTION_NAME,
            {},
            { sort: { windowStart: -1 }, limit: windows }
        );
        return rows
            .map(row => ({
                windowStart: row.windowStart,
                windowEnd: row.windowEnd,
                callCount: row.callCount,
                limit: row.limit
            }))
            .reverse();
    }

    /**
     * Forecast usage for the next windows from the last seven completed ones.
     */
    async forecast(daysAhead: number): Promise<QuotaForecast> {
        const currentStart = this.windowAt(this.clock()).start;
        const past = (await this.history(8)).filter(window => window.windowStart.getTime() < currentStart);
        return forecastUsage(past.slice(-7).map(window => window.callCount), this.options.limit, daysAhead);
    }

    /**
     * Window containing `now`: `anchor + floor((now - anchor) / length) * length`.
     */
    windowAt(now: number): { start: number; end: number } {
        const { anchorMs, windowMs } = this.options;
        const start = anchorMs + Math.floor((now - anchorMs) / windowMs) * windowMs;
        return { start, end: start + windowMs };
    }

    private keyFor(windowStart: number): string {
        return `${this.KEY_PREFIX}${windowStart}`;
    }

    private counterTtl(window: { start: number; end: number }, now: number): number {
        return window.end - now + this.options.windowMs;
    }

    /**
     * Bring the live counter up to the persisted usage of the window, once per
     * window per process. Concurrent first calls share one restore. A failed
     * read is logged and retried on the next call.
     */
    private restoreWindow(window: { start: number; end: number }, now: number): Promise<void> {
        const pending = this.restored.get(window.start);
        if (pending) {
            return pending;
        }

        for (const start of this.restored.keys()) {
            this.restored.delete(start);
        }

        const restore = this.raiseToPersisted(window, now).catch((error: unknown) => {
            this.restored.delete(window.start);
            this.logger.warn(
                { error, windowStart: new Date(window.start).toISOString() },
                'Failed to restore persisted quota usage'
            );
        });
        this.restored.set(window.start, restore);
        return restore;
    }

    private async raiseToPersisted(window: { start: number; end: number }, now: number): Promise<void> {
        const persisted = await this.database.findOne<IQuotaWindow>(this.COLLECTION_NAME, {
            windowStart: new Date(window.start)
        });
        if (!persisted || persisted.callCount <= 0) {
            return;
        }

        const key = this.keyFor(window.start);
        const ttlMs = this.counterTtl(window, now);
        const live = await this.store.incrBy(key, 0, ttlMs);
        if (live < persisted.callCount) {
            await this.store.incrBy(key, persisted.callCount - live, ttlMs);
            this.logger.info(
                { windowStart: new Date(window.start).toISOString(), used: persisted.callCount },
                'Restored quota usage from history'
            );
        }
    }

    private async recordUsage(window: { start: number; end: number }, units: number): Promise<void> {
        try {
            await this.database.updateOne<IQuotaWindow>(
                this.COLLECTION_NAME,
                { windowStart: new Date(window.start) },
                {
                    $inc: { callCount: units },
                    $set: { windowEnd: new Date(window.end), limit: this.options.limit }
                },
                { upsert: true }
            );
        } catch (error) {
            this.logger.warn({ error, units }, 'Failed to persist quota usage');
        }
    }
}
