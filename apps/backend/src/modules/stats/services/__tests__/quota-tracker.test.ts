/// <reference types="vitest" />

import { describe, it, expect, beforeEach } from 'vitest';
import { QuotaTracker } from '../quota-tracker.js';
import { MemoryKeyValueStore } from '../../../../services/key-value/memory-key-value-store.js';
import { ValidationError } from '../../../../lib/errors.js';
import { createMockDatabaseService, type MockDatabaseService } from '../../../../tests/vitest/mocks/database-service.js';
import { createMockLogger } from '../../../../tests/vitest/mocks/logger.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const ANCHOR = Date.parse('1970-01-01T08:00:00.000Z');
const WINDOW_START = Date.parse('2026-03-10T08:00:00.000Z');

describe('QuotaTracker', () => {
    let now: number;
    let database: MockDatabaseService;
    let tracker: QuotaTracker;

    function createTracker(limit: number): QuotaTracker {
        return new QuotaTracker(
            new MemoryKeyValueStore(() => now),
            database,
            { limit, windowMs: DAY_MS, anchorMs: ANCHOR },
            createMockLogger(),
            () => now
        );
    }

    beforeEach(() => {
        now = WINDOW_START + 3 * 60 * 60 * 1000;
        database = createMockDatabaseService();
        tracker = createTracker(5);
    });

    describe('windowAt', () => {
        it('aligns windows on the anchor', () => {
            expect(tracker.windowAt(WINDOW_START + 60_000)).toEqual({ start: WINDOW_START, end: WINDOW_START + DAY_MS });
            expect(tracker.windowAt(WINDOW_START - 1)).toEqual({ start: WINDOW_START - DAY_MS, end: WINDOW_START });
        });

        it('starts a new window exactly at the boundary', () => {
            expect(tracker.windowAt(WINDOW_START + DAY_MS).start).toBe(WINDOW_START + DAY_MS);
        });
    });

    describe('tryAcquire', () => {
        it('grants units up to the limit and refuses the next', async () => {
            const granted: boolean[] = [];
            for (let call = 0; call < 6; call += 1) {
                granted.push(await tracker.tryAcquire());
            }

            expect(granted).toEqual([true, true, true, true, true, false]);
            expect((await tracker.remaining()).used).toBe(5);
        });

        it('never over-grants under concurrent calls', async () => {
            const results = await Promise.all(Array.from({ length: 10 }, () => tracker.tryAcquire()));

            expect(results.filter(Boolean)).toHaveLength(5);
            expect((await tracker.remaining()).used).toBe(5);
        });

        it('refuses a multi-unit request that does not fit and keeps the units free', async () => {
            await tracker.tryAcquire(3);

            expect(await tracker.tryAcquire(3)).toBe(false);
            expect(await tracker.tryAcquire(2)).toBe(true);
        });

        it('refuses a request larger than the limit', async () => {
            expect(await tracker.tryAcquire(6)).toBe(false);
            expect((await tracker.remaining()).used).toBe(0);
        });

        it('rejects a non-positive or fractional request', async () => {
            await expect(tracker.tryAcquire(0)).rejects.toBeInstanceOf(ValidationError);
            await expect(tracker.tryAcquire(1.5)).rejects.toBeInstanceOf(ValidationError);
        });

        it('succeeds again once the window rolls over', async () => {
            for (let call = 0; call < 5; call += 1) {
                await tracker.tryAcquire();
            }
            expect(await tracker.tryAcquire()).toBe(false);

            now = WINDOW_START + DAY_MS;

            expect(await tracker.tryAcquire()).toBe(true);
            const status = await tracker.remaining();
            expect(status.used).toBe(1);
            expect(status.windowStart).toEqual(new Date(WINDOW_START + DAY_MS));
        });
    });

    describe('after a restart', () => {
        it('keeps a spent window spent', async () => {
            for (let call = 0; call < 5; call += 1) {
                await tracker.tryAcquire();
            }

            const restarted = createTracker(5);

            expect(await restarted.tryAcquire()).toBe(false);
            expect((await restarted.remaining()).remaining).toBe(0);
            expect(database.getCollectionData('quotaWindows')[0]?.['callCount']).toBe(5);
        });

        it('grants only what the window has left', async () => {
            await tracker.tryAcquire(3);

            const restarted = createTracker(5);

            expect(await restarted.remaining()).toMatchObject({ used: 3, remaining: 2 });
            expect(await restarted.tryAcquire(3)).toBe(false);
            expect(await restarted.tryAcquire(2)).toBe(true);
            expect(await restarted.tryAcquire()).toBe(false);
        });

        it('restores once under concurrent first calls', async () => {
            await tracker.tryAcquire(4);

            const restarted = createTracker(5);
            const results = await Promise.all(Array.from({ length: 3 }, () => restarted.tryAcquire()));

            expect(results.filter(Boolean)).toHaveLength(1);
            expect((await restarted.remaining()).used).toBe(5);
        });

        it('falls back to the live counter when history cannot be read', async () => {
            await tracker.tryAcquire(5);
            database.injectError('quotaWindows', 'findOne', new Error('read failed'));

            const restarted = createTracker(5);

            expect(await restarted.tryAcquire()).toBe(true);
            expect(await restarted.tryAcquire()).toBe(false);
        });
    });

    describe('remaining', () => {
        it('reports the current window', async () => {
            await tracker.tryAcquire(2);

            expect(await tracker.remaining()).toEqual({
                windowStart: new Date(WINDOW_START),
                windowEnd: new Date(WINDOW_START + DAY_MS),
                used: 2,
                limit: 5,
                remaining: 3
            });
        });
    });

    describe('history', () => {
        it('persists granted units per window', async () => {
            await tracker.tryAcquire(2);
            await tracker.tryAcquire();
            await tracker.tryAcquire(4);

            expect(await tracker.history(1)).toEqual([
                {
                    windowStart: new Date(WINDOW_START),
                    windowEnd: new Date(WINDOW_START + DAY_MS),
                    callCount: 3,
                    limit: 5
                }
            ]);
        });

        it('keeps granting when the usage write fails', async () => {
            database.injectError('quotaWindows', 'updateOne', new Error('write failed'));

            expect(await tracker.tryAcquire()).toBe(true);
        });
    });

    describe('forecast', () => {
        function seedWindows(counts: number[]): void {
            database.seed(
                'quotaWindows',
                counts.map((callCount, index) => {
                    const start = WINDOW_START - (counts.length - index) * DAY_MS;
                    return { windowStart: new Date(start), windowEnd: new Date(start + DAY_MS), callCount, limit: 100 };
                })
            );
        }

        it('needs at least two completed windows', async () => {
            seedWindows([40]);
            await tracker.tryAcquire();

            expect(await tracker.forecast(3)).toEqual({ status: 'insufficient-history', windows: 1 });
        });

        it('projects usage from completed windows only', async () => {
            tracker = createTracker(100);
            seedWindows([10, 10, 10, 40]);
            await tracker.tryAcquire(90);

            expect(await tracker.forecast(3)).toEqual({
                status: 'ok',
                averageUsage: 17.5,
                trend: 'increasing',
                forecast: [
                    { day: 1, predictedUsage: 20, utilization: 20 },
                    { day: 2, predictedUsage: 23, utilization: 23 },
                    { day: 3, predictedUsage: 25, utilization: 25 }
                ]
            });
        });
    });
});
