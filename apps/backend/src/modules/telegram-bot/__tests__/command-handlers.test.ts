/// <reference types="vitest" />

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import type { CurrentStatsResult, ICurrentStats, IStatsService, ITrend } from '@tubepulse/types';
import { CommandHandler, parseCommand } from '../command-handlers.js';
import { RequestLimiter } from '../request-limiter.js';
import type { ITelegramUpdate } from '../ITelegramUpdate.js';
import { EntityRegistry } from '../../stats/services/entity-registry.js';
import { MemoryKeyValueStore } from '../../../services/key-value/memory-key-value-store.js';
import { createMockDatabaseService } from '../../../tests/vitest/mocks/database-service.js';
import { createMockLogger, type MockLogger } from '../../../tests/vitest/mocks/logger.js';

const ADMIN_ID = 1000;
const USER_ID = 42;
const CHANNEL_ID = 'UCaaaaaaaaaaaaaaaaaaaaaa';
const FOOTER = '\n\n<i>Requests today: 1/5</i>';
const GENERIC_ERROR = '⚠️ Sorry, something went wrong processing your request. Please try again later.';

function update(text: string | undefined, userId = USER_ID, chatType = 'private'): ITelegramUpdate {
    return {
        update_id: 1,
        message: {
            message_id: 10,
            from: { id: userId, username: 'viewer' },
            chat: { id: userId, type: chatType },
            text
        }
    };
}

function channelStats(overrides: Partial<ICurrentStats> = {}): ICurrentStats {
    return {
        entityId: CHANNEL_ID,
        entityType: 'channel',
        displayName: 'Cooking Lab',
        capturedAt: new Date('2026-03-10T09:30:00.000Z'),
        metrics: { viewCount: 1234567, likeCount: 0, commentCount: 0, subscriberCount: 8900, videoCount: 120 },
        ...overrides
    };
}

function trend(overrides: Partial<ITrend> = {}): ITrend {
    return {
        entityType: 'channel',
        entityId: CHANNEL_ID,
        windowDays: 30,
        fromDate: '2026-02-08',
        toDate: '2026-03-10',
        deltaViewCount: 1500,
        deltaLikeCount: 0,
        deltaCommentCount: 0,
        deltaSubscriberCount: 25,
        viewGrowthPercent: 12.5,
        computedAt: new Date('2026-03-10T12:00:00.000Z'),
        ...overrides
    };
}

describe('parseCommand', () => {
    it('splits the name from its arguments', () => {
        expect(parseCommand('  /Trend@TubePulseBot  Cooking   Lab 30 ')).toEqual({
            name: '/trend',
            args: ['Cooking', 'Lab', '30']
        });
    });

    it('returns null for plain text', () => {
        expect(parseCommand('hello')).toBeNull();
    });
});

describe('CommandHandler', () => {
    let logger: MockLogger;
    let registry: EntityRegistry;
    let stats: { [K in keyof IStatsService]: Mock<IStatsService[K]> };
    let handler: CommandHandler;

    async function reply(text: string | undefined, userId = USER_ID): Promise<string | undefined> {
        const response = await handler.handleUpdate(update(text, userId));
        return response?.text;
    }

    beforeEach(async () => {
        const now = Date.parse('2026-03-10T12:00:00.000Z');
        const clock = () => now;
        const mockLogger = createMockLogger();
        logger = mockLogger;

        registry = new EntityRegistry(createMockDatabaseService(), mockLogger, clock);
        await registry.seed([{ entityId: CHANNEL_ID, entityType: 'channel', displayName: 'Cooking Lab', handle: '@cookinglab' }]);

        const limiter = new RequestLimiter(
            new MemoryKeyValueStore(clock),
            { dailyLimit: 5, cooldownSeconds: 0, adminId: ADMIN_ID },
            clock
        );

        stats = {
            getCurrent: vi.fn<IStatsService['getCurrent']>(async () => []),
            getTrend: vi.fn<IStatsService['getTrend']>(async () => ({ status: 'not-found' })),
            getRecentVideos: vi.fn<IStatsService['getRecentVideos']>(async () => ({ status: 'unavailable', reason: 'quota-exhausted' })),
            getTopComments: vi.fn<IStatsService['getTopComments']>(async () => ({ status: 'unavailable', reason: 'quota-exhausted' })),
            getSummary: vi.fn<IStatsService['getSummary']>(async () => null),
            getTopContent: vi.fn<IStatsService['getTopContent']>(async () => null),
            getTrending: vi.fn<IStatsService['getTrending']>(async () => ({ status: 'unavailable', reason: 'upstream-unavailable' })),
            getStatus: vi.fn<IStatsService['getStatus']>(async () => ({
                quota: null,
                forecast: null,
                cache: null,
                snapshotCount: null,
                trackedEntities: 1
            })),
            refreshTracked: vi.fn<IStatsService['refreshTracked']>(async () => [])
        };

        handler = new CommandHandler(
            stats,
            registry,
            limiter,
            { adminId: ADMIN_ID, defaultWindowDays: 7, maxWindowDays: 365 },
            mockLogger
        );
    });

    describe('routing', () => {
        it('answers in the chat the command came from', async () => {
            const response = await handler.handleUpdate(update('/help'));

            expect(response).toMatchObject({ chatId: String(USER_ID), parseMode: 'HTML' });
        });

        it('ignores group chats, plain text and updates without a message', async () => {
            expect(await handler.handleUpdate(update('/stats', USER_ID, 'group'))).toBeNull();
            expect(await handler.handleUpdate(update('hello'))).toBeNull();
            expect(await handler.handleUpdate(update(undefined))).toBeNull();
            expect(await handler.handleUpdate({ update_id: 2 })).toBeNull();
            expect(stats.getCurrent).not.toHaveBeenCalled();
        });

        it('answers unknown commands with a hint', async () => {
            expect(await reply('/dance')).toBe('❓ Unknown command. Try /help to see available commands.');
        });

        it('accepts the bot name suffix', async () => {
            expect(await reply('/HELP@TubePulseBot')).toContain('/stats [channel] - current statistics');
        });
    });

    describe('/help and /start', () => {
        it('lists admin commands for the admin only', async () => {
            const userHelp = await reply('/help');
            const adminHelp = await reply('/help', ADMIN_ID);

            expect(userHelp).not.toContain('/quota');
            expect(adminHelp).toContain('/quota - upstream quota and forecast');
        });

        it('does not count toward the request limit', async () => {
            expect(await reply('/help')).not.toContain('Requests today');
        });

        it('greets with the tracked count', async () => {
            const text = await reply('/start');

            expect(text?.split('\n').slice(0, 2)).toEqual([
                '👋 <b>Welcome!</b>',
                'I report view, subscriber and engagement statistics for 1 tracked channel(s).'
            ]);
        });
    });

    describe('/stats', () => {
        it('reports every tracked entity with the usage footer', async () => {
            stats.getCurrent.mockResolvedValue([
                { entityId: CHANNEL_ID, status: 'fresh', source: 'upstream', stats: channelStats() }
            ]);

            const text = await reply('/stats');

            expect(stats.getCurrent).toHaveBeenCalledWith([CHANNEL_ID]);
            expect(text).toBe(
                '📊 <b>Current statistics</b>\n\n<b>Cooking Lab</b>\n1,234,567 views | 8,900 subscribers | 120 videos' + FOOTER
            );
        });

        it('resolves a channel by name or handle', async () => {
            await reply('/stats cooking lab');
            await reply('/stats @CookingLab');

            expect(stats.getCurrent.mock.calls).toEqual([[[CHANNEL_ID]], [[CHANNEL_ID]]]);
        });

        it('passes unknown queries through as ids', async () => {
            await reply('/stats dQ4wXbqQrYk');

            expect(stats.getCurrent).toHaveBeenCalledWith(['dQ4wXbqQrYk']);
        });

        it('marks stale and unavailable results', async () => {
            const results: CurrentStatsResult[] = [
                { entityId: CHANNEL_ID, status: 'stale', reason: 'quota-exhausted', stats: channelStats() },
                { entityId: 'dQ4wXbqQrYk', status: 'unavailable', reason: 'upstream-unavailable' }
            ];
            stats.getCurrent.mockResolvedValue(results);

            const text = await reply('/stats', ADMIN_ID);

            expect(text).toBe(
                [
                    '📊 <b>Current statistics</b>',
                    '<b>Cooking Lab</b>\n1,234,567 views | 8,900 subscribers | 120 videos\n<i>data may be stale (as of 2026-03-10 09:30 UTC)</i>',
                    '<b>dQ4wXbqQrYk</b>\n<i>data unavailable</i>'
                ].join('\n\n')
            );
        });

        it('refuses once the daily limit is spent', async () => {
            for (let i = 0; i < 5; i += 1) {
                await reply('/stats');
            }

            expect(await reply('/stats')).toBe('⚠️ Daily limit of 5 requests reached, try again tomorrow');
            expect(stats.getCurrent).toHaveBeenCalledTimes(5);
        });

        it('hides internal failures behind a generic reply', async () => {
            stats.getCurrent.mockRejectedValue(new Error('boom'));

            expect(await reply('/stats')).toBe(GENERIC_ERROR);
            expect(logger.error).toHaveBeenCalledTimes(1);
        });
    });

    describe('/trend', () => {
        it('reads a trailing day count', async () => {
            stats.getTrend.mockResolvedValue({ status: 'ok', cached: false, trend: trend() });

            const text = await reply('/trend Cooking Lab 30', ADMIN_ID);

            expect(stats.getTrend).toHaveBeenCalledWith(CHANNEL_ID, 30);
            expect(text).toBe(
                '📈 <b>Cooking Lab</b>, last 30 day(s)\n2026-02-08 → 2026-03-10\nViews: +1,500 (12.5%)\nSubscribers: +25'
            );
        });

        it('uses the default window', async () => {
            await reply('/trend Cooking Lab', ADMIN_ID);

            expect(stats.getTrend).toHaveBeenCalledWith(CHANNEL_ID, 7);
        });

        it('validates its arguments', async () => {
            expect(await reply('/trend', ADMIN_ID)).toBe('Usage: /trend &lt;channel&gt; [days]');
            expect(await reply('/trend Cooking Lab 0', ADMIN_ID)).toBe('⚠️ Days must be between 1 and 365.');
            expect(await reply('/trend Cooking Lab 400', ADMIN_ID)).toBe('⚠️ Days must be between 1 and 365.');
            expect(stats.getTrend).not.toHaveBeenCalled();
        });

        it('reports missing history and unknown channels', async () => {
            stats.getTrend.mockResolvedValueOnce({ status: 'no-data', points: 1 });

            expect(await reply('/trend Cooking Lab', ADMIN_ID)).toBe('📈 <b>Cooking Lab</b>\nNot enough data yet (1 day(s) recorded).');
            expect(await reply('/trend Unknown <x>', ADMIN_ID)).toBe('Unknown channel: Unknown &lt;x&gt;');
            expect(stats.getTrend).toHaveBeenLastCalledWith('Unknown <x>', 7);
        });

        it('reports unavailable data', async () => {
            stats.getTrend.mockResolvedValue({ status: 'unavailable', reason: 'storage-unavailable' });

            expect(await reply('/trend Cooking Lab', ADMIN_ID)).toBe('📈 <b>Cooking Lab</b>\n<i>data unavailable</i>');
        });
    });

    describe('/summary', () => {
        it('reports unavailable data', async () => {
            expect(await reply('/summary', ADMIN_ID)).toBe('🗓 Summary: <i>data unavailable</i>');
            expect(stats.getSummary).toHaveBeenCalledWith(7);
        });

        it('rejects a non-numeric day count', async () => {
            expect(await reply('/summary week', ADMIN_ID)).toBe('⚠️ Days must be between 1 and 365.');
        });
    });

    describe('/top', () => {
        it('passes the day count and reports unavailable data', async () => {
            expect(await reply('/top 30', ADMIN_ID)).toBe('🏆 Top content: <i>data unavailable</i>');
            expect(stats.getTopContent).toHaveBeenCalledWith(30);
        });

        it('renders the top content with the usage footer', async () => {
            stats.getTopContent.mockResolvedValue({
                days: 7,
                fromDate: '2026-03-04',
                toDate: '2026-03-10',
                channels: [],
                videos: [],
                incomplete: []
            });

            expect(await reply('/top')).toBe(
                [
                    '🏆 <b>Top content</b> 2026-03-04 → 2026-03-10',
                    '',
                    '<b>Channels</b>',
                    'No channel data for this period yet.',
                    '',
                    '<b>Videos</b>',
                    'No uploads in this period.',
                    '',
                    '<i>Requests today: 1/5</i>'
                ].join('\n')
            );
            expect(stats.getTopContent).toHaveBeenCalledWith(7);
        });

        it('rejects a day count out of range', async () => {
            expect(await reply('/top 0', ADMIN_ID)).toBe('⚠️ Days must be between 1 and 365.');
            expect(stats.getTopContent).not.toHaveBeenCalled();
        });
    });

    describe('/trending', () => {
        it('reports an unavailable chart', async () => {
            expect(await reply('/trending', ADMIN_ID)).toBe('🔥 Trending: <i>data unavailable</i>');
        });

        it('marks a stale chart', async () => {
            stats.getTrending.mockResolvedValue({
                status: 'stale',
                reason: 'quota-exhausted',
                analysis: {
                    region: 'US',
                    utcOffsetHours: 0,
                    videoCount: 0,
                    categories: [],
                    topHashtags: [],
                    topTags: [],
                    averageDurationSeconds: null,
                    bestHours: [],
                    viralVideos: [],
                    recommendedFormat: null
                }
            });

            expect(await reply('/trending', ADMIN_ID)).toBe(
                '🔥 <b>Trending in US</b> (0 videos)\n\nThe chart is empty.\n\n<i>data may be stale</i>'
            );
        });
    });

    describe('/videos', () => {
        it('lists uploads with top comments and the stale note', async () => {
            stats.getRecentVideos.mockResolvedValue({
                status: 'stale',
                reason: 'quota-exhausted',
                items: [
                    {
                        videoId: 'vid00000001',
                        title: 'Bread & Butter',
                        publishedAt: '2026-03-09T10:00:00Z',
                        viewCount: 1200,
                        likeCount: 80,
                        commentCount: 5
                    }
                ]
            });
            stats.getTopComments.mockResolvedValue({
                status: 'fresh',
                source: 'upstream',
                items: [{ author: 'Ana', text: 'Great <3', likeCount: 4 }]
            });

            const text = await reply('/videos Cooking Lab');

            expect(stats.getRecentVideos).toHaveBeenCalledWith(CHANNEL_ID);
            expect(stats.getTopComments).toHaveBeenCalledWith('vid00000001');
            expect(text).toBe(
                [
                    '🎬 <b>Cooking Lab</b>, recent uploads\n1. Bread &amp; Butter\n   1,200 views | 80 likes | 5 comments',
                    '<b>Top comments on the latest upload</b>\n💬 <b>Ana</b> (4 likes)\nGreat &lt;3',
                    '<i>data may be stale</i>'
                ].join('\n\n') + FOOTER
            );
        });

        it('reports unavailable listings without asking for comments', async () => {
            expect(await reply('/videos Cooking Lab', ADMIN_ID)).toBe('🎬 <b>Cooking Lab</b>\n<i>data unavailable</i>');
            expect(stats.getTopComments).not.toHaveBeenCalled();
        });
    });

    describe('admin commands', () => {
        it('refuses other users', async () => {
            expect(await reply('/quota')).toBe('⛔ This command is available to the administrator only.');
            expect(logger.warn).toHaveBeenCalledWith({ userId: USER_ID, command: '/quota' }, 'Admin command refused');
            expect(stats.getStatus).not.toHaveBeenCalled();
        });

        it('renders the quota and forecast', async () => {
            stats.getStatus.mockResolvedValue({
                quota: {
                    windowStart: new Date('2026-03-10T08:00:00.000Z'),
                    windowEnd: new Date('2026-03-11T08:00:00.000Z'),
                    used: 1234,
                    limit: 10000,
                    remaining: 8766
                },
                forecast: {
                    status: 'ok',
                    averageUsage: 1500.5,
                    trend: 'stable',
                    forecast: [{ day: 1, predictedUsage: 1500, utilization: 15 }]
                },
                cache: null,
                snapshotCount: null,
                trackedEntities: 1
            });

            expect(await reply('/quota', ADMIN_ID)).toBe(
                [
                    '🔋 <b>Upstream quota</b>',
                    'Used: 1,234 / 10,000 (remaining 8,766)',
                    'Window: 2026-03-10 08:00 UTC → 2026-03-11 08:00 UTC',
                    'Average per window: 1500.5 (stable)',
                    'Day +1: ~1,500 (15%)'
                ].join('\n')
            );
        });

        it('renders the status with unavailable parts', async () => {
            expect(await reply('/status', ADMIN_ID)).toBe(
                [
                    '🛠 <b>Status</b>',
                    'Tracked entities: 1',
                    'Snapshots: data unavailable',
                    'Cache entries: data unavailable',
                    '',
                    '🔋 Quota: <i>data unavailable</i>'
                ].join('\n')
            );
        });

        it('adds a channel', async () => {
            const text = await reply('/add_channel UCbbbbbbbbbbbbbbbbbbbbbb Garden Notes', ADMIN_ID);

            expect(text).toBe('✅ Tracking <b>Garden Notes</b> (channel UCbbbbbbbbbbbbbbbbbbbbbb).');
            expect(registry.list().map(entity => entity.entityId)).toEqual([CHANNEL_ID, 'UCbbbbbbbbbbbbbbbbbbbbbb']);
        });

        it('removes a channel once', async () => {
            expect(await reply('/remove_channel Cooking Lab', ADMIN_ID)).toBe(
                `🗑 Stopped tracking <b>Cooking Lab</b> (channel ${CHANNEL_ID}). History is kept.`
            );
            expect(await reply('/remove_channel Cooking Lab', ADMIN_ID)).toBe('Not tracked: Cooking Lab');
            expect(registry.list()).toEqual([]);
        });

        it('shows usage without arguments', async () => {
            expect(await reply('/add_channel', ADMIN_ID)).toBe('Usage: /add_channel &lt;id&gt; [name]');
            expect(await reply('/remove_channel', ADMIN_ID)).toBe('Usage: /remove_channel &lt;channel&gt;');
        });
    });
});
