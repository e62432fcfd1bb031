/// <reference types="vitest" />

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AxiosError, AxiosHeaders } from 'axios';
import { YouTubeClient } from '../youtube-client.js';
import { UpstreamUnavailableError, ValidationError } from '../../../../lib/errors.js';
import { createMockLogger } from '../../../../tests/vitest/mocks/logger.js';

const BASE_URL = 'https://youtube.test/v3';
const CHANNEL_ID = 'UCaaaaaaaaaaaaaaaaaaaaaa';

function httpError(status: number, data: unknown): AxiosError {
    const config = { headers: new AxiosHeaders() };
    return new AxiosError('Request failed', 'ERR_BAD_REQUEST', config, undefined, {
        data,
        status,
        statusText: 'Error',
        headers: {},
        config
    });
}

describe('YouTubeClient', () => {
    let get: ReturnType<typeof vi.fn>;
    let logger: ReturnType<typeof createMockLogger>;
    let client: YouTubeClient;

    beforeEach(() => {
        get = vi.fn();
        logger = createMockLogger();
        client = new YouTubeClient({ get }, { apiKey: 'test-youtube-key', baseUrl: BASE_URL, timeoutMs: 5000 }, logger);
    });

    describe('fetchMetrics', () => {
        it('reads channel statistics in one call', async () => {
            get.mockResolvedValueOnce({
                data: {
                    items: [
                        {
                            id: CHANNEL_ID,
                            snippet: { title: 'Cooking Lab' },
                            statistics: { viewCount: '1200', subscriberCount: '40', videoCount: '7' }
                        }
                    ]
                }
            });

            const result = await client.fetchMetrics('channel', [CHANNEL_ID]);

            expect(result).toEqual([
                {
                    entityId: CHANNEL_ID,
                    entityType: 'channel',
                    title: 'Cooking Lab',
                    metrics: { viewCount: 1200, likeCount: 0, commentCount: 0, subscriberCount: 40, videoCount: 7 }
                }
            ]);
            expect(get).toHaveBeenCalledWith(`${BASE_URL}/channels`, {
                params: { part: 'snippet,statistics', id: CHANNEL_ID, maxResults: 1, key: 'test-youtube-key' },
                timeout: 5000
            });
        });

        it('reads hidden video counters as zero and falls back to the id for the title', async () => {
            get.mockResolvedValueOnce({
                data: { items: [{ id: 'dQ4wXbqQrYk', statistics: { viewCount: '300' } }] }
            });

            const [video] = await client.fetchMetrics('video', ['dQ4wXbqQrYk', 'missingVid1']);

            expect(video).toEqual({
                entityId: 'dQ4wXbqQrYk',
                entityType: 'video',
                title: 'dQ4wXbqQrYk',
                metrics: { viewCount: 300, likeCount: 0, commentCount: 0 }
            });
            expect(get).toHaveBeenCalledWith(`${BASE_URL}/videos`, expect.objectContaining({
                params: expect.objectContaining({ id: 'dQ4wXbqQrYk,missingVid1' })
            }));
        });

        it('makes no call for an empty id list', async () => {
            expect(await client.fetchMetrics('video', [])).toEqual([]);
            expect(get).not.toHaveBeenCalled();
        });

        it('refuses more ids than one call accepts', async () => {
            const ids = Array.from({ length: 51 }, (_, index) => `video${String(index).padStart(6, '0')}`);

            await expect(client.fetchMetrics('video', ids)).rejects.toBeInstanceOf(ValidationError);
        });

        it('reports a quota refusal as upstream unavailable', async () => {
            get.mockRejectedValueOnce(httpError(403, { error: { code: 403, errors: [{ reason: 'quotaExceeded' }] } }));

            const failure = client.fetchMetrics('video', ['dQ4wXbqQrYk']);

            await expect(failure).rejects.toBeInstanceOf(UpstreamUnavailableError);
            await expect(failure).rejects.toMatchObject({
                details: { resource: 'videos', status: 403, reason: 'quotaExceeded' }
            });
        });

        it('reports a network failure as upstream unavailable', async () => {
            get.mockRejectedValueOnce(new Error('socket hang up'));

            await expect(client.fetchMetrics('video', ['dQ4wXbqQrYk'])).rejects.toMatchObject({
                code: 'UPSTREAM_UNAVAILABLE',
                details: { resource: 'videos', cause: 'socket hang up' }
            });
        });

        it('rejects a malformed payload', async () => {
            get.mockResolvedValueOnce({ data: { items: [{ id: 42, statistics: {} }] } });

            await expect(client.fetchMetrics('video', ['dQ4wXbqQrYk'])).rejects.toBeInstanceOf(UpstreamUnavailableError);
            expect(logger.warn).toHaveBeenCalledWith(
                expect.objectContaining({ resource: 'videos' }),
                'Malformed upstream payload'
            );
        });
    });

    describe('listRecentVideos', () => {
        it('reads the uploads playlist and keeps its order', async () => {
            get.mockResolvedValueOnce({
                data: {
                    items: [
                        { contentDetails: { videoId: 'newestVid01' } },
                        { contentDetails: { videoId: 'olderVid002' } }
                    ]
                }
            });
            get.mockResolvedValueOnce({
                data: {
                    items: [
                        { id: 'olderVid002', snippet: { title: 'Older' }, statistics: { viewCount: '10', likeCount: '1', commentCount: '0' } },
                        {
                            id: 'newestVid01',
                            snippet: { title: 'Newest', publishedAt: '2026-03-09T18:00:00Z' },
                            statistics: { viewCount: '25', likeCount: '4', commentCount: '2' }
                        }
                    ]
                }
            });

            const videos = await client.listRecentVideos(CHANNEL_ID, 5);

            expect(videos).toEqual([
                { videoId: 'newestVid01', title: 'Newest', publishedAt: '2026-03-09T18:00:00Z', viewCount: 25, likeCount: 4, commentCount: 2 },
                { videoId: 'olderVid002', title: 'Older', publishedAt: '', viewCount: 10, likeCount: 1, commentCount: 0 }
            ]);
            expect(get).toHaveBeenNthCalledWith(1, `${BASE_URL}/playlistItems`, {
                params: { part: 'contentDetails', playlistId: 'UUaaaaaaaaaaaaaaaaaaaaaa', maxResults: 5, key: 'test-youtube-key' },
                timeout: 5000
            });
        });

        it('skips the statistics call for an empty playlist', async () => {
            get.mockResolvedValueOnce({ data: {} });

            expect(await client.listRecentVideos(CHANNEL_ID, 5)).toEqual([]);
            expect(get).toHaveBeenCalledTimes(1);
        });

        it('needs a channel id', async () => {
            await expect(client.listRecentVideos('dQ4wXbqQrYk', 5)).rejects.toBeInstanceOf(ValidationError);
        });
    });

    describe('listTopComments', () => {
        it('returns plain text comments truncated to 60 characters', async () => {
            get.mockResolvedValueOnce({
                data: {
                    items: [
                        { snippet: { topLevelComment: { snippet: { authorDisplayName: 'Ann', textDisplay: '<b>Nice</b> loaf &amp; butter', likeCount: '3' } } } },
                        { snippet: { topLevelComment: { snippet: { authorDisplayName: 'Ben', textDisplay: 'a'.repeat(80) } } } }
                    ]
                }
            });

            const comments = await client.listTopComments('dQ4wXbqQrYk', 3);

            expect(comments).toEqual([
                { author: 'Ann', text: 'Nice loaf & butter', likeCount: 3 },
                { author: 'Ben', text: `${'a'.repeat(57)}...`, likeCount: 0 }
            ]);
            expect(get).toHaveBeenCalledWith(`${BASE_URL}/commentThreads`, {
                params: {
                    part: 'snippet',
                    videoId: 'dQ4wXbqQrYk',
                    order: 'relevance',
                    textFormat: 'plainText',
                    maxResults: 3,
                    key: 'test-youtube-key'
                },
                timeout: 5000
            });
        });
    });

    describe('listTrending', () => {
        it('reads the most popular chart with hashtags and durations', async () => {
            get.mockResolvedValueOnce({
                data: {
                    items: [
                        {
                            id: 'trendVid001',
                            snippet: {
                                title: 'Sourdough in 60 seconds',
                                channelTitle: 'Cooking Lab',
                                categoryId: '26',
                                publishedAt: '2026-03-09T17:30:00Z',
                                description: 'Quick bake #bread #sourdough_tips and more',
                                tags: ['bread', 'baking']
                            },
                            statistics: { viewCount: '250000', likeCount: '9000', commentCount: '120' },
                            contentDetails: { duration: 'PT1H2M3S' }
                        },
                        {
                            id: 'trendVid002',
                            snippet: { title: 'Live match' },
                            contentDetails: { duration: 'P0D' }
                        }
                    ]
                }
            });

            const videos = await client.listTrending('GB', 80);

            expect(videos).toEqual([
                {
                    videoId: 'trendVid001',
                    title: 'Sourdough in 60 seconds',
                    channelTitle: 'Cooking Lab',
                    categoryId: '26',
                    publishedAt: '2026-03-09T17:30:00Z',
                    viewCount: 250000,
                    likeCount: 9000,
                    commentCount: 120,
                    tags: ['bread', 'baking'],
                    hashtags: ['#bread', '#sourdough_tips'],
                    durationSeconds: 3723
                },
                {
                    videoId: 'trendVid002',
                    title: 'Live match',
                    channelTitle: '',
                    categoryId: '',
                    publishedAt: '',
                    viewCount: 0,
                    likeCount: 0,
                    commentCount: 0,
                    tags: [],
                    hashtags: [],
                    durationSeconds: 0
                }
            ]);
            expect(get).toHaveBeenCalledWith(`${BASE_URL}/videos`, {
                params: {
                    part: 'snippet,statistics,contentDetails',
                    chart: 'mostPopular',
                    regionCode: 'GB',
                    maxResults: 50,
                    key: 'test-youtube-key'
                },
                timeout: 5000
            });
        });
    });
});
