import axios, { type AxiosInstance } from 'axios';
import type { ZodType, ZodTypeDef } from 'zod';
import type {
    EntityType,
    ICommentSummary,
    ILogger,
    IMetricsUpstream,
    IUpstreamCosts,
    IUpstreamEntityStats,
    ITrendingVideo,
    IVideoSummary
} from '@tubepulse/types';
import { UpstreamUnavailableError, ValidationError } from '../../../lib/errors.js';
import {
    apiErrorSchema,
    channelListSchema,
    commentThreadsSchema,
    playlistItemsSchema,
    trendingListSchema,
    videoListSchema
} from './youtube.schemas.js';

export interface YouTubeClientOptions {
    apiKey: string;
    baseUrl: string;
    timeoutMs: number;
}

const MAX_BATCH_SIZE = 50;
const COMMENT_MAX_LENGTH = 60;
const HASHTAG = /#[\p{L}\p{N}_]+/gu;

/**
 * Read-only client for the YouTube Data API v3.
 *
 * Each public method maps to a fixed number of list calls, reported in `costs`
 * so callers can reserve quota before calling. Responses are validated with
 * zod; transport failures, non-success statuses (including quota refusals)
 * and malformed payloads all surface as UpstreamUnavailableError.
 */
export class YouTubeClient implements IMetricsUpstream {
    readonly maxBatchSize = MAX_BATCH_SIZE;

    readonly costs: IUpstreamCosts = {
        fetchMetrics: 1,
        listRecentVideos: 2,
        listTopComments: 1,
        listTrending: 1
    };

    /**
     * @param http - Axios instance (the shared httpClient in production)
     * @param options - API key, base URL and per-call timeout
     * @param logger - Scoped logger
     */
    constructor(
        private readonly http: Pick<AxiosInstance, 'get'>,
        private readonly options: YouTubeClientOptions,
        private readonly logger: ILogger
    ) {}

    async fetchMetrics(entityType: EntityType, ids: readonly string[]): Promise<IUpstreamEntityStats[]> {
        if (ids.length === 0) {
            return [];
        }
        if (ids.length > MAX_BATCH_SIZE) {
            throw new ValidationError(`At most ${MAX_BATCH_SIZE} ids per call`, { count: ids.length });
        }

        if (entityType === 'channel') {
            const payload = await this.request('channels', { part: 'snippet,statistics', id: ids.join(','), maxResults: ids.length }, channelListSchema);
            return payload.items.map(item => ({
                entityId: item.id,
                entityType: 'channel' as const,
                title: item.snippet?.title ?? item.id,
                metrics: {
                    viewCount: item.statistics.viewCount,
                    likeCount: 0,
                    commentCount: 0,
                    subscriberCount: item.statistics.subscriberCount,
                    videoCount: item.statistics.videoCount
                }
            }));
        }

        const payload = await this.request('videos', { part: 'snippet,statistics', id: ids.join(','), maxResults: ids.length }, videoListSchema);
        return payload.items.map(item => ({
            entityId: item.id,
            entityType: 'video' as const,
            title: item.snippet?.title ?? item.id,
            metrics: {
                viewCount: item.statistics.viewCount,
                likeCount: item.statistics.likeCount,
                commentCount: item.statistics.commentCount
            }
        }));
    }

    /**
     * Latest uploads of a channel with their counters.
     *
     * Reads the channel's uploads playlist (`UU` + the id after `UC`), then
     * fetches statistics for those videos in one batch.
     */
    async listRecentVideos(channelId: string, limit: number): Promise<IVideoSummary[]> {
        if (!channelId.startsWith('UC')) {
            throw new ValidationError('Recent videos need a channel id starting with UC', { channelId });
        }

        const uploads = `UU${channelId.slice(2)}`;
        const playlist = await this.request(
            'playlistItems',
            { part: 'contentDetails', playlistId: uploads, maxResults: Math.min(limit, MAX_BATCH_SIZE) },
            playlistItemsSchema
        );

        const videoIds = playlist.items.map(item => item.contentDetails.videoId);
        if (videoIds.length === 0) {
            return [];
        }

        const videos = await this.request('videos', { part: 'snippet,statistics', id: videoIds.join(','), maxResults: videoIds.length }, videoListSchema);
        const byId = new Map(videos.items.map(item => [item.id, item]));

        return videoIds.flatMap(videoId => {
            const item = byId.get(videoId);
            if (!item) {
                return [];
            }
            return [{
                videoId,
                title: item.snippet?.title ?? videoId,
                publishedAt: item.snippet?.publishedAt ?? '',
                viewCount: item.statistics.viewCount,
                likeCount: item.statistics.likeCount,
                commentCount: item.statistics.commentCount
            }];
        });
    }

    async listTopComments(videoId: string, limit: number): Promise<ICommentSummary[]> {
        const payload = await this.request(
            'commentThreads',
            { part: 'snippet', videoId, order: 'relevance', textFormat: 'plainText', maxResults: Math.min(limit, 100) },
            commentThreadsSchema
        );

        return payload.items.map(item => {
            const comment = item.snippet.topLevelComment.snippet;
            return {
                author: comment.authorDisplayName,
                text: truncate(stripHtml(comment.textDisplay), COMMENT_MAX_LENGTH),
                likeCount: comment.likeCount
            };
        });
    }

    async listTrending(regionCode: string, limit: number): Promise<ITrendingVideo[]> {
        const payload = await this.request(
            'videos',
            {
                part: 'snippet,statistics,contentDetails',
                chart: 'mostPopular',
                regionCode,
                maxResults: Math.min(limit, MAX_BATCH_SIZE)
            },
            trendingListSchema
        );

        return payload.items.map(item => ({
            videoId: item.id,
            title: item.snippet.title,
            channelTitle: item.snippet.channelTitle,
            categoryId: item.snippet.categoryId,
            publishedAt: item.snippet.publishedAt,
            viewCount: item.statistics.viewCount,
            likeCount: item.statistics.likeCount,
            commentCount: item.statistics.commentCount,
            tags: item.snippet.tags,
            hashtags: item.snippet.description.match(HASHTAG) ?? [],
            durationSeconds: item.contentDetails.duration
        }));
    }

    private async request<T>(
        resource: string,
        params: Record<string, string | number>,
        schema: ZodType<T, ZodTypeDef, unknown>
    ): Promise<T> {
        let data: unknown;
        try {
            const response = await this.http.get<unknown>(`${this.options.baseUrl}/${resource}`, {
                params: { ...params, key: this.options.apiKey },
                timeout: this.options.timeoutMs
            });
            data = response.data;
        } catch (error) {
            throw this.toUpstreamError(resource, error);
        }

        const parsed = schema.safeParse(data);
        if (!parsed.success) {
            this.logger.warn({ resource, issues: parsed.error.issues.slice(0, 3) }, 'Malformed upstream payload');
            throw new UpstreamUnavailableError(`Malformed ${resource} response`, { resource });
        }
        return parsed.data;
    }

    private toUpstreamError(resource: string, error: unknown): UpstreamUnavailableError {
        if (axios.isAxiosError(error)) {
            const status = error.response?.status;
            const envelope = apiErrorSchema.safeParse(error.response?.data);
            const reason = envelope.success ? envelope.data.error.errors?.[0]?.reason : undefined;

            this.logger.warn({ resource, status, reason, code: error.code }, 'Upstream request failed');
            return new UpstreamUnavailableError(`YouTube ${resource} request failed`, { resource, status, reason });
        }

        this.logger.warn({ resource, error }, 'Upstream request failed');
        return new UpstreamUnavailableError(`YouTube ${resource} request failed`, {
            resource,
            cause: error instanceof Error ? error.message : String(error)
        });
    }
}

function stripHtml(text: string): string {
    return text
        .replace(/<br\s*\/?>/gi, ' ')
        .replace(/<[^>]+>/g, '')
        .replace(/&quot;/g, '"')
        .replace(/&#39;/g, "'")
        .replace(/&lt;/g, '<')
        .replace(/&gt;/g, '>')
        .replace(/&amp;/g, '&')
        .replace(/\s+/g, ' ')
        .trim();
}

function truncate(text: string, max: number): string {
    return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}
