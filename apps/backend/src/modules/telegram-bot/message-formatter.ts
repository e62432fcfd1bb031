import type {
    CurrentStatsResult,
    ICommentSummary,
    ICurrentStats,
    IStatsStatus,
    IStatsSummary,
    ITopContent,
    ITrend,
    ITrendingAnalysis,
    IVideoSummary,
    QuotaForecast,
    IQuotaStatus,
    VideoFormat
} from '@tubepulse/types';

/**
 * HTML renderers for bot replies. Every value that came from the upstream or
 * from a user is escaped.
 */

export const STALE_NOTE = 'data may be stale';
export const UNAVAILABLE_NOTE = 'data unavailable';

export function escapeHtml(text: string): string {
    return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function formatNumber(value: number): string {
    return value.toLocaleString('en-US');
}

function signed(value: number): string {
    return value > 0 ? `+${formatNumber(value)}` : formatNumber(value);
}

function formatTimestamp(date: Date): string {
    return `${date.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

function nameOf(stats: ICurrentStats): string {
    return escapeHtml(stats.displayName ?? stats.entityId);
}

function metricsLine(stats: ICurrentStats): string {
    const { metrics } = stats;
    if (stats.entityType === 'channel') {
        const parts = [`${formatNumber(metrics.viewCount)} views`];
        if (metrics.subscriberCount !== undefined) {
            parts.push(`${formatNumber(metrics.subscriberCount)} subscribers`);
        }
        if (metrics.videoCount !== undefined) {
            parts.push(`${formatNumber(metrics.videoCount)} videos`);
        }
        return parts.join(' | ');
    }
    return `${formatNumber(metrics.viewCount)} views | ${formatNumber(metrics.likeCount)} likes | ${formatNumber(metrics.commentCount)} comments`;
}

export function formatCurrentStats(results: readonly CurrentStatsResult[]): string {
    const blocks = results.map(result => {
        switch (result.status) {
            case 'fresh':
                return `<b>${nameOf(result.stats)}</b>\n${metricsLine(result.stats)}`;
            case 'stale':
                return `<b>${nameOf(result.stats)}</b>\n${metricsLine(result.stats)}\n<i>${STALE_NOTE} (as of ${formatTimestamp(result.stats.capturedAt)})</i>`;
            case 'unavailable':
                return `<b>${escapeHtml(result.entityId)}</b>\n<i>${UNAVAILABLE_NOTE}</i>`;
            case 'not-found':
                return `<b>${escapeHtml(result.entityId)}</b>\nnot found`;
        }
    });
    return ['📊 <b>Current statistics</b>', ...blocks].join('\n\n');
}

export function formatTrend(name: string, trend: ITrend): string {
    const lines = [
        `📈 <b>${escapeHtml(name)}</b>, last ${trend.windowDays} day(s)`,
        `${trend.fromDate} → ${trend.toDate}`,
        `Views: ${signed(trend.deltaViewCount)} (${trend.viewGrowthPercent}%)`
    ];
    if (trend.deltaSubscriberCount !== null) {
        lines.push(`Subscribers: ${signed(trend.deltaSubscriberCount)}`);
    }
    if (trend.entityType === 'video') {
        lines.push(`Likes: ${signed(trend.deltaLikeCount)}`, `Comments: ${signed(trend.deltaCommentCount)}`);
    }
    return lines.join('\n');
}

export function formatSummary(summary: IStatsSummary, names: ReadonlyMap<string, string>): string {
    const lines = [
        `🗓 <b>Summary</b> ${summary.fromDate} → ${summary.toDate}`,
        `Views: ${signed(summary.totals.viewsGained)} | Subscribers: ${signed(summary.totals.subscribersGained)}`
    ];

    if (summary.entities.length === 0) {
        lines.push('', 'No data for this period yet.');
        return lines.join('\n');
    }

    lines.push('');
    for (const entity of summary.entities) {
        const name = escapeHtml(names.get(entity.entityId) ?? entity.entityId);
        lines.push(`• ${name}: ${signed(entity.viewsGained)} views, ${signed(entity.subscribersGained)} subscribers`);
    }

    if (summary.bestDay) {
        lines.push('', `Best day: ${summary.bestDay.date} (${signed(summary.bestDay.viewsGained)} views)`);
    }
    return lines.join('\n');
}

export function formatVideos(name: string, videos: readonly IVideoSummary[]): string {
    if (videos.length === 0) {
        return `🎬 <b>${escapeHtml(name)}</b>\nNo recent uploads.`;
    }
    const lines = videos.map(
        (video, index) =>
            `${index + 1}. ${escapeHtml(video.title)}\n   ${formatNumber(video.viewCount)} views | ${formatNumber(video.likeCount)} likes | ${formatNumber(video.commentCount)} comments`
    );
    return [`🎬 <b>${escapeHtml(name)}</b>, recent uploads`, ...lines].join('\n');
}

export function formatComments(comments: readonly ICommentSummary[]): string {
    if (comments.length === 0) {
        return 'No comments yet.';
    }
    return comments
        .map(comment => `💬 <b>${escapeHtml(comment.author)}</b> (${formatNumber(comment.likeCount)} likes)\n${escapeHtml(comment.text)}`)
        .join('\n');
}

export function formatTopContent(top: ITopContent): string {
    const lines = [`🏆 <b>Top content</b> ${top.fromDate} → ${top.toDate}`, '', '<b>Channels</b>'];

    if (top.channels.length === 0) {
        lines.push('No channel data for this period yet.');
    }
    top.channels.forEach((channel, index) => {
        const name = escapeHtml(channel.displayName ?? channel.entityId);
        lines.push(`${index + 1}. ${name}: ${signed(channel.viewsGained)} views, ${signed(channel.subscribersGained)} subscribers`);
    });

    lines.push('', '<b>Videos</b>');
    if (top.videos.length === 0) {
        lines.push('No uploads in this period.');
    }
    top.videos.forEach((video, index) => {
        const channel = escapeHtml(video.channelName ?? video.channelId);
        lines.push(
            `${index + 1}. ${escapeHtml(video.title)} (${channel})`,
            `   ${formatNumber(video.viewCount)} views | ${formatNumber(video.likeCount)} likes`
        );
    });

    if (top.incomplete.length > 0) {
        lines.push('', `<i>Some uploads could not be refreshed (${top.incomplete.join(', ')})</i>`);
    }
    return lines.join('\n');
}

const FORMAT_TIPS: Record<VideoFormat, string> = {
    short: 'Short videos (under a minute) lead the chart.',
    medium: 'Medium videos (1-5 minutes) lead the chart.',
    long: 'Long videos (over 5 minutes) lead the chart.'
};

function utcLabel(offsetHours: number): string {
    if (offsetHours === 0) {
        return 'UTC';
    }
    return offsetHours > 0 ? `UTC+${offsetHours}` : `UTC${offsetHours}`;
}

function formatDuration(seconds: number): string {
    const minutes = Math.floor(seconds / 60);
    return `${minutes}:${String(seconds % 60).padStart(2, '0')}`;
}

export function formatTrending(analysis: ITrendingAnalysis): string {
    const lines = [`🔥 <b>Trending in ${escapeHtml(analysis.region)}</b> (${analysis.videoCount} videos)`];

    if (analysis.videoCount === 0) {
        lines.push('', 'The chart is empty.');
        return lines.join('\n');
    }

    lines.push('', '<b>Top categories</b>');
    analysis.categories.slice(0, 5).forEach((category, index) => {
        lines.push(`${index + 1}. ${escapeHtml(category.category)}: ${category.count} video(s), ${formatNumber(category.totalViews)} views`);
    });

    lines.push('', '<b>Viral videos</b>');
    analysis.viralVideos.slice(0, 5).forEach((video, index) => {
        lines.push(`${index + 1}. ${escapeHtml(video.title)} (${escapeHtml(video.channelTitle)}): ${formatNumber(video.viewCount)} views`);
    });

    if (analysis.topHashtags.length > 0) {
        lines.push('', '<b>Popular hashtags</b>', escapeHtml(analysis.topHashtags.slice(0, 10).map(entry => entry.term).join(' ')));
    }
    if (analysis.topTags.length > 0) {
        lines.push('', '<b>Popular tags</b>', escapeHtml(analysis.topTags.slice(0, 10).map(entry => entry.term).join(', ')));
    }

    if (analysis.bestHours.length > 0) {
        const hours = analysis.bestHours.map(entry => `${String(entry.hour).padStart(2, '0')}:00 (${entry.count})`);
        lines.push('', `<b>Busiest publish hours (${utcLabel(analysis.utcOffsetHours)})</b>`, hours.join(', '));
    }

    if (analysis.averageDurationSeconds !== null && analysis.recommendedFormat !== null) {
        lines.push('', `Average length: ${formatDuration(analysis.averageDurationSeconds)}`, FORMAT_TIPS[analysis.recommendedFormat]);
    }
    return lines.join('\n');
}

export function formatQuota(quota: IQuotaStatus | null, forecast: QuotaForecast | null): string {
    if (!quota) {
        return `🔋 Quota: <i>${UNAVAILABLE_NOTE}</i>`;
    }

    const lines = [
        '🔋 <b>Upstream quota</b>',
        `Used: ${formatNumber(quota.used)} / ${formatNumber(quota.limit)} (remaining ${formatNumber(quota.remaining)})`,
        `Window: ${formatTimestamp(quota.windowStart)} → ${formatTimestamp(quota.windowEnd)}`
    ];

    if (forecast?.status === 'ok') {
        lines.push(`Average per window: ${forecast.averageUsage} (${forecast.trend})`);
        for (const day of forecast.forecast) {
            lines.push(`Day +${day.day}: ~${formatNumber(day.predictedUsage)} (${day.utilization}%)`);
        }
    } else if (forecast?.status === 'insufficient-history') {
        lines.push(`Forecast: not enough history (${forecast.windows} window(s))`);
    }
    return lines.join('\n');
}

export function formatStatus(status: IStatsStatus): string {
    const cache = status.cache
        ? `${formatNumber(status.cache.active)} active / ${formatNumber(status.cache.expired)} expired`
        : UNAVAILABLE_NOTE;
    const snapshots = status.snapshotCount !== null ? formatNumber(status.snapshotCount) : UNAVAILABLE_NOTE;

    return [
        '🛠 <b>Status</b>',
        `Tracked entities: ${status.trackedEntities}`,
        `Snapshots: ${snapshots}`,
        `Cache entries: ${cache}`,
        '',
        formatQuota(status.quota, status.forecast)
    ].join('\n');
}
