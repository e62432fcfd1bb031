import type {
    ICategoryStats,
    IHourCount,
    ITermCount,
    ITrendingAnalysis,
    ITrendingVideo,
    VideoFormat
} from '@tubepulse/types';

const CATEGORY_NAMES: Readonly<Record<string, string>> = {
    '1': 'Film & Animation',
    '2': 'Autos & Vehicles',
    '10': 'Music',
    '15': 'Pets & Animals',
    '17': 'Sports',
    '19': 'Travel & Events',
    '20': 'Gaming',
    '22': 'People & Blogs',
    '23': 'Comedy',
    '24': 'Entertainment',
    '25': 'News & Politics',
    '26': 'Howto & Style',
    '27': 'Education',
    '28': 'Science & Technology',
    '29': 'Nonprofits & Activism'
};

const TOP_TERMS = 20;
const TOP_HOURS = 5;
const VIRAL_MIN_VIEWS = 100_000;
const VIRAL_LIMIT = 10;

export function categoryName(categoryId: string): string {
    return CATEGORY_NAMES[categoryId] ?? 'Other';
}

/**
 * Summarise a most-popular chart.
 *
 * Hashtags, tags and publish hours are ranked by frequency; ties keep the
 * order of first appearance. Videos without a known duration are left out of
 * the average. Viral videos are those above 100k views in chart order, or the
 * first ten of the chart when none qualify.
 *
 * @param videos - Chart entries, in chart order
 * @param region - Region the chart belongs to
 * @param utcOffsetHours - Offset publish hours are reported in
 */
export function analyzeTrending(videos: readonly ITrendingVideo[], region: string, utcOffsetHours: number): ITrendingAnalysis {
    const categories = new Map<string, ICategoryStats>();
    for (const video of videos) {
        const category = categoryName(video.categoryId);
        const stats = categories.get(category) ?? { category, count: 0, totalViews: 0, totalLikes: 0 };
        stats.count += 1;
        stats.totalViews += video.viewCount;
        stats.totalLikes += video.likeCount;
        categories.set(category, stats);
    }

    const durations = videos.map(video => video.durationSeconds).filter(seconds => seconds > 0);
    const averageDurationSeconds = durations.length > 0
        ? Math.round(durations.reduce((sum, seconds) => sum + seconds, 0) / durations.length)
        : null;

    const hours = videos.flatMap(video => {
        const publishedAt = Date.parse(video.publishedAt);
        if (Number.isNaN(publishedAt)) {
            return [];
        }
        return [(((new Date(publishedAt).getUTCHours() + utcOffsetHours) % 24) + 24) % 24];
    });

    const viral = videos.filter(video => video.viewCount > VIRAL_MIN_VIEWS);

    return {
        region,
        utcOffsetHours,
        videoCount: videos.length,
        categories: Array.from(categories.values()).sort((a, b) => b.totalViews - a.totalViews),
        topHashtags: mostCommon(videos.flatMap(video => video.hashtags), TOP_TERMS),
        topTags: mostCommon(videos.flatMap(video => video.tags), TOP_TERMS),
        averageDurationSeconds,
        bestHours: mostCommon(hours, TOP_HOURS).map(({ term, count }) => ({ hour: term, count }) satisfies IHourCount),
        viralVideos: (viral.length > 0 ? viral : videos).slice(0, VIRAL_LIMIT),
        recommendedFormat: averageDurationSeconds === null ? null : formatFor(averageDurationSeconds)
    };
}

function formatFor(seconds: number): VideoFormat {
    if (seconds < 60) {
        return 'short';
    }
    if (seconds < 300) {
        return 'medium';
    }
    return 'long';
}

function mostCommon<T extends string | number>(values: readonly T[], limit: number): Array<Omit<ITermCount, 'term'> & { term: T }> {
    const counts = new Map<T, number>();
    for (const value of values) {
        counts.set(value, (counts.get(value) ?? 0) + 1);
    }
    return Array.from(counts, ([term, count]) => ({ term, count }))
        .sort((a, b) => b.count - a.count)
        .slice(0, limit);
}
