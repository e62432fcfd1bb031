/**
 * Cacheable resource categories.
 *
 * Each kind maps to a TTL resolved once when configuration loads. Channel
 * statistics change slowest and live longest; video lists sit in the middle;
 * comment threads are the most volatile. Video counters, computed trends and
 * the trending chart carry their own TTLs.
 */
export type ResourceKind = 'channel_stats' | 'video_stats' | 'video_list' | 'comments' | 'trend' | 'trending';
