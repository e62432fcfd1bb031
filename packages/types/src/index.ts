export type { ILogger } from './logging/ILogger.js';
export type { IDatabaseService, IFindOptions, IIndexedModel, IUpdateResult } from './database/IDatabaseService.js';
export type { IKeyValueStore } from './cache/IKeyValueStore.js';
export type { ICacheService, ICacheStats, ICacheKindStats } from './services/ICacheService.js';
export type { CronJobHandler, ISchedulerService, IScheduledJobConfig } from './scheduler/ISchedulerService.js';
export type { ResourceKind } from './stats/ResourceKind.js';
export type { EntityType, IEntityRef, ITrackedEntity, INewTrackedEntity } from './stats/IEntity.js';
export type { ISnapshot, ISnapshotInput, ISnapshotMetrics, ISnapshotStore } from './stats/ISnapshot.js';
export type { IDailyAggregate, IEntitySummary, IBestDay, IStatsSummary } from './stats/IDailyAggregate.js';
export type { ITrend, TrendComputation } from './stats/ITrend.js';
export type {
    IQuotaTracker,
    IQuotaStatus,
    IQuotaWindow,
    IQuotaForecastDay,
    QuotaForecast,
    QuotaTrendDirection
} from './stats/IQuotaTracker.js';
export type {
    IMetricsUpstream,
    IUpstreamEntityStats,
    IUpstreamCosts,
    IVideoSummary,
    ITrendingVideo,
    ICommentSummary
} from './stats/IMetricsUpstream.js';
export type {
    ICategoryStats,
    ITermCount,
    IHourCount,
    VideoFormat,
    ITrendingAnalysis,
    TrendingResult,
    ITopVideo,
    ITopChannel,
    ITopContent
} from './stats/ITrending.js';
export type {
    IStatsService,
    IStatsStatus,
    ICurrentStats,
    CurrentStatsResult,
    TrendResult,
    ListingResult,
    FreshSource,
    StaleReason
} from './stats/IStatsService.js';
