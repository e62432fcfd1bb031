export { SnapshotStore } from './services/snapshot-store.js';
export { QuotaTracker, type QuotaTrackerOptions } from './services/quota-tracker.js';
export { forecastUsage } from './services/quota-forecast.js';
export { Aggregator, growthPercent } from './services/aggregator.js';
export { EntityRegistry, inferEntityType } from './services/entity-registry.js';
export { StatsService, type StatsServiceDependencies } from './services/stats.service.js';
export { YouTubeClient, type YouTubeClientOptions } from './upstream/youtube-client.js';
