import type { ICacheService, IDatabaseService, ILogger, ISnapshotStore, IStatsService } from '@tubepulse/types';
import { SchedulerService } from '../services/scheduler.service.js';
import type { Aggregator } from '../modules/stats/services/aggregator.js';
import type { EntityRegistry } from '../modules/stats/services/entity-registry.js';
import { DAY_MS } from '../lib/dates.js';

export interface JobDependencies {
    database: IDatabaseService;
    stats: IStatsService;
    aggregator: Aggregator;
    registry: EntityRegistry;
    store: ISnapshotStore;
    cache: ICacheService;
    retentionDays: number;
    logger: ILogger;
    clock?: () => number;
}

/**
 * Register every scheduled job on a new scheduler. The caller starts it.
 *
 * - `stats:poll` every 20 minutes: fetch and snapshot every tracked entity
 * - `stats:aggregate` hourly: recompute yesterday and today
 * - `stats:prune` daily: drop snapshots past the retention period
 * - `cache:cleanup` hourly: remove expired cache entries
 */
export function createScheduler(deps: JobDependencies): SchedulerService {
    const clock = deps.clock ?? Date.now;
    const scheduler = new SchedulerService(deps.database, deps.logger.child({ module: 'scheduler' }));

    scheduler.register('stats:poll', '*/20 * * * *', async () => {
        await deps.stats.refreshTracked();
    });

    scheduler.register('stats:aggregate', '5 * * * *', async () => {
        const ids = deps.registry.list().map(entity => entity.entityId);
        await deps.aggregator.runScheduled(ids);
    });

    scheduler.register('stats:prune', '30 3 * * *', async () => {
        const cutoff = new Date(clock() - deps.retentionDays * DAY_MS);
        const removed = await deps.store.prune(cutoff);
        deps.logger.info({ removed, cutoff }, 'Pruned old snapshots');
    });

    scheduler.register('cache:cleanup', '0 * * * *', async () => {
        await deps.cache.clearExpired();
    });

    return scheduler;
}
