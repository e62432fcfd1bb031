/**
 * @fileoverview Application entry point.
 *
 * Startup runs in two phases. Init connects infrastructure and builds every
 * service; nothing is exposed yet. Run builds indexes, seeds tracked
 * channels, starts the scheduler and finally opens the HTTP port. A failure
 * in either phase exits before partial state is served.
 *
 * @module index
 */

import http from 'node:http';
import type { Connection } from 'mongoose';
import type { IKeyValueStore } from '@tubepulse/types';
import { env } from './config/env.js';
import { buildStatsConfig } from './config/stats.js';
import { parseTrackedChannels } from './config/channels.js';
import { connectDatabase, disconnectDatabase } from './loaders/database.js';
import { connectRedis, disconnectRedis } from './loaders/redis.js';
import { createExpressApp } from './loaders/express.js';
import { logger } from './lib/logger.js';
import { httpClient } from './lib/http-client.js';
import { DatabaseService } from './modules/database/index.js';
import { CacheService } from './services/cache.service.js';
import { MemoryKeyValueStore } from './services/key-value/memory-key-value-store.js';
import { RedisKeyValueStore } from './services/key-value/redis-key-value-store.js';
import type { SchedulerService } from './services/scheduler.service.js';
import { createScheduler } from './jobs/index.js';
import {
    Aggregator,
    EntityRegistry,
    QuotaTracker,
    SnapshotStore,
    StatsService,
    YouTubeClient
} from './modules/stats/index.js';
import { StatsController } from './modules/stats/api/stats.controller.js';
import {
    CommandHandler,
    RequestLimiter,
    TelegramClient,
    createWebhookHandler
} from './modules/telegram-bot/index.js';

/**
 * Everything the init phase produces for the run phase.
 */
interface BootstrapContext {
    server: http.Server;
    database: DatabaseService;
    registry: EntityRegistry;
    scheduler: SchedulerService | null;
}

/**
 * Main application entry point. Registers SIGINT/SIGTERM handlers for
 * graceful shutdown.
 */
async function bootstrap(): Promise<void> {
    try {
        const ctx = await bootstrapInit();
        await bootstrapRun(ctx);

        const shutdown = async (signal: string) => {
            logger.info({ signal }, 'Shutting down');
            ctx.scheduler?.stop();
            ctx.server.close();
            await disconnectRedis();
            await disconnectDatabase();
            process.exit(0);
        };

        process.once('SIGINT', () => void shutdown('SIGINT'));
        process.once('SIGTERM', () => void shutdown('SIGTERM'));
    } catch (error) {
        logger.error({ error }, 'Failed to bootstrap application');
        process.exit(1);
    }
}

void bootstrap();

/**
 * Init phase: connect MongoDB and the key-value tier, build services, mount routes.
 *
 * @throws If a connection fails or configuration is invalid
 */
async function bootstrapInit(): Promise<BootstrapContext> {
    const config = buildStatsConfig(env);

    const connection: Connection = await connectDatabase();
    const redis = await connectRedis();
    const keyValue: IKeyValueStore = redis ? new RedisKeyValueStore(redis) : new MemoryKeyValueStore();

    const database = new DatabaseService(logger.child({ module: 'database' }), connection);
    const cache = new CacheService(keyValue, database, config.cacheTtlSeconds, logger.child({ module: 'cache' }));
    const store = new SnapshotStore(database, logger.child({ module: 'snapshots' }), config.snapshotPageSize);
    const quota = new QuotaTracker(keyValue, database, config.quota, logger.child({ module: 'quota' }));
    const aggregator = new Aggregator(store, database, logger.child({ module: 'aggregator' }));
    const registry = new EntityRegistry(database, logger.child({ module: 'registry' }));
    const upstream = new YouTubeClient(
        httpClient,
        { apiKey: env.YOUTUBE_API_KEY, baseUrl: env.YOUTUBE_API_BASE_URL, timeoutMs: config.upstreamTimeoutMs },
        logger.child({ module: 'youtube' })
    );

    const stats = new StatsService({
        store,
        cache,
        quota,
        upstream,
        aggregator,
        registry,
        config,
        logger: logger.child({ module: 'stats' })
    });

    const scheduler = env.ENABLE_SCHEDULER
        ? createScheduler({
            database,
            stats,
            aggregator,
            registry,
            store,
            cache,
            retentionDays: config.retentionDays,
            logger
        })
        : null;

    const telegramLogger = logger.child({ module: 'telegram' });
    const commandHandler = new CommandHandler(
        stats,
        registry,
        new RequestLimiter(keyValue, {
            dailyLimit: env.USER_DAILY_REQUEST_LIMIT,
            cooldownSeconds: env.USER_REQUEST_COOLDOWN_SECONDS,
            adminId: env.ADMIN_TELEGRAM_ID
        }),
        { adminId: env.ADMIN_TELEGRAM_ID, defaultWindowDays: 7, maxWindowDays: config.maxTrendWindowDays },
        telegramLogger
    );
    const telegram = new TelegramClient(httpClient, env.TELEGRAM_BOT_TOKEN, telegramLogger);

    const app = createExpressApp({
        statsController: new StatsController(stats, scheduler),
        telegramWebhook: createWebhookHandler(commandHandler, telegram, telegramLogger, {
            allowedIps: env.TELEGRAM_ALLOWED_IPS,
            webhookSecret: env.TELEGRAM_WEBHOOK_SECRET
        }),
        adminToken: env.ADMIN_API_TOKEN
    });

    return {
        server: http.createServer(app),
        database,
        registry,
        scheduler
    };
}

/**
 * Run phase: indexes, seed data, scheduler, then the HTTP listener.
 */
async function bootstrapRun(ctx: BootstrapContext): Promise<void> {
    await ctx.database.ensureIndexes();
    await ctx.registry.seed(parseTrackedChannels(env.TRACKED_CHANNELS));
    logger.info({ tracked: ctx.registry.list().length }, 'Tracked entities loaded');

    if (ctx.scheduler) {
        await ctx.scheduler.start();
        logger.info('Scheduler started with configuration from MongoDB');
    } else {
        logger.warn('Scheduler disabled by configuration');
    }

    ctx.server.listen(env.PORT, () => {
        logger.info({ port: env.PORT }, 'Server listening');
    });
}
