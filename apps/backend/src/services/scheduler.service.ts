import cron, { type ScheduledTask } from 'node-cron';
import { v4 as uuid } from 'uuid';
import type { CronJobHandler, IDatabaseService, ILogger, IScheduledJobConfig, ISchedulerService } from '@tubepulse/types';
import { SchedulerConfigModel, type ISchedulerConfig } from '../database/models/scheduler-config-model.js';
import { SchedulerExecutionModel, type ISchedulerExecution } from '../database/models/scheduler-execution-model.js';
import { NotFoundError, ValidationError } from '../lib/errors.js';

/**
 * RegisteredJob
 *
 * Internal representation of a scheduled job with its handler and active cron task.
 *
 * **Fields:**
 * - `name` - Unique job identifier (e.g., "stats:aggregate")
 * - `defaultSchedule` - Default cron expression from code registration
 * - `currentSchedule` - Active cron expression (may differ from default if admin changed it)
 * - `enabled` - Whether job is currently active
 * - `handler` - Async function to execute on schedule
 * - `task` - Active node-cron ScheduledTask (undefined if job is disabled)
 */
interface RegisteredJob {
    name: string;
    defaultSchedule: string;
    currentSchedule: string;
    enabled: boolean;
    handler: CronJobHandler;
    task?: ScheduledTask;
}

/**
 * Outcome of a single job run.
 */
export interface JobRunResult {
    jobName: string;
    status: 'success' | 'failed' | 'skipped';
    durationMs: number;
    error?: string;
}

/**
 * SchedulerService
 *
 * Centralized cron scheduler with dynamic reconfiguration support.
 * Jobs are registered during startup; runtime configuration (schedule,
 * enabled state) is loaded from MongoDB and can be changed without restart.
 *
 * **Key Features:**
 * - Dynamic rescheduling without restart (updateJobConfig)
 * - On-demand execution of a registered job (runNow)
 * - Execution tracking in MongoDB
 * - Overlap protection: a run is skipped while the previous one is still going
 *
 * A failing handler is logged and recorded; it never escapes into node-cron.
 *
 * @example
 * const scheduler = new SchedulerService(database, logger.child({ module: 'scheduler' }));
 * scheduler.register('stats:aggregate', '5 * * * *', async () => {
 *   await aggregator.runScheduled(ids);
 * });
 * await scheduler.start();
 */
export class SchedulerService implements ISchedulerService {
    private readonly CONFIG_COLLECTION = 'schedulerConfigs';
    private readonly EXECUTION_COLLECTION = 'schedulerExecutions';
    private readonly jobs = new Map<string, RegisteredJob>();
    private readonly runningJobs = new Set<string>();
    private started = false;

    /**
     * @param database - Database service for config and execution persistence
     * @param logger - Scoped logger
     */
    constructor(
        private readonly database: IDatabaseService,
        private readonly logger: ILogger
    ) {
        this.database.registerModel(this.CONFIG_COLLECTION, SchedulerConfigModel);
        this.database.registerModel(this.EXECUTION_COLLECTION, SchedulerExecutionModel);
    }

    /**
     * Registers a new scheduled job with default configuration.
     *
     * If the scheduler has already started, the job is scheduled immediately.
     *
     * @param name - Unique job identifier (e.g., "cache:cleanup")
     * @param defaultSchedule - Default node-cron expression
     * @param handler - Function to execute on schedule
     * @throws If the name is already registered or the expression is invalid
     */
    register(name: string, defaultSchedule: string, handler: CronJobHandler): void {
        if (this.jobs.has(name)) {
            throw new Error(`Job ${name} already registered`);
        }
        if (!cron.validate(defaultSchedule)) {
            throw new ValidationError(`Invalid cron expression for ${name}`, { schedule: defaultSchedule });
        }

        this.jobs.set(name, {
            name,
            defaultSchedule,
            currentSchedule: defaultSchedule,
            enabled: true,
            handler,
            task: undefined
        });

        if (this.started) {
            this.scheduleJobFromDatabase(name).catch((error: unknown) => {
                this.logger.error({ jobName: name, error }, 'Failed to schedule late-registered job');
            });
        }
    }

    /**
     * Starts all registered jobs by loading configuration from MongoDB
     * and scheduling enabled jobs.
     *
     * For each registered job:
     * 1. Check if configuration exists in MongoDB
     * 2. If not, create default config with defaultSchedule and enabled=true
     * 3. If config exists, use stored schedule and enabled state
     * 4. Schedule enabled jobs with node-cron
     */
    async start(): Promise<void> {
        for (const name of this.jobs.keys()) {
            await this.scheduleJobFromDatabase(name);
        }
        this.started = true;
    }

    /**
     * Run a registered job now, outside its schedule, with the same tracking
     * and overlap protection as a scheduled run.
     *
     * @throws NotFoundError if the job is not registered
     */
    async runNow(name: string): Promise<JobRunResult> {
        const job = this.jobs.get(name);
        if (!job) {
            throw new NotFoundError(`Job ${name} not registered`);
        }
        return await this.execute(job);
    }

    private async scheduleJobFromDatabase(name: string): Promise<void> {
        const job = this.jobs.get(name);
        if (!job) {
            this.logger.error({ jobName: name }, 'Attempted to schedule unknown job');
            return;
        }

        let config = await this.database.findOne<ISchedulerConfig>(this.CONFIG_COLLECTION, { jobName: name });

        if (!config) {
            config = {
                jobName: name,
                enabled: true,
                schedule: job.defaultSchedule,
                updatedAt: new Date()
            };
            await this.database.insertOne<ISchedulerConfig>(this.CONFIG_COLLECTION, config);
            this.logger.info(
                { jobName: name, schedule: job.defaultSchedule },
                'Created default scheduler config'
            );
        }

        job.currentSchedule = config.schedule;
        job.enabled = config.enabled;

        if (job.enabled) {
            this.scheduleJob(job);
            this.logger.info(
                { jobName: name, schedule: job.currentSchedule },
                `Scheduler job started: ${name}`
            );
        } else {
            this.logger.info({ jobName: name }, 'Scheduler job disabled (skipped)');
        }
    }

    private scheduleJob(job: RegisteredJob): void {
        job.task = cron.schedule(job.currentSchedule, async () => {
            await this.execute(job);
        });
    }

    /**
     * Execute a job with execution tracking.
     *
     * Creates a "running" record, runs the handler, then completes the record
     * with the outcome and duration. Persistence failures are logged and do not
     * affect the run.
     */
    private async execute(job: RegisteredJob): Promise<JobRunResult> {
        if (this.runningJobs.has(job.name)) {
            this.logger.warn(
                { jobName: job.name },
                `Scheduled Job Skipped: ${job.name} - previous execution still running`
            );
            return { jobName: job.name, status: 'skipped', durationMs: 0 };
        }

        this.runningJobs.add(job.name);
        const executionId = uuid();
        const started = Date.now();

        await this.recordExecution(() =>
            this.database.insertOne<ISchedulerExecution>(this.EXECUTION_COLLECTION, {
                executionId,
                jobName: job.name,
                startedAt: new Date(started),
                status: 'running',
                completedAt: null,
                duration: null,
                error: null
            })
        );

        this.logger.debug({ job: job.name }, `Scheduled Job Start: ${job.name}`);

        try {
            await job.handler();
            const duration = Date.now() - started;

            await this.recordExecution(() =>
                this.database.updateOne<ISchedulerExecution>(
                    this.EXECUTION_COLLECTION,
                    { executionId },
                    { $set: { completedAt: new Date(), duration, status: 'success' } }
                )
            );

            this.logger.info(
                { job: job.name, durationMs: duration, status: 'success' },
                `Scheduled Job Complete: ${job.name}`
            );
            return { jobName: job.name, status: 'success', durationMs: duration };
        } catch (error) {
            const duration = Date.now() - started;
            const errorMessage = error instanceof Error ? error.message : String(error);

            await this.recordExecution(() =>
                this.database.updateOne<ISchedulerExecution>(
                    this.EXECUTION_COLLECTION,
                    { executionId },
                    { $set: { completedAt: new Date(), duration, status: 'failed', error: errorMessage } }
                )
            );

            this.logger.error(
                { job: job.name, durationMs: duration, status: 'failed', error: errorMessage },
                `Scheduled Job Failed: ${job.name}`
            );
            return { jobName: job.name, status: 'failed', durationMs: duration, error: errorMessage };
        } finally {
            this.runningJobs.delete(job.name);
        }
    }

    private async recordExecution(write: () => Promise<unknown>): Promise<void> {
        try {
            await write();
        } catch (error) {
            this.logger.warn({ error }, 'Failed to persist scheduler execution record');
        }
    }

    /**
     * Updates job configuration and dynamically reschedules without restart.
     *
     * **Behavior:**
     * - If schedule changes: stops old cron task, starts new one with updated interval
     * - If enabled changes: starts or stops cron task accordingly
     * - If job is disabled and schedule changes: updates config but doesn't start task
     *
     * @throws NotFoundError if job name is not registered
     * @throws ValidationError if the new schedule is not a valid cron expression
     */
    async updateJobConfig(
        jobName: string,
        updates: { schedule?: string; enabled?: boolean; updatedBy?: string }
    ): Promise<void> {
        const job = this.jobs.get(jobName);
        if (!job) {
            throw new NotFoundError(`Job ${jobName} not registered`);
        }
        if (updates.schedule !== undefined && !cron.validate(updates.schedule)) {
            throw new ValidationError(`Invalid cron expression for ${jobName}`, { schedule: updates.schedule });
        }

        const updateDoc: Partial<ISchedulerConfig> = { updatedAt: new Date() };
        if (updates.schedule !== undefined) {
            updateDoc.schedule = updates.schedule;
        }
        if (updates.enabled !== undefined) {
            updateDoc.enabled = updates.enabled;
        }
        if (updates.updatedBy !== undefined) {
            updateDoc.updatedBy = updates.updatedBy;
        }

        await this.database.updateOne<ISchedulerConfig>(
            this.CONFIG_COLLECTION,
            { jobName },
            { $set: updateDoc },
            { upsert: true }
        );

        const scheduleChanged = updates.schedule !== undefined && updates.schedule !== job.currentSchedule;
        const enabledChanged = updates.enabled !== undefined && updates.enabled !== job.enabled;

        if (updates.schedule !== undefined) {
            job.currentSchedule = updates.schedule;
        }
        if (updates.enabled !== undefined) {
            job.enabled = updates.enabled;
        }

        if (scheduleChanged || enabledChanged) {
            if (job.task) {
                job.task.stop();
                job.task = undefined;
                this.logger.info({ jobName }, 'Stopped existing scheduler task');
            }

            if (job.enabled) {
                this.scheduleJob(job);
                this.logger.info(
                    { jobName, schedule: job.currentSchedule },
                    'Rescheduled job with new configuration'
                );
            } else {
                this.logger.warn({ jobName }, `Scheduler job disabled: ${jobName}`);
            }
        }
    }

    getAllJobConfigs(): IScheduledJobConfig[] {
        return Array.from(this.jobs.values()).map(job => ({
            name: job.name,
            schedule: job.currentSchedule,
            enabled: job.enabled,
            defaultSchedule: job.defaultSchedule
        }));
    }

    /**
     * Stops all running cron tasks.
     *
     * Called during graceful shutdown so jobs don't fire mid-restart.
     */
    stop(): void {
        this.jobs.forEach(job => {
            if (job.task) {
                job.task.stop();
                job.task = undefined;
            }
        });
        this.started = false;
        this.logger.info('All scheduler jobs stopped');
    }
}
