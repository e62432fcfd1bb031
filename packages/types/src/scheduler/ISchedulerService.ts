/**
 * Cron job handler. Async handlers are awaited before the run is recorded.
 */
export type CronJobHandler = () => Promise<void> | void;

/**
 * Runtime view of a registered job.
 */
export interface IScheduledJobConfig {
    name: string;
    schedule: string;
    enabled: boolean;
    defaultSchedule: string;
}

/**
 * Named cron scheduler with persisted, runtime-editable job configuration.
 *
 * Jobs are registered in code with a default schedule (`stats:aggregate`,
 * `cache:cleanup`, ...). On start the stored configuration for each job is
 * loaded, or created from the default, and enabled jobs are scheduled.
 * Every run is recorded with its duration and outcome; a failing handler is
 * logged and recorded but never stops the scheduler.
 */
export interface ISchedulerService {
    /**
     * Register a job. Registering after `start()` schedules it immediately.
     *
     * @param name - Unique job name, `{area}:{action}` by convention
     * @param defaultSchedule - node-cron expression used until reconfigured
     * @throws Error when the name is already registered
     */
    register(name: string, defaultSchedule: string, handler: CronJobHandler): void;

    start(): Promise<void>;

    updateJobConfig(jobName: string, updates: { schedule?: string; enabled?: boolean; updatedBy?: string }): Promise<void>;

    getAllJobConfigs(): IScheduledJobConfig[];

    stop(): void;
}
