import mongoose, { Schema, Document } from 'mongoose';

/**
 * Persisted runtime configuration of one cron job.
 *
 * Created from the job's default schedule the first time the job is seen, then
 * edited through `SchedulerService.updateJobConfig()`.
 */
export interface ISchedulerConfig {
    jobName: string;
    enabled: boolean;
    schedule: string;
    updatedAt: Date;
    updatedBy?: string;
}

export type SchedulerConfigDoc = Document & ISchedulerConfig;

const schedulerConfigSchema = new Schema<SchedulerConfigDoc>(
    {
        jobName: {
            type: String,
            required: true,
            unique: true
        },
        enabled: {
            type: Boolean,
            required: true,
            default: true
        },
        schedule: {
            type: String,
            required: true
        },
        updatedAt: {
            type: Date,
            default: Date.now
        },
        updatedBy: {
            type: String,
            required: false
        }
    },
    {
        collection: 'schedulerConfigs',
        timestamps: false
    }
);

export const SchedulerConfigModel = mongoose.model<SchedulerConfigDoc>(
    'SchedulerConfig',
    schedulerConfigSchema
);
