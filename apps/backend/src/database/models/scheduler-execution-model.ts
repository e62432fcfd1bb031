import mongoose, { Schema, Document } from 'mongoose';

export type SchedulerExecutionStatus = 'running' | 'success' | 'failed';

/**
 * One run of a cron job, written when the run starts and completed when it ends.
 */
export interface ISchedulerExecution {
    executionId: string;
    jobName: string;
    startedAt: Date;
    completedAt: Date | null;
    duration: number | null;
    status: SchedulerExecutionStatus;
    error: string | null;
}

export type SchedulerExecutionDoc = Document & ISchedulerExecution;

const schedulerExecutionSchema = new Schema<SchedulerExecutionDoc>(
    {
        executionId: {
            type: String,
            required: true,
            unique: true
        },
        jobName: {
            type: String,
            required: true,
            index: true
        },
        startedAt: {
            type: Date,
            required: true
        },
        completedAt: {
            type: Date,
            default: null
        },
        duration: {
            type: Number,
            default: null
        },
        status: {
            type: String,
            enum: ['running', 'success', 'failed'],
            required: true,
            default: 'running'
        },
        error: {
            type: String,
            default: null
        }
    },
    {
        collection: 'schedulerExecutions',
        timestamps: false
    }
);

// TTL index to auto-delete execution records older than 30 days
schedulerExecutionSchema.index({ startedAt: 1 }, { expireAfterSeconds: 30 * 24 * 60 * 60 });

export const SchedulerExecutionModel = mongoose.model<SchedulerExecutionDoc>(
    'SchedulerExecution',
    schedulerExecutionSchema
);
