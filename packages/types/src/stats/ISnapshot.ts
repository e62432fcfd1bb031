import type { EntityType } from './IEntity.js';

/**
 * Cumulative counters observed for an entity at one instant.
 *
 * Video snapshots fill the three engagement counters. Channel snapshots also
 * carry subscriber and video counts; channels expose no like or comment totals
 * upstream, so those are recorded as zero.
 */
export interface ISnapshotMetrics {
    viewCount: number;
    likeCount: number;
    commentCount: number;
    subscriberCount?: number;
    videoCount?: number;
}

/**
 * An immutable, append-only observation of an entity's counters.
 */
export interface ISnapshot extends ISnapshotMetrics {
    entityId: string;
    entityType: EntityType;
    capturedAt: Date;
}

export interface ISnapshotInput {
    entityId: string;
    entityType: EntityType;
    capturedAt: Date;
    metrics: ISnapshotMetrics;
}

/**
 * Time-indexed storage of raw snapshots.
 */
export interface ISnapshotStore {
    /**
     * Append a snapshot. Never overwrites an existing one.
     *
     * @throws ValidationError when `capturedAt` precedes the entity's latest snapshot
     * @throws StorageError when the write fails
     */
    record(input: ISnapshotInput): Promise<ISnapshot>;

    /**
     * Most recent snapshot for an entity, or null when none exists.
     *
     * @param before - Only consider snapshots captured strictly before this instant
     */
    latest(entityId: string, before?: Date): Promise<ISnapshot | null>;

    /**
     * Snapshots with `from <= capturedAt < to`, ascending.
     *
     * The sequence is lazy and restartable: each iteration re-reads storage page
     * by page, so it can be consumed more than once.
     */
    range(entityId: string, from: Date, to: Date): AsyncIterable<ISnapshot>;

    /**
     * Delete snapshots captured before `olderThan`.
     *
     * @returns Number of snapshots removed
     */
    prune(olderThan: Date): Promise<number>;

    count(): Promise<number>;
}
