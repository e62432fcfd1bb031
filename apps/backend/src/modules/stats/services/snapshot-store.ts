import type { IDatabaseService, ILogger, ISnapshot, ISnapshotInput, ISnapshotMetrics, ISnapshotStore } from '@tubepulse/types';
import { SnapshotModel, type SnapshotFields } from '../../../database/models/snapshot-model.js';
import { KeyedLock } from '../../../lib/keyed-lock.js';
import { toStorageError, ValidationError } from '../../../lib/errors.js';

/**
 * Append-only, time-indexed storage of raw metric snapshots.
 *
 * Writes for one entity are serialised by a per-entity lock so the
 * "read latest, check ordering, insert" sequence cannot interleave. Each write
 * takes the next per-entity `sequence`, and the unique `(entityId, sequence)`
 * index rejects a concurrent duplicate instead of overwriting.
 *
 * Database access pattern:
 * Uses IDatabaseService for every MongoDB operation; failures surface as
 * StorageError so the stats facade can keep serving in-memory data.
 */
export class SnapshotStore implements ISnapshotStore {
    private readonly COLLECTION_NAME = 'snapshots';
    private readonly lock = new KeyedLock();

    /**
     * @param database - Database service
     * @param logger - Scoped logger
     * @param pageSize - Documents read per round trip by `range()`
     */
    constructor(
        private readonly database: IDatabaseService,
        private readonly logger: ILogger,
        private readonly pageSize = 500
    ) {
        this.database.registerModel(this.COLLECTION_NAME, SnapshotModel);
    }

    async record(input: ISnapshotInput): Promise<ISnapshot> {
        assertValidMetrics(input.metrics, input.entityId);
        if (Number.isNaN(input.capturedAt.getTime())) {
            throw new ValidationError('Snapshot timestamp is invalid', { entityId: input.entityId });
        }

        return await this.lock.run(input.entityId, async () => {
            const latest = await this.latestDocument(input.entityId);

            if (latest && input.capturedAt.getTime() < latest.capturedAt.getTime()) {
                throw new ValidationError('Snapshot is older than the latest recorded snapshot', {
                    entityId: input.entityId,
                    capturedAt: input.capturedAt.toISOString(),
                    latestCapturedAt: latest.capturedAt.toISOString()
                });
            }

            const doc: SnapshotFields = {
                entityId: input.entityId,
                entityType: input.entityType,
                capturedAt: input.capturedAt,
                sequence: (latest?.sequence ?? 0) + 1,
                viewCount: input.metrics.viewCount,
                likeCount: input.metrics.likeCount,
                commentCount: input.metrics.commentCount,
                ...(input.metrics.subscriberCount !== undefined ? { subscriberCount: input.metrics.subscriberCount } : {}),
                ...(input.metrics.videoCount !== undefined ? { videoCount: input.metrics.videoCount } : {})
            };

            try {
                await this.database.insertOne<SnapshotFields>(this.COLLECTION_NAME, { ...doc });
            } catch (error) {
                throw toStorageError(error, 'Failed to record snapshot', { entityId: input.entityId });
            }

            this.logger.debug({ entityId: input.entityId, sequence: doc.sequence }, 'Snapshot recorded');
            return toSnapshot(doc);
        });
    }

    async latest(entityId: string, before?: Date): Promise<ISnapshot | null> {
        const doc = await this.latestDocument(entityId, before);
        return doc ? toSnapshot(doc) : null;
    }

    /**
     * Lazy ascending sequence of snapshots with `from <= capturedAt < to`.
     *
     * Nothing is read until iteration starts. Pages are fetched by sequence
     * cursor, so each iteration is an independent, restartable scan.
     */
    range(entityId: string, from: Date, to: Date): AsyncIterable<ISnapshot> {
        const database = this.database;
        const collection = this.COLLECTION_NAME;
        const pageSize = this.pageSize;

        return {
            async *[Symbol.asyncIterator]() {
                if (from.getTime() >= to.getTime()) {
                    return;
                }

                let cursor = 0;
                while (true) {
                    let page: SnapshotFields[];
                    try {
                        page = await database.find<SnapshotFields>(
                            collection,
                            { entityId, capturedAt: { $gte: from, $lt: to }, sequence: { $gt: cursor } },
                            { sort: { sequence: 1 }, limit: pageSize }
                        );
                    } catch (error) {
                        throw toStorageError(error, 'Failed to read snapshot range', { entityId });
                    }

                    for (const doc of page) {
                        yield toSnapshot(doc);
                    }

                    const last = page.at(-1);
                    if (!last || page.length < pageSize) {
                        return;
                    }
                    cursor = last.sequence;
                }
            }
        };
    }

    async prune(olderThan: Date): Promise<number> {
        try {
            const removed = await this.database.deleteMany<SnapshotFields>(this.COLLECTION_NAME, {
                capturedAt: { $lt: olderThan }
            });
            this.logger.info({ removed, olderThan: olderThan.toISOString() }, 'Snapshots pruned');
            return removed;
        } catch (error) {
            throw toStorageError(error, 'Failed to prune snapshots');
        }
    }

    async count(): Promise<number> {
        try {
            return await this.database.count<SnapshotFields>(this.COLLECTION_NAME, {});
        } catch (error) {
            throw toStorageError(error, 'Failed to count snapshots');
        }
    }

    private async latestDocument(entityId: string, before?: Date): Promise<SnapshotFields | null> {
        try {
            return await this.database.findOne<SnapshotFields>(
                this.COLLECTION_NAME,
                before ? { entityId, capturedAt: { $lt: before } } : { entityId },
                { sort: { sequence: -1 } }
            );
        } catch (error) {
            throw toStorageError(error, 'Failed to read latest snapshot', { entityId });
        }
    }
}

function assertValidMetrics(metrics: ISnapshotMetrics, entityId: string): void {
    const counters: Array<[string, number | undefined]> = [
        ['viewCount', metrics.viewCount],
        ['likeCount', metrics.likeCount],
        ['commentCount', metrics.commentCount],
        ['subscriberCount', metrics.subscriberCount],
        ['videoCount', metrics.videoCount]
    ];

    for (const [name, value] of counters) {
        if (value === undefined) {
            continue;
        }
        if (!Number.isSafeInteger(value) || value < 0) {
            throw new ValidationError(`Snapshot ${name} must be a non-negative integer`, { entityId, [name]: value });
        }
    }
}

/**
 * Copy the public snapshot fields, dropping storage-only ones (`_id`, `sequence`).
 */
function toSnapshot(doc: SnapshotFields): ISnapshot {
    const snapshot: ISnapshot = {
        entityId: doc.entityId,
        entityType: doc.entityType,
        capturedAt: doc.capturedAt,
        viewCount: doc.viewCount,
        likeCount: doc.likeCount,
        commentCount: doc.commentCount
    };
    if (doc.subscriberCount !== undefined && doc.subscriberCount !== null) {
        snapshot.subscriberCount = doc.subscriberCount;
    }
    if (doc.videoCount !== undefined && doc.videoCount !== null) {
        snapshot.videoCount = doc.videoCount;
    }
    return snapshot;
}
