import type { EntityType, IDatabaseService, ILogger, INewTrackedEntity, ITrackedEntity } from '@tubepulse/types';
import { TrackedEntityModel } from '../../../database/models/tracked-entity-model.js';
import { ValidationError } from '../../../lib/errors.js';

const CHANNEL_ID_PATTERN = /^UC[A-Za-z0-9_-]{22}$/;
const VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]{11}$/;

/**
 * Guess an entity's type from the shape of its id.
 *
 * Channel ids are 24 characters starting with `UC`; video ids are 11
 * characters. Anything else is treated as a channel.
 */
export function inferEntityType(entityId: string): EntityType {
    if (CHANNEL_ID_PATTERN.test(entityId)) {
        return 'channel';
    }
    return VIDEO_ID_PATTERN.test(entityId) ? 'video' : 'channel';
}

/**
 * Registry of the channels and videos the bot tracks.
 *
 * MongoDB holds the records; an in-memory copy, refreshed by `load()` and
 * every mutation, answers the synchronous lookups the stats facade needs per
 * request (`typeOf`, `displayNameOf`).
 */
export class EntityRegistry {
    private readonly COLLECTION_NAME = 'trackedEntities';
    private readonly entities = new Map<string, ITrackedEntity>();

    constructor(
        private readonly database: IDatabaseService,
        private readonly logger: ILogger,
        private readonly clock: () => number = Date.now
    ) {
        this.database.registerModel(this.COLLECTION_NAME, TrackedEntityModel);
    }

    /**
     * Insert configured entities that are not known yet. Existing records,
     * including deactivated ones, are left untouched.
     *
     * @returns Number of entities inserted
     */
    async seed(entries: readonly INewTrackedEntity[]): Promise<number> {
        let inserted = 0;
        for (const entry of entries) {
            const now = new Date(this.clock());
            const result = await this.database.updateOne<ITrackedEntity>(
                this.COLLECTION_NAME,
                { entityId: entry.entityId },
                {
                    $setOnInsert: {
                        entityId: entry.entityId,
                        entityType: entry.entityType,
                        displayName: entry.displayName,
                        platform: 'youtube',
                        ...(entry.handle ? { handle: entry.handle } : {}),
                        active: true,
                        createdAt: now,
                        updatedAt: now
                    }
                },
                { upsert: true }
            );
            if (result.upserted) {
                inserted += 1;
            }
        }

        await this.load();
        if (inserted > 0) {
            this.logger.info({ inserted }, 'Seeded tracked entities');
        }
        return inserted;
    }

    async load(): Promise<void> {
        const docs = await this.database.find<ITrackedEntity>(this.COLLECTION_NAME, {}, { sort: { createdAt: 1 } });
        this.entities.clear();
        for (const doc of docs) {
            this.entities.set(doc.entityId, toEntity(doc));
        }
    }

    list(activeOnly = true): ITrackedEntity[] {
        const all = Array.from(this.entities.values());
        return activeOnly ? all.filter(entity => entity.active) : all;
    }

    get(entityId: string): ITrackedEntity | null {
        return this.entities.get(entityId) ?? null;
    }

    typeOf(entityId: string): EntityType {
        return this.entities.get(entityId)?.entityType ?? inferEntityType(entityId);
    }

    displayNameOf(entityId: string): string | undefined {
        return this.entities.get(entityId)?.displayName;
    }

    /**
     * Find an entity by id, handle (with or without `@`) or display name,
     * case-insensitively for names and handles.
     */
    resolve(query: string): ITrackedEntity | null {
        const needle = query.trim();
        if (!needle) {
            return null;
        }

        const byId = this.entities.get(needle);
        if (byId) {
            return byId;
        }

        const lowered = needle.toLowerCase();
        const handle = lowered.startsWith('@') ? lowered : `@${lowered}`;
        for (const entity of this.entities.values()) {
            if (entity.handle?.toLowerCase() === handle || entity.displayName.toLowerCase() === lowered) {
                return entity;
            }
        }
        return null;
    }

    /**
     * Start tracking an entity, reactivating it if it was removed before.
     *
     * @throws ValidationError when the id is empty
     */
    async add(entry: INewTrackedEntity): Promise<ITrackedEntity> {
        if (!entry.entityId.trim()) {
            throw new ValidationError('Entity id is required');
        }

        const now = new Date(this.clock());
        await this.database.updateOne<ITrackedEntity>(
            this.COLLECTION_NAME,
            { entityId: entry.entityId },
            {
                $set: { active: true, updatedAt: now },
                $setOnInsert: {
                    entityId: entry.entityId,
                    entityType: entry.entityType,
                    displayName: entry.displayName,
                    platform: 'youtube',
                    ...(entry.handle ? { handle: entry.handle } : {}),
                    createdAt: now
                }
            },
            { upsert: true }
        );

        await this.load();
        const entity = this.entities.get(entry.entityId);
        if (!entity) {
            throw new Error(`Tracked entity ${entry.entityId} missing after upsert`);
        }
        this.logger.info({ entityId: entity.entityId, entityType: entity.entityType }, 'Tracked entity added');
        return entity;
    }

    /**
     * Stop tracking an entity. Its snapshots and aggregates are kept.
     *
     * @returns false when the entity is unknown or already inactive
     */
    async deactivate(entityId: string): Promise<boolean> {
        const result = await this.database.updateOne<ITrackedEntity>(
            this.COLLECTION_NAME,
            { entityId, active: true },
            { $set: { active: false, updatedAt: new Date(this.clock()) } }
        );

        if (result.matched === 0) {
            return false;
        }
        await this.load();
        this.logger.info({ entityId }, 'Tracked entity deactivated');
        return true;
    }

    /**
     * Refresh the display name from an upstream re-fetch. No write when unchanged
     * or when the entity is not tracked.
     */
    async recordDisplayName(entityId: string, displayName: string): Promise<void> {
        const entity = this.entities.get(entityId);
        if (!entity || !displayName || entity.displayName === displayName) {
            return;
        }

        const updatedAt = new Date(this.clock());
        await this.database.updateOne<ITrackedEntity>(
            this.COLLECTION_NAME,
            { entityId },
            { $set: { displayName, updatedAt } }
        );
        this.entities.set(entityId, { ...entity, displayName, updatedAt });
    }
}

function toEntity(doc: ITrackedEntity): ITrackedEntity {
    return {
        entityId: doc.entityId,
        entityType: doc.entityType,
        displayName: doc.displayName,
        platform: doc.platform,
        ...(doc.handle ? { handle: doc.handle } : {}),
        active: doc.active,
        createdAt: doc.createdAt,
        updatedAt: doc.updatedAt
    };
}
