import type { Connection } from 'mongoose';
import type { Document, Filter, OptionalUnlessRequiredId, UpdateFilter } from 'mongodb';
import type { IDatabaseService, IFindOptions, IIndexedModel, ILogger, IUpdateResult } from '@tubepulse/types';

/**
 * Database service providing typed collection access for every backend component.
 *
 * Reads and writes go through the native driver collections of the mongoose
 * connection. Mongoose models are registered only for their schemas: they
 * declare collection names and indexes, which `ensureIndexes()` builds once
 * after connecting.
 *
 * The connection is injected so unit tests can supply one whose `db` is a fake,
 * and so the service never reaches for the global mongoose instance.
 *
 * @example
 * ```typescript
 * const database = new DatabaseService(logger.child({ module: 'database' }), mongoose.connection);
 * database.registerModel('snapshots', SnapshotModel);
 * await database.ensureIndexes();
 * const latest = await database.findOne<SnapshotFields>('snapshots', { entityId }, { sort: { capturedAt: -1 } });
 * ```
 */
export class DatabaseService implements IDatabaseService {
    private readonly models = new Map<string, IIndexedModel>();

    /**
     * @param logger - Scoped logger
     * @param connection - Mongoose connection whose native database is used
     */
    constructor(
        private readonly logger: ILogger,
        private readonly connection: Connection
    ) {}

    /**
     * Register a schema model. Registering the same collection twice keeps the
     * first model, so services can register in their constructors.
     */
    registerModel(collectionName: string, model: IIndexedModel): void {
        if (this.models.has(collectionName)) {
            return;
        }
        this.models.set(collectionName, model);
    }

    async ensureIndexes(): Promise<void> {
        for (const [collectionName, model] of this.models) {
            await model.syncIndexes();
            this.logger.debug({ collectionName, model: model.modelName }, 'Indexes synchronized');
        }
    }

    async count<T extends Document = Document>(collectionName: string, filter: Filter<T>): Promise<number> {
        return await this.collection<T>(collectionName).countDocuments(filter);
    }

    async find<T extends Document = Document>(
        collectionName: string,
        filter: Filter<T>,
        options: IFindOptions = {}
    ): Promise<T[]> {
        let cursor = this.collection<T>(collectionName).find(filter);

        if (options.sort) {
            cursor = cursor.sort(options.sort);
        }
        if (options.skip) {
            cursor = cursor.skip(options.skip);
        }
        if (options.limit) {
            cursor = cursor.limit(options.limit);
        }

        return (await cursor.toArray()) as T[];
    }

    async findOne<T extends Document = Document>(
        collectionName: string,
        filter: Filter<T>,
        options: Pick<IFindOptions, 'sort'> = {}
    ): Promise<T | null> {
        const collection = this.collection<T>(collectionName);
        const doc = options.sort
            ? await collection.findOne(filter, { sort: options.sort })
            : await collection.findOne(filter);
        return doc as T | null;
    }

    async insertOne<T extends Document = Document>(
        collectionName: string,
        document: OptionalUnlessRequiredId<T>
    ): Promise<void> {
        await this.collection<T>(collectionName).insertOne(document);
    }

    async updateOne<T extends Document = Document>(
        collectionName: string,
        filter: Filter<T>,
        update: UpdateFilter<T>,
        options: { upsert?: boolean } = {}
    ): Promise<IUpdateResult> {
        const result = await this.collection<T>(collectionName).updateOne(filter, update, { upsert: options.upsert ?? false });
        return {
            matched: result.matchedCount,
            upserted: result.upsertedCount > 0
        };
    }

    async deleteMany<T extends Document = Document>(collectionName: string, filter: Filter<T>): Promise<number> {
        const result = await this.collection<T>(collectionName).deleteMany(filter);
        return result.deletedCount;
    }

    /**
     * Native driver collection for a name.
     *
     * @throws Error if the connection has not been established
     */
    private collection<T extends Document>(name: string) {
        const db = this.connection.db;
        if (!db) {
            throw new Error('MongoDB connection not established');
        }
        return db.collection<T>(name);
    }
}
