import type { Document, Filter, OptionalUnlessRequiredId, UpdateFilter } from 'mongodb';

/**
 * Sort, paging and limit options accepted by collection reads.
 */
export interface IFindOptions {
    sort?: Record<string, 1 | -1>;
    skip?: number;
    limit?: number;
}

/**
 * Outcome of a single-document update.
 */
export interface IUpdateResult {
    /** Documents matched by the filter (0 or 1). */
    matched: number;
    /** True when the update inserted a new document. */
    upserted: boolean;
}

/**
 * A schema-bearing model whose indexes the database service keeps in sync.
 *
 * Mongoose models satisfy this shape; the service only needs the name for
 * logging and the ability to build the declared indexes.
 */
export interface IIndexedModel {
    readonly modelName: string;
    syncIndexes(): Promise<unknown>;
}

/**
 * Database access contract for MongoDB collections.
 *
 * Every persistent component (snapshot store, aggregator, cache, quota history,
 * scheduler) talks to MongoDB through this interface rather than through
 * Mongoose models directly. Production wires `DatabaseService` over the live
 * connection; tests wire an in-memory implementation with the same filter
 * semantics for the operators the backend uses (`$gte`, `$gt`, `$lt`, `$lte`,
 * `$in`, `$ne`).
 */
export interface IDatabaseService {
    /**
     * Register a schema model so its indexes are created by `ensureIndexes()`.
     *
     * @param collectionName - Collection the model is bound to
     * @param model - Model declaring the collection's indexes
     */
    registerModel(collectionName: string, model: IIndexedModel): void;

    /**
     * Build the indexes of every registered model. Called once after connecting.
     */
    ensureIndexes(): Promise<void>;

    count<T extends Document = Document>(collectionName: string, filter: Filter<T>): Promise<number>;

    find<T extends Document = Document>(
        collectionName: string,
        filter: Filter<T>,
        options?: IFindOptions
    ): Promise<T[]>;

    /**
     * Find the first document matching the filter, honouring an optional sort so
     * callers can ask for "the latest" or "the earliest" in one round trip.
     */
    findOne<T extends Document = Document>(
        collectionName: string,
        filter: Filter<T>,
        options?: Pick<IFindOptions, 'sort'>
    ): Promise<T | null>;

    insertOne<T extends Document = Document>(
        collectionName: string,
        document: OptionalUnlessRequiredId<T>
    ): Promise<void>;

    updateOne<T extends Document = Document>(
        collectionName: string,
        filter: Filter<T>,
        update: UpdateFilter<T>,
        options?: { upsert?: boolean }
    ): Promise<IUpdateResult>;

    /**
     * Delete every document matching the filter.
     *
     * @returns Number of documents removed
     */
    deleteMany<T extends Document = Document>(collectionName: string, filter: Filter<T>): Promise<number>;
}
