import type { Document, Filter, UpdateFilter } from 'mongodb';

/**
 * Options accepted by `IDatabaseService.find()`.
 */
export interface IFindOptions {
    sort?: Record<string, 1 | -1>;
    skip?: number;
    limit?: number;
}

/**
 * Options accepted by `IDatabaseService.createIndex()`.
 */
export interface ICreateIndexOptions {
    unique?: boolean;
    sparse?: boolean;
    name?: string;
}

/**
 * Database service interface providing collection-level access to MongoDB.
 *
 * Services depend on this interface rather than on mongoose or the driver, so
 * they can be exercised against an in-memory implementation in tests.
 *
 * Documents are identified by their own `id` field (a UUID). The `_id` the
 * driver adds is never returned: reads project it away and writes store a
 * copy of the caller's object.
 *
 * @example
 * ```typescript
 * await database.insertOne<IHost>('hosts', host);
 * const hosts = await database.find<IHost>('hosts', { eventId }, { sort: { name: 1 } });
 * await database.updateOne('hosts', { id: host.id }, { $set: { name: 'New name' } });
 * ```
 */
export interface IDatabaseService {
    /**
     * Find documents matching a filter.
     *
     * @param collectionName - Logical collection name
     * @param filter - MongoDB query filter
     * @param options - Sort, skip and limit
     * @returns Matching documents without `_id`
     */
    find<T extends Document = Document>(
        collectionName: string,
        filter: Filter<Document>,
        options?: IFindOptions
    ): Promise<T[]>;

    /**
     * Find the first document matching a filter.
     *
     * @returns The document, or null when nothing matches
     */
    findOne<T extends Document = Document>(
        collectionName: string,
        filter: Filter<Document>
    ): Promise<T | null>;

    /**
     * Count documents matching a filter.
     */
    count(collectionName: string, filter: Filter<Document>): Promise<number>;

    /**
     * Insert one document. The caller's object is not mutated.
     */
    insertOne<T extends Document = Document>(collectionName: string, document: T): Promise<void>;

    /**
     * Insert several documents in one round trip. An empty array is a no-op.
     */
    insertMany<T extends Document = Document>(collectionName: string, documents: readonly T[]): Promise<void>;

    /**
     * Update the first document matching a filter.
     *
     * @returns Number of matched documents (0 or 1)
     */
    updateOne(collectionName: string, filter: Filter<Document>, update: UpdateFilter<Document>): Promise<number>;

    /**
     * Update every document matching a filter.
     *
     * @returns Number of modified documents
     */
    updateMany(collectionName: string, filter: Filter<Document>, update: UpdateFilter<Document>): Promise<number>;

    /**
     * Delete the first document matching a filter.
     *
     * @returns True when a document was removed
     */
    deleteOne(collectionName: string, filter: Filter<Document>): Promise<boolean>;

    /**
     * Delete every document matching a filter.
     *
     * @returns Number of removed documents
     */
    deleteMany(collectionName: string, filter: Filter<Document>): Promise<number>;

    /**
     * Create an index if it does not exist yet. Safe to call on every start.
     */
    createIndex(
        collectionName: string,
        indexSpec: Record<string, 1 | -1>,
        options?: ICreateIndexOptions
    ): Promise<void>;

    /**
     * Names of the collections in the database, sorted.
     */
    listCollections(): Promise<string[]>;
}
