import type { Connection } from 'mongoose';
import type { Collection, Document, Filter, UpdateFilter } from 'mongodb';
import type { ICreateIndexOptions, IDatabaseService, IFindOptions, ILogger } from '@event-suite/types';

/**
 * Projection applied to every read so the driver's ObjectId never reaches
 * callers; documents are addressed by their own `id` field.
 */
const WITHOUT_OBJECT_ID = { _id: 0 } as const;

/**
 * Database service providing collection-level MongoDB access to every module.
 *
 * Uses the native driver collections behind the shared mongoose connection, so
 * the pool configured in `connectDatabase()` serves all queries. Services only
 * see `IDatabaseService`, which keeps them testable against the in-memory
 * implementation in `tests/vitest/mocks`.
 *
 * @example
 * ```typescript
 * import mongoose from 'mongoose';
 * const database = new DatabaseService(logger, mongoose.connection);
 * const days = await database.find<IEventDay>('event_days', { eventId }, { sort: { eventDate: 1 } });
 * ```
 */
export class DatabaseService implements IDatabaseService {
    /**
     * @param logger - Logger scoped to the database module
     * @param connection - Mongoose connection whose `db` handle is used for queries
     */
    constructor(
        private readonly logger: ILogger,
        private readonly connection: Connection
    ) {}

    /**
     * Resolve a native collection.
     *
     * @throws Error if the mongoose connection has not been opened yet
     */
    private getCollection(name: string): Collection<Document> {
        const db = this.connection.db;
        if (!db) {
            throw new Error('MongoDB connection not established');
        }
        return db.collection(name);
    }

    async find<T extends Document = Document>(
        collectionName: string,
        filter: Filter<Document>,
        options?: IFindOptions
    ): Promise<T[]> {
        let cursor = this.getCollection(collectionName).find(filter).project<T>(WITHOUT_OBJECT_ID);

        if (options?.sort) {
            cursor = cursor.sort(options.sort);
        }
        if (options?.skip) {
            cursor = cursor.skip(options.skip);
        }
        if (options?.limit) {
            cursor = cursor.limit(options.limit);
        }

        return await cursor.toArray();
    }

    async findOne<T extends Document = Document>(collectionName: string, filter: Filter<Document>): Promise<T | null> {
        return await this.getCollection(collectionName).findOne<T>(filter, { projection: WITHOUT_OBJECT_ID });
    }

    async count(collectionName: string, filter: Filter<Document>): Promise<number> {
        return await this.getCollection(collectionName).countDocuments(filter);
    }

    async insertOne<T extends Document = Document>(collectionName: string, document: T): Promise<void> {
        // The driver writes `_id` into the object it is given
        await this.getCollection(collectionName).insertOne({ ...document });
    }

    async insertMany<T extends Document = Document>(collectionName: string, documents: readonly T[]): Promise<void> {
        if (documents.length === 0) {
            return;
        }
        await this.getCollection(collectionName).insertMany(documents.map(document => ({ ...document })));
    }

    async updateOne(collectionName: string, filter: Filter<Document>, update: UpdateFilter<Document>): Promise<number> {
        const result = await this.getCollection(collectionName).updateOne(filter, update);
        return result.matchedCount;
    }

    async updateMany(collectionName: string, filter: Filter<Document>, update: UpdateFilter<Document>): Promise<number> {
        const result = await this.getCollection(collectionName).updateMany(filter, update);
        return result.modifiedCount;
    }

    async deleteOne(collectionName: string, filter: Filter<Document>): Promise<boolean> {
        const result = await this.getCollection(collectionName).deleteOne(filter);
        return result.deletedCount > 0;
    }

    async deleteMany(collectionName: string, filter: Filter<Document>): Promise<number> {
        const result = await this.getCollection(collectionName).deleteMany(filter);
        return result.deletedCount;
    }

    async createIndex(
        collectionName: string,
        indexSpec: Record<string, 1 | -1>,
        options?: ICreateIndexOptions
    ): Promise<void> {
        await this.getCollection(collectionName).createIndex(indexSpec, options ?? {});
        this.logger.debug({ collection: collectionName, indexSpec }, 'Ensured collection index');
    }

    async listCollections(): Promise<string[]> {
        const db = this.connection.db;
        if (!db) {
            throw new Error('MongoDB connection not established');
        }
        const collections = await db.listCollections({}, { nameOnly: true }).toArray();
        return collections.map(collection => collection.name).sort();
    }
}
