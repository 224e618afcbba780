/**
 * Database module implementation.
 *
 * Owns the core DatabaseService that every other module receives, and exposes
 * a protected diagnostic route listing the collections of the connected
 * database.
 */

import { Router } from 'express';
import type { Express, Request, Response } from 'express';
import type { Connection } from 'mongoose';
import type { IDatabaseService, ILogger, IModule, IModuleMetadata } from '@event-suite/types';
import { DatabaseService } from './services/database.service.js';
import { asyncHandler } from '../../api/middleware/async-handler.js';
import { requireAdmin } from '../../api/middleware/admin-auth.js';

/**
 * Database module dependencies for initialization.
 */
export interface IDatabaseModuleDependencies {
    /**
     * Root logger; the module derives a child bound to `module: 'database'`.
     */
    logger: ILogger;

    /**
     * Open mongoose connection whose native handle serves all queries.
     */
    connection: Connection;

    /**
     * Express application instance for mounting the diagnostic router.
     */
    app: Express;
}

/**
 * Database module for unified database access.
 *
 * ## Lifecycle
 *
 * ### init() phase:
 * - Creates the core DatabaseService instance
 *
 * ### run() phase:
 * - Mounts `GET /api/health/database/collections` behind the admin token
 *
 * Other modules obtain the service through `getDatabaseService()` once
 * `init()` has completed.
 */
export class DatabaseModule implements IModule<IDatabaseModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'database',
        name: 'Database',
        version: '1.0.0',
        description: 'MongoDB access shared by all modules'
    };

    private logger!: ILogger;
    private app!: Express;
    private databaseService!: DatabaseService;

    async init(dependencies: IDatabaseModuleDependencies): Promise<void> {
        this.logger = dependencies.logger.child({ module: this.metadata.id });
        this.app = dependencies.app;

        this.databaseService = new DatabaseService(this.logger, dependencies.connection);
        this.logger.info('Database module initialized');
    }

    async run(): Promise<void> {
        const router = Router();

        // GET /api/health/database/collections
        router.get(
            '/collections',
            requireAdmin,
            asyncHandler(async (_req: Request, res: Response) => {
                const collections = await this.databaseService.listCollections();
                res.json({ collections });
            })
        );

        this.app.use('/api/health/database', router);
        this.logger.info('Database diagnostics mounted at /api/health/database');
    }

    /**
     * Get the core database service instance.
     *
     * @throws Error if called before init()
     */
    getDatabaseService(): IDatabaseService {
        if (!this.databaseService) {
            throw new Error('DatabaseModule.init() must be called before getDatabaseService()');
        }
        return this.databaseService;
    }
}
