import type { Express } from 'express';
import type { ICacheService, IDatabaseService, IModule, IModuleMetadata } from '@event-suite/types';
import { logger } from '../../lib/logger.js';
import { DashboardService } from './services/dashboard.service.js';
import { DashboardController } from './api/dashboard.controller.js';
import { createDashboardRouter } from './api/dashboard.routes.js';

export interface IDashboardModuleDependencies {
    database: IDatabaseService;
    /**
     * Redis-backed cache for computed dashboards; null disables caching.
     */
    cacheService: ICacheService | null;
    /**
     * Lifetime of a cached dashboard.
     */
    cacheTtlSeconds: number;
    app: Express;
}

/**
 * Dashboard module: organiser overview of an event.
 */
export class DashboardModule implements IModule<IDashboardModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'dashboard',
        name: 'Dashboard',
        version: '1.0.0',
        description: 'Daily participant lists and statistics per event'
    };

    private app!: Express;
    private controller!: DashboardController;

    private readonly logger = logger.child({ module: 'dashboard' });

    async init(dependencies: IDashboardModuleDependencies): Promise<void> {
        this.app = dependencies.app;

        const service = new DashboardService(
            dependencies.database,
            dependencies.cacheService,
            this.logger,
            dependencies.cacheTtlSeconds
        );
        this.controller = new DashboardController(service);

        this.logger.info({ cached: dependencies.cacheService !== null }, 'Dashboard module initialized');
    }

    async run(): Promise<void> {
        this.app.use('/api/dashboard', createDashboardRouter(this.controller));
        this.logger.info('Dashboard router mounted at /api/dashboard');
    }
}
