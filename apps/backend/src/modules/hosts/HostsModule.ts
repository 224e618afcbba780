import type { Express } from 'express';
import type { ICacheService, IDatabaseService, IModule, IModuleMetadata } from '@event-suite/types';
import { logger } from '../../lib/logger.js';
import { HostService } from './services/host.service.js';
import { HostController } from './api/host.controller.js';
import { createHostRouter } from './api/host.routes.js';

export interface IHostsModuleDependencies {
    database: IDatabaseService;
    cacheService: ICacheService | null;
    app: Express;
}

/**
 * Hosts module: local housing providers per event day.
 */
export class HostsModule implements IModule<IHostsModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'hosts',
        name: 'Hosts',
        version: '1.0.0',
        description: 'Housing providers and their capacity per event day'
    };

    private app!: Express;
    private controller!: HostController;

    private readonly logger = logger.child({ module: 'hosts' });

    async init(dependencies: IHostsModuleDependencies): Promise<void> {
        this.app = dependencies.app;

        const hostService = new HostService(dependencies.database, dependencies.cacheService, this.logger);
        await hostService.createIndexes();
        this.controller = new HostController(hostService, this.logger);

        this.logger.info('Hosts module initialized');
    }

    async run(): Promise<void> {
        this.app.use('/api/hosts', createHostRouter(this.controller));
        this.logger.info('Hosts router mounted at /api/hosts');
    }
}
