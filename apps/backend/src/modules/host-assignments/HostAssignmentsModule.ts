import type { Express } from 'express';
import type { ICacheService, IDatabaseService, IModule, IModuleMetadata } from '@event-suite/types';
import { logger } from '../../lib/logger.js';
import { HostAssignmentService } from './services/host-assignment.service.js';
import { HostAssignmentController } from './api/host-assignment.controller.js';
import { createHostAssignmentRouter } from './api/host-assignment.routes.js';

export interface IHostAssignmentsModuleDependencies {
    database: IDatabaseService;
    cacheService: ICacheService | null;
    app: Express;
}

/**
 * Host assignments module: single and bulk placement of members with hosts.
 */
export class HostAssignmentsModule implements IModule<IHostAssignmentsModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'host-assignments',
        name: 'Host Assignments',
        version: '1.0.0',
        description: 'Capacity-checked placement of members with hosts'
    };

    private app!: Express;
    private controller!: HostAssignmentController;

    private readonly logger = logger.child({ module: 'host-assignments' });

    async init(dependencies: IHostAssignmentsModuleDependencies): Promise<void> {
        this.app = dependencies.app;

        const service = new HostAssignmentService(dependencies.database, dependencies.cacheService, this.logger);
        await service.createIndexes();
        this.controller = new HostAssignmentController(service, this.logger);

        this.logger.info('Host assignments module initialized');
    }

    async run(): Promise<void> {
        this.app.use('/api/host-assignments', createHostAssignmentRouter(this.controller));
        this.logger.info('Host assignments router mounted at /api/host-assignments');
    }
}
