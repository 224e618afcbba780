import type { Express } from 'express';
import type { IDatabaseService, IModule, IModuleMetadata } from '@event-suite/types';
import { logger } from '../../lib/logger.js';
import { VehicleSharingService } from './services/vehicle-sharing.service.js';
import { VehicleSharingController } from './api/vehicle-sharing.controller.js';
import { createVehicleSharingRouter } from './api/vehicle-sharing.routes.js';

export interface IVehicleSharingModuleDependencies {
    database: IDatabaseService;
    app: Express;
}

/**
 * Vehicle sharing module: carpool pairings between members.
 */
export class VehicleSharingModule implements IModule<IVehicleSharingModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'vehicle-sharing',
        name: 'Vehicle Sharing',
        version: '1.0.0',
        description: 'Carpool arrangements between registration members'
    };

    private app!: Express;
    private controller!: VehicleSharingController;

    private readonly logger = logger.child({ module: 'vehicle-sharing' });

    async init(dependencies: IVehicleSharingModuleDependencies): Promise<void> {
        this.app = dependencies.app;

        const service = new VehicleSharingService(dependencies.database, this.logger);
        await service.createIndexes();
        this.controller = new VehicleSharingController(service);

        this.logger.info('Vehicle sharing module initialized');
    }

    async run(): Promise<void> {
        this.app.use('/api/vehicle-sharing', createVehicleSharingRouter(this.controller));
        this.logger.info('Vehicle sharing router mounted at /api/vehicle-sharing');
    }
}
