import type { Express } from 'express';
import type { IDatabaseService, IModule, IModuleMetadata } from '@event-suite/types';
import { logger } from '../../lib/logger.js';
import { EventService } from './services/event.service.js';
import { EventController } from './api/event.controller.js';
import { createEventRouter } from './api/event.routes.js';

export interface IEventsModuleDependencies {
    database: IDatabaseService;
    app: Express;
}

/**
 * Events module: events and their event days.
 *
 * init() creates the service and indexes; run() mounts /api/events.
 */
export class EventsModule implements IModule<IEventsModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'events',
        name: 'Events',
        version: '1.0.0',
        description: 'Multi-day events and their event days'
    };

    private app!: Express;
    private eventService!: EventService;
    private controller!: EventController;

    private readonly logger = logger.child({ module: 'events' });

    async init(dependencies: IEventsModuleDependencies): Promise<void> {
        this.app = dependencies.app;

        this.eventService = new EventService(dependencies.database, this.logger);
        await this.eventService.createIndexes();
        this.controller = new EventController(this.eventService, this.logger);

        this.logger.info('Events module initialized');
    }

    async run(): Promise<void> {
        this.app.use('/api/events', createEventRouter(this.controller));
        this.logger.info('Events router mounted at /api/events');
    }
}
