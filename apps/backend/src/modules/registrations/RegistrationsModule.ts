import type { Express } from 'express';
import type { ICacheService, IDatabaseService, IModule, IModuleMetadata } from '@event-suite/types';
import { logger } from '../../lib/logger.js';
import { RegistrationService } from './services/registration.service.js';
import { MemberService } from './services/member.service.js';
import { RegistrationController } from './api/registration.controller.js';
import { createRegistrationRouter } from './api/registration.routes.js';

export interface IRegistrationsModuleDependencies {
    database: IDatabaseService;
    /**
     * Dashboard cache to invalidate on writes; null when caching is off.
     */
    cacheService: ICacheService | null;
    app: Express;
}

/**
 * Registrations module: sign-ups, their members and daily preferences, and
 * the public participant lookup.
 */
export class RegistrationsModule implements IModule<IRegistrationsModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'registrations',
        name: 'Registrations',
        version: '1.0.0',
        description: 'Registrations, members, waiting list and participant search'
    };

    private app!: Express;
    private controller!: RegistrationController;

    private readonly logger = logger.child({ module: 'registrations' });

    async init(dependencies: IRegistrationsModuleDependencies): Promise<void> {
        this.app = dependencies.app;

        const registrationService = new RegistrationService(
            dependencies.database,
            dependencies.cacheService,
            this.logger
        );
        await registrationService.createIndexes();
        const memberService = new MemberService(dependencies.database, dependencies.cacheService, this.logger);

        this.controller = new RegistrationController(registrationService, memberService, this.logger);
        this.logger.info('Registrations module initialized');
    }

    async run(): Promise<void> {
        this.app.use('/api/registrations', createRegistrationRouter(this.controller));
        this.logger.info('Registrations router mounted at /api/registrations');
    }
}
