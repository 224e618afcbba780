/**
 * @fileoverview Application entry point with two-phase lifecycle.
 *
 * Every module completes its init() phase before any starts run(), so a
 * failing index build or bad configuration stops the process before a single
 * route is exposed.
 *
 * @module index
 */

import http from 'node:http';
import type { Express } from 'express';
import type { ICacheService, IModule } from '@event-suite/types';
import { env } from './config/env.js';
import { attachErrorHandling, createExpressApp } from './loaders/express.js';
import { connectDatabase, disconnectDatabase } from './loaders/database.js';
import { createRedisClient, disconnectRedis } from './loaders/redis.js';
import { logger } from './lib/logger.js';
import { CacheService } from './services/cache.service.js';
import { DatabaseModule } from './modules/database/index.js';
import { EventsModule } from './modules/events/index.js';
import { RegistrationsModule } from './modules/registrations/index.js';
import { HostsModule } from './modules/hosts/index.js';
import { HostAssignmentsModule } from './modules/host-assignments/index.js';
import { VehicleSharingModule } from './modules/vehicle-sharing/index.js';
import { DashboardModule } from './modules/dashboard/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Entry Point
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Main application entry point.
 *
 * Executes the startup sequence: infrastructure → module init → module run →
 * server. Registers SIGINT and SIGTERM handlers for graceful shutdown.
 */
async function bootstrap(): Promise<void> {
    try {
        const ctx = await bootstrapInit();
        await bootstrapRun(ctx);

        ctx.server.listen(env.PORT, () => {
            logger.info({ port: env.PORT }, 'Server listening');
        });

        const shutdown = (signal: string) => {
            logger.info({ signal }, 'Shutting down');
            ctx.server.close();
            Promise.all([disconnectRedis(), disconnectDatabase()])
                .then(() => process.exit(0))
                .catch(error => {
                    logger.error({ error }, 'Error during shutdown');
                    process.exit(1);
                });
        };
        process.on('SIGINT', () => shutdown('SIGINT'));
        process.on('SIGTERM', () => shutdown('SIGTERM'));
    } catch (error) {
        logger.error({ error }, 'Failed to bootstrap application');
        process.exit(1);
    }
}

void bootstrap();

// ─────────────────────────────────────────────────────────────────────────────
// Two-Phase Lifecycle
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Shared context passed from init phase to run phase.
 */
interface BootstrapContext {
    app: Express;
    server: http.Server;
    modules: IModule[];
}

/**
 * Init Phase: connect infrastructure, create services, build indexes.
 *
 * No routes are mounted here apart from the liveness check the Express
 * loader owns.
 *
 * @throws If MongoDB, Redis or any module init() fails
 */
async function bootstrapInit(): Promise<BootstrapContext> {
    const connection = await connectDatabase();

    let cacheService: ICacheService | null = null;
    if (env.ENABLE_DASHBOARD_CACHE) {
        const redis = createRedisClient();
        await redis.connect();
        cacheService = new CacheService(redis, logger.child({ module: 'cache' }));
    } else {
        logger.info('Dashboard cache disabled');
    }

    const app = createExpressApp();
    const server = http.createServer(app);

    // Database module first (others depend on it)
    const databaseModule = new DatabaseModule();
    await databaseModule.init({ logger, connection, app });
    const coreDatabase = databaseModule.getDatabaseService();

    const eventsModule = new EventsModule();
    const registrationsModule = new RegistrationsModule();
    const hostsModule = new HostsModule();
    const hostAssignmentsModule = new HostAssignmentsModule();
    const vehicleSharingModule = new VehicleSharingModule();
    const dashboardModule = new DashboardModule();

    const sharedDeps = { database: coreDatabase, cacheService, app };

    await eventsModule.init({ database: coreDatabase, app });
    await registrationsModule.init(sharedDeps);
    await hostsModule.init(sharedDeps);
    await hostAssignmentsModule.init(sharedDeps);
    await vehicleSharingModule.init({ database: coreDatabase, app });
    await dashboardModule.init({ ...sharedDeps, cacheTtlSeconds: env.DASHBOARD_CACHE_TTL_SECONDS });

    return {
        app,
        server,
        modules: [
            databaseModule,
            eventsModule,
            registrationsModule,
            hostsModule,
            hostAssignmentsModule,
            vehicleSharingModule,
            dashboardModule
        ]
    };
}

/**
 * Run Phase: mount every module's routes, then the error handling that must
 * come after them.
 *
 * @param ctx - Bootstrap context from init phase containing all components
 */
async function bootstrapRun(ctx: BootstrapContext): Promise<void> {
    for (const appModule of ctx.modules) {
        await appModule.run();
    }

    attachErrorHandling(ctx.app);
    logger.info({ modules: ctx.modules.map(appModule => appModule.metadata.id) }, 'All modules initialized');
}
