import type { IModuleMetadata } from './IModuleMetadata.js';

/**
 * Core module interface for backend components.
 *
 * Every domain area (events, registrations, hosts, ...) is a module that the
 * bootstrap creates, initialises and runs in a fixed order.
 *
 * ## Two-Phase Lifecycle
 *
 * ### Phase 1: init(dependencies)
 * - Create service and controller instances, create database indexes
 * - Cannot assume other modules are initialised
 *
 * ### Phase 2: run()
 * - Mount routers on the injected Express app
 * - Every module has finished `init()` by now
 *
 * A failure in either phase is fatal: the bootstrap logs it and exits.
 *
 * ## Inversion of Control
 *
 * Modules receive the Express app as a dependency and mount their own routers
 * rather than returning them to the bootstrap.
 *
 * ```typescript
 * const hostsModule = new HostsModule();
 * await hostsModule.init({ database, cacheService, app });
 * await hostsModule.run();
 * ```
 *
 * @template TDependencies - Typed dependencies object specific to this module
 */
export interface IModule<TDependencies extends object = object> {
    /**
     * Identifying information used in logs.
     */
    readonly metadata: IModuleMetadata;

    /**
     * Prepare the module. Must not mount routes.
     */
    init(dependencies: TDependencies): Promise<void>;

    /**
     * Activate the module.
     */
    run(): Promise<void>;
}
