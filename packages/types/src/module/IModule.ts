import type { IModuleMetadata } from './IModuleMetadata.js';

/**
 * Core module interface for backend components.
 *
 * Modules initialize during process bootstrap and stay active until the process
 * shuts down. They follow a two-phase lifecycle so that every module has been
 * prepared before any of them starts background work.
 *
 * ## Two-Phase Lifecycle
 *
 * ### Phase 1: init(dependencies)
 * - Store injected dependencies, create service instances, validate configuration
 * - Must not start subscriptions, timers or other background work
 * - Failures are fatal
 *
 * ### Phase 2: run()
 * - Activate the module: open subscriptions, start timers
 * - All dependencies are guaranteed to be initialized
 * - Failures are fatal
 *
 * ### Shutdown: stop()
 * - Release local resources (connections, subscriptions, timers)
 * - Must leave shared backend records alone; other workers may still own them
 *
 * @example
 * ```typescript
 * const stateModule = new StateModule();
 * await stateModule.init({ config, logger });
 * await stateModule.run();
 *
 * process.on('SIGTERM', () => void stateModule.stop());
 * ```
 *
 * @template TDependencies - Typed dependencies object specific to this module
 */
export interface IModule<TDependencies extends object = Record<string, unknown>> {
    /**
     * Module metadata for introspection.
     */
    readonly metadata: IModuleMetadata;

    /**
     * Prepare the module with injected dependencies.
     *
     * @param dependencies - Typed dependencies required by this module
     */
    init(dependencies: TDependencies): Promise<void>;

    /**
     * Activate the module after every module has completed init().
     */
    run(): Promise<void>;

    /**
     * Release local resources on process termination.
     */
    stop(): Promise<void>;
}
