/**
 * State module.
 *
 * Owns the process's `StateManager`: widget registry, connection routing,
 * callback dispatch and sessions, backed by memory or Redis depending on
 * configuration.
 *
 * ## Lifecycle
 *
 * ### init() phase:
 * - Stores the configuration, logger and optional shared Redis client
 * - Creates the StateManager (no I/O yet)
 *
 * ### run() phase:
 * - Initializes the stores; in deploy mode this also subscribes to the
 *   worker's own channel so routed callbacks reach it
 *
 * ### stop():
 * - Shuts the manager down: closes local connections, removes routing
 *   entries, announces the departure and closes owned Redis connections
 *
 * @example
 * ```typescript
 * const stateModule = new StateModule();
 * await stateModule.init({ config: loadStateConfig(), logger });
 * await stateModule.run();
 *
 * const manager = stateModule.getManager();
 * await manager.registerWidget('chart-1', html);
 * ```
 */

import type { Redis as RedisClient } from 'ioredis';
import type { ILogger, IModule, IModuleMetadata, IStateConfig } from '@meshstate/types';
import { MeshStateError } from '../../lib/errors.js';
import { StateManager } from './services/state-manager.service.js';

export interface IStateModuleDependencies {
    config: IStateConfig;

    logger: ILogger;

    /**
     * Client to share with the rest of the application. When omitted and the
     * Redis backend is selected, the module opens and closes its own.
     */
    redisClient?: RedisClient;
}

export class StateModule implements IModule<IStateModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'state',
        name: 'State',
        version: '1.0.0',
        description: 'Widget, connection, callback and session state shared across workers'
    };

    private manager: StateManager | null = null;
    private logger: ILogger | null = null;

    async init(dependencies: IStateModuleDependencies): Promise<void> {
        this.logger = dependencies.logger.child({ module: 'state' });
        this.logger.info('Initializing state module...');

        this.manager = new StateManager({
            config: dependencies.config,
            logger: dependencies.logger,
            redisClient: dependencies.redisClient
        });

        this.logger.info(
            { workerId: this.manager.workerId, backend: this.manager.backend, deployMode: this.manager.deployMode },
            'State module initialized'
        );
    }

    async run(): Promise<void> {
        const manager = this.getManager();
        await manager.initialize();
        this.logger?.info({ workerId: manager.workerId }, 'State module running');
    }

    async stop(): Promise<void> {
        if (!this.manager) {
            return;
        }
        await this.manager.shutdown();
        this.logger?.info('State module stopped');
    }

    /**
     * @throws MeshStateError when called before init()
     */
    getManager(): StateManager {
        if (!this.manager) {
            throw new MeshStateError('State module has not been initialized', 'MODULE_NOT_INITIALIZED');
        }
        return this.manager;
    }
}
