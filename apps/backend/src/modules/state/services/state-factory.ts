import type { Redis as RedisClient } from 'ioredis';
import type {
    IConnectionRouter,
    IEventBus,
    ILogger,
    ISessionStore,
    IStateConfig,
    IWidgetStore,
    StateBackend
} from '@meshstate/types';
import { createRedisClient, disconnectRedis } from '../../../loaders/redis.js';
import {
    MemoryConnectionRouter,
    MemoryEventBus,
    MemorySessionStore,
    MemoryWidgetStore
} from '../memory/index.js';
import {
    RedisConnectionRouter,
    RedisEventBus,
    RedisKeys,
    RedisSessionStore,
    RedisWidgetStore
} from '../redis/index.js';

/**
 * The four shared stores of one state manager, built for a single backend.
 */
export interface IStateStores {
    backend: StateBackend;
    widgets: IWidgetStore;
    events: IEventBus;
    connections: IConnectionRouter;
    sessions: ISessionStore;
    /** Ends subscriptions and closes any Redis connection the factory opened. */
    close(): Promise<void>;
}

export interface IStateStoreDependencies {
    logger: ILogger;
    /** Use this client instead of opening one; the caller keeps ownership. */
    redisClient?: RedisClient;
}

/**
 * Backend actually used for a configuration. Redis only serves deploy mode;
 * a single process keeps its state in memory.
 */
export function resolveBackend(config: IStateConfig): StateBackend {
    return config.deployMode && config.backend === 'redis' ? 'redis' : 'memory';
}

export function createMemoryStores(config: IStateConfig, logger: ILogger): IStateStores {
    const events = new MemoryEventBus({ queueSize: config.eventQueueSize, logger });
    return {
        backend: 'memory',
        widgets: new MemoryWidgetStore(),
        events,
        connections: new MemoryConnectionRouter(),
        sessions: new MemorySessionStore(config.permissions),
        close: () => events.close()
    };
}

export function createRedisStores(config: IStateConfig, dependencies: IStateStoreDependencies): IStateStores {
    const ownsClient = dependencies.redisClient === undefined;
    const client = dependencies.redisClient ?? createRedisClient(config.redis, dependencies.logger);
    const keys = new RedisKeys(config.redis.prefix);
    const events = new RedisEventBus({ client, keys, queueSize: config.eventQueueSize, logger: dependencies.logger });

    return {
        backend: 'redis',
        widgets: new RedisWidgetStore({ client, keys, ttl: config.ttl.widget }),
        events,
        connections: new RedisConnectionRouter({ client, keys, ttl: config.ttl.connection }),
        sessions: new RedisSessionStore({
            client,
            keys,
            defaultTtl: config.ttl.session,
            policy: config.permissions
        }),
        close: async () => {
            await events.close();
            if (ownsClient) {
                await disconnectRedis(client);
            }
        }
    };
}

/**
 * Build the stores for the configured backend.
 */
export function createStateStores(config: IStateConfig, dependencies: IStateStoreDependencies): IStateStores {
    return resolveBackend(config) === 'redis'
        ? createRedisStores(config, dependencies)
        : createMemoryStores(config, dependencies.logger);
}
