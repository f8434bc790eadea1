import { Redis } from 'ioredis';
import type { Redis as RedisClient } from 'ioredis';
import type { ILogger, IStateConfig } from '@meshstate/types';
import { logger as rootLogger } from '../lib/logger.js';

/**
 * Create an ioredis client for the state layer.
 *
 * Keys are namespaced by the stores themselves, so no `keyPrefix` is set
 * here; pub/sub channel names would not receive it anyway.
 */
export function createRedisClient(
    config: IStateConfig['redis'],
    logger: ILogger = rootLogger
): RedisClient {
    const log = logger.child({ module: 'redis' });
    const instance = new Redis(config.url, {
        lazyConnect: true,
        maxRetriesPerRequest: config.maxRetriesPerRequest
    });

    instance.on('connect', () => log.info({ url: redactUrl(config.url) }, 'Redis connected'));
    instance.on('error', (error: Error) => log.error({ error }, 'Redis error'));

    return instance;
}

/**
 * Close a client, falling back to a hard disconnect when QUIT cannot be sent.
 */
export async function disconnectRedis(client: RedisClient): Promise<void> {
    if (client.status === 'end') {
        return;
    }
    if (client.status === 'wait') {
        client.disconnect();
        return;
    }
    try {
        await client.quit();
    } catch {
        client.disconnect();
    }
}

function redactUrl(url: string): string {
    return url.replace(/\/\/([^@/]*)@/, '//***@');
}
