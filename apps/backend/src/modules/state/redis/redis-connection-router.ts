import type { Redis as RedisClient } from 'ioredis';
import type { IConnectionInfo, IConnectionRouter } from '@meshstate/types';
import { nowSeconds } from '../../../lib/clock.js';
import type { RedisKeys } from './keys.js';
import { execPipeline, numberField, optionalField, ttlSeconds } from './pipeline.js';

export interface IRedisConnectionRouterOptions {
    client: RedisClient;
    keys: RedisKeys;
    /** Seconds a connection survives without a heartbeat. */
    ttl: number;
}

/**
 * Connection ownership shared through Redis.
 *
 * A connection hash expires unless heartbeats keep renewing it. Per-worker
 * sets are indexes only and are pruned when read.
 */
export class RedisConnectionRouter implements IConnectionRouter {
    private readonly client: RedisClient;
    private readonly keys: RedisKeys;
    private readonly ttl: number;

    constructor(options: IRedisConnectionRouterOptions) {
        this.client = options.client;
        this.keys = options.keys;
        this.ttl = ttlSeconds(options.ttl);
    }

    async registerConnection(
        widgetId: string,
        workerId: string,
        userId: string | null = null,
        sessionId: string | null = null
    ): Promise<void> {
        const key = this.keys.connection(widgetId);
        const previousOwner = await this.client.hget(key, 'worker_id');
        const now = String(nowSeconds());

        const transaction = this.client
            .multi()
            .hset(key, {
                widget_id: widgetId,
                worker_id: workerId,
                connected_at: now,
                last_heartbeat: now,
                user_id: userId ?? '',
                session_id: sessionId ?? ''
            })
            .expire(key, this.ttl)
            .sadd(this.keys.workerConnections(workerId), widgetId);

        if (previousOwner && previousOwner !== workerId) {
            transaction.srem(this.keys.workerConnections(previousOwner), widgetId);
        }

        await execPipeline(transaction, 'connection register');
    }

    async getConnectionInfo(widgetId: string): Promise<IConnectionInfo | null> {
        const fields = await this.client.hgetall(this.keys.connection(widgetId));
        if (fields['worker_id'] === undefined) {
            return null;
        }
        return {
            widgetId,
            workerId: fields['worker_id'],
            connectedAt: numberField(fields['connected_at']),
            lastHeartbeat: numberField(fields['last_heartbeat']),
            userId: optionalField(fields['user_id']),
            sessionId: optionalField(fields['session_id'])
        };
    }

    async getOwner(widgetId: string): Promise<string | null> {
        return this.client.hget(this.keys.connection(widgetId), 'worker_id');
    }

    async refreshHeartbeat(widgetId: string): Promise<boolean> {
        const key = this.keys.connection(widgetId);
        if ((await this.client.exists(key)) === 0) {
            return false;
        }
        await execPipeline(
            this.client.multi().hset(key, 'last_heartbeat', String(nowSeconds())).expire(key, this.ttl),
            'connection heartbeat'
        );
        return true;
    }

    async unregisterConnection(widgetId: string): Promise<boolean> {
        const key = this.keys.connection(widgetId);
        const owner = await this.client.hget(key, 'worker_id');
        if (owner === null) {
            return false;
        }
        const [deleted] = await execPipeline(
            this.client.multi().del(key).srem(this.keys.workerConnections(owner), widgetId),
            'connection unregister'
        );
        return deleted === 1;
    }

    async listWorkerConnections(workerId: string): Promise<string[]> {
        const setKey = this.keys.workerConnections(workerId);
        const members = await this.client.smembers(setKey);
        if (members.length === 0) {
            return [];
        }

        const pipeline = this.client.pipeline();
        for (const widgetId of members) {
            pipeline.hget(this.keys.connection(widgetId), 'worker_id');
        }
        const owners = await execPipeline(pipeline, 'connection list');

        const owned: string[] = [];
        const stale: string[] = [];
        members.forEach((widgetId, index) => {
            (owners[index] === workerId ? owned : stale).push(widgetId);
        });

        if (stale.length > 0) {
            await this.client.srem(setKey, ...stale);
        }
        return owned;
    }
}
