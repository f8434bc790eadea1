import type { Redis as RedisClient } from 'ioredis';
import type { IWidgetRecord, IWidgetStore } from '@meshstate/types';
import { nowSeconds } from '../../../lib/clock.js';
import type { RedisKeys } from './keys.js';
import { execPipeline, numberField, optionalField, parseJsonObject, ttlSeconds } from './pipeline.js';

export interface IRedisWidgetStoreOptions {
    client: RedisClient;
    keys: RedisKeys;
    /** Sliding expiry of widget records, in seconds. */
    ttl: number;
}

/**
 * Widget registry shared by all workers through Redis.
 *
 * Each widget is a hash with a sliding TTL plus a member of the active set.
 * The set can outlive an expired hash, so every read that consults it prunes
 * members whose hash is gone.
 */
export class RedisWidgetStore implements IWidgetStore {
    private readonly client: RedisClient;
    private readonly keys: RedisKeys;
    private readonly ttl: number;

    constructor(options: IRedisWidgetStoreOptions) {
        this.client = options.client;
        this.keys = options.keys;
        this.ttl = ttlSeconds(options.ttl);
    }

    async register(
        widgetId: string,
        html: string,
        token: string | null = null,
        ownerWorkerId: string | null = null,
        metadata: Record<string, unknown> | null = null
    ): Promise<void> {
        const key = this.keys.widget(widgetId);
        await execPipeline(
            this.client
                .multi()
                .del(key)
                .hset(key, {
                    html,
                    token: token ?? '',
                    created_at: String(nowSeconds()),
                    owner_worker_id: ownerWorkerId ?? '',
                    metadata: JSON.stringify(metadata ?? {})
                })
                .expire(key, this.ttl)
                .sadd(this.keys.activeWidgets, widgetId),
            'widget register'
        );
    }

    async get(widgetId: string): Promise<IWidgetRecord | null> {
        const fields = await this.client.hgetall(this.keys.widget(widgetId));
        if (fields['html'] === undefined) {
            return null;
        }
        return {
            widgetId,
            html: fields['html'],
            token: optionalField(fields['token']),
            createdAt: numberField(fields['created_at']),
            ownerWorkerId: optionalField(fields['owner_worker_id']),
            metadata: parseJsonObject(fields['metadata'])
        };
    }

    async getHtml(widgetId: string): Promise<string | null> {
        return this.client.hget(this.keys.widget(widgetId), 'html');
    }

    async getToken(widgetId: string): Promise<string | null> {
        const token = await this.client.hget(this.keys.widget(widgetId), 'token');
        return optionalField(token ?? undefined);
    }

    async exists(widgetId: string): Promise<boolean> {
        const [member, present] = await Promise.all([
            this.client.sismember(this.keys.activeWidgets, widgetId),
            this.client.exists(this.keys.widget(widgetId))
        ]);
        if (member === 1 && present === 0) {
            await this.client.srem(this.keys.activeWidgets, widgetId);
        }
        return member === 1 && present === 1;
    }

    async updateHtml(widgetId: string, html: string): Promise<boolean> {
        return this.updateField(widgetId, 'html', html);
    }

    async updateToken(widgetId: string, token: string): Promise<boolean> {
        return this.updateField(widgetId, 'token', token);
    }

    async delete(widgetId: string): Promise<boolean> {
        const [deleted] = await execPipeline(
            this.client.multi().del(this.keys.widget(widgetId)).srem(this.keys.activeWidgets, widgetId),
            'widget delete'
        );
        return deleted === 1;
    }

    async listActive(): Promise<string[]> {
        const members = await this.client.smembers(this.keys.activeWidgets);
        if (members.length === 0) {
            return [];
        }

        const pipeline = this.client.pipeline();
        for (const widgetId of members) {
            pipeline.exists(this.keys.widget(widgetId));
        }
        const presence = await execPipeline(pipeline, 'widget list');

        const active: string[] = [];
        const expired: string[] = [];
        members.forEach((widgetId, index) => {
            (presence[index] === 1 ? active : expired).push(widgetId);
        });

        if (expired.length > 0) {
            await this.client.srem(this.keys.activeWidgets, ...expired);
        }
        return active;
    }

    async count(): Promise<number> {
        return (await this.listActive()).length;
    }

    private async updateField(widgetId: string, field: 'html' | 'token', value: string): Promise<boolean> {
        const key = this.keys.widget(widgetId);
        if ((await this.client.exists(key)) === 0) {
            return false;
        }
        // Field and TTL go together so a hash recreated by a racing delete still expires
        await execPipeline(this.client.multi().hset(key, field, value).expire(key, this.ttl), `widget ${field} update`);
        return true;
    }
}
