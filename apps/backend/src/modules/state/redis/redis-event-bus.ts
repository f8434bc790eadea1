import type { Redis as RedisClient } from 'ioredis';
import type { IEventBus, IEventMessage, IEventSubscription, ILogger, ISubscribeOptions } from '@meshstate/types';
import { disconnectRedis } from '../../../loaders/redis.js';
import { decodeEventMessage, encodeEventMessage } from '../events/event-message.js';
import { QueueSubscription } from '../events/queue-subscription.js';
import type { RedisKeys } from './keys.js';

export interface IRedisEventBusOptions {
    client: RedisClient;
    keys: RedisKeys;
    queueSize?: number;
    logger: ILogger;
}

/**
 * Event bus over Redis pub/sub.
 *
 * A connection in subscriber mode cannot issue other commands, so every
 * subscription runs on its own duplicate of the shared client and closes it
 * when the subscription ends.
 */
export class RedisEventBus implements IEventBus {
    private readonly client: RedisClient;
    private readonly keys: RedisKeys;
    private readonly queueSize: number;
    private readonly logger: ILogger;
    private readonly subscriptions = new Map<string, Set<QueueSubscription>>();

    constructor(options: IRedisEventBusOptions) {
        this.client = options.client;
        this.keys = options.keys;
        this.queueSize = options.queueSize ?? 1000;
        this.logger = options.logger.child({ module: 'redis-event-bus' });
    }

    async publish(channel: string, event: IEventMessage): Promise<void> {
        await this.client.publish(this.keys.channel(channel), encodeEventMessage(event));
    }

    subscribe(channel: string, options: ISubscribeOptions = {}): IEventSubscription {
        if (options.signal?.aborted) {
            return new QueueSubscription({ channel, capacity: this.queueSize, logger: this.logger, signal: options.signal });
        }

        const redisChannel = this.keys.channel(channel);
        const subscriber = this.client.duplicate();
        const onMessage = (incoming: string, payload: string): void => {
            if (incoming !== redisChannel) {
                return;
            }
            const message = decodeEventMessage(payload);
            if (!message) {
                this.logger.warn({ channel }, 'Skipping undecodable event payload');
                return;
            }
            subscription.deliver(message);
        };
        const onError = (error: Error): void => {
            this.logger.error({ error, channel }, 'Subscriber connection error');
        };

        subscriber.on('message', onMessage);
        subscriber.on('error', onError);

        const subscription: QueueSubscription = new QueueSubscription({
            channel,
            capacity: this.queueSize,
            logger: this.logger,
            signal: options.signal,
            ready: subscriber.subscribe(redisChannel).then(() => undefined),
            teardown: async () => {
                this.forget(channel, subscription);
                subscriber.off('message', onMessage);
                try {
                    await disconnectRedis(subscriber);
                } finally {
                    subscriber.off('error', onError);
                }
            }
        });

        this.track(channel, subscription);
        return subscription;
    }

    /**
     * Close this process's subscriptions to a channel. Other workers keep
     * theirs.
     */
    async unsubscribe(channel: string): Promise<void> {
        const subscriptions = this.subscriptions.get(channel);
        if (!subscriptions) {
            return;
        }
        await Promise.all(Array.from(subscriptions, subscription => subscription.close()));
        this.subscriptions.delete(channel);
    }

    async close(): Promise<void> {
        const channels = Array.from(this.subscriptions.keys());
        await Promise.all(channels.map(channel => this.unsubscribe(channel)));
    }

    private track(channel: string, subscription: QueueSubscription): void {
        let subscriptions = this.subscriptions.get(channel);
        if (!subscriptions) {
            subscriptions = new Set();
            this.subscriptions.set(channel, subscriptions);
        }
        subscriptions.add(subscription);
    }

    private forget(channel: string, subscription: QueueSubscription): void {
        const subscriptions = this.subscriptions.get(channel);
        if (!subscriptions) {
            return;
        }
        subscriptions.delete(subscription);
        if (subscriptions.size === 0) {
            this.subscriptions.delete(channel);
        }
    }
}
