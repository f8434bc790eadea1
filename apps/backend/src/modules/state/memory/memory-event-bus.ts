import type { IEventBus, IEventMessage, IEventSubscription, ILogger, ISubscribeOptions } from '@meshstate/types';
import { QueueSubscription } from '../events/queue-subscription.js';

export interface IMemoryEventBusOptions {
    /** Per-subscriber queue capacity. */
    queueSize?: number;
    logger: ILogger;
}

/**
 * Event bus for a single process.
 *
 * Every subscriber owns a bounded queue; `publish` copies the message into
 * each queue without awaiting any consumer.
 */
export class MemoryEventBus implements IEventBus {
    private readonly subscribers = new Map<string, Set<QueueSubscription>>();
    private readonly queueSize: number;
    private readonly logger: ILogger;

    constructor(options: IMemoryEventBusOptions) {
        this.queueSize = options.queueSize ?? 1000;
        this.logger = options.logger.child({ module: 'memory-event-bus' });
    }

    async publish(channel: string, event: IEventMessage): Promise<void> {
        const subscriptions = this.subscribers.get(channel);
        if (!subscriptions) {
            return;
        }
        for (const subscription of subscriptions) {
            subscription.deliver(event);
        }
    }

    subscribe(channel: string, options: ISubscribeOptions = {}): IEventSubscription {
        let subscriptions = this.subscribers.get(channel);
        if (!subscriptions) {
            subscriptions = new Set();
            this.subscribers.set(channel, subscriptions);
        }
        const registered = subscriptions;

        const subscription: QueueSubscription = new QueueSubscription({
            channel,
            capacity: this.queueSize,
            logger: this.logger,
            signal: options.signal,
            teardown: async () => {
                registered.delete(subscription);
                if (registered.size === 0 && this.subscribers.get(channel) === registered) {
                    this.subscribers.delete(channel);
                }
            }
        });

        if (!subscription.closed) {
            registered.add(subscription);
        }
        return subscription;
    }

    async unsubscribe(channel: string): Promise<void> {
        const subscriptions = this.subscribers.get(channel);
        if (!subscriptions) {
            return;
        }
        await Promise.all(Array.from(subscriptions, subscription => subscription.close()));
        this.subscribers.delete(channel);
    }

    /**
     * Number of live subscriptions on a channel.
     */
    subscriberCount(channel: string): number {
        return this.subscribers.get(channel)?.size ?? 0;
    }

    async close(): Promise<void> {
        const channels = Array.from(this.subscribers.keys());
        await Promise.all(channels.map(channel => this.unsubscribe(channel)));
    }
}
