import type { IEventMessage, IEventSubscription, ILogger } from '@meshstate/types';
import { BoundedQueue } from './bounded-queue.js';

export interface IQueueSubscriptionOptions {
    channel: string;
    capacity: number;
    logger: ILogger;
    /**
     * Releases whatever feeds the queue; failures are logged, not thrown.
     * Not called when `signal` is already aborted at construction.
     */
    teardown?: () => Promise<void>;
    /** Settles when the feed is live. */
    ready?: Promise<void>;
    signal?: AbortSignal;
}

/**
 * Subscription backed by a bounded in-process queue.
 *
 * Both bus implementations push into it: the memory bus directly from
 * `publish`, the Redis bus from its subscriber connection.
 */
export class QueueSubscription implements IEventSubscription {
    readonly channel: string;
    readonly ready: Promise<void>;

    private readonly queue: BoundedQueue<IEventMessage>;
    private readonly logger: ILogger;
    private readonly teardown: () => Promise<void>;
    private readonly signal: AbortSignal | undefined;
    private readonly onAbort = (): void => {
        void this.close();
    };
    private closing: Promise<void> | null = null;

    constructor(options: IQueueSubscriptionOptions) {
        this.channel = options.channel;
        this.logger = options.logger;
        this.queue = new BoundedQueue<IEventMessage>(options.capacity);
        this.teardown = options.teardown ?? (async () => undefined);
        this.ready = options.ready ?? Promise.resolve();

        this.ready.catch((error: unknown) => {
            this.logger.error({ error, channel: this.channel }, 'Subscription failed to start');
            void this.close();
        });

        const { signal } = options;
        this.signal = signal;
        if (signal) {
            if (signal.aborted) {
                // Nothing has been attached yet, so there is nothing to tear down
                this.queue.close(true);
                this.closing = Promise.resolve();
            } else {
                signal.addEventListener('abort', this.onAbort, { once: true });
            }
        }
    }

    get closed(): boolean {
        return this.queue.closed;
    }

    /**
     * Hand a message to the consumer.
     *
     * @returns `false` when the queue is full or the subscription has ended
     */
    deliver(message: IEventMessage): boolean {
        const accepted = this.queue.offer(message);
        if (!accepted && !this.queue.closed) {
            this.logger.warn(
                { channel: this.channel, messageId: message.messageId, eventType: message.eventType },
                'Subscriber queue full, dropping event'
            );
        }
        return accepted;
    }

    close(): Promise<void> {
        if (!this.closing) {
            this.signal?.removeEventListener('abort', this.onAbort);
            this.queue.close(true);
            this.closing = this.teardown().catch((error: unknown) => {
                this.logger.warn({ error, channel: this.channel }, 'Failed to release subscription');
            });
        }
        return this.closing;
    }

    [Symbol.asyncIterator](): AsyncIterator<IEventMessage> {
        return this.queue[Symbol.asyncIterator]();
    }
}
