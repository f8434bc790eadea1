import type { IEventMessage } from './IEventMessage.js';

/**
 * Options for opening a subscription.
 */
export interface ISubscribeOptions {
    /**
     * Ends the subscription when aborted.
     */
    signal?: AbortSignal;
}

/**
 * A live subscription to one channel.
 *
 * Consume it with `for await`; the loop waits between messages indefinitely
 * and finishes only when the subscription is closed, its abort signal fires,
 * or the channel is unsubscribed.
 */
export interface IEventSubscription extends AsyncIterable<IEventMessage> {
    /**
     * Channel this subscription listens to.
     */
    readonly channel: string;

    /**
     * Whether the subscription has ended.
     */
    readonly closed: boolean;

    /**
     * Resolves once the subscription is active on the bus.
     *
     * Messages published before this settles may not be delivered.
     */
    readonly ready: Promise<void>;

    /**
     * End the subscription and release its resources.
     *
     * Safe to call more than once.
     */
    close(): Promise<void>;
}

/**
 * Publish/subscribe fan-out of event messages on named channels.
 *
 * Channels follow the `widget:{widgetId}` convention for per-widget routing
 * and `worker:{workerId}` for addressing one worker. Delivery is
 * fire-and-forget: a subscriber that was not listening when an event was
 * published never sees it.
 *
 * @example
 * ```typescript
 * const subscription = bus.subscribe('widget:chart-1');
 * for await (const event of subscription) {
 *     queue.put({ type: event.eventType, data: { ...event.data } });
 * }
 * ```
 */
export interface IEventBus {
    /**
     * Publish an event to every current subscriber of a channel.
     *
     * Never blocks on slow subscribers; an in-process subscriber whose queue
     * is full drops the event.
     */
    publish(channel: string, event: IEventMessage): Promise<void>;

    /**
     * Open a subscription on a channel.
     *
     * @param channel - Channel name
     * @param options - Optional abort signal
     * @returns A subscription that yields events until it is closed
     */
    subscribe(channel: string, options?: ISubscribeOptions): IEventSubscription;

    /**
     * End every subscription this process holds on a channel.
     *
     * Best-effort for external stores: subscriptions are tied to the lifetime
     * of their subscribing connection.
     */
    unsubscribe(channel: string): Promise<void>;

    /**
     * Close every subscription and release backend connections.
     */
    close(): Promise<void>;
}
