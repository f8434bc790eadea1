/**
 * An event travelling between workers.
 *
 * Messages are immutable once published. Delivery is at-least-once to the
 * subscribers listening at publish time; there is no replay.
 */
export interface IEventMessage {
    /**
     * Event type, e.g. `click` or `cellValueChanged`.
     */
    readonly eventType: string;

    /**
     * Widget the event concerns.
     */
    readonly widgetId: string;

    /**
     * Event payload.
     */
    readonly data: Readonly<Record<string, unknown>>;

    /**
     * Worker that published the event.
     */
    readonly sourceWorkerId: string;

    /**
     * Worker the event is addressed to, or `null` for every subscriber.
     */
    readonly targetWorkerId: string | null;

    /**
     * Unix timestamp (seconds) of publication.
     */
    readonly timestamp: number;

    /**
     * Unique message identifier.
     */
    readonly messageId: string;
}

/**
 * Fields a caller supplies to build an {@link IEventMessage}.
 *
 * `timestamp` and `messageId` are filled in at creation time when omitted.
 */
export interface IEventMessageInput {
    eventType: string;
    widgetId: string;
    data?: Record<string, unknown>;
    sourceWorkerId: string;
    targetWorkerId?: string | null;
    timestamp?: number;
    messageId?: string;
}

/**
 * Event shape handed to a widget's local event queue.
 *
 * This is what the duplex-channel layer forwards to the browser.
 */
export interface IWidgetEvent {
    type: string;
    data: Record<string, unknown>;
}
