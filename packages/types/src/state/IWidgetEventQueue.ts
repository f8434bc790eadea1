import type { IWidgetEvent } from '../event-bus/IEventMessage.js';

/**
 * Bounded FIFO of events waiting to be pushed to one connected widget.
 *
 * Capacity comes from the configured event queue size; when full, the newest
 * event is dropped and a warning logged.
 *
 * The duplex-channel layer drains it (with `get()` or `for await`) and writes
 * each event to the browser.
 */
export interface IWidgetEventQueue extends AsyncIterable<IWidgetEvent> {
    readonly widgetId: string;

    /**
     * Number of events waiting.
     */
    readonly size: number;

    readonly closed: boolean;

    /**
     * Append an event. Dropped when the queue is full or closed.
     */
    put(event: IWidgetEvent): void;

    /**
     * Take the next event, waiting until one arrives.
     *
     * @returns The event, or `null` once the queue is closed and drained
     */
    get(): Promise<IWidgetEvent | null>;

    /**
     * Close the queue and release pending readers.
     */
    close(): void;
}
