import type { ILogger, IWidgetEvent, IWidgetEventQueue } from '@meshstate/types';
import { BoundedQueue } from '../events/bounded-queue.js';

/**
 * Client-bound events waiting to be written to one widget's connection.
 *
 * The channel layer drains it; producers (local broadcasts and events
 * forwarded from other workers) never wait on it.
 */
export class WidgetEventQueue implements IWidgetEventQueue {
    private readonly queue: BoundedQueue<IWidgetEvent>;

    constructor(
        readonly widgetId: string,
        capacity: number,
        private readonly logger: ILogger
    ) {
        this.queue = new BoundedQueue<IWidgetEvent>(capacity);
    }

    get size(): number {
        return this.queue.size;
    }

    get closed(): boolean {
        return this.queue.closed;
    }

    put(event: IWidgetEvent): void {
        if (!this.queue.offer(event) && !this.queue.closed) {
            this.logger.warn({ widgetId: this.widgetId, eventType: event.type }, 'Widget event queue full, dropping event');
        }
    }

    get(): Promise<IWidgetEvent | null> {
        return this.queue.take();
    }

    close(): void {
        this.queue.close();
    }

    [Symbol.asyncIterator](): AsyncIterator<IWidgetEvent> {
        return this.queue[Symbol.asyncIterator]();
    }
}
