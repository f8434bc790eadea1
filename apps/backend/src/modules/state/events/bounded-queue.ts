import { ValidationError } from '../../../lib/errors.js';

/**
 * FIFO buffer between a producer that must never block and an async consumer.
 *
 * `offer` refuses the item when the buffer is at capacity (the newest item is
 * the one dropped). `take` waits until an item arrives or the queue closes.
 * Items already buffered when the queue closes are still handed out.
 */
export class BoundedQueue<T extends object> implements AsyncIterable<T> {
    private readonly items: T[] = [];
    private readonly waiters: Array<(item: T | null) => void> = [];
    private isClosed = false;

    constructor(private readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new ValidationError('Queue capacity must be a positive integer', { capacity });
        }
    }

    get size(): number {
        return this.items.length;
    }

    get closed(): boolean {
        return this.isClosed;
    }

    /**
     * @returns `false` when the item was dropped (queue full or closed)
     */
    offer(item: T): boolean {
        if (this.isClosed) {
            return false;
        }

        const waiter = this.waiters.shift();
        if (waiter) {
            waiter(item);
            return true;
        }

        if (this.items.length >= this.capacity) {
            return false;
        }

        this.items.push(item);
        return true;
    }

    /**
     * Next item, or `null` once the queue is closed and drained.
     */
    take(): Promise<T | null> {
        if (this.items.length > 0) {
            const [head] = this.items.splice(0, 1);
            return Promise.resolve(head);
        }
        if (this.isClosed) {
            return Promise.resolve(null);
        }
        return new Promise(resolve => {
            this.waiters.push(resolve);
        });
    }

    /**
     * Stop accepting items and wake every pending `take`.
     *
     * @param discard - Drop buffered items instead of letting consumers drain them
     */
    close(discard = false): void {
        this.isClosed = true;
        if (discard) {
            this.items.length = 0;
        }
        for (const waiter of this.waiters.splice(0)) {
            waiter(null);
        }
    }

    async *[Symbol.asyncIterator](): AsyncIterator<T> {
        while (true) {
            const item = await this.take();
            if (item === null) {
                return;
            }
            yield item;
        }
    }
}
