/**
 * Mutual exclusion for async critical sections within one process.
 *
 * Callers queue in FIFO order; a section that throws releases the lock and
 * rethrows to its own caller only.
 *
 * @example
 * ```typescript
 * const lock = new AsyncLock();
 * await lock.run(async () => {
 *     const current = map.get(key);
 *     map.set(key, next(current));
 * });
 * ```
 */
export class AsyncLock {
    private tail: Promise<void> = Promise.resolve();
    private pending = 0;

    /**
     * Whether a section is running or waiting.
     */
    get locked(): boolean {
        return this.pending > 0;
    }

    async run<T>(section: () => T | Promise<T>): Promise<T> {
        const previous = this.tail;
        let release: () => void = () => undefined;
        this.tail = new Promise<void>(resolve => {
            release = resolve;
        });
        this.pending++;

        try {
            await previous;
            return await section();
        } finally {
            this.pending--;
            release();
        }
    }
}
