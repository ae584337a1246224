/**
 * FIFO async mutex guarding index mutation. Only one holder at a time;
 * waiters run in the order they asked.
 */
export class WriteLock {
    private tail: Promise<void> = Promise.resolve();
    private pending = 0;

    get queued(): number {
        return this.pending;
    }

    async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
        let release: () => void = () => {};
        const next = new Promise<void>(resolve => {
            release = resolve;
        });

        const previous = this.tail;
        this.tail = previous.then(() => next);
        this.pending++;

        await previous;
        try {
            return await task();
        } finally {
            this.pending--;
            release();
        }
    }
}
