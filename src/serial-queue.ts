/**
 * Promise-chain mutex.
 *
 * Every task is chained to the end of the queue, so at most one runs at a
 * time and they run in submission order. A failing task rejects its own
 * caller only; the queue keeps going.
 */
export class SerialQueue {
    private tail: Promise<void> = Promise.resolve();
    private pending = 0;

    /**
     * Run `task` once every previously submitted task has settled
     */
    run<T>(task: () => Promise<T> | T): Promise<T> {
        this.pending++;
        const result = this.tail.then(async () => {
            try {
                return await task();
            } finally {
                this.pending--;
            }
        });

        // Errors belong to `result`'s caller; the chain itself must not stall
        this.tail = result.then(() => undefined, () => undefined);

        return result;
    }

    /** Number of tasks queued or running */
    get size(): number {
        return this.pending;
    }
}

export default SerialQueue;
