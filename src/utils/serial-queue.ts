/**
 * Runs tasks one at a time in submission order.
 *
 * Each task starts only after the previous one settled, so a task that awaits
 * I/O still cannot interleave with the next one. A rejected task rejects its own
 * promise and does not stall the queue.
 */
export class SerialQueue {
    private tail: Promise<unknown> = Promise.resolve();
    private pending = 0;

    run<T>(task: () => T | Promise<T>): Promise<T> {
        this.pending += 1;
        const result = this.tail.then(task);
        // the caller observes the rejection through `result`
        this.tail = result
            .catch(() => undefined)
            .finally(() => { this.pending -= 1; });
        return result;
    }

    get size(): number {
        return this.pending;
    }
}
