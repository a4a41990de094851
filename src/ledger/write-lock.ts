// Runs async tasks one at a time, in submission order.
export class WriteLock {
    private tail: Promise<void> = Promise.resolve();

    run<T>(task: () => Promise<T>): Promise<T> {
        const result = this.tail.then(task);
        // Keep the chain alive after a failed task; the caller still sees the rejection.
        this.tail = result.then(
            () => undefined,
            () => undefined,
        );
        return result;
    }
}
