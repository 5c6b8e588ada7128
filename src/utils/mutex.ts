/**
 * Promise-chain mutex. Callers run strictly one after another in arrival order;
 * a failing callback releases the lock for the next one.
 */
export class Mutex {
    private tail: Promise<void> = Promise.resolve();
    private pending = 0;

    runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
        this.pending++;
        const run = this.tail.then(() => fn());
        this.tail = run.then(
            () => { this.pending--; },
            () => { this.pending--; }
        );
        return run;
    }

    isLocked(): boolean {
        return this.pending > 0;
    }
}
