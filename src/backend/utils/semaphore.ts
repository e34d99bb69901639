/**
 * Counting semaphore bounding how many collaborator-heavy tasks run at once.
 */
export class Semaphore {
    private permits: number;
    private readonly waiting: Array<() => void> = [];

    constructor(permits: number) {
        if (!Number.isInteger(permits) || permits < 1) {
            throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
        }
        this.permits = permits;
    }

    async run<T>(task: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await task();
        } finally {
            this.release();
        }
    }

    private acquire(): Promise<void> {
        if (this.permits > 0) {
            this.permits--;
            return Promise.resolve();
        }
        return new Promise((resolve) => {
            this.waiting.push(resolve);
        });
    }

    private release(): void {
        const next = this.waiting.shift();
        if (next) {
            // Hand the permit straight to the next waiter.
            next();
            return;
        }
        this.permits++;
    }
}

/**
 * Maps items through an async task with at most `concurrency` in flight.
 * Results keep the input order. The first rejection rejects the whole map,
 * and tasks still queued at that point are never started.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    concurrency: number,
    task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const semaphore = new Semaphore(concurrency);
    let failed = false;

    return Promise.all(
        items.map((item, index) =>
            semaphore.run(async () => {
                if (failed) {
                    throw new Error('Skipped after an earlier task failed');
                }
                try {
                    return await task(item, index);
                } catch (error) {
                    failed = true;
                    throw error;
                }
            })
        )
    );
}
