/**
 * Fixed-capacity buffer that evicts the oldest item when full.
 */
export class RingBuffer<T> {
    private readonly items: (T | undefined)[];
    private start = 0;
    private count = 0;

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
        }
        this.items = new Array<T | undefined>(capacity);
    }

    /**
     * Appends an item. Returns the evicted item, if any.
     */
    push(item: T): T | undefined {
        if (this.count < this.capacity) {
            this.items[(this.start + this.count) % this.capacity] = item;
            this.count++;
            return undefined;
        }

        const evicted = this.items[this.start];
        this.items[this.start] = item;
        this.start = (this.start + 1) % this.capacity;
        return evicted;
    }

    get size(): number {
        return this.count;
    }

    /**
     * Items oldest first.
     */
    toArray(): T[] {
        const result: T[] = [];
        for (let i = 0; i < this.count; i++) {
            const item = this.items[(this.start + i) % this.capacity];
            if (item !== undefined) {
                result.push(item);
            }
        }
        return result;
    }
}
