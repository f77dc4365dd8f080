/**
 * Fixed-capacity circular buffer.
 *
 * `push` is O(1): once full, the write cursor overwrites the oldest slot.
 */
export class RingBuffer<T> {
    private readonly slots: (T | undefined)[];
    private head = 0; // next write index
    private size = 0;

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
        }
        this.slots = new Array<T | undefined>(capacity);
    }

    /**
     * Append an item. Returns the evicted item when the buffer was already full.
     */
    push(item: T): T | undefined {
        const evicted = this.size === this.capacity ? this.slots[this.head] : undefined;
        this.slots[this.head] = item;
        this.head = (this.head + 1) % this.capacity;
        if (this.size < this.capacity) this.size++;
        return evicted;
    }

    get length(): number {
        return this.size;
    }

    /** Newest item, or undefined when empty. */
    last(): T | undefined {
        if (this.size === 0) return undefined;
        return this.slots[(this.head - 1 + this.capacity) % this.capacity];
    }

    /** Oldest item, or undefined when empty. */
    first(): T | undefined {
        if (this.size === 0) return undefined;
        return this.slots[(this.head - this.size + this.capacity) % this.capacity];
    }

    /**
     * Copy retained items oldest first.
     */
    toArray(): T[] {
        const out: T[] = [];
        const start = (this.head - this.size + this.capacity) % this.capacity;
        for (let i = 0; i < this.size; i++) {
            const item = this.slots[(start + i) % this.capacity];
            if (item !== undefined) out.push(item);
        }
        return out;
    }

    clear(): void {
        this.slots.fill(undefined);
        this.head = 0;
        this.size = 0;
    }
}
