/**
 * Bounded LRU keyed by message identity. Map iteration order is insertion
 * order, so the first key is always the least recently used.
 */
export class RecentIdCache<V> {
    private readonly entries = new Map<string, V>();
    private readonly capacity: number;

    constructor(capacity: number) {
        this.capacity = Math.max(1, Math.floor(capacity));
    }

    get size(): number {
        return this.entries.size;
    }

    has(key: string): boolean {
        return this.entries.has(key);
    }

    get(key: string): V | undefined {
        if (!this.entries.has(key)) {
            return undefined;
        }
        const value = this.entries.get(key);
        this.entries.delete(key);
        if (value !== undefined) {
            this.entries.set(key, value);
        }
        return value;
    }

    set(key: string, value: V): void {
        if (this.entries.has(key)) {
            this.entries.delete(key);
        }
        this.entries.set(key, value);
        while (this.entries.size > this.capacity) {
            const oldest = this.entries.keys().next();
            if (oldest.done) break;
            this.entries.delete(oldest.value);
        }
    }
}
