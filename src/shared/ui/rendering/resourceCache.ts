import { StartupError } from "@/shared/utils/errors";

interface CacheEntry<V> {
    readonly value: V;
}

/**
 * Process-wide get-or-init cache. Each key is initialized at most once; a
 * caller never sees a value that is still being built.
 */
export class ResourceCache<K, V> {
    private readonly entries = new Map<K, CacheEntry<V>>();
    private readonly pending = new Set<K>();

    constructor(private readonly label: string) {}

    getOrInit(key: K, init: (key: K) => V): V {
        const entry = this.entries.get(key);
        if (entry) {
            return entry.value;
        }
        if (this.pending.has(key)) {
            throw new StartupError(
                "resource-cache",
                `${this.label}: "${String(key)}" was requested while it was still being initialized`,
            );
        }
        this.pending.add(key);
        try {
            const value = init(key);
            this.entries.set(key, { value });
            return value;
        } finally {
            this.pending.delete(key);
        }
    }

    has(key: K): boolean {
        return this.entries.has(key);
    }

    get size(): number {
        return this.entries.size;
    }
}
