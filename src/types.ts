import type { CacheKey } from "./key-builder";
import type { Logger } from "./logger";
import type { MemoryProbeLike } from "./memory-probe";

export type EvictReason = "lru" | "clear";

export interface Stats {
    hits: number;
    misses: number;
    capacity: number | null; // null when entry count is not the limit
    size: number;
}

export interface Options<R> {
    /**
     * Entry limit. null = unbounded, 0 = caching disabled. Default 128.
     * Ignored when memoryThresholdBytes is set.
     */
    maxSize?: number | null;

    /** Cache f(3) and f(3n) separately. Default false. */
    typed?: boolean;

    /**
     * Treat the cache as full whenever fewer than this many bytes of system
     * memory are available. Overrides maxSize.
     */
    memoryThresholdBytes?: number;

    /**
     * Source of the available-memory reading for memoryThresholdBytes.
     * Defaults to os.freemem().
     */
    memoryProbe?: MemoryProbeLike;

    /**
     * Called after an entry leaves the cache, once the cache is consistent
     * again. It may safely call back into the cache.
     */
    onEvict?: (key: CacheKey, value: R, reason: EvictReason) => void;

    logger?: Logger;
}
