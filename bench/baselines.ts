import { LRUCache } from "lru-cache";
import { MemoCache } from "../src/memo-cache";
import type { Options } from "../src/types";
import type { Compute, ComputedValue, MemoizerBenchmark, Stats, WorkloadConfig } from "./types";

/**
 * Factory function to create MemoCache benchmark wrappers
 */
function createMemoCacheBenchmark(
    toOptions: (config: WorkloadConfig) => Options<ComputedValue>
): new (config: WorkloadConfig) => MemoizerBenchmark {
    return class implements MemoizerBenchmark {
        private cache: MemoCache<ComputedValue>;
        private evictions = 0;

        constructor(config: WorkloadConfig) {
            this.cache = new MemoCache<ComputedValue>({
                ...toOptions(config),
                onEvict: (_key, _value, reason) => {
                    if (reason === "lru") {
                        this.evictions++;
                    }
                },
            });
        }

        call(arg: number, compute: Compute): ComputedValue {
            return this.cache.getOrCompute([arg], () => compute(arg));
        }

        stats(): Stats {
            const { hits, misses, size } = this.cache.stats();
            return { size, hits, misses, evictions: this.evictions };
        }

        close(): void {
            this.cache.clear();
        }
    };
}

/**
 * MemoCache with a fixed entry capacity
 */
export const MemoCacheBenchmark = createMemoCacheBenchmark((config) => ({ maxSize: config.maxEntries }));

/**
 * MemoCache evicting under system memory pressure only
 */
export const MemoCacheMemoryBenchmark = createMemoCacheBenchmark((config) => ({
    memoryThresholdBytes: config.memoryThresholdBytes,
}));

/**
 * MemoCache that never evicts
 */
export const MemoCacheUnboundedBenchmark = createMemoCacheBenchmark(() => ({ maxSize: null }));

/**
 * lru-cache used as a memoizer (get, then set on miss)
 */
export class LruCacheBenchmark implements MemoizerBenchmark {
    private cache: LRUCache<number, ComputedValue>;
    private hitCount = 0;
    private missCount = 0;
    private evictions = 0;

    constructor(config: WorkloadConfig) {
        this.cache = new LRUCache<number, ComputedValue>({
            max: config.maxEntries,
            dispose: (_value, _key, reason) => {
                if (reason === "evict") {
                    this.evictions++;
                }
            },
        });
    }

    call(arg: number, compute: Compute): ComputedValue {
        const cached = this.cache.get(arg);
        if (cached !== undefined) {
            this.hitCount++;
            return cached;
        }
        const value = compute(arg);
        this.cache.set(arg, value);
        this.missCount++;
        return value;
    }

    stats(): Stats {
        return {
            size: this.cache.size,
            hits: this.hitCount,
            misses: this.missCount,
            evictions: this.evictions,
        };
    }

    close(): void {
        this.cache.clear();
    }
}

/**
 * Plain Map memoizer (unbounded, no recency tracking)
 * Lower bound on lookup cost.
 */
export class MapBaselineBenchmark implements MemoizerBenchmark {
    private map = new Map<number, ComputedValue>();
    private hitCount = 0;
    private missCount = 0;

    constructor(_config: WorkloadConfig) { }

    call(arg: number, compute: Compute): ComputedValue {
        const cached = this.map.get(arg);
        if (cached !== undefined) {
            this.hitCount++;
            return cached;
        }
        const value = compute(arg);
        this.map.set(arg, value);
        this.missCount++;
        return value;
    }

    stats(): Stats {
        return {
            size: this.map.size,
            hits: this.hitCount,
            misses: this.missCount,
            evictions: 0,
        };
    }

    close(): void {
        this.map.clear();
    }
}
