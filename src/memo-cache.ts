import type { Options, Stats } from "./types";
import { KeyBuilder, type CacheKey, type Kwargs } from "./key-builder";
import { createEvictionPolicy, type EvictionPolicy, type PolicyKind } from "./eviction-policy";
import { RecencyStore, type Evicted, type Lookup } from "./recency-store";
import { StatsCounter } from "./stats-counter";
import { getDefaultLogger, type Logger } from "./logger";
import { DEFAULT_MAX_SIZE } from "./constants";

/**
 * Memoizing LRU cache for one computation.
 *
 * Every method that touches the store, the `full` flag or the counters runs
 * synchronously to completion and never awaits: on the event loop that is
 * the engine's critical section. The computation itself always runs outside
 * it, so a slow miss never holds up hits for other callers.
 *
 * Two callers missing on the same key both compute. The first to finish
 * stores its result; the other returns its own result without storing it.
 */
export class MemoCache<R> {
    private readonly keyBuilder: KeyBuilder;
    private readonly policy: EvictionPolicy;
    private readonly store: RecencyStore<R>;
    private readonly counters = new StatsCounter();
    private readonly onEvict: Options<R>["onEvict"];
    private readonly logger: Logger;

    // policy verdict after the latest insertion
    private full = false;

    constructor(options: Options<R> = {}) {
        const baseLogger = options.logger ?? getDefaultLogger();

        this.policy = createEvictionPolicy(
            {
                maxSize: options.maxSize,
                memoryThresholdBytes: options.memoryThresholdBytes,
                memoryProbe: options.memoryProbe,
                logger: baseLogger,
            },
            DEFAULT_MAX_SIZE
        );
        this.logger = baseLogger.child({ policy: this.policy.kind });
        this.keyBuilder = new KeyBuilder({ typed: options.typed });
        this.store = new RecencyStore<R>({
            maxEntries: this.policy.capacity === null || this.policy.capacity === 0 ? undefined : this.policy.capacity,
        });
        this.onEvict = options.onEvict;
    }

    get policyKind(): PolicyKind {
        return this.policy.kind;
    }

    get typed(): boolean {
        return this.keyBuilder.typed;
    }

    /**
     * Return the cached result for these arguments, or run `compute`, cache
     * its result and return it. Errors from `compute` propagate and nothing
     * is recorded.
     */
    getOrCompute(args: readonly unknown[], compute: () => R, kwargs?: Kwargs): R {
        if (!this.policy.storesEntries) {
            const result = compute();
            this.counters.recordMiss();
            return result;
        }

        const key = this.keyBuilder.build(args, kwargs);
        const cached = this.lookup(key);
        if (cached.hit) {
            return cached.value;
        }

        const result = compute();
        this.commit(key, result);
        return result;
    }

    /**
     * Async counterpart of getOrCompute: `compute` is awaited outside the
     * critical section and the settled value is what gets cached.
     */
    async getOrComputeAsync(args: readonly unknown[], compute: () => Promise<R>, kwargs?: Kwargs): Promise<R> {
        if (!this.policy.storesEntries) {
            const result = await compute();
            this.counters.recordMiss();
            return result;
        }

        const key = this.keyBuilder.build(args, kwargs);
        const cached = this.lookup(key);
        if (cached.hit) {
            return cached.value;
        }

        const result = await compute();
        this.commit(key, result);
        return result;
    }

    /**
     * Whether a result is cached for these arguments. Does not promote.
     */
    has(args: readonly unknown[], kwargs?: Kwargs): boolean {
        if (!this.policy.storesEntries) {
            return false;
        }
        return this.store.contains(this.keyBuilder.build(args, kwargs));
    }

    /**
     * Cached keys, least recently used first.
     */
    keys(): CacheKey[] {
        return this.store.keys();
    }

    stats(): Stats {
        return this.counters.snapshot(this.policy.capacity, this.store.size);
    }

    /**
     * Drop every entry and zero the counters.
     */
    clear(): void {
        const dropped = this.store.clear();
        this.full = false;
        this.counters.reset();

        this.logger.debug({ dropped: dropped.length }, "cache cleared");

        if (this.onEvict) {
            for (const { key, value } of dropped) {
                this.onEvict(key, value, "clear");
            }
        }
    }

    private lookup(key: CacheKey): Lookup<R> {
        const found = this.store.lookupAndPromote(key);
        if (found.hit) {
            this.counters.recordHit();
        }
        return found;
    }

    private commit(key: CacheKey, result: R): void {
        let evicted: Evicted<R> | undefined;

        // If another caller stored this key while we computed, theirs stays.
        if (!this.store.contains(key)) {
            if (this.full && this.store.size > 0) {
                evicted = this.store.evictAndReuse(key, result);
            } else {
                this.store.insert(key, result);
            }
            this.full = this.policy.isFull(this.store.size);
        }

        this.counters.recordMiss();

        if (evicted !== undefined) {
            this.logger.debug({ size: this.store.size }, "evicted least recently used entry");
            this.onEvict?.(evicted.key, evicted.value, "lru");
        }
    }
}
