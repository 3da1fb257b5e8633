import type { Logger } from "./logger";
import { toMemoryProbe, type MemoryProbe, type MemoryProbeLike } from "./memory-probe";

export type PolicyKind = "disabled" | "unbounded" | "fixed-capacity" | "memory-pressure";

/**
 * Decides when the cache is full.
 *
 * `isFull` is asked only right after an entry has been inserted. The engine
 * caches the answer and evicts on the *next* insertion, so a fixed capacity
 * of n really holds n entries.
 */
export interface EvictionPolicy {
    readonly kind: PolicyKind;
    /** Reported in stats: entry limit, or null when count is not the limit. */
    readonly capacity: number | null;
    /** False only for the disabled policy: nothing is ever stored. */
    readonly storesEntries: boolean;
    isFull(size: number): boolean;
}

export class DisabledPolicy implements EvictionPolicy {
    readonly kind = "disabled";
    readonly capacity = 0;
    readonly storesEntries = false;

    isFull(_size: number): boolean {
        return true;
    }
}

export class UnboundedPolicy implements EvictionPolicy {
    readonly kind = "unbounded";
    readonly capacity = null;
    readonly storesEntries = true;

    isFull(_size: number): boolean {
        return false;
    }
}

export class FixedCapacityPolicy implements EvictionPolicy {
    readonly kind = "fixed-capacity";
    readonly capacity: number;
    readonly storesEntries = true;

    constructor(maxSize: number) {
        if (!Number.isInteger(maxSize) || maxSize <= 0) {
            throw new Error("maxSize must be a positive integer");
        }
        this.capacity = maxSize;
    }

    isFull(size: number): boolean {
        return size >= this.capacity;
    }
}

/**
 * Full whenever available system memory drops below the threshold.
 * Entry count is ignored, so the cache may keep growing between readings.
 */
export class MemoryPressurePolicy implements EvictionPolicy {
    readonly kind = "memory-pressure";
    readonly capacity = null;
    readonly storesEntries = true;
    readonly thresholdBytes: number;
    private readonly probe: MemoryProbe;
    private readonly logger?: Logger;

    constructor(thresholdBytes: number, probe: MemoryProbe, logger?: Logger) {
        if (!Number.isFinite(thresholdBytes) || thresholdBytes <= 0) {
            throw new Error("memoryThresholdBytes must be a positive finite number");
        }
        this.thresholdBytes = thresholdBytes;
        this.probe = probe;
        this.logger = logger;
    }

    isFull(_size: number): boolean {
        let available: number;
        try {
            available = this.probe.availableBytes();
        } catch (err) {
            // fail open
            this.logger?.warn({ err }, "memory probe failed; treating cache as not full");
            return false;
        }
        if (!Number.isFinite(available) || available < 0) {
            this.logger?.warn({ available }, "memory probe returned an invalid reading; treating cache as not full");
            return false;
        }
        return available < this.thresholdBytes;
    }
}

export interface PolicyOptions {
    maxSize?: number | null;
    memoryThresholdBytes?: number;
    memoryProbe?: MemoryProbeLike;
    logger?: Logger;
}

/**
 * Pick the policy once, at construction. A memory threshold overrides maxSize.
 */
export function createEvictionPolicy(opts: PolicyOptions, defaultMaxSize: number): EvictionPolicy {
    if (opts.memoryThresholdBytes !== undefined) {
        return new MemoryPressurePolicy(
            opts.memoryThresholdBytes,
            toMemoryProbe(opts.memoryProbe),
            opts.logger?.child({ policy: "memory-pressure" })
        );
    }

    const maxSize = opts.maxSize === undefined ? defaultMaxSize : opts.maxSize;
    if (maxSize === null) {
        return new UnboundedPolicy();
    }
    if (!Number.isInteger(maxSize) || maxSize < 0) {
        throw new Error("maxSize must be null or a non-negative integer");
    }
    if (maxSize === 0) {
        return new DisabledPolicy();
    }
    return new FixedCapacityPolicy(maxSize);
}
