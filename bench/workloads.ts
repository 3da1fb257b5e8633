import type { WorkloadConfig } from "./types";

/**
 * Default seed for reproducibility
 */
const DEFAULT_SEED = 42;

const MB = 1024 * 1024;

/**
 * Uniform Churn: argument space much larger than capacity.
 *
 * Most calls miss, so this measures the eviction path: every miss on a
 * full cache reuses the least recently used slot.
 */
export const UNIFORM_CHURN: WorkloadConfig = {
    name: "uniform-churn",
    description: "Uniform arguments over 5x the capacity - eviction heavy",
    maxEntries: 10_000,
    totalCalls: 200_000,
    keySpace: 50_000,
    distribution: "uniform",
    computeIterations: 50,
    memoryThresholdBytes: 256 * MB,
    seed: DEFAULT_SEED,
};

/**
 * Zipf Hotspot: a small set of hot arguments dominates.
 *
 * Typical memoization pattern; recency keeps the hot set resident.
 */
export const ZIPF_HOTSPOT: WorkloadConfig = {
    name: "zipf-hotspot",
    description: "Zipf(1.0) arguments over 10x the capacity - hit heavy",
    maxEntries: 5_000,
    totalCalls: 200_000,
    keySpace: 50_000,
    distribution: "zipf",
    zipfAlpha: 1.0,
    computeIterations: 50,
    memoryThresholdBytes: 256 * MB,
    seed: DEFAULT_SEED,
};

/**
 * Map of all workloads by name
 */
export const WORKLOADS = new Map<string, WorkloadConfig>([
    [UNIFORM_CHURN.name, UNIFORM_CHURN],
    [ZIPF_HOTSPOT.name, ZIPF_HOTSPOT],
]);

/**
 * xorshift32 over a non-zero state; yields floats in [0, 1).
 */
function createRng(seed: number): () => number {
    let state = (seed | 0) || 0x9e3779b9;
    return () => {
        state ^= state << 13;
        state ^= state >>> 17;
        state ^= state << 5;
        return (state >>> 0) / 0x1_0000_0000;
    };
}

/**
 * Argument sampler for a Zipf(alpha) law over [0, n): argument i is drawn
 * with weight 1 / (i + 1)^alpha.
 */
function zipfSampler(n: number, alpha: number, rng: () => number): () => number {
    const cdf = new Float64Array(n);
    let total = 0;
    for (let i = 0; i < n; i++) {
        total += (i + 1) ** -alpha;
        cdf[i] = total;
    }

    return () => {
        const target = rng() * total;
        let lo = 0;
        let hi = n - 1;
        while (lo < hi) {
            const mid = (lo + hi) >>> 1;
            if (cdf[mid] <= target) {
                lo = mid + 1;
            } else {
                hi = mid;
            }
        }
        return lo;
    };
}

/**
 * Generate the argument sequence for a workload.
 * Pre-generated so every implementation sees the same calls.
 */
export function generateCalls(config: WorkloadConfig): Int32Array {
    const rng = createRng(config.seed);
    const next = config.distribution === "zipf"
        ? zipfSampler(config.keySpace, config.zipfAlpha ?? 1.0, rng)
        : () => Math.floor(rng() * config.keySpace);

    const calls = new Int32Array(config.totalCalls);
    for (let i = 0; i < calls.length; i++) {
        calls[i] = next();
    }
    return calls;
}
