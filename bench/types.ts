/**
 * Memoizer stats (benchmark-specific, includes evictions)
 */
export interface Stats {
    size: number;
    hits: number;
    misses: number;
    evictions: number;
}

/**
 * Key distribution patterns for workload generation
 */
export type Distribution = "uniform" | "zipf";

/**
 * Workload configuration parameters
 */
export interface WorkloadConfig {
    name: string;
    description: string;

    // Size parameters
    maxEntries: number;      // Memoizer capacity
    totalCalls: number;      // Total memoized calls to perform
    keySpace: number;        // Total distinct arguments

    // Key distribution
    distribution: Distribution;
    zipfAlpha?: number;      // Zipf parameter (1.0 = realistic hotspot)

    // Cost of one miss, in loop iterations of the fake computation
    computeIterations: number;

    // Threshold for the memory-pressure variant, in bytes
    memoryThresholdBytes: number;

    // Reproducibility
    seed: number;
}

/**
 * Value produced by the benchmark computation
 */
export interface ComputedValue {
    id: number;
    checksum: number;
}

/**
 * Computation handed to every memoizer; the runner uses it to tell hits from misses
 */
export type Compute = (arg: number) => ComputedValue;

/**
 * Call outcome types for tracking
 */
export type OperationType = "hit" | "miss";

/**
 * Raw latency sample (for violin plots / CDFs)
 */
export interface LatencySample {
    timestamp: number;       // Relative time in ms from benchmark start
    nanos: number;
    operation: OperationType;
    arg: number;             // Argument of the call
}

/**
 * Latency statistics (in nanoseconds)
 */
export interface LatencyStats {
    p50: number;
    p90: number;
    p99: number;
    p999: number;
    max: number;
    mean: number;
    count: number;
}

/**
 * Per-outcome latency breakdown
 */
export interface OperationLatencies {
    hit: LatencyStats;
    miss: LatencyStats;
    total: LatencyStats;
}

/**
 * Memory usage snapshot
 */
export interface MemorySample {
    timestamp: number;      // Relative time in ms from benchmark start
    heapUsed: number;       // Bytes
    heapTotal: number;      // Bytes
    external: number;       // Bytes
    rss: number;            // Bytes (Resident Set Size)
}

/**
 * Result from a single benchmark run
 */
export interface BenchmarkResult {
    implementation: string;
    workload: string;

    // Throughput
    totalCalls: number;
    durationMs: number;
    callsPerSec: number;

    latencies: OperationLatencies;
    samples: LatencySample[];

    stats: Stats;
    hitRate: number;  // hits / (hits + misses)
    evictions: number; // evictions during measurement

    memorySamples: MemorySample[];
}

/**
 * Common interface for all memoizers in benchmarks
 */
export interface MemoizerBenchmark {
    call(arg: number, compute: Compute): ComputedValue;
    stats(): Stats;
    close(): void;
}

/**
 * Full benchmark suite results
 */
export interface BenchmarkSuiteResult {
    workload: WorkloadConfig;
    timestamp: Date;
    results: BenchmarkResult[];
    winner?: string;  // Implementation with best composite latency
}

/**
 * Runner options
 */
export interface RunnerOptions {
    warmupCalls?: number;
    maxSamples?: number;  // Max samples per outcome (default: 10000)
    verbose?: boolean;
}
