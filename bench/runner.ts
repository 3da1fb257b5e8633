import type {
    BenchmarkResult,
    Compute,
    ComputedValue,
    MemoizerBenchmark,
    MemorySample,
    WorkloadConfig,
    RunnerOptions,
} from "./types";
import { OutcomeLatencies } from "./latency";

/**
 * Deterministic stand-in for an expensive pure function.
 * Cost grows linearly with `iterations`.
 */
export function simulateWork(arg: number, iterations: number): ComputedValue {
    let h = arg | 0;
    for (let i = 0; i < iterations; i++) {
        h = Math.imul(h ^ (h >>> 13), 0x5bd1e995) + i;
    }
    return { id: arg, checksum: h >>> 0 };
}

/**
 * Run a benchmark for a single memoizer
 *
 * @param workload - Workload configuration
 * @param implementation - Memoizer to benchmark
 * @param implName - Name of implementation (for result)
 * @param calls - Pre-generated argument sequence
 * @param options - Runner options
 * @returns Benchmark result
 */
export async function runBenchmark(
    workload: WorkloadConfig,
    implementation: MemoizerBenchmark,
    implName: string,
    calls: Int32Array,
    options: RunnerOptions = {}
): Promise<BenchmarkResult> {
    const {
        warmupCalls = 5000,
        maxSamples = 10000,
        verbose = false,
    } = options;

    if (verbose) {
        console.error(`  Running ${implName}...`);
    }

    const latencies = new OutcomeLatencies(calls.length, maxSamples);
    const memorySamples: MemorySample[] = [];

    // A hit never reaches the computation, so the flag tells the outcome apart
    let computed = false;
    const compute: Compute = (arg) => {
        computed = true;
        return simulateWork(arg, workload.computeIterations);
    };

    // Phase 1: Warmup (no measurement)
    if (verbose) {
        console.error(`    Warming up (${warmupCalls} calls)...`);
    }
    const warmupCount = Math.min(warmupCalls, calls.length);
    for (let i = 0; i < warmupCount; i++) {
        implementation.call(calls[i], compute);
    }

    await new Promise<void>((resolve) => setTimeout(resolve, 100));

    // Phase 2: GC baseline, when node runs with --expose-gc
    if (typeof global.gc === "function") {
        global.gc();
    }

    // Phase 3: Measurement (steady state)
    if (verbose) {
        console.error(`    Measuring (${calls.length} calls)...`);
    }

    const statsBeforeMeasurement = implementation.stats();

    const startTime = Date.now();
    let currentTime = 0;
    let lastMemSampleTime = 0;

    for (const arg of calls) {
        currentTime = Date.now() - startTime;

        // Sample memory usage every 1ms
        if (currentTime - lastMemSampleTime >= 1) {
            const mem = process.memoryUsage();
            memorySamples.push({
                timestamp: currentTime,
                heapUsed: mem.heapUsed,
                heapTotal: mem.heapTotal,
                external: mem.external,
                rss: mem.rss,
            });
            lastMemSampleTime = currentTime;
        }

        computed = false;
        const start = process.hrtime.bigint();
        implementation.call(arg, compute);
        const end = process.hrtime.bigint();

        latencies.record(computed ? "miss" : "hit", end - start, currentTime, arg);
    }

    const durationMs = Math.max(1, Date.now() - startTime);

    // Phase 4: Collect stats
    const stats = implementation.stats();
    const measuredHits = stats.hits - statsBeforeMeasurement.hits;
    const measuredMisses = stats.misses - statsBeforeMeasurement.misses;
    const totalCalls = measuredHits + measuredMisses;

    // Phase 5: Cleanup
    implementation.close();

    return {
        implementation: implName,
        workload: workload.name,
        totalCalls: calls.length,
        durationMs,
        callsPerSec: (calls.length / durationMs) * 1000,
        latencies: latencies.stats(),
        samples: latencies.sampled(),
        stats,
        hitRate: totalCalls > 0 ? measuredHits / totalCalls : 0,
        evictions: stats.evictions - statsBeforeMeasurement.evictions,
        memorySamples,
    };
}

/**
 * Determine the winner based on a composite latency score
 *
 * Score = p50 * 0.3 + p99 * 0.7
 *
 * Lower is better; tail latency weighs more than the median.
 */
export function determineWinner(results: BenchmarkResult[]): string | undefined {
    if (results.length === 0) return undefined;

    let best = results[0];
    let bestScore = score(best);

    for (const result of results) {
        const current = score(result);
        if (current < bestScore) {
            best = result;
            bestScore = current;
        }
    }

    return best.implementation;
}

function score(result: BenchmarkResult): number {
    const latency = result.latencies.total;
    return latency.p50 * 0.3 + latency.p99 * 0.7;
}
