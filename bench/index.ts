#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import fs from "node:fs";
import type { BenchmarkResult, BenchmarkSuiteResult, MemoizerBenchmark, WorkloadConfig } from "./types";
import { WORKLOADS, generateCalls } from "./workloads";
import {
    MemoCacheBenchmark,
    MemoCacheMemoryBenchmark,
    MemoCacheUnboundedBenchmark,
    LruCacheBenchmark,
    MapBaselineBenchmark,
} from "./baselines";
import { runBenchmark, determineWinner } from "./runner";

/**
 * Available implementations
 */
const IMPLEMENTATIONS: Record<string, new (config: WorkloadConfig) => MemoizerBenchmark> = {
    "memo-lru": MemoCacheBenchmark,
    "memo-lru-memory": MemoCacheMemoryBenchmark,
    "memo-lru-unbounded": MemoCacheUnboundedBenchmark,
    "lru-cache": LruCacheBenchmark,
    "map": MapBaselineBenchmark,
};

interface BenchOptions {
    workload?: string;
    implementations: string;
    output?: string;
    calls?: number;
    maxEntries?: number;
    warmup?: number;
    maxSamples?: number;
    seed?: number;
    quiet: boolean;
}

function parseInteger(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if (Number.isNaN(parsed)) {
        throw new InvalidArgumentError("Not a number.");
    }
    return parsed;
}

/**
 * Main CLI program
 */
const program = new Command();

program
    .name("bench")
    .description("MemoCache benchmark suite - outputs JSON results")
    .version("0.1.0")
    .option("-w, --workload <name>", "Run specific workload (default: all)")
    .option(
        "-i, --implementations <list>",
        `Comma-separated list: ${Object.keys(IMPLEMENTATIONS).join(",")} (default: all)`,
        Object.keys(IMPLEMENTATIONS).join(",")
    )
    .option("-o, --output <file>", "Output file path (default: stdout)")
    .option("--calls <number>", "Override total calls", parseInteger)
    .option("--max-entries <number>", "Override capacity", parseInteger)
    .option("--warmup <number>", "Warmup calls (default: 5000)", parseInteger)
    .option("--max-samples <number>", "Max samples per outcome for JSON size control (default: 10000)", parseInteger)
    .option("--seed <number>", "Random seed for reproducibility", parseInteger)
    .option("--quiet", "Suppress progress output", false)
    .parse();

const options = program.opts<BenchOptions>();

/**
 * Log to stderr (so stdout is clean JSON)
 */
function log(message = ""): void {
    if (!options.quiet) {
        console.error(message);
    }
}

const integer = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

function nanos(value: number): string {
    return value < 1000 ? `${integer.format(value)} ns` : `${(value / 1000).toFixed(1)} us`;
}

/**
 * One stderr line per run: throughput, hit rate, latency and peak heap.
 */
function summarize(result: BenchmarkResult): string {
    const peakHeap = result.memorySamples.reduce((peak, m) => Math.max(peak, m.heapUsed), 0);
    const { p50, p99 } = result.latencies.total;

    return [
        result.implementation.padEnd(20),
        `${integer.format(result.callsPerSec)} calls/s`.padEnd(20),
        `hit ${(result.hitRate * 100).toFixed(1)}%`.padEnd(12),
        `p50 ${nanos(p50)}`.padEnd(14),
        `p99 ${nanos(p99)}`.padEnd(14),
        `heap ${(peakHeap / (1024 * 1024)).toFixed(1)} MB`,
    ].join(" ");
}

/**
 * Main execution
 */
async function main(): Promise<void> {
    log("MemoCache Benchmark Suite");
    log();

    const implNames = options.implementations.split(",").map((s) => s.trim());

    for (const name of implNames) {
        if (!(name in IMPLEMENTATIONS)) {
            console.error(`Unknown implementation: ${name}`);
            console.error(`   Available: ${Object.keys(IMPLEMENTATIONS).join(", ")}`);
            process.exit(1);
        }
    }

    const workloadsToRun: WorkloadConfig[] = [];

    if (options.workload) {
        const workload = WORKLOADS.get(options.workload);
        if (!workload) {
            console.error(`Unknown workload: ${options.workload}`);
            console.error(`   Available: ${Array.from(WORKLOADS.keys()).join(", ")}`);
            process.exit(1);
        }
        workloadsToRun.push(workload);
    } else {
        workloadsToRun.push(...WORKLOADS.values());
    }

    // Apply overrides on copies so the registry stays pristine
    const configured = workloadsToRun.map((workload) => ({
        ...workload,
        totalCalls: options.calls ?? workload.totalCalls,
        maxEntries: options.maxEntries ?? workload.maxEntries,
        seed: options.seed ?? workload.seed,
    }));

    const suiteResults: BenchmarkSuiteResult[] = [];
    let completedCount = 0;
    const totalRuns = configured.length * implNames.length;

    for (const workload of configured) {
        log(`Workload: ${workload.name}`);
        log(`   ${workload.description}`);

        // Generate calls once (same for all implementations)
        const calls = generateCalls(workload);

        const results: BenchmarkResult[] = [];

        for (const implName of implNames) {
            completedCount++;
            log(`   [${completedCount}/${totalRuns}] Running ${implName}...`);

            const ImplClass = IMPLEMENTATIONS[implName];
            const memoizer = new ImplClass(workload);

            const result = await runBenchmark(workload, memoizer, implName, calls, {
                warmupCalls: options.warmup ?? 5000,
                maxSamples: options.maxSamples ?? 10000,
                verbose: false,
            });

            log(`      ${summarize(result)}`);
            results.push(result);
        }

        suiteResults.push({
            workload,
            timestamp: new Date(),
            results,
            winner: determineWinner(results),
        });
        log();
    }

    const output = JSON.stringify(suiteResults, null, 2);

    if (options.output) {
        fs.writeFileSync(options.output, output, "utf-8");
        log(`Results written to ${options.output}`);
    } else {
        console.log(output);
    }

    log("Benchmark complete!");
}

main().catch((error: unknown) => {
    console.error("Error:", error instanceof Error ? error.stack ?? error.message : error);
    process.exit(1);
});
