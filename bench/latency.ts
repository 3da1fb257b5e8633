import type { LatencySample, LatencyStats, OperationLatencies, OperationType } from "./types";

const EMPTY_STATS: LatencyStats = {
    p50: 0,
    p90: 0,
    p99: 0,
    p999: 0,
    max: 0,
    mean: 0,
    count: 0,
};

/**
 * Growable buffer of durations in nanoseconds.
 */
class DurationSeries {
    private values = new Float64Array(4096);
    private length = 0;

    push(nanos: number): void {
        if (this.length === this.values.length) {
            const grown = new Float64Array(this.values.length * 2);
            grown.set(this.values);
            this.values = grown;
        }
        this.values[this.length++] = nanos;
    }

    /** Sorted copy of the recorded durations. */
    sorted(): Float64Array {
        return this.values.slice(0, this.length).sort();
    }
}

/**
 * Nearest-rank percentiles over an ascending series.
 */
function summarize(sorted: Float64Array): LatencyStats {
    const count = sorted.length;
    if (count === 0) {
        return { ...EMPTY_STATS };
    }

    const at = (p: number): number => sorted[Math.min(count - 1, Math.max(0, Math.ceil(p * count) - 1))];
    let sum = 0;
    for (const nanos of sorted) {
        sum += nanos;
    }

    return {
        p50: at(0.5),
        p90: at(0.9),
        p99: at(0.99),
        p999: at(0.999),
        max: sorted[count - 1],
        mean: sum / count,
        count,
    };
}

/**
 * Call latencies split by outcome.
 *
 * Every call feeds the percentiles. Raw samples for plotting are thinned to
 * one every `ceil(expectedCalls / maxSamples)` calls.
 */
export class OutcomeLatencies {
    private readonly series: Record<OperationType, DurationSeries> = {
        hit: new DurationSeries(),
        miss: new DurationSeries(),
    };
    private readonly samples: LatencySample[] = [];
    private readonly sampleEvery: number;
    private calls = 0;

    constructor(expectedCalls: number, maxSamples = 10000) {
        this.sampleEvery = Math.max(1, Math.ceil(expectedCalls / Math.max(1, maxSamples)));
    }

    record(outcome: OperationType, nanos: bigint, timestamp: number, arg: number): void {
        const duration = Number(nanos);
        this.series[outcome].push(duration);
        if (this.calls++ % this.sampleEvery === 0) {
            this.samples.push({ timestamp, nanos: duration, operation: outcome, arg });
        }
    }

    stats(): OperationLatencies {
        const hit = this.series.hit.sorted();
        const miss = this.series.miss.sorted();

        const all = new Float64Array(hit.length + miss.length);
        all.set(hit);
        all.set(miss, hit.length);

        return {
            hit: summarize(hit),
            miss: summarize(miss),
            total: summarize(all.sort()),
        };
    }

    sampled(): LatencySample[] {
        return this.samples.slice();
    }
}
