import type { Stats } from "./types";

/**
 * Hit/miss counters. Only touched from the engine's critical sections, so a
 * snapshot never mixes counts from different mutations.
 */
export class StatsCounter {
    private hits = 0;
    private misses = 0;

    recordHit(): void {
        this.hits++;
    }

    recordMiss(): void {
        this.misses++;
    }

    snapshot(capacity: number | null, size: number): Stats {
        return {
            hits: this.hits,
            misses: this.misses,
            capacity,
            size,
        };
    }

    reset(): void {
        this.hits = 0;
        this.misses = 0;
    }
}
