import { describe, it, expect } from "vitest";
import { StatsCounter } from "../src/stats-counter";

describe("StatsCounter", () => {
    it("should count hits and misses into a snapshot", () => {
        const counters = new StatsCounter();
        counters.recordHit();
        counters.recordMiss();
        counters.recordMiss();

        expect(counters.snapshot(8, 2)).toEqual({ hits: 1, misses: 2, capacity: 8, size: 2 });
    });

    it("should return independent snapshots", () => {
        const counters = new StatsCounter();
        const before = counters.snapshot(null, 0);

        counters.recordHit();

        expect(before.hits).toBe(0);
        expect(counters.snapshot(null, 0).hits).toBe(1);
    });

    it("should zero both counters on reset", () => {
        const counters = new StatsCounter();
        counters.recordHit();
        counters.recordMiss();

        counters.reset();

        expect(counters.snapshot(0, 0)).toEqual({ hits: 0, misses: 0, capacity: 0, size: 0 });
    });
});
