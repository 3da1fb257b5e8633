import { describe, it, expect } from "vitest";
import {
    createEvictionPolicy,
    DisabledPolicy,
    FixedCapacityPolicy,
    MemoryPressurePolicy,
    UnboundedPolicy,
} from "../src/eviction-policy";
import { OsMemoryProbe, toMemoryProbe } from "../src/memory-probe";
import { FakeMemoryProbe, captureLogger } from "./fakes";

describe("createEvictionPolicy", () => {
    it("should default to a fixed capacity", () => {
        const policy = createEvictionPolicy({}, 128);

        expect(policy).toBeInstanceOf(FixedCapacityPolicy);
        expect(policy.capacity).toBe(128);
        expect(policy.kind).toBe("fixed-capacity");
    });

    it("should select unbounded for null and disabled for 0", () => {
        const unbounded = createEvictionPolicy({ maxSize: null }, 128);
        const disabled = createEvictionPolicy({ maxSize: 0 }, 128);

        expect(unbounded).toBeInstanceOf(UnboundedPolicy);
        expect(unbounded.capacity).toBeNull();
        expect(disabled).toBeInstanceOf(DisabledPolicy);
        expect(disabled.capacity).toBe(0);
        expect(disabled.storesEntries).toBe(false);
    });

    it("should let a memory threshold override maxSize", () => {
        const policy = createEvictionPolicy({ maxSize: 10, memoryThresholdBytes: 1024 }, 128);

        expect(policy).toBeInstanceOf(MemoryPressurePolicy);
        expect(policy.capacity).toBeNull();
    });

    it("should reject invalid sizes", () => {
        expect(() => createEvictionPolicy({ maxSize: -1 }, 128)).toThrow("maxSize must be null or a non-negative integer");
        expect(() => createEvictionPolicy({ maxSize: 1.5 }, 128)).toThrow("maxSize must be null or a non-negative integer");
        expect(() => createEvictionPolicy({ memoryThresholdBytes: 0 }, 128)).toThrow(/memoryThresholdBytes/);
        expect(() => createEvictionPolicy({ memoryThresholdBytes: Number.NaN }, 128)).toThrow(/memoryThresholdBytes/);
    });
});

describe("policies", () => {
    it("disabled is always full and unbounded never is", () => {
        expect(new DisabledPolicy().isFull(0)).toBe(true);
        expect(new UnboundedPolicy().isFull(1_000_000)).toBe(false);
    });

    it("fixed capacity is full once size reaches the limit", () => {
        const policy = new FixedCapacityPolicy(5);

        expect(policy.isFull(4)).toBe(false);
        expect(policy.isFull(5)).toBe(true);
        expect(() => new FixedCapacityPolicy(0)).toThrow(/positive integer/);
    });

    it("memory pressure compares the probe reading with the threshold", () => {
        const probe = new FakeMemoryProbe(100);
        const policy = new MemoryPressurePolicy(200, probe);

        expect(policy.isFull(0)).toBe(true);
        probe.set(200);
        expect(policy.isFull(0)).toBe(false);
        probe.set(10_000);
        expect(policy.isFull(1_000_000)).toBe(false);
        expect(probe.calls).toBe(3);
    });

    it("memory pressure fails open when the probe throws", () => {
        const { logger, lines } = captureLogger();
        const probe = new FakeMemoryProbe(0);
        probe.fail(new Error("probe unavailable"));
        const policy = new MemoryPressurePolicy(200, probe, logger);

        expect(policy.isFull(3)).toBe(false);
        expect(lines).toHaveLength(1);
        expect(lines[0].level).toBe(40);
        expect(lines[0].msg).toBe("memory probe failed; treating cache as not full");
    });

    it("memory pressure fails open on an invalid reading", () => {
        const { logger, lines } = captureLogger();
        const policy = new MemoryPressurePolicy(200, new FakeMemoryProbe(Number.NaN), logger);

        expect(policy.isFull(3)).toBe(false);
        expect(lines[0].msg).toBe("memory probe returned an invalid reading; treating cache as not full");
    });

    it("binds the policy name on the probe logger", () => {
        const { logger, lines } = captureLogger();
        const probe = new FakeMemoryProbe(0);
        probe.fail(new Error("boom"));
        const policy = createEvictionPolicy({ memoryThresholdBytes: 10, memoryProbe: probe, logger }, 128);

        policy.isFull(1);

        expect(lines[0].policy).toBe("memory-pressure");
    });
});

describe("memory probes", () => {
    it("accepts a bare function", () => {
        const policy = createEvictionPolicy({ memoryThresholdBytes: 50, memoryProbe: () => 10 }, 128);

        expect(policy.isFull(1)).toBe(true);
    });

    it("defaults to the operating system reading", () => {
        expect(toMemoryProbe(undefined)).toBeInstanceOf(OsMemoryProbe);
        expect(new OsMemoryProbe().availableBytes()).toBeGreaterThan(0);
    });
});
