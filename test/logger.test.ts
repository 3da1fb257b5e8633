import { describe, it, expect, vi, afterEach } from "vitest";
import { createLogger, getDefaultLogger } from "../src/logger";

describe("createLogger", () => {
    afterEach(() => {
        vi.unstubAllEnvs();
    });

    it("should be silent by default", () => {
        vi.stubEnv("MEMO_LRU_LOG_LEVEL", "");

        expect(createLogger().level).toBe("silent");
    });

    it("should read the level from MEMO_LRU_LOG_LEVEL", () => {
        vi.stubEnv("MEMO_LRU_LOG_LEVEL", "DEBUG");

        expect(createLogger().level).toBe("debug");
    });

    it("should ignore unknown levels", () => {
        vi.stubEnv("MEMO_LRU_LOG_LEVEL", "verbose");

        expect(createLogger().level).toBe("silent");
    });

    it("should prefer an explicit level", () => {
        vi.stubEnv("MEMO_LRU_LOG_LEVEL", "debug");

        expect(createLogger({ level: "warn" }).level).toBe("warn");
    });

    it("should share one default logger", () => {
        expect(getDefaultLogger()).toBe(getDefaultLogger());
    });
});
