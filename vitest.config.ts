import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",
        globals: false,
        include: ["test/**/*.test.ts"],
        pool: "threads",
        testTimeout: 10_000
    }
});
