import pino from "pino";
import type { Logger } from "../src/logger";
import type { MemoryProbe } from "../src/memory-probe";

/**
 * Memory probe with a settable reading, for deterministic pressure tests.
 */
export class FakeMemoryProbe implements MemoryProbe {
    calls = 0;
    private available: number;
    private failure?: Error;

    constructor(available: number) {
        this.available = available;
    }

    availableBytes(): number {
        this.calls++;
        if (this.failure) {
            throw this.failure;
        }
        return this.available;
    }

    set(available: number): void {
        this.available = available;
        this.failure = undefined;
    }

    fail(error: Error): void {
        this.failure = error;
    }
}

export interface LogLine {
    level: number;
    msg: string;
    [field: string]: unknown;
}

/**
 * pino logger writing parsed JSON lines into an array.
 */
export function captureLogger(): { logger: Logger; lines: LogLine[] } {
    const lines: LogLine[] = [];
    const logger = pino(
        { level: "debug", base: null },
        {
            write(msg: string): void {
                lines.push(JSON.parse(msg));
            },
        }
    );
    return { logger, lines };
}
