import pino, { type Logger, type LevelWithSilent } from "pino";

export type { Logger } from "pino";

const LEVELS: readonly LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export interface LoggerConfig {
    /** Defaults to MEMO_LRU_LOG_LEVEL, then "silent". */
    level?: LevelWithSilent;
    base?: Record<string, unknown>;
}

function levelFromEnv(): LevelWithSilent {
    const raw = process.env.MEMO_LRU_LOG_LEVEL?.toLowerCase();
    const match = LEVELS.find((level) => level === raw);
    return match ?? "silent";
}

/**
 * Create the library's pino logger.
 * Caches are quiet by default; set MEMO_LRU_LOG_LEVEL=debug to trace evictions.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
    return pino({
        name: "memo-lru",
        level: config.level ?? levelFromEnv(),
        base: config.base ?? null,
    });
}

let defaultLogger: Logger | undefined;

/**
 * Shared fallback logger for caches constructed without one.
 */
export function getDefaultLogger(): Logger {
    if (defaultLogger === undefined) {
        defaultLogger = createLogger();
    }
    return defaultLogger;
}
