export { MemoCache } from "./memo-cache";
export { memoize, memoizeAsync } from "./memoize";
export type { Memoized, MemoizedAsync } from "./memoize";
export { KeyBuilder, HashedKey, KWARGS_MARK, typeTag } from "./key-builder";
export type { CacheKey, PrimitiveKey, Kwargs } from "./key-builder";
export {
    createEvictionPolicy,
    DisabledPolicy,
    UnboundedPolicy,
    FixedCapacityPolicy,
    MemoryPressurePolicy,
} from "./eviction-policy";
export type { EvictionPolicy, PolicyKind, PolicyOptions } from "./eviction-policy";
export { OsMemoryProbe } from "./memory-probe";
export type { MemoryProbe, MemoryProbeLike } from "./memory-probe";
export { UnhashableArgumentError } from "./errors";
export { createLogger } from "./logger";
export type { Logger, LoggerConfig } from "./logger";
export type { Options, Stats, EvictReason } from "./types";
