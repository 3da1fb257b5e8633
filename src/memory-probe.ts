import os from "node:os";

export interface MemoryProbe {
    /** Bytes of system memory currently available. */
    availableBytes(): number;
}

export type MemoryProbeLike = MemoryProbe | (() => number);

export class OsMemoryProbe implements MemoryProbe {
    availableBytes(): number {
        return os.freemem();
    }
}

/**
 * Accepts either a probe object or a bare function returning bytes.
 */
export function toMemoryProbe(probe: MemoryProbeLike | undefined): MemoryProbe {
    if (probe === undefined) {
        return new OsMemoryProbe();
    }
    if (typeof probe === "function") {
        return { availableBytes: probe };
    }
    return probe;
}
