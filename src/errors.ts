/**
 * Thrown when a call argument cannot take part in a cache key: it has no
 * stable equality (mutable arrays and plain objects, Map, Set, Date, ...).
 */
export class UnhashableArgumentError extends TypeError {
    /** Positional index, or keyword name, of the offending argument. */
    public readonly position: number | string;

    constructor(position: number | string, typeName: string, detail?: string) {
        const where = typeof position === "number" ? `argument ${position}` : `keyword argument "${position}"`;
        super(`unhashable ${where} of type ${typeName}${detail ? `: ${detail}` : ""}`);
        this.name = "UnhashableArgumentError";
        this.position = position;
    }
}
