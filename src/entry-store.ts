import { NIL, ROOT } from "./constants";

export type EntryId = number;

/**
 * EntryStore = SoA arena for cache entries + id allocator + growth.
 *
 * Slots are never freed one by one: eviction overwrites the least recent slot
 * in place, and clear() resets the whole arena.
 *
 * Conventions:
 * - entryId: integer in [1, cap-1]; slot ROOT (0) is reserved for the list sentinel
 * - allocated slot: used[id] === 1 (source of truth; keys may legitimately be undefined)
 * - list pointers: NIL means unlinked
 */
export class EntryStore<K, V> {
    private readonly maxEntries: number;
    private cap: number;
    private sizeAllocated: number; // next fresh id

    // SoA refs; unallocated slots are holes
    public readonly keyRef: K[];
    public readonly valRef: V[];

    // SoA metadata
    public used: Uint8Array;
    public prev: Int32Array;
    public next: Int32Array;

    /**
     * @param opts.maxEntries - upper bound on live entries; omit for an unbounded arena
     */
    constructor(opts: { maxEntries?: number; initialCap?: number } = {}) {
        const maxEntries = opts.maxEntries ?? Number.POSITIVE_INFINITY;
        if (maxEntries !== Number.POSITIVE_INFINITY && (!Number.isInteger(maxEntries) || maxEntries <= 0)) {
            throw new Error("maxEntries must be a positive integer");
        }
        this.maxEntries = maxEntries;

        // +1 for the sentinel slot
        const initialCap = opts.initialCap ?? Math.min(1024, maxEntries + 1);
        if (!Number.isInteger(initialCap) || initialCap < 2) {
            throw new Error("initialCap must be an integer >= 2");
        }
        if (initialCap > maxEntries + 1) {
            throw new Error("initialCap cannot exceed maxEntries + 1");
        }

        this.cap = initialCap;
        this.sizeAllocated = ROOT + 1;

        this.keyRef = new Array<K>(this.cap);
        this.valRef = new Array<V>(this.cap);

        this.used = new Uint8Array(this.cap);
        this.prev = new Int32Array(this.cap).fill(NIL);
        this.next = new Int32Array(this.cap).fill(NIL);
    }

    /** Number of slots currently holding an entry. */
    liveCount(): number {
        return this.sizeAllocated - 1;
    }

    /**
     * Allocate an entryId and store key/value in it.
     * Returns NIL if impossible (at maxEntries).
     */
    allocEntry(key: K, value: V): EntryId {
        if (this.sizeAllocated - 1 >= this.maxEntries) return NIL;

        const id = this.sizeAllocated++;
        if (id >= this.cap) {
            this.ensureCapacity(id + 1);
        }

        this.used[id] = 1;
        this.keyRef[id] = key;
        this.valRef[id] = value;
        this.prev[id] = NIL;
        this.next[id] = NIL;
        return id;
    }

    isUsed(id: EntryId): boolean {
        return id > ROOT && id < this.cap && this.used[id] === 1;
    }

    /**
     * Overwrite key and value of a live slot in place.
     */
    setEntry(id: EntryId, key: K, value: V): void {
        this.assertLive(id);
        this.keyRef[id] = key;
        this.valRef[id] = value;
    }

    /**
     * Drop every entry. Allocated capacity is kept for reuse.
     */
    reset(): void {
        this.keyRef.length = 0;
        this.keyRef.length = this.cap;
        this.valRef.length = 0;
        this.valRef.length = this.cap;
        this.used.fill(0);
        this.prev.fill(NIL);
        this.next.fill(NIL);
        this.sizeAllocated = ROOT + 1;
    }

    private assertLive(id: EntryId): void {
        if (!Number.isInteger(id) || id <= ROOT || id >= this.cap) {
            throw new Error(`invalid entryId: ${id}`);
        }
        if (this.used[id] === 0) {
            throw new Error(`entryId=${id} is not allocated`);
        }
    }

    /**
     * Growth strategy: doubling, capped at maxEntries + 1.
     * Copies typed arrays.
     */
    private ensureCapacity(required: number): void {
        if (required <= this.cap) return;

        const limit = this.maxEntries + 1;
        let newCap = this.cap;
        while (newCap < required) {
            const prevCap = newCap;
            newCap = Math.min(newCap * 2, limit);
            if (newCap === prevCap) {
                throw new Error(`cannot grow capacity to ${required} (maxEntries=${this.maxEntries})`);
            }
        }

        this.keyRef.length = newCap;
        this.valRef.length = newCap;

        const oldUsed = this.used;
        const oldPrev = this.prev;
        const oldNext = this.next;

        this.used = new Uint8Array(newCap);
        this.prev = new Int32Array(newCap).fill(NIL);
        this.next = new Int32Array(newCap).fill(NIL);

        this.used.set(oldUsed);
        this.prev.set(oldPrev);
        this.next.set(oldNext);

        this.cap = newCap;
    }
}
