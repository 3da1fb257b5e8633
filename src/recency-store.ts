import { EntryStore, type EntryId } from "./entry-store";
import { RecencyList } from "./recency-list";
import { HashedKey, type CacheKey, type PrimitiveKey } from "./key-builder";
import { NIL } from "./constants";

export type Lookup<V> = { hit: true; value: V } | { hit: false };

export interface Evicted<V> {
    key: CacheKey;
    value: V;
}

/**
 * Key -> EntryId map. Primitive keys and composite digests live in separate
 * maps so a string argument can never collide with a composite's digest.
 */
class KeyIndex {
    private readonly primitives = new Map<PrimitiveKey, EntryId>();
    private readonly composites = new Map<string, EntryId>();

    get(key: CacheKey): EntryId | undefined {
        return key instanceof HashedKey ? this.composites.get(key.digest) : this.primitives.get(key);
    }

    has(key: CacheKey): boolean {
        return key instanceof HashedKey ? this.composites.has(key.digest) : this.primitives.has(key);
    }

    set(key: CacheKey, id: EntryId): void {
        if (key instanceof HashedKey) {
            this.composites.set(key.digest, id);
        } else {
            this.primitives.set(key, id);
        }
    }

    delete(key: CacheKey): void {
        if (key instanceof HashedKey) {
            this.composites.delete(key.digest);
        } else {
            this.primitives.delete(key);
        }
    }

    clear(): void {
        this.primitives.clear();
        this.composites.clear();
    }
}

/**
 * RecencyStore = key index + arena + recency list.
 *
 * Not synchronized on its own: the engine only calls it from synchronous
 * critical sections.
 */
export class RecencyStore<V> {
    private readonly entries: EntryStore<CacheKey, V>;
    private readonly list: RecencyList<CacheKey, V>;
    private readonly index = new KeyIndex();

    constructor(opts: { maxEntries?: number } = {}) {
        this.entries = new EntryStore<CacheKey, V>({ maxEntries: opts.maxEntries });
        this.list = new RecencyList(this.entries);
    }

    get size(): number {
        return this.entries.liveCount();
    }

    contains(key: CacheKey): boolean {
        return this.index.has(key);
    }

    /**
     * Read a value and mark it most recently used.
     * A miss leaves the structure untouched.
     */
    lookupAndPromote(key: CacheKey): Lookup<V> {
        const id = this.index.get(key);
        if (id === undefined) {
            return { hit: false };
        }

        this.list.promote(id);
        return { hit: true, value: this.readValue(id) };
    }

    /**
     * Store a new entry at the most recent end.
     * The key must not be present.
     */
    insert(key: CacheKey, value: V): void {
        const id = this.entries.allocEntry(key, value);
        if (id === NIL) {
            throw new Error("Failed to allocate entry ID");
        }
        this.list.linkMostRecent(id);
        this.index.set(key, id);
    }

    /**
     * Evict the least recently used entry and reuse its slot for a new one.
     *
     * The evicted key and value are returned rather than dropped: anything the
     * caller does with them (callbacks that may re-enter the cache) must wait
     * until this method has left the index and list consistent again.
     */
    evictAndReuse(key: CacheKey, value: V): Evicted<V> {
        if (this.list.isEmpty()) {
            throw new Error("cannot evict from an empty store");
        }
        const id = this.list.leastRecent();

        const evicted: Evicted<V> = {
            key: this.readKey(id),
            value: this.readValue(id),
        };

        this.index.delete(evicted.key);
        this.entries.setEntry(id, key, value);
        this.list.promote(id);
        // index assignment last, once the links are consistent
        this.index.set(key, id);

        return evicted;
    }

    /**
     * Keys from least to most recently used.
     */
    keys(): CacheKey[] {
        const out: CacheKey[] = [];
        for (const id of this.list.ids()) {
            out.push(this.readKey(id));
        }
        return out;
    }

    /**
     * Empty the store, returning what it held (least recent first).
     */
    clear(): Array<Evicted<V>> {
        const dropped: Array<Evicted<V>> = [];
        for (const id of this.list.ids()) {
            dropped.push({ key: this.readKey(id), value: this.readValue(id) });
        }

        this.index.clear();
        this.entries.reset();
        this.list.reset();

        return dropped;
    }

    private readKey(id: EntryId): CacheKey {
        return this.entries.keyRef[id];
    }

    private readValue(id: EntryId): V {
        if (!this.entries.isUsed(id)) {
            throw new Error(`entryId=${id} is not allocated`);
        }
        return this.entries.valRef[id];
    }
}
