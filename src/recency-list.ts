import type { EntryStore, EntryId } from "./entry-store";
import { ROOT } from "./constants";

/**
 * RecencyList orders entry IDs from least to most recently used.
 *
 * The list is circular around the ROOT sentinel slot, stored in the
 * EntryStore's prev/next arrays:
 *   next[ROOT] -> least recent ... most recent <- prev[ROOT]
 * An empty list is ROOT linked to itself, so no operation special-cases
 * the ends.
 */
export class RecencyList<K, V> {
    private readonly store: EntryStore<K, V>;

    constructor(store: EntryStore<K, V>) {
        this.store = store;
        this.reset();
    }

    /**
     * Link an entry at the most recent end.
     */
    linkMostRecent(id: EntryId): void {
        const { prev, next } = this.store;
        const last = prev[ROOT];

        next[last] = id;
        prev[id] = last;
        next[id] = ROOT;
        prev[ROOT] = id;
    }

    /**
     * Remove an entry from the list. Its own links are left stale;
     * callers relink or free it straight after.
     */
    unlink(id: EntryId): void {
        const { prev, next } = this.store;
        const before = prev[id];
        const after = next[id];

        next[before] = after;
        prev[after] = before;
    }

    /**
     * Move an entry to the most recent end.
     */
    promote(id: EntryId): void {
        if (this.mostRecent() === id) {
            return;
        }

        this.unlink(id);
        this.linkMostRecent(id);
    }

    /**
     * Least recently used entry, or ROOT if the list is empty.
     */
    leastRecent(): EntryId {
        return this.store.next[ROOT];
    }

    /**
     * Most recently used entry, or ROOT if the list is empty.
     */
    mostRecent(): EntryId {
        return this.store.prev[ROOT];
    }

    isEmpty(): boolean {
        return this.store.next[ROOT] === ROOT;
    }

    /**
     * Walk entry IDs from least to most recent.
     */
    *ids(): IterableIterator<EntryId> {
        const { next } = this.store;
        for (let id = next[ROOT]; id !== ROOT; id = next[id]) {
            yield id;
        }
    }

    /**
     * Reset to the empty circular state.
     */
    reset(): void {
        this.store.next[ROOT] = ROOT;
        this.store.prev[ROOT] = ROOT;
    }
}
