import { describe, it, expect } from "vitest";
import { RecencyStore } from "../src/recency-store";
import { KeyBuilder } from "../src/key-builder";

describe("RecencyStore", () => {
    describe("insert & lookupAndPromote", () => {
        it("should find inserted values and promote them", () => {
            const store = new RecencyStore<number>();
            store.insert("a", 1);
            store.insert("b", 2);

            expect(store.lookupAndPromote("a")).toEqual({ hit: true, value: 1 });
            expect(store.keys()).toEqual(["b", "a"]);
            expect(store.size).toBe(2);
        });

        it("should leave recency untouched on a miss", () => {
            const store = new RecencyStore<number>();
            store.insert("a", 1);
            store.insert("b", 2);

            expect(store.lookupAndPromote("zzz")).toEqual({ hit: false });
            expect(store.keys()).toEqual(["a", "b"]);
        });

        it("should accept null and undefined as keys", () => {
            const store = new RecencyStore<string>();
            store.insert(undefined, "u");
            store.insert(null, "n");

            expect(store.contains(undefined)).toBe(true);
            expect(store.lookupAndPromote(null)).toEqual({ hit: true, value: "n" });
        });

        it("should match composite keys by value", () => {
            const keys = new KeyBuilder();
            const store = new RecencyStore<string>();
            store.insert(keys.build([1, "x"]), "first");

            expect(store.lookupAndPromote(keys.build([1, "x"]))).toEqual({ hit: true, value: "first" });
            expect(store.contains(keys.build([1, "y"]))).toBe(false);
        });

        it("should keep string keys apart from composite digests", () => {
            const keys = new KeyBuilder();
            const store = new RecencyStore<string>();
            store.insert("n1,n2", "string");
            store.insert(keys.build([1, 2]), "pair");

            expect(store.size).toBe(2);
            expect(store.lookupAndPromote("n1,n2")).toEqual({ hit: true, value: "string" });
            expect(store.lookupAndPromote(keys.build([1, 2]))).toEqual({ hit: true, value: "pair" });
        });

        it("should throw once a bounded arena is exhausted", () => {
            const store = new RecencyStore<number>({ maxEntries: 2 });
            store.insert(1, 1);
            store.insert(2, 2);

            expect(() => store.insert(3, 3)).toThrow("Failed to allocate entry ID");
        });
    });

    describe("contains", () => {
        it("should report presence without promoting", () => {
            const store = new RecencyStore<number>();
            store.insert("a", 1);
            store.insert("b", 2);

            expect(store.contains("a")).toBe(true);
            expect(store.contains("c")).toBe(false);
            expect(store.keys()).toEqual(["a", "b"]);
        });
    });

    describe("evictAndReuse", () => {
        it("should replace the least recent entry and return it", () => {
            const store = new RecencyStore<number>({ maxEntries: 2 });
            store.insert("a", 1);
            store.insert("b", 2);

            const evicted = store.evictAndReuse("c", 3);

            expect(evicted).toEqual({ key: "a", value: 1 });
            expect(store.contains("a")).toBe(false);
            expect(store.keys()).toEqual(["b", "c"]);
            expect(store.size).toBe(2);
        });

        it("should respect promotions when picking the victim", () => {
            const store = new RecencyStore<number>({ maxEntries: 3 });
            store.insert("a", 1);
            store.insert("b", 2);
            store.insert("c", 3);
            store.lookupAndPromote("a");

            expect(store.evictAndReuse("d", 4)).toEqual({ key: "b", value: 2 });
            expect(store.keys()).toEqual(["c", "a", "d"]);
        });

        it("should work with a single entry", () => {
            const store = new RecencyStore<number>({ maxEntries: 1 });
            store.insert("a", 1);

            expect(store.evictAndReuse("b", 2)).toEqual({ key: "a", value: 1 });
            expect(store.lookupAndPromote("b")).toEqual({ hit: true, value: 2 });
        });

        it("should throw when the store is empty", () => {
            const store = new RecencyStore<number>();

            expect(() => store.evictAndReuse("a", 1)).toThrow("cannot evict from an empty store");
        });
    });

    describe("clear", () => {
        it("should return dropped entries least recent first and accept new ones", () => {
            const store = new RecencyStore<number>({ maxEntries: 3 });
            store.insert("a", 1);
            store.insert("b", 2);
            store.lookupAndPromote("a");

            expect(store.clear()).toEqual([
                { key: "b", value: 2 },
                { key: "a", value: 1 },
            ]);
            expect(store.size).toBe(0);
            expect(store.keys()).toEqual([]);

            store.insert("c", 3);
            store.insert("d", 4);
            store.insert("e", 5);
            expect(store.keys()).toEqual(["c", "d", "e"]);
        });
    });
});
