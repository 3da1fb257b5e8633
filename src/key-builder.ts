import { UnhashableArgumentError } from "./errors";

/** Keys a Map already compares by value; used as cache keys unwrapped. */
export type PrimitiveKey = string | number | null | undefined;

export type CacheKey = PrimitiveKey | HashedKey;

export type Kwargs = Readonly<Record<string, unknown>>;

/** Separates positional values from keyword pairs in a key's parts. */
export const KWARGS_MARK: unique symbol = Symbol("memo-lru.kwargs");

/**
 * Composite key. The digest is computed once, when the key is built, and is
 * what the store indexes on: two keys are equal iff their digests are.
 */
export class HashedKey {
    readonly parts: readonly unknown[];
    readonly digest: string;

    constructor(parts: readonly unknown[], digest: string) {
        this.parts = Object.freeze(parts.slice());
        this.digest = digest;
        Object.freeze(this);
    }

    toString(): string {
        return `HashedKey(${this.digest})`;
    }
}

function isPlainObject(value: object): boolean {
    const proto: object | null = Object.getPrototypeOf(value);
    return proto === null || proto === Object.prototype;
}

function isMutableContainer(value: object): boolean {
    return value instanceof Map
        || value instanceof Set
        || value instanceof WeakMap
        || value instanceof WeakSet
        || value instanceof Date
        || value instanceof ArrayBuffer
        || ArrayBuffer.isView(value);
}

/**
 * Type name appended to keys in typed mode.
 */
export function typeTag(value: unknown): string {
    if (value === null) return "null";
    if (Array.isArray(value)) return "array";
    if (typeof value !== "object") return typeof value;
    const proto: object | null = Object.getPrototypeOf(value);
    if (proto === null || proto === Object.prototype) return "object";
    const ctor: unknown = Reflect.get(proto, "constructor");
    return typeof ctor === "function" && ctor.name !== "" ? ctor.name : "object";
}

/**
 * Builds cache keys from call arguments.
 *
 * Equality rules:
 * - numbers and bigints compare numerically (3 and 3n are one argument)
 * - strings, booleans, null and undefined compare by value
 * - frozen arrays and frozen plain objects compare structurally, over
 *   every own property including symbol-keyed ones
 * - functions, class instances and symbols compare by identity
 *
 * Mutable arrays/objects and the built-in mutable containers are rejected
 * with UnhashableArgumentError.
 */
export class KeyBuilder {
    readonly typed: boolean;

    // identity ids, scoped to this builder
    private nextId = 0;
    private readonly identities = new WeakMap<WeakKey, number>();

    constructor(opts: { typed?: boolean } = {}) {
        this.typed = opts.typed ?? false;
    }

    build(args: readonly unknown[], kwargs?: Kwargs): CacheKey {
        const names = kwargs === undefined ? [] : Object.keys(kwargs).sort();

        if (!this.typed && names.length === 0 && args.length === 1) {
            const fast = fastKey(args[0]);
            if (fast !== NOT_FAST) {
                return fast;
            }
        }

        const parts: unknown[] = [...args];
        const tokens: string[] = args.map((arg, i) => this.encode(arg, i, new Set()));

        if (kwargs !== undefined && names.length > 0) {
            parts.push(KWARGS_MARK);
            tokens.push("^");
            for (const name of names) {
                const value = kwargs[name];
                parts.push(name, value);
                tokens.push(`${JSON.stringify(name)}=${this.encode(value, name, new Set())}`);
            }
        }

        if (this.typed) {
            const types = args.map(typeTag);
            if (kwargs !== undefined) {
                for (const name of names) {
                    types.push(typeTag(kwargs[name]));
                }
            }
            parts.push(...types);
            tokens.push(`!${types.join(",")}`);
        }

        return new HashedKey(parts, tokens.join(","));
    }

    private encode(value: unknown, position: number | string, seen: Set<object>): string {
        switch (typeof value) {
            case "string":
                return `s${JSON.stringify(value)}`;
            case "number":
                return Number.isInteger(value) ? `n${BigInt(value).toString()}` : `n${String(value)}`;
            case "bigint":
                return `n${value.toString()}`;
            case "boolean":
                return value ? "t" : "f";
            case "undefined":
                return "u";
            case "symbol":
                return this.encodeSymbol(value);
            case "function":
                return `o#${this.identityOf(value)}`;
        }

        if (value === null) {
            return "z";
        }
        if (typeof value !== "object") {
            throw new UnhashableArgumentError(position, typeof value);
        }

        if (isMutableContainer(value)) {
            throw new UnhashableArgumentError(position, typeTag(value), "mutable container");
        }

        if (Array.isArray(value) || isPlainObject(value)) {
            if (!Object.isFrozen(value)) {
                throw new UnhashableArgumentError(position, typeTag(value), "freeze it to use it as a key");
            }
            if (seen.has(value)) {
                throw new UnhashableArgumentError(position, typeTag(value), "cyclic structure");
            }
            seen.add(value);
            const encoded = Array.isArray(value)
                ? `[${value.map((item: unknown) => this.encode(item, position, seen)).join(",")}]`
                : `{${Reflect.ownKeys(value)
                    .map((k) => ({ name: this.encodePropertyKey(k), k }))
                    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
                    .map(({ name, k }) => `${name}:${this.encode(Reflect.get(value, k), position, seen)}`)
                    .join(",")}}`;
            seen.delete(value);
            return encoded;
        }

        return `o#${this.identityOf(value)}`;
    }

    private encodePropertyKey(key: string | symbol): string {
        return typeof key === "string" ? JSON.stringify(key) : this.encodeSymbol(key);
    }

    private encodeSymbol(value: symbol): string {
        // registered symbols cannot be weak keys; their name is their identity
        const registered = Symbol.keyFor(value);
        if (registered !== undefined) {
            return `y${JSON.stringify(registered)}`;
        }
        return `y#${this.identityOf(value)}`;
    }

    private identityOf(value: WeakKey): number {
        let id = this.identities.get(value);
        if (id === undefined) {
            id = this.nextId++;
            this.identities.set(value, id);
        }
        return id;
    }
}

const NOT_FAST: unique symbol = Symbol("not-fast");
const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

function fastKey(value: unknown): PrimitiveKey | typeof NOT_FAST {
    if (value === null || value === undefined || typeof value === "string") {
        return value;
    }
    if (typeof value === "number" && Number.isSafeInteger(value)) {
        return value;
    }
    if (typeof value === "bigint" && value >= MIN_SAFE && value <= MAX_SAFE) {
        return Number(value);
    }
    return NOT_FAST;
}
