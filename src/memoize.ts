import { MemoCache } from "./memo-cache";
import type { Options, Stats } from "./types";

export interface Memoized<A extends unknown[], R> {
    (...args: A): R;
    /** The engine behind this function. */
    readonly cache: MemoCache<R>;
    /** The original, uncached function. */
    readonly wrapped: (...args: A) => R;
    cacheInfo(): Stats;
    cacheClear(): void;
}

export interface MemoizedAsync<A extends unknown[], R> {
    (...args: A): Promise<R>;
    readonly cache: MemoCache<R>;
    readonly wrapped: (...args: A) => Promise<R>;
    cacheInfo(): Stats;
    cacheClear(): void;
}

/**
 * Wrap `fn` in its own MemoCache. The positional arguments form the key;
 * `this` is not part of it, so wrap methods as closures over their instance.
 *
 * @example
 * const fib: Memoized<[number], number> = memoize(
 *     (n: number): number => (n < 2 ? n : fib(n - 1) + fib(n - 2)),
 *     { maxSize: null }
 * );
 */
export function memoize<A extends unknown[], R>(fn: (...args: A) => R, options?: Options<R>): Memoized<A, R> {
    const cache = new MemoCache<R>(options);
    const memoized = (...args: A): R => cache.getOrCompute(args, () => fn(...args));

    return Object.assign(memoized, {
        cache,
        wrapped: fn,
        cacheInfo: () => cache.stats(),
        cacheClear: () => cache.clear(),
    });
}

/**
 * memoize() for promise-returning functions. Settled values are cached;
 * rejections are not.
 */
export function memoizeAsync<A extends unknown[], R>(
    fn: (...args: A) => Promise<R>,
    options?: Options<R>
): MemoizedAsync<A, R> {
    const cache = new MemoCache<R>(options);
    const memoized = (...args: A): Promise<R> => cache.getOrComputeAsync(args, () => fn(...args));

    return Object.assign(memoized, {
        cache,
        wrapped: fn,
        cacheInfo: () => cache.stats(),
        cacheClear: () => cache.clear(),
    });
}
