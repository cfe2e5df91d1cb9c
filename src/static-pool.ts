import {
    ObjectPool,
    type ObjectPoolOptions,
    type Rented,
    type RentedArray,
    type RentOptions,
} from './object-pool.ts';
import type { ArrayKind, Constructor, PoolableArray } from './types.ts';

let sharedPool: ObjectPool | undefined;
let sharedOptions: ObjectPoolOptions = {};

/**
 * Sets the options the shared pool is created with. Must run before the
 * shared pool is first used, or after {@link resetSharedPool}.
 */
export function configureSharedPool(options: ObjectPoolOptions): void {
    if (sharedPool !== undefined) {
        throw new Error('shared pool is already initialized');
    }
    sharedOptions = { ...options };
}

/**
 * Gets the process-wide pool, creating it on first use. Pass it to code that
 * takes an {@link ObjectPool} to share storage with the StaticPool functions.
 */
export function getSharedPool(): ObjectPool {
    if (sharedPool === undefined) {
        sharedPool = new ObjectPool(sharedOptions);
    }
    return sharedPool;
}

/**
 * Disposes the shared pool and forgets its options. The next access creates
 * a fresh one.
 */
export function resetSharedPool(): void {
    sharedPool?.dispose();
    sharedPool = undefined;
    sharedOptions = {};
}

/**
 * Functions over the process-wide pool, for call sites that hold no pool
 * reference.
 *
 * The two object return paths default differently, and both defaults are
 * relied upon by existing callers:
 * - `release(item)` never auto-clears; the object keeps its contents.
 * - `releaseNew(item)` auto-clears unless `skipAutoClear` is passed.
 */
export const StaticPool = {
    rent<T extends object>(
        ctor: Constructor<T>,
        options?: RentOptions<T>,
    ): Rented<T> {
        return getSharedPool().rent(ctor, options);
    },

    rentArray<A extends PoolableArray>(
        kind: ArrayKind<A>,
        length: number,
        preserveContents: boolean = false,
    ): RentedArray<A> {
        return getSharedPool().rentArray(kind, length, preserveContents);
    },

    use<T extends object, U>(
        ctor: Constructor<T>,
        fn: (item: T) => U,
        options?: RentOptions<T>,
    ): U {
        return getSharedPool().use(ctor, fn, options);
    },

    get<T extends object>(ctor: Constructor<T>): T {
        return getSharedPool().acquire(ctor);
    },

    /**
     * Legacy return: the object goes back as-is, never auto-cleared.
     */
    release<T extends object>(item: T): void {
        getSharedPool().release(item, true);
    },

    /**
     * Returns an object, calling its clear action first unless
     * `skipAutoClear` is set.
     */
    releaseNew<T extends object>(
        item: T,
        skipAutoClear: boolean = false,
    ): void {
        getSharedPool().release(item, skipAutoClear);
    },

    getArray<A extends PoolableArray>(kind: ArrayKind<A>, length: number): A {
        return getSharedPool().acquireArray(kind, length);
    },

    /**
     * Returns an array, zeroing it unless `preserveContents` is set.
     */
    releaseArray(array: PoolableArray, preserveContents: boolean = false): void {
        getSharedPool().releaseArray(array, preserveContents);
    },
};
