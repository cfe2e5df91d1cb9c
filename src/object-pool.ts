import { Bucket } from './bucket.ts';
import { ClearResolver } from './clear-resolver.ts';
import {
    DoubleReturnError,
    TrackerCorruptionError,
    UseAfterReturnError,
} from './errors.ts';
import { EventEmitter } from './event-emitter.ts';
import {
    LiveObjectTracker,
    NO_VERSION,
    sharedVersions,
} from './live-object-tracker.ts';
import {
    type ArrayKind,
    type Constructor,
    type PoolableArray,
    type TypeKey,
    typeKeyOf,
    zeroArray,
} from './types.ts';

/**
 * Configuration options for an object pool.
 */
export interface ObjectPoolOptions {
    /**
     * Track rented objects and throw on double-return and use-after-return
     * (default: true unless NODE_ENV is "production")
     */
    checked?: boolean;
}

/**
 * Options for renting a single object.
 * @template T The type of the rented object
 */
export interface RentOptions<T> {
    /** Called on the object when its guard is disposed, before auto-clear */
    clearAction?: (item: T) => void;

    /** Return the object without calling its `clear()` (default: false) */
    skipAutoClear?: boolean;
}

/**
 * Listener arguments for each event an object pool emits.
 */
export type ObjectPoolEvents = {
    doubleReturn: [item: object];
    useAfterReturn: [
        item: object,
        expectedVersion: number,
        actualVersion: number,
    ];
    clearError: [error: unknown, item: object];
};

// Pool Defaults
class ObjectPoolDefaults {
    checked: boolean = process.env.NODE_ENV !== 'production';
}

// Pool Config
class ObjectPoolConfig {
    checked: boolean;

    constructor(opts: ObjectPoolOptions = {}) {
        const poolDefaults = new ObjectPoolDefaults();

        this.checked = typeof opts.checked === 'boolean'
            ? opts.checked
            : poolDefaults.checked;
    }
}

function assertLength(length: number): void {
    if (!Number.isInteger(length) || length < 0) {
        throw new RangeError('length must be a non-negative integer');
    }
}

function createArray<A extends PoolableArray>(
    kind: ArrayKind<A>,
    length: number,
): A {
    const array = new kind(length);
    const view: PoolableArray = array;
    // new Array(n) is all holes
    if (Array.isArray(view)) {
        view.fill(undefined);
    }
    return array;
}

/**
 * Scoped ownership of an object rented from an {@link ObjectPool}. Disposing
 * the guard returns the object to its pool; a guard belongs to a single owner
 * and is disposed once.
 * @template T The type of the rented object
 */
export class Rented<T extends object> {
    protected _pool: ObjectPool;
    protected _item: T;
    protected _clearAction: ((item: T) => void) | undefined;
    protected _skipAutoClear: boolean;
    protected _version: number;
    protected _released: boolean = false;

    constructor(
        pool: ObjectPool,
        item: T,
        clearAction: ((item: T) => void) | undefined,
        skipAutoClear: boolean,
        version: number,
    ) {
        this._pool = pool;
        this._item = item;
        this._clearAction = clearAction;
        this._skipAutoClear = skipAutoClear;
        this._version = version;
    }

    /**
     * Gets the rented object.
     * @throws UseAfterReturnError once the guard has been disposed
     */
    get value(): T {
        if (this._released) {
            throw new UseAfterReturnError(
                'rented object accessed after release',
                this._version,
            );
        }
        return this._item;
    }

    get isAllocated(): boolean {
        return this._released === false;
    }

    /**
     * Version the object was rented under, or NO_VERSION when the pool is
     * not checked.
     */
    get version(): number {
        return this._version;
    }

    /**
     * Runs the clear action, if any, and returns the object to its pool.
     */
    dispose(): void {
        const repeated = this._released;
        this._released = true;
        if (!this._pool.settleRental(this._item, this._version, repeated)) {
            return;
        }
        if (this._clearAction !== undefined) {
            try {
                this._clearAction(this._item);
            } catch (error) {
                this._pool.emit(ObjectPool.CLEAR_ERROR, error, this._item);
            }
        }
        this._pool.release(this._item, this._skipAutoClear);
    }
}

/**
 * Scoped ownership of an array rented from an {@link ObjectPool}.
 * @template A The array type, e.g. `number[]` or `Float64Array`
 */
export class RentedArray<A extends PoolableArray> {
    protected _pool: ObjectPool;
    protected _item: A;
    protected _preserveContents: boolean;
    protected _version: number;
    protected _released: boolean = false;

    constructor(
        pool: ObjectPool,
        item: A,
        preserveContents: boolean,
        version: number,
    ) {
        this._pool = pool;
        this._item = item;
        this._preserveContents = preserveContents;
        this._version = version;
    }

    /**
     * Gets the rented array.
     * @throws UseAfterReturnError once the guard has been disposed
     */
    get value(): A {
        if (this._released) {
            throw new UseAfterReturnError(
                'rented array accessed after release',
                this._version,
            );
        }
        return this._item;
    }

    get isAllocated(): boolean {
        return this._released === false;
    }

    get version(): number {
        return this._version;
    }

    dispose(): void {
        const repeated = this._released;
        this._released = true;
        if (!this._pool.settleRental(this._item, this._version, repeated)) {
            return;
        }
        this._pool.releaseArray(this._item, this._preserveContents);
    }
}

/**
 * Unbounded, unordered cache of reusable objects and fixed-length arrays.
 * Objects are bucketed by their constructor, arrays by their constructor and
 * exact length. Each instance owns its own, separate storage.
 *
 * Every operation is synchronous. After {@link ObjectPool.dispose} the pool
 * hands out fresh instances and ignores returns.
 */
export class ObjectPool extends EventEmitter<ObjectPoolEvents> {
    /** Event emitted when an object is returned while already pooled */
    static readonly DOUBLE_RETURN = 'doubleReturn';
    /** Event emitted when a stale guard is released after its object was rented again */
    static readonly USE_AFTER_RETURN = 'useAfterReturn';
    /** Event emitted when a clear action throws; the error is otherwise swallowed */
    static readonly CLEAR_ERROR = 'clearError';

    protected _config: ObjectPoolConfig;
    protected _itemBuckets = new Map<TypeKey, Bucket<object>>();
    protected _arrayBuckets = new Map<
        TypeKey,
        Map<number, Bucket<PoolableArray>>
    >();
    protected _clearResolver = new ClearResolver();
    protected _tracker = new LiveObjectTracker();
    protected _disposed: boolean = false;

    constructor(options?: ObjectPoolOptions) {
        super();
        this._config = new ObjectPoolConfig(options);
    }

    /**
     * Takes a pooled instance of the given type, constructing one when none
     * is available. Prefer {@link ObjectPool.rent}, which returns it
     * automatically.
     * @param ctor Constructor of the wanted type; called with no arguments
     * @returns A pooled or newly constructed instance
     */
    acquire<T extends object>(ctor: Constructor<T>): T {
        if (this._disposed === false) {
            const item = this._itemBuckets.get(ctor)?.take();
            if (item instanceof ctor) {
                return item;
            }
        }
        return new ctor();
    }

    /**
     * Returns an object to the pool so later `acquire` calls can reuse it.
     * Unless `skipAutoClear` is set, the object is first reset through its
     * type's clear action (see {@link ClearResolver}); errors thrown while
     * clearing are reported via the `clearError` event only.
     * @param item The object to return
     * @param skipAutoClear Return the object with its contents intact
     * @throws DoubleReturnError in checked pools when the object is already pooled
     * @example
     * ```typescript
     * const seen = pool.acquire(Set<string>);
     * try {
     *   collect(seen);
     * } finally {
     *   pool.release(seen);
     * }
     * ```
     */
    release<T extends object>(item: T, skipAutoClear: boolean = false): void {
        if (this._disposed) {
            return;
        }
        const key = typeKeyOf(item);
        if (key === undefined) {
            return;
        }
        const bucket = this._itemBucket(key);
        if (bucket.contains(item)) {
            this._reportDoubleReturn(item);
            return;
        }
        if (skipAutoClear === false) {
            this._autoClear(item);
        }
        bucket.put(item);
    }

    /**
     * Rents an object; disposing the returned guard gives it back.
     * @param ctor Constructor of the wanted type; called with no arguments
     * @param options Optional clear action and auto-clear opt-out
     * @returns Guard owning the object
     * @throws TrackerCorruptionError in checked pools when the object handed
     * out is still owned by an outstanding guard
     * @example
     * ```typescript
     * const rented = pool.rent(Map<string, number>);
     * try {
     *   rented.value.set('a', 1);
     * } finally {
     *   rented.dispose();
     * }
     * ```
     */
    rent<T extends object>(
        ctor: Constructor<T>,
        options: RentOptions<T> = {},
    ): Rented<T> {
        const item = this.acquire(ctor);
        return new Rented(
            this,
            item,
            options.clearAction,
            options.skipAutoClear === true,
            this._track(item),
        );
    }

    /**
     * Rents an object for the duration of a synchronous callback.
     * @param ctor Constructor of the wanted type
     * @param fn Function to run with the object
     * @param options Optional clear action and auto-clear opt-out
     * @returns The return value of `fn`
     */
    use<T extends object, U>(
        ctor: Constructor<T>,
        fn: (item: T) => U,
        options?: RentOptions<T>,
    ): U {
        const rented = this.rent(ctor, options);
        try {
            return fn(rented.value);
        } finally {
            rented.dispose();
        }
    }

    /**
     * Takes a pooled array of exactly `length` elements, creating one when
     * none is available. Arrays of other lengths are never handed out.
     * @param kind `Array` or a typed-array constructor
     * @param length Exact length of the array
     * @throws RangeError if `length` is not a non-negative integer
     */
    acquireArray<A extends PoolableArray>(
        kind: ArrayKind<A>,
        length: number,
    ): A {
        assertLength(length);
        if (this._disposed === false) {
            const item = this._arrayBuckets.get(kind)?.get(length)?.take();
            if (item instanceof kind) {
                return item;
            }
        }
        return createArray(kind, length);
    }

    /**
     * Returns an array to the pool. Every element is reset to its zero value
     * unless `preserveContents` is set.
     * @throws DoubleReturnError in checked pools when the array is already pooled
     */
    releaseArray(array: PoolableArray, preserveContents: boolean = false): void {
        if (this._disposed) {
            return;
        }
        const key = typeKeyOf(array);
        if (key === undefined) {
            return;
        }
        const bucket = this._arrayBucket(key, array.length);
        if (bucket.contains(array)) {
            this._reportDoubleReturn(array);
            return;
        }
        if (preserveContents === false) {
            zeroArray(array);
        }
        bucket.put(array);
    }

    /**
     * Rents an array of exactly `length` elements.
     * @param kind `Array` or a typed-array constructor
     * @param length Exact length of the array
     * @param preserveContents Skip zeroing when the guard is disposed
     * @returns Guard owning the array
     * @example
     * ```typescript
     * const scratch = pool.rentArray(Float64Array, 256);
     * try {
     *   fillSamples(scratch.value);
     * } finally {
     *   scratch.dispose();
     * }
     * ```
     */
    rentArray<A extends PoolableArray>(
        kind: ArrayKind<A>,
        length: number,
        preserveContents: boolean = false,
    ): RentedArray<A> {
        const array = this.acquireArray(kind, length);
        return new RentedArray(
            this,
            array,
            preserveContents,
            this._track(array),
        );
    }

    useArray<A extends PoolableArray, U>(
        kind: ArrayKind<A>,
        length: number,
        fn: (array: A) => U,
        preserveContents?: boolean,
    ): U {
        const rented = this.rentArray(kind, length, preserveContents);
        try {
            return fn(rented.value);
        } finally {
            rented.dispose();
        }
    }

    /**
     * Settles the tracker entry of a rental whose guard is being disposed.
     * @internal
     * @returns true if the caller should go on and return the object
     */
    settleRental(item: object, version: number, repeated: boolean): boolean {
        if (this._disposed) {
            return false;
        }
        const current = version === NO_VERSION
            ? undefined
            : this._tracker.versionOf(item);
        if (current === undefined) {
            // Absent: an earlier release already returned it
            if (repeated) {
                this._reportDoubleReturn(item);
                return false;
            }
            return true;
        }
        if (current !== version) {
            this.emit(ObjectPool.USE_AFTER_RETURN, item, version, current);
            throw new UseAfterReturnError(
                `stale guard (version ${version}) released while the object is rented under version ${current}`,
                version,
                current,
            );
        }
        this._tracker.release(item);
        return true;
    }

    /**
     * Drops every pooled instance and cached clear action. Idempotent.
     */
    dispose(): void {
        if (this._disposed) {
            return;
        }
        this._disposed = true;
        this._itemBuckets.clear();
        this._arrayBuckets.clear();
        this._clearResolver.clear();
        this._tracker.clear();
    }

    protected _itemBucket(key: TypeKey): Bucket<object> {
        let bucket = this._itemBuckets.get(key);
        if (bucket === undefined) {
            bucket = new Bucket<object>();
            this._itemBuckets.set(key, bucket);
        }
        return bucket;
    }

    protected _arrayBucket(
        key: TypeKey,
        length: number,
    ): Bucket<PoolableArray> {
        let byLength = this._arrayBuckets.get(key);
        if (byLength === undefined) {
            byLength = new Map<number, Bucket<PoolableArray>>();
            this._arrayBuckets.set(key, byLength);
        }
        let bucket = byLength.get(length);
        if (bucket === undefined) {
            bucket = new Bucket<PoolableArray>();
            byLength.set(length, bucket);
        }
        return bucket;
    }

    protected _track(item: object): number {
        if (this._disposed || this._config.checked === false) {
            return NO_VERSION;
        }
        const version = sharedVersions.next();
        if (this._tracker.register(item, version) === false) {
            throw new TrackerCorruptionError(
                'object handed out while still owned by an outstanding guard',
            );
        }
        return version;
    }

    protected _autoClear(item: object): void {
        const clearAction = this._clearResolver.resolve(item);
        if (clearAction === undefined) {
            return;
        }
        try {
            clearAction(item);
        } catch (error) {
            this.emit(ObjectPool.CLEAR_ERROR, error, item);
        }
    }

    protected _reportDoubleReturn(item: object): void {
        this.emit(ObjectPool.DOUBLE_RETURN, item);
        if (this._config.checked) {
            throw new DoubleReturnError();
        }
    }

    /**
     * Whether corruption is tracked and raised as errors.
     */
    get checked(): boolean {
        return this._config.checked;
    }

    get isDisposed(): boolean {
        return this._disposed;
    }

    /**
     * Gets the number of objects and arrays waiting in the pool.
     */
    get available(): number {
        let count = 0;
        for (const bucket of this._itemBuckets.values()) {
            count += bucket.available;
        }
        for (const byLength of this._arrayBuckets.values()) {
            for (const bucket of byLength.values()) {
                count += bucket.available;
            }
        }
        return count;
    }

    /**
     * Gets the number of guards a checked pool has handed out and not seen
     * disposed. An abandoned guard counts until the pool is disposed, even
     * once its object has been garbage-collected.
     */
    get rented(): number {
        return this._tracker.size;
    }
}

/**
 * Creates a new, independent object pool.
 * @param options Optional configuration for the pool
 * @returns A new ObjectPool instance
 * @example
 * ```typescript
 * const pool = createObjectPool({ checked: true });
 * const total = pool.use(Array<number>, (values) => {
 *   values.push(1, 2, 3);
 *   return values.reduce((a, b) => a + b, 0);
 * });
 * ```
 */
export function createObjectPool(options?: ObjectPoolOptions): ObjectPool {
    return new ObjectPool(options);
}
