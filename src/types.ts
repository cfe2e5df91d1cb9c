/**
 * A type the pool can construct on demand: anything callable with `new` and
 * no arguments.
 */
export type Constructor<T extends object> = new () => T;

/**
 * Runtime identity of a pooled type: the constructor found on an instance's
 * prototype.
 */
export type TypeKey = Function;

export type TypedArray =
    | Int8Array
    | Uint8Array
    | Uint8ClampedArray
    | Int16Array
    | Uint16Array
    | Int32Array
    | Uint32Array
    | Float32Array
    | Float64Array
    | BigInt64Array
    | BigUint64Array;

export type PoolableArray = unknown[] | TypedArray;

/**
 * Constructor of a fixed-length array: `Array` or a typed-array constructor.
 */
export type ArrayKind<A extends PoolableArray> = new (length: number) => A;

/**
 * Object that opts into auto-clear by exposing a parameterless `clear()`.
 */
export interface Clearable {
    clear(): void;
}

/**
 * Resolves the constructor an instance was built from, or undefined when its
 * prototype carries none (e.g. `Object.create(null)`).
 */
export function typeKeyOf(item: object): TypeKey | undefined {
    const proto: unknown = Object.getPrototypeOf(item);
    if (typeof proto !== 'object' || proto === null) {
        return undefined;
    }
    const ctor: unknown = proto.constructor;
    return typeof ctor === 'function' ? ctor : undefined;
}

export function isTypedArray(value: unknown): value is TypedArray {
    return ArrayBuffer.isView(value) && !(value instanceof DataView);
}

/**
 * Resets every element of an array to its kind's zero value: `undefined` for
 * plain arrays, `0n` for BigInt arrays, `0` for the other typed arrays.
 */
export function zeroArray(array: PoolableArray): void {
    if (Array.isArray(array)) {
        array.fill(undefined);
    } else if (
        array instanceof BigInt64Array || array instanceof BigUint64Array
    ) {
        array.fill(0n);
    } else {
        array.fill(0);
    }
}
