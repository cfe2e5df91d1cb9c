import {
    type Clearable,
    isTypedArray,
    type TypeKey,
    typeKeyOf,
    zeroArray,
} from './types.ts';

/**
 * Resets a pooled object to its empty state.
 */
export type ClearAction = (item: object) => void;

const NO_CLEAR = Symbol('NO_CLEAR');

function truncateArray(item: object): void {
    if (Array.isArray(item)) {
        item.length = 0;
    }
}

function zeroTypedArray(item: object): void {
    if (isTypedArray(item)) {
        zeroArray(item);
    }
}

/**
 * Checks whether a value exposes a `clear()` taking no declared parameters.
 */
export function isClearable(value: object): value is Clearable {
    return 'clear' in value && typeof value.clear === 'function' &&
        value.clear.length === 0;
}

function bindClear(clear: Clearable['clear']): ClearAction {
    return (item: object) => {
        clear.call(item);
    };
}

/**
 * Discovers, once per type, how to reset instances of that type before they
 * re-enter the pool.
 *
 * - plain arrays are truncated to length 0
 * - typed arrays are zero-filled
 * - types whose prototype chain has a parameterless `clear()` get that
 *   method called
 * - everything else has no clear action
 */
export class ClearResolver {
    protected _cache = new Map<TypeKey, ClearAction | typeof NO_CLEAR>();

    /**
     * Gets the clear action for an instance's type, probing the type on first
     * use and serving the cached decision afterwards.
     * @returns The action, or undefined when the type cannot be cleared
     */
    resolve(item: object): ClearAction | undefined {
        const key = typeKeyOf(item);
        if (key === undefined) {
            return undefined;
        }
        let action = this._cache.get(key);
        if (action === undefined) {
            action = this._probe(item) ?? NO_CLEAR;
            this._cache.set(key, action);
        }
        return action === NO_CLEAR ? undefined : action;
    }

    clear(): void {
        this._cache.clear();
    }

    /**
     * Gets the number of types resolved so far.
     */
    get size(): number {
        return this._cache.size;
    }

    protected _probe(item: object): ClearAction | undefined {
        if (Array.isArray(item)) {
            return truncateArray;
        }
        if (isTypedArray(item)) {
            return zeroTypedArray;
        }
        const proto: unknown = Object.getPrototypeOf(item);
        if (typeof proto === 'object' && proto !== null && isClearable(proto)) {
            return bindClear(proto.clear);
        }
        return undefined;
    }
}
