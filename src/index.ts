import { Bucket } from './bucket.ts';
import { ClearResolver } from './clear-resolver.ts';
import {
    DoubleReturnError,
    PoolCorruptionError,
    TrackerCorruptionError,
    UseAfterReturnError,
} from './errors.ts';
import {
    LiveObjectTracker,
    sharedVersions,
    VersionCounter,
} from './live-object-tracker.ts';
import {
    createObjectPool,
    ObjectPool,
    Rented,
    RentedArray,
} from './object-pool.ts';
import {
    configureSharedPool,
    getSharedPool,
    resetSharedPool,
    StaticPool,
} from './static-pool.ts';

export { Bucket } from './bucket.ts';
export { type ClearAction, ClearResolver, isClearable } from './clear-resolver.ts';
export {
    DoubleReturnError,
    PoolCorruptionError,
    TrackerCorruptionError,
    UseAfterReturnError,
} from './errors.ts';
export { type EventMap, EventEmitter } from './event-emitter.ts';
export {
    LiveObjectTracker,
    MAX_VERSION,
    NO_VERSION,
    sharedVersions,
    VersionCounter,
} from './live-object-tracker.ts';
export {
    createObjectPool,
    ObjectPool,
    type ObjectPoolEvents,
    type ObjectPoolOptions,
    Rented,
    RentedArray,
    type RentOptions,
} from './object-pool.ts';
export {
    configureSharedPool,
    getSharedPool,
    resetSharedPool,
    StaticPool,
} from './static-pool.ts';
export type {
    ArrayKind,
    Clearable,
    Constructor,
    PoolableArray,
    TypedArray,
} from './types.ts';

// Default export for convenience
export default {
    ObjectPool,
    Rented,
    RentedArray,
    Bucket,
    ClearResolver,
    LiveObjectTracker,
    VersionCounter,
    sharedVersions,
    StaticPool,
    PoolCorruptionError,
    DoubleReturnError,
    UseAfterReturnError,
    TrackerCorruptionError,
    createObjectPool,
    configureSharedPool,
    getSharedPool,
    resetSharedPool,
};
