/** Version reserved for "not tracked"; never issued. */
export const NO_VERSION = 0;

/** Largest version issued before the counter wraps back to 1. */
export const MAX_VERSION = 0x7fffffff;

/**
 * Issues the version numbers that tell successive rentals of one physical
 * object apart.
 */
export class VersionCounter {
    protected _current: number;

    constructor(start: number = NO_VERSION) {
        this._current = start;
    }

    next(): number {
        this._current = this._current >= MAX_VERSION ? 1 : this._current + 1;
        return this._current;
    }

    get current(): number {
        return this._current;
    }
}

/** Counter shared by every pool in the process. */
export const sharedVersions = new VersionCounter();

/**
 * Identity map from each currently rented object to the version it was rented
 * under. An object is present while exactly one guard for it is outstanding.
 */
export class LiveObjectTracker {
    protected _live = new WeakMap<object, number>();
    protected _size: number = 0;

    /**
     * @returns false if the object is already live
     */
    register(item: object, version: number): boolean {
        if (this._live.has(item)) {
            return false;
        }
        this._live.set(item, version);
        this._size++;
        return true;
    }

    versionOf(item: object): number | undefined {
        return this._live.get(item);
    }

    release(item: object): boolean {
        if (!this._live.delete(item)) {
            return false;
        }
        this._size--;
        return true;
    }

    clear(): void {
        this._live = new WeakMap<object, number>();
        this._size = 0;
    }

    /**
     * Gets the number of registrations not yet released. Entries are held
     * weakly, so a guard that is abandoned and collected leaves no entry
     * behind but stays in this count.
     */
    get size(): number {
        return this._size;
    }
}
