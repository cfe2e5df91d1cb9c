/**
 * Unordered set of available instances of one exact type (or one exact
 * array kind and length).
 *
 * Storage is an arena of slots plus a free-list of the indices that hold an
 * instance. Taking an instance empties its slot and files the index as
 * vacant for the next insertion, so the bucket references available
 * instances only. The identity index likewise covers available instances,
 * which makes a second insertion of one detectable in O(1).
 * @template T The type of instance stored in the bucket
 */
export class Bucket<T extends object> {
    protected _slots: (T | undefined)[] = [];
    protected _freeList: number[] = [];
    protected _vacant: number[] = [];
    protected _slotIndex = new WeakMap<T, number>();

    /**
     * Removes one available instance.
     * @returns An instance, or undefined if the bucket is empty
     */
    take(): T | undefined {
        const index = this._freeList.pop();
        if (index === undefined) {
            return undefined;
        }
        const item = this._slots[index];
        this._slots[index] = undefined;
        this._vacant.push(index);
        if (item !== undefined) {
            this._slotIndex.delete(item);
        }
        return item;
    }

    /**
     * Makes an instance available.
     * @returns false if the instance was already available, true otherwise
     */
    put(item: T): boolean {
        if (this._slotIndex.has(item)) {
            return false;
        }
        const index = this._vacant.pop() ?? this._slots.length;
        this._slots[index] = item;
        this._slotIndex.set(item, index);
        this._freeList.push(index);
        return true;
    }

    /**
     * Checks whether an instance is currently available in this bucket.
     */
    contains(item: T): boolean {
        return this._slotIndex.has(item);
    }

    clear(): void {
        this._slots = [];
        this._freeList = [];
        this._vacant = [];
        this._slotIndex = new WeakMap<T, number>();
    }

    /**
     * Gets the number of instances available for borrowing.
     */
    get available(): number {
        return this._freeList.length;
    }

    /**
     * Gets the number of slots allocated, filled or vacant. This is the
     * largest number of instances the bucket has held at once.
     */
    get capacity(): number {
        return this._slots.length;
    }
}
