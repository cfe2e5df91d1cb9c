class ExtendableError extends Error {
    constructor(message: string) {
        super(message);
        this.name = this.constructor.name;
        this.message = message;
        if (typeof Error.captureStackTrace === 'function') {
            Error.captureStackTrace(this, this.constructor);
        } else {
            this.stack = new Error(message).stack;
        }
    }
}

/**
 * Base class of the errors a checked pool raises when single ownership of a
 * pooled object has been violated.
 */
export class PoolCorruptionError extends ExtendableError {
    constructor(message: string) {
        super(message);
    }
}

/**
 * The same object was returned to its bucket twice without a borrow in
 * between.
 */
export class DoubleReturnError extends PoolCorruptionError {
    constructor(message: string = 'object returned to the pool twice') {
        super(message);
    }
}

/**
 * A guard was released (or read) after its object went back to the pool.
 * When the object has since been rented again, `actualVersion` is the
 * version of the current owner.
 */
export class UseAfterReturnError extends PoolCorruptionError {
    readonly expectedVersion: number;
    readonly actualVersion: number | undefined;

    constructor(
        message: string,
        expectedVersion: number,
        actualVersion?: number,
    ) {
        super(message);
        this.expectedVersion = expectedVersion;
        this.actualVersion = actualVersion;
    }
}

/**
 * The pool tried to register an object as live while it was already live.
 */
export class TrackerCorruptionError extends PoolCorruptionError {
    constructor(message: string) {
        super(message);
    }
}
