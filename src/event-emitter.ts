/**
 * Map of event name to the argument tuple its listeners receive.
 */
export type EventMap = Record<string, unknown[]>;

type Listener<Args extends unknown[]> = (...args: Args) => void;

class EmittedEvent<Args extends unknown[]> extends Event {
    readonly args: Args;

    constructor(type: string, args: Args) {
        super(type);
        this.args = args;
    }
}

/**
 * Minimal typed emitter over `EventTarget`. Listeners run synchronously,
 * in registration order, from within `emit`.
 */
export class EventEmitter<Events extends EventMap> extends EventTarget {
    protected _listenerMetadata = new WeakMap<
        object,
        Map<string, (event: Event) => void>
    >();

    emit<K extends keyof Events & string>(type: K, ...args: Events[K]): boolean {
        return this.dispatchEvent(new EmittedEvent(type, args));
    }

    on<K extends keyof Events & string>(
        type: K,
        listener: Listener<Events[K]>,
    ): void {
        const wrapped = (event: Event) => {
            if (event instanceof EmittedEvent) {
                listener(...event.args);
            }
        };
        this._track(listener, type, wrapped);
        this.addEventListener(type, wrapped);
    }

    off<K extends keyof Events & string>(
        type: K,
        listener: Listener<Events[K]>,
    ): void {
        const wrapped = this._untrack(listener, type);
        if (wrapped) {
            this.removeEventListener(type, wrapped);
        }
    }

    once<K extends keyof Events & string>(
        type: K,
        listener: Listener<Events[K]>,
    ): void {
        const wrapped = (event: Event) => {
            // Clean up our tracking when the event fires
            this._untrack(listener, type);
            if (event instanceof EmittedEvent) {
                listener(...event.args);
            }
        };
        this._track(listener, type, wrapped);
        this.addEventListener(type, wrapped, { once: true });
    }

    // Wrappers are kept per listener and event type, so one function can
    // listen to several events.
    protected _track(
        listener: object,
        type: string,
        wrapped: (event: Event) => void,
    ): void {
        let byType = this._listenerMetadata.get(listener);
        if (byType === undefined) {
            byType = new Map<string, (event: Event) => void>();
            this._listenerMetadata.set(listener, byType);
        }
        const previous = byType.get(type);
        if (previous) {
            this.removeEventListener(type, previous);
        }
        byType.set(type, wrapped);
    }

    protected _untrack(
        listener: object,
        type: string,
    ): ((event: Event) => void) | undefined {
        const byType = this._listenerMetadata.get(listener);
        const wrapped = byType?.get(type);
        if (byType && wrapped) {
            byType.delete(type);
            if (byType.size === 0) {
                this._listenerMetadata.delete(listener);
            }
        }
        return wrapped;
    }
}
