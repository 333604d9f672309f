import type { ScheduledOperation } from '../core/scheduled-operation';
import type { Dispatcher } from './dispatcher';

export interface ObserverOptions {
    /** Subscribe to the dispatcher once constructed. Defaults to true. */
    subscribe?: boolean;
    /** At most one subscribed observer of this kind per dispatcher. Defaults to false. */
    isSingleton?: boolean;
}

/**
 * Something that keeps derived state in step with a {@link Dispatcher}.
 *
 * Concrete observers finish their constructor with {@link activate}, which
 * builds the initial state and subscribes. Doing that from this constructor
 * would run before subclass fields exist.
 */
export abstract class DispatcherObserver {
    /** Tag shared by every instance of a concrete observer class. */
    abstract readonly kind: string;
    readonly isSingleton: boolean;

    constructor(
        readonly dispatcher: Dispatcher,
        options: ObserverOptions = {},
    ) {
        this.isSingleton = options.isSingleton ?? false;
    }

    /** Rebuilds all derived state from the dispatcher's current state. */
    abstract initializeFromCurrentState(): void;

    /**
     * Called after every commit, once the dispatcher's own state is up to date.
     * The default rebuilds everything; override to apply an incremental delta.
     */
    update(_scheduledOperation: ScheduledOperation): void {
        this.initializeFromCurrentState();
    }

    /** Called after the dispatcher has been reset to an empty schedule. */
    reset(): void {
        this.initializeFromCurrentState();
    }

    protected activate(subscribe = true): void {
        this.initializeFromCurrentState();
        if (subscribe) {
            this.dispatcher.subscribe(this);
        }
    }

    toString(): string {
        return `${this.kind}(singleton=${this.isSingleton})`;
    }
}

export type ObserverClass<T extends DispatcherObserver, O> = new (dispatcher: Dispatcher, options?: O) => T;

/**
 * Returns a subscribed observer of `observerClass` that satisfies `condition`,
 * or constructs (and thereby subscribes) a new one with `options`.
 */
export function createOrGetObserver<T extends DispatcherObserver, O extends ObserverOptions>(
    dispatcher: Dispatcher,
    observerClass: ObserverClass<T, O>,
    condition: (observer: T) => boolean = () => true,
    options?: O,
): T {
    return dispatcher.findObserver(observerClass, condition) ?? new observerClass(dispatcher, options);
}
