import type { Dispatcher } from '../dispatcher';
import { FeatureObserver, type FeatureObserverOptions } from './feature-observer';

/** 1 for every operation in {@link Dispatcher.readyOperations}. */
export class IsReadyObserver extends FeatureObserver {
    readonly kind = 'is-ready';

    constructor(dispatcher: Dispatcher, options: FeatureObserverOptions = {}) {
        super(dispatcher, options, { supportedFeatureTypes: ['operations'] });
        this.activate(options.subscribe);
    }

    protected initializeFeatures(): void {
        const operations = this.getFeatures('operations');
        for (const operation of this.dispatcher.readyOperations()) {
            operations.set(operation.id, 1);
        }
    }
}
