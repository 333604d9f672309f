import type { ScheduledOperation } from '../../core/scheduled-operation';
import type { Dispatcher } from '../dispatcher';
import { FeatureObserver, type FeatureObserverOptions } from './feature-observer';

export class IsScheduledObserver extends FeatureObserver {
    readonly kind = 'is-scheduled';

    constructor(dispatcher: Dispatcher, options: FeatureObserverOptions = {}) {
        super(dispatcher, options, { supportedFeatureTypes: ['operations'] });
        this.activate(options.subscribe);
    }

    protected initializeFeatures(): void {
        const operations = this.getFeatures('operations');
        for (const scheduled of this.dispatcher.scheduledOperations()) {
            operations.set(scheduled.operation.id, 1);
        }
    }

    update(scheduledOperation: ScheduledOperation): void {
        this.getFeatures('operations').set(scheduledOperation.operation.id, 1);
    }
}
