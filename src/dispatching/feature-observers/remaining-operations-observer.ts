import type { ScheduledOperation } from '../../core/scheduled-operation';
import type { Dispatcher } from '../dispatcher';
import { FeatureObserver, type FeatureObserverOptions } from './feature-observer';

/**
 * Number of unscheduled operations per job, and per machine counting every
 * machine an operation is eligible for.
 */
export class RemainingOperationsObserver extends FeatureObserver {
    readonly kind = 'remaining-operations';

    constructor(dispatcher: Dispatcher, options: FeatureObserverOptions = {}) {
        super(dispatcher, options, { supportedFeatureTypes: ['machines', 'jobs'] });
        this.activate(options.subscribe);
    }

    protected initializeFeatures(): void {
        const machines = this.features.get('machines');
        const jobs = this.features.get('jobs');
        for (const operation of this.dispatcher.unscheduledOperations()) {
            jobs?.add(operation.jobId, 1);
            for (const machineId of operation.machines) {
                machines?.add(machineId, 1);
            }
        }
    }

    update(scheduledOperation: ScheduledOperation): void {
        const { operation } = scheduledOperation;
        this.features.get('jobs')?.add(operation.jobId, -1);
        const machines = this.features.get('machines');
        for (const machineId of operation.machines) {
            machines?.add(machineId, -1);
        }
    }
}
