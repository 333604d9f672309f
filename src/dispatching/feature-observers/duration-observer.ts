import type { ScheduledOperation } from '../../core/scheduled-operation';
import type { Dispatcher } from '../dispatcher';
import { FeatureObserver, type FeatureObserverOptions } from './feature-observer';

/**
 * Processing-time features.
 * - operations: actual duration once scheduled, shortest eligible duration before.
 * - machines: busy time committed on the machine so far.
 * - jobs: shortest-duration sum of the job's unscheduled operations.
 */
export class DurationObserver extends FeatureObserver {
    readonly kind = 'duration';

    constructor(dispatcher: Dispatcher, options: FeatureObserverOptions = {}) {
        super(dispatcher, options, { supportedFeatureTypes: ['operations', 'machines', 'jobs'] });
        this.activate(options.subscribe);
    }

    protected initializeFeatures(): void {
        const operations = this.features.get('operations');
        const machines = this.features.get('machines');
        const jobs = this.features.get('jobs');

        for (const operation of this.dispatcher.instance.operations) {
            const scheduled = this.dispatcher.getScheduledOperation(operation);
            if (scheduled) {
                operations?.set(operation.id, scheduled.duration);
                machines?.add(scheduled.machineId, scheduled.duration);
            } else {
                operations?.set(operation.id, operation.minDuration);
                jobs?.add(operation.jobId, operation.minDuration);
            }
        }
    }

    update(scheduledOperation: ScheduledOperation): void {
        const { operation, machineId, duration } = scheduledOperation;
        this.features.get('operations')?.set(operation.id, duration);
        this.features.get('machines')?.add(machineId, duration);
        this.features.get('jobs')?.add(operation.jobId, -operation.minDuration);
    }
}
