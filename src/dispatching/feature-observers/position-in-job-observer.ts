import type { ScheduledOperation } from '../../core/scheduled-operation';
import type { Dispatcher } from '../dispatcher';
import { FeatureObserver, type FeatureObserverOptions } from './feature-observer';

/** Operation position within its job, and how far each job has progressed. */
export class PositionInJobObserver extends FeatureObserver {
    readonly kind = 'position-in-job';

    constructor(dispatcher: Dispatcher, options: FeatureObserverOptions = {}) {
        super(dispatcher, options, { supportedFeatureTypes: ['operations', 'jobs'] });
        this.activate(options.subscribe);
    }

    protected initializeFeatures(): void {
        const operations = this.features.get('operations');
        if (operations) {
            for (const operation of this.dispatcher.instance.operations) {
                operations.set(operation.id, operation.positionInJob);
            }
        }
        const jobs = this.features.get('jobs');
        if (jobs) {
            for (let jobId = 0; jobId < this.dispatcher.instance.numJobs; jobId++) {
                jobs.set(jobId, this.dispatcher.scheduledCountInJob(jobId));
            }
        }
    }

    update(scheduledOperation: ScheduledOperation): void {
        this.features.get('jobs')?.add(scheduledOperation.jobId, 1);
    }
}
