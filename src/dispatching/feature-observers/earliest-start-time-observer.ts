import type { Dispatcher } from '../dispatcher';
import { FeatureObserver, type FeatureObserverOptions } from './feature-observer';

/**
 * Earliest start time of every operation, machine and job, measured from
 * {@link Dispatcher.currentTime}. Scheduled operations report their actual
 * start. A single commit can shift many rows, so every update recomputes them all.
 */
export class EarliestStartTimeObserver extends FeatureObserver {
    readonly kind = 'earliest-start-time';

    constructor(dispatcher: Dispatcher, options: FeatureObserverOptions = {}) {
        super(dispatcher, options, { supportedFeatureTypes: ['operations', 'machines', 'jobs'] });
        this.activate(options.subscribe);
    }

    protected initializeFeatures(): void {
        const now = this.dispatcher.currentTime();

        const operations = this.features.get('operations');
        if (operations) {
            for (const operation of this.dispatcher.instance.operations) {
                const scheduled = this.dispatcher.getScheduledOperation(operation);
                const start = scheduled ? scheduled.startTime : this.dispatcher.earliestStartTime(operation);
                operations.set(operation.id, start - now);
            }
        }

        const machines = this.features.get('machines');
        if (machines) {
            this.dispatcher.machineNextAvailableTime.forEach((time, machineId) => {
                machines.set(machineId, time - now);
            });
        }

        const jobs = this.features.get('jobs');
        if (jobs) {
            this.dispatcher.jobNextAvailableTime.forEach((time, jobId) => {
                jobs.set(jobId, time - now);
            });
        }
    }

    update(): void {
        this.initializeFeatures();
    }
}
