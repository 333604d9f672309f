import type { ScheduledOperation } from '../../core/scheduled-operation';
import type { Dispatcher } from '../dispatcher';
import { FeatureObserver, type FeatureObserverOptions, type FeatureType } from './feature-observer';
import { RemainingOperationsObserver } from './remaining-operations-observer';

/**
 * Binary feature: 1 once an operation has finished (see
 * {@link Dispatcher.completedOperations}), or once a machine or job has no
 * unscheduled operations left.
 *
 * Machine and job counters are decremented on each commit. They start as a copy
 * of a {@link RemainingOperationsObserver}'s tables when one covering the same
 * types is notified before this observer, and from a full scan otherwise.
 */
export class IsCompletedObserver extends FeatureObserver {
    readonly kind = 'is-completed';
    private remainingPerMachine: number[] = [];
    private remainingPerJob: number[] = [];

    constructor(dispatcher: Dispatcher, options: FeatureObserverOptions = {}) {
        super(dispatcher, options, { supportedFeatureTypes: ['operations', 'machines', 'jobs'] });
        this.activate(options.subscribe);
    }

    /** Unscheduled operations left per machine. */
    get remainingOperationsPerMachine(): readonly number[] {
        return this.remainingPerMachine;
    }

    /** Unscheduled operations left per job. */
    get remainingOperationsPerJob(): readonly number[] {
        return this.remainingPerJob;
    }

    protected initializeFeatures(): void {
        this.initializeCounters();

        this.markCompletedOperations();
        const machines = this.features.get('machines');
        this.remainingPerMachine.forEach((remaining, machineId) => {
            machines?.set(machineId, remaining === 0 ? 1 : 0);
        });
        const jobs = this.features.get('jobs');
        this.remainingPerJob.forEach((remaining, jobId) => {
            jobs?.set(jobId, remaining === 0 ? 1 : 0);
        });
    }

    update(scheduledOperation: ScheduledOperation): void {
        const { operation } = scheduledOperation;

        // Current time can move backwards, so the whole column is rebuilt.
        this.markCompletedOperations();

        const machines = this.features.get('machines');
        for (const machineId of operation.machines) {
            this.remainingPerMachine[machineId]--;
            machines?.set(machineId, this.remainingPerMachine[machineId] === 0 ? 1 : 0);
        }

        this.remainingPerJob[operation.jobId]--;
        this.features.get('jobs')?.set(operation.jobId, this.remainingPerJob[operation.jobId] === 0 ? 1 : 0);
    }

    private markCompletedOperations(): void {
        const operations = this.features.get('operations');
        if (!operations) {
            return;
        }
        operations.fill(0);
        for (const scheduled of this.dispatcher.completedOperations()) {
            operations.set(scheduled.operation.id, 1);
        }
    }

    private initializeCounters(): void {
        const { instance } = this.dispatcher;
        const source = this.findRemainingOperationsObserver();
        if (source) {
            this.remainingPerMachine = source.getFeatures('machines').column(0);
            this.remainingPerJob = source.getFeatures('jobs').column(0);
            return;
        }

        this.remainingPerMachine = new Array<number>(instance.numMachines).fill(0);
        this.remainingPerJob = new Array<number>(instance.numJobs).fill(0);
        for (const operation of this.dispatcher.unscheduledOperations()) {
            this.remainingPerJob[operation.jobId]++;
            for (const machineId of operation.machines) {
                this.remainingPerMachine[machineId]++;
            }
        }
    }

    /**
     * A remaining-operations observer tracking both machines and jobs that has
     * already been updated for the current state: one subscribed before this
     * observer, or any subscribed one while this observer is not subscribed.
     */
    private findRemainingOperationsObserver(): RemainingOperationsObserver | undefined {
        const subscribers = this.dispatcher.subscribers;
        const ownIndex = subscribers.indexOf(this);
        const candidates = ownIndex === -1 ? subscribers : subscribers.slice(0, ownIndex);
        const required: FeatureType[] = ['machines', 'jobs'];
        return candidates.find(
            (observer): observer is RemainingOperationsObserver =>
                observer instanceof RemainingOperationsObserver &&
                required.every((featureType) => observer.hasFeatureType(featureType)),
        );
    }
}
