import { ValidationError } from './errors';
import type { JobShopInstance } from './job-shop-instance';
import type { ScheduledOperation } from './scheduled-operation';

/**
 * Committed operations, one start-ordered sequence per machine.
 *
 * Invariants kept by {@link Schedule.add}:
 * - on every machine, each entry starts no earlier than the previous one ends;
 * - every job is scheduled in position order and each operation starts no
 *   earlier than its job predecessor ends.
 */
export class Schedule {
    private machineSequences: ScheduledOperation[][];
    private jobSequenceList: ScheduledOperation[][];
    private count = 0;

    constructor(readonly instance: JobShopInstance) {
        this.machineSequences = Array.from({ length: instance.numMachines }, () => []);
        this.jobSequenceList = Array.from({ length: instance.numJobs }, () => []);
    }

    /** Per-machine sequences. Read-only view. */
    get sequences(): ReadonlyArray<readonly ScheduledOperation[]> {
        return this.machineSequences;
    }

    get numScheduledOperations(): number {
        return this.count;
    }

    add(scheduledOperation: ScheduledOperation): void {
        const { operation, machineId, startTime } = scheduledOperation;
        if (operation !== this.instance.operations[operation.id]) {
            throw new ValidationError(`Operation ${operation.id} does not belong to instance ${this.instance.name}.`);
        }

        const jobSequence = this.jobSequenceList[operation.jobId];
        if (operation.positionInJob !== jobSequence.length) {
            throw new ValidationError(
                `Operation ${operation.id} is at position ${operation.positionInJob} of job ${operation.jobId}, ` +
                    `but the next position to schedule is ${jobSequence.length}.`,
            );
        }
        const predecessor = jobSequence[jobSequence.length - 1];
        if (predecessor !== undefined && startTime < predecessor.endTime) {
            throw new ValidationError(
                `Operation ${operation.id} starts at ${startTime}, before its job predecessor ends at ${predecessor.endTime}.`,
            );
        }

        const machineSequence = this.machineSequences[machineId];
        const previous = machineSequence[machineSequence.length - 1];
        if (previous !== undefined && startTime < previous.endTime) {
            throw new ValidationError(
                `Operation ${operation.id} starts at ${startTime} on machine ${machineId}, ` +
                    `before operation ${previous.operation.id} ends at ${previous.endTime}.`,
            );
        }

        machineSequence.push(scheduledOperation);
        jobSequence.push(scheduledOperation);
        this.count++;
    }

    /** Scheduled operations of each job, in position order. */
    jobSequences(): ScheduledOperation[][] {
        return this.jobSequenceList.map((sequence) => [...sequence]);
    }

    makespan(): number {
        let makespan = 0;
        for (const sequence of this.machineSequences) {
            const last = sequence[sequence.length - 1];
            if (last !== undefined) {
                makespan = Math.max(makespan, last.endTime);
            }
        }
        return makespan;
    }

    isComplete(): boolean {
        return this.count === this.instance.numOperations;
    }

    reset(): void {
        this.machineSequences = Array.from({ length: this.instance.numMachines }, () => []);
        this.jobSequenceList = Array.from({ length: this.instance.numJobs }, () => []);
        this.count = 0;
    }

    toString(): string {
        return `Schedule(instance=${this.instance.name}, makespan=${this.makespan()}, scheduled=${this.count}/${this.instance.numOperations})`;
    }
}
