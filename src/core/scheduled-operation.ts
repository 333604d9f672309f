import type { Operation } from './operation';

/**
 * An operation bound to a machine and a start time. Created only by a commit;
 * never mutated afterwards.
 */
export class ScheduledOperation {
    readonly endTime: number;

    constructor(
        readonly operation: Operation,
        readonly startTime: number,
        readonly machineId: number,
    ) {
        this.endTime = startTime + operation.durationOn(machineId);
    }

    get jobId(): number {
        return this.operation.jobId;
    }

    get positionInJob(): number {
        return this.operation.positionInJob;
    }

    get duration(): number {
        return this.endTime - this.startTime;
    }

    toString(): string {
        return `S-Op(operation=${this.operation.id}, machine=${this.machineId}, start=${this.startTime}, end=${this.endTime})`;
    }
}
