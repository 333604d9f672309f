import { ValidationError } from './errors';

/**
 * Raw description of an operation before it is placed in an instance.
 * A scalar duration is shared by every eligible machine; an array gives one
 * duration per entry of `machines`.
 */
export interface OperationSpec {
    machines: number | readonly number[];
    duration: number | readonly number[];
}

/**
 * A single processing step of a job. Ids are dense and assigned by
 * {@link JobShopInstance} in job-major, position-minor order.
 */
export class Operation {
    readonly machines: readonly number[];
    readonly durations: readonly number[];

    constructor(
        readonly id: number,
        readonly jobId: number,
        readonly positionInJob: number,
        spec: OperationSpec,
    ) {
        const machines = typeof spec.machines === 'number' ? [spec.machines] : [...spec.machines];
        const label = `operation ${id} (job ${jobId}, position ${positionInJob})`;

        if (machines.length === 0) {
            throw new ValidationError(`No eligible machines for ${label}.`);
        }
        for (const machineId of machines) {
            if (!Number.isInteger(machineId) || machineId < 0) {
                throw new ValidationError(`Invalid machine id ${machineId} for ${label}.`);
            }
        }
        if (new Set(machines).size !== machines.length) {
            throw new ValidationError(`Repeated machine ids for ${label}: ${machines.join(', ')}.`);
        }

        const duration = spec.duration;
        let durations: number[];
        if (typeof duration === 'number') {
            durations = machines.map(() => duration);
        } else {
            durations = [...duration];
            if (durations.length !== machines.length) {
                throw new ValidationError(
                    `Expected ${machines.length} durations for ${label}, got ${durations.length}.`,
                );
            }
        }
        for (const value of durations) {
            if (!Number.isFinite(value) || value < 0) {
                throw new ValidationError(`Invalid duration ${value} for ${label}.`);
            }
        }

        this.machines = machines;
        this.durations = durations;
    }

    /** Duration on the first eligible machine. */
    get duration(): number {
        return this.durations[0];
    }

    get minDuration(): number {
        return Math.min(...this.durations);
    }

    get isFlexible(): boolean {
        return this.machines.length > 1;
    }

    isEligible(machineId: number): boolean {
        return this.machines.includes(machineId);
    }

    durationOn(machineId: number): number {
        const index = this.machines.indexOf(machineId);
        if (index === -1) {
            throw new ValidationError(
                `Machine ${machineId} is not eligible for operation ${this.id}; eligible: ${this.machines.join(', ')}.`,
            );
        }
        return this.durations[index];
    }

    toString(): string {
        return `O(id=${this.id}, job=${this.jobId}, pos=${this.positionInJob}, m=[${this.machines.join(',')}])`;
    }
}
