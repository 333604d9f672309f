import { ValidationError } from './errors';
import { Operation, type OperationSpec } from './operation';

/**
 * Descriptive data that travels with an instance. The engine never reads it.
 */
export interface InstanceMetadata {
    optimum?: number | null;
    lowerBound?: number;
    upperBound?: number;
    reference?: string;
    [key: string]: unknown;
}

export interface InstanceOptions {
    name?: string;
    metadata?: InstanceMetadata;
}

/** `D[job][pos]`: one duration, or one per eligible machine. */
export type DurationMatrix = ReadonlyArray<ReadonlyArray<number | readonly number[]>>;
/** `M[job][pos]`: one machine id, or the list of eligible machine ids. */
export type MachinesMatrix = ReadonlyArray<ReadonlyArray<number | readonly number[]>>;

/**
 * Immutable description of a job-shop problem: jobs, their operations, and the
 * machines those operations may run on. Machine ids are dense, `0..numMachines-1`.
 */
export class JobShopInstance {
    readonly name: string;
    readonly metadata: Readonly<InstanceMetadata>;
    readonly jobs: ReadonlyArray<readonly Operation[]>;
    readonly operations: readonly Operation[];
    readonly numMachines: number;
    readonly operationsByMachine: ReadonlyArray<readonly Operation[]>;

    constructor(jobs: ReadonlyArray<readonly OperationSpec[]>, options: InstanceOptions = {}) {
        this.name = options.name ?? 'JobShopInstance';
        this.metadata = { ...options.metadata };

        const operations: Operation[] = [];
        this.jobs = jobs.map((specs, jobId) =>
            specs.map((spec, position) => {
                const operation = new Operation(operations.length, jobId, position, spec);
                operations.push(operation);
                return operation;
            }),
        );
        this.operations = operations;

        // Machine ids must cover 0..M-1; tables and graphs allocate one slot per id.
        const machineIds = [...new Set(operations.flatMap((operation) => operation.machines))].sort((a, b) => a - b);
        const gap = machineIds.findIndex((machineId, index) => machineId !== index);
        if (gap !== -1) {
            throw new ValidationError(
                `Machine ids must be dense: no operation uses machine ${gap}, ` +
                    `but machine ${machineIds[machineIds.length - 1]} is referenced.`,
            );
        }
        this.numMachines = machineIds.length;

        const byMachine: Operation[][] = Array.from({ length: this.numMachines }, () => []);
        for (const operation of operations) {
            for (const machineId of operation.machines) {
                byMachine[machineId].push(operation);
            }
        }
        this.operationsByMachine = byMachine;
    }

    /**
     * Builds an instance from a duration matrix and a machines matrix of the
     * same shape. Row `j` describes job `j`; column `k` its k-th operation.
     */
    static fromMatrices(
        durationMatrix: DurationMatrix,
        machinesMatrix: MachinesMatrix,
        options: InstanceOptions = {},
    ): JobShopInstance {
        if (durationMatrix.length !== machinesMatrix.length) {
            throw new ValidationError(
                `Duration matrix has ${durationMatrix.length} jobs but machines matrix has ${machinesMatrix.length}.`,
            );
        }
        const jobs = durationMatrix.map((durations, jobId) => {
            const machines = machinesMatrix[jobId];
            if (durations.length !== machines.length) {
                throw new ValidationError(
                    `Job ${jobId} has ${durations.length} durations but ${machines.length} machine entries.`,
                );
            }
            return durations.map((duration, position): OperationSpec => ({
                duration,
                machines: machines[position],
            }));
        });
        return new JobShopInstance(jobs, options);
    }

    get numJobs(): number {
        return this.jobs.length;
    }

    get numOperations(): number {
        return this.operations.length;
    }

    get isFlexible(): boolean {
        return this.operations.some((operation) => operation.isFlexible);
    }

    /** Largest duration of any operation on any of its machines. */
    get maxDuration(): number {
        return this.operations.reduce((max, op) => Math.max(max, ...op.durations), 0);
    }

    get maxDurationPerJob(): number[] {
        return this.jobs.map((job) => job.reduce((max, op) => Math.max(max, ...op.durations), 0));
    }

    get maxDurationPerMachine(): number[] {
        return this.operationsByMachine.map((ops, machineId) =>
            ops.reduce((max, op) => Math.max(max, op.durationOn(machineId)), 0),
        );
    }

    /** Sum of each operation's shortest duration. */
    get totalDuration(): number {
        return this.operations.reduce((sum, op) => sum + op.minDuration, 0);
    }

    get durationsMatrix(): number[][][] {
        return this.jobs.map((job) => job.map((op) => [...op.durations]));
    }

    get machinesMatrix(): number[][][] {
        return this.jobs.map((job) => job.map((op) => [...op.machines]));
    }

    getOperation(operationId: number): Operation {
        const operation = this.operations[operationId];
        if (operation === undefined) {
            throw new ValidationError(
                `Operation ${operationId} does not exist; the instance has ${this.numOperations} operations.`,
            );
        }
        return operation;
    }

    toString(): string {
        return `JobShopInstance(name=${this.name}, numJobs=${this.numJobs}, numMachines=${this.numMachines})`;
    }
}
