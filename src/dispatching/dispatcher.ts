import type winston from 'winston';
import { ValidationError } from '../core/errors';
import type { JobShopInstance } from '../core/job-shop-instance';
import type { Operation } from '../core/operation';
import { Schedule } from '../core/schedule';
import { ScheduledOperation } from '../core/scheduled-operation';
import { getLogger } from '../utils/logger';
import type { DispatcherObserver } from './dispatcher-observer';

/**
 * Narrows the ready operations offered to a policy. May only drop entries.
 */
export type ReadyOperationsFilter = (dispatcher: Dispatcher, operations: Operation[]) => Operation[];

export interface DispatcherOptions {
    readyOperationsFilter?: ReadyOperationsFilter;
    logger?: winston.Logger;
}

/**
 * Incremental dispatching engine. Owns the {@link Schedule}, keeps the
 * machine/job availability indices, and notifies observers after each commit.
 *
 * {@link commit} and {@link reset} are the only methods that change state.
 * Query methods return freshly built arrays, ordered by operation id.
 */
export class Dispatcher {
    readonly schedule: Schedule;
    private readonly observers: DispatcherObserver[] = [];
    private readonly readyOperationsFilter?: ReadyOperationsFilter;
    private readonly logger: winston.Logger;

    private machineNext: number[];
    private jobNext: number[];
    private scheduledById: (ScheduledOperation | undefined)[];
    private scheduledPerJob: number[];
    private lastStartTime = 0;

    constructor(
        readonly instance: JobShopInstance,
        options: DispatcherOptions = {},
    ) {
        this.schedule = new Schedule(instance);
        this.readyOperationsFilter = options.readyOperationsFilter;
        this.logger = options.logger ?? getLogger();
        this.machineNext = new Array<number>(instance.numMachines).fill(0);
        this.jobNext = new Array<number>(instance.numJobs).fill(0);
        this.scheduledById = new Array<ScheduledOperation | undefined>(instance.numOperations).fill(undefined);
        this.scheduledPerJob = new Array<number>(instance.numJobs).fill(0);
    }

    /** Earliest time each machine is free. */
    get machineNextAvailableTime(): readonly number[] {
        return this.machineNext;
    }

    /** Earliest time the next unscheduled operation of each job may start. */
    get jobNextAvailableTime(): readonly number[] {
        return this.jobNext;
    }

    get subscribers(): readonly DispatcherObserver[] {
        return this.observers;
    }

    /** Start time of the most recent commit, or 0 when nothing is committed. */
    currentTime(): number {
        return this.lastStartTime;
    }

    isScheduled(operation: Operation): boolean {
        return this.scheduledById[operation.id] !== undefined;
    }

    getScheduledOperation(operation: Operation): ScheduledOperation | undefined {
        return this.scheduledById[operation.id];
    }

    scheduledCountInJob(jobId: number): number {
        return this.scheduledPerJob[jobId];
    }

    isReady(operation: Operation): boolean {
        return this.scheduledPerJob[operation.jobId] === operation.positionInJob;
    }

    /** First unscheduled operation of a job. Throws when the job is finished. */
    nextOperation(jobId: number): Operation {
        const job = this.instance.jobs[jobId];
        if (job === undefined) {
            throw new ValidationError(`Job ${jobId} does not exist.`);
        }
        const operation = job[this.scheduledPerJob[jobId]];
        if (operation === undefined) {
            throw new ValidationError(`Job ${jobId} has no operations left to schedule.`);
        }
        return operation;
    }

    readyOperations(): Operation[] {
        const ready: Operation[] = [];
        this.instance.jobs.forEach((job, jobId) => {
            const next = job[this.scheduledPerJob[jobId]];
            if (next !== undefined) {
                ready.push(next);
            }
        });
        ready.sort((a, b) => a.id - b.id);
        return this.readyOperationsFilter ? this.readyOperationsFilter(this, ready) : ready;
    }

    unscheduledOperations(): Operation[] {
        return this.instance.operations.filter((op) => this.scheduledById[op.id] === undefined);
    }

    scheduledOperations(): ScheduledOperation[] {
        return this.scheduledById.filter((s): s is ScheduledOperation => s !== undefined);
    }

    /** Scheduled operations that have finished by {@link currentTime}. */
    completedOperations(): ScheduledOperation[] {
        const now = this.currentTime();
        return this.scheduledOperations().filter((s) => s.endTime <= now);
    }

    /** Scheduled operations still running at {@link currentTime}. */
    ongoingOperations(): ScheduledOperation[] {
        const now = this.currentTime();
        return this.scheduledOperations().filter((s) => s.endTime > now);
    }

    /** Unscheduled operations plus ongoing ones, by operation id. */
    uncompletedOperations(): Operation[] {
        const now = this.currentTime();
        return this.instance.operations.filter((op) => {
            const scheduled = this.scheduledById[op.id];
            return scheduled === undefined || scheduled.endTime > now;
        });
    }

    /**
     * Feasibility floor for starting `operation`. Without a machine, the
     * minimum over its eligible machines is used.
     */
    earliestStartTime(operation: Operation, machineId?: number): number {
        const jobTime = this.jobNext[operation.jobId];
        if (machineId !== undefined) {
            this.assertEligible(operation, machineId);
            return Math.max(jobTime, this.machineNext[machineId]);
        }
        const machineTime = Math.min(...operation.machines.map((m) => this.machineNext[m]));
        return Math.max(jobTime, machineTime);
    }

    /** Eligible machine that frees up first; ties go to the lowest machine id. */
    earliestMachine(operation: Operation): number {
        let best = operation.machines[0];
        for (const machineId of operation.machines) {
            const time = this.machineNext[machineId];
            const bestTime = this.machineNext[best];
            if (time < bestTime || (time === bestTime && machineId < best)) {
                best = machineId;
            }
        }
        return best;
    }

    /**
     * Places `operation` on `machineId` at `startTime` and notifies every
     * observer in subscription order. The machine defaults to
     * {@link earliestMachine}; the start to {@link earliestStartTime}.
     * Every check runs before any state changes.
     */
    commit(operation: Operation, machineId?: number, startTime?: number): ScheduledOperation {
        if (operation !== this.instance.operations[operation.id]) {
            throw new ValidationError(`Operation ${operation.id} does not belong to instance ${this.instance.name}.`);
        }
        if (this.isScheduled(operation)) {
            throw new ValidationError(`Operation ${operation.id} is already scheduled.`);
        }
        const machine = machineId ?? this.earliestMachine(operation);
        this.assertEligible(operation, machine);
        if (!this.isReady(operation)) {
            throw new ValidationError(
                `Operation ${operation.id} is not ready: job ${operation.jobId} has ` +
                    `${this.scheduledPerJob[operation.jobId]} operations scheduled, position is ${operation.positionInJob}.`,
            );
        }
        const earliest = this.earliestStartTime(operation, machine);
        const start = startTime ?? earliest;
        if (!Number.isFinite(start) || start < earliest) {
            throw new ValidationError(
                `Operation ${operation.id} cannot start at ${start} on machine ${machine}; earliest start is ${earliest}.`,
            );
        }

        const scheduled = new ScheduledOperation(operation, start, machine);
        this.schedule.add(scheduled);
        this.machineNext[machine] = scheduled.endTime;
        this.jobNext[operation.jobId] = scheduled.endTime;
        this.scheduledById[operation.id] = scheduled;
        this.scheduledPerJob[operation.jobId]++;
        this.lastStartTime = start;

        this.logger.debug('Committed operation', {
            operationId: operation.id,
            machineId: machine,
            startTime: start,
            endTime: scheduled.endTime,
        });

        for (const observer of [...this.observers]) {
            observer.update(scheduled);
        }
        return scheduled;
    }

    subscribe(observer: DispatcherObserver): void {
        if (observer.dispatcher !== this) {
            throw new ValidationError(`Observer ${observer.kind} was created for a different dispatcher.`);
        }
        if (this.observers.includes(observer)) {
            return;
        }
        if (observer.isSingleton && this.observers.some((o) => o.kind === observer.kind)) {
            throw new ValidationError(`An observer of kind "${observer.kind}" is already subscribed.`);
        }
        this.observers.push(observer);
    }

    unsubscribe(observer: DispatcherObserver): void {
        const index = this.observers.indexOf(observer);
        if (index !== -1) {
            this.observers.splice(index, 1);
        }
    }

    /** First subscribed observer of `observerClass` satisfying `predicate`. */
    findObserver<T extends DispatcherObserver>(
        observerClass: abstract new (...args: never[]) => T,
        predicate: (observer: T) => boolean = () => true,
    ): T | undefined {
        for (const observer of this.observers) {
            if (observer instanceof observerClass && predicate(observer)) {
                return observer;
            }
        }
        return undefined;
    }

    /** Empties the schedule and indices, then resets every observer. */
    reset(): void {
        this.schedule.reset();
        this.machineNext.fill(0);
        this.jobNext.fill(0);
        this.scheduledById.fill(undefined);
        this.scheduledPerJob.fill(0);
        this.lastStartTime = 0;

        this.logger.debug('Dispatcher reset', { instance: this.instance.name });

        for (const observer of [...this.observers]) {
            observer.reset();
        }
    }

    private assertEligible(operation: Operation, machineId: number): void {
        if (!operation.isEligible(machineId)) {
            throw new ValidationError(
                `Machine ${machineId} is not eligible for operation ${operation.id}; eligible: ${operation.machines.join(', ')}.`,
            );
        }
    }
}
