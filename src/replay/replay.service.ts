import { DateTime } from 'luxon';
import { ConstraintChecker } from '../core/constraint-checker';
import { ValidationError } from '../core/errors';
import { JobShopInstance } from '../core/job-shop-instance';
import type { Schedule } from '../core/schedule';
import { Dispatcher, type DispatcherOptions } from '../dispatching/dispatcher';
import { InstanceDocumentSchema, type InstanceDocument, type ReplayResult, type ScheduledOperationRecord } from './types';

/**
 * Rebuilds a schedule by committing a recorded dispatch sequence through a
 * {@link Dispatcher}. Steps without a machine or a start time take the
 * dispatcher's earliest machine and earliest start.
 */
export class ReplayService {
    private formatUtc(dt: DateTime): string {
        const s = dt.toUTC().startOf('second').toISO({ suppressMilliseconds: true });
        if (!s) throw new Error('Failed to format DateTime to ISO string');
        return s;
    }

    readonly instance: JobShopInstance;
    private readonly document: InstanceDocument;

    constructor(
        rawDocument: unknown,
        private readonly dispatcherOptions: DispatcherOptions = {},
    ) {
        const parsed = InstanceDocumentSchema.safeParse(rawDocument);
        if (!parsed.success) {
            const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
            throw new ValidationError(`Invalid instance document: ${issues.join('; ')}`);
        }
        this.document = parsed.data;
        this.instance = JobShopInstance.fromMatrices(this.document.durationMatrix, this.document.machinesMatrix, {
            name: this.document.name,
            metadata: this.document.metadata,
        });
    }

    public replay(): ReplayResult {
        const dispatcher = new Dispatcher(this.instance, this.dispatcherOptions);

        this.document.dispatchSequence.forEach((step, index) => {
            const operation = this.instance.getOperation(step.operationId);
            try {
                dispatcher.commit(operation, step.machineId, step.startTime);
            } catch (err) {
                if (err instanceof ValidationError) {
                    throw new ValidationError(`Dispatch step ${index} rejected: ${err.message}`);
                }
                throw err;
            }
        });

        // Independent re-check of what the dispatcher built
        ConstraintChecker.validate(dispatcher.schedule);

        const scheduledOperations = this.toRecords(dispatcher.schedule);
        const makespan = dispatcher.schedule.makespan();
        const isComplete = dispatcher.schedule.isComplete();

        return {
            instanceName: this.instance.name,
            scheduledOperations,
            makespan,
            isComplete,
            explanation:
                `Committed ${scheduledOperations.length} of ${this.instance.numOperations} operations. ` +
                (isComplete ? `Makespan ${makespan}.` : `Partial schedule ends at ${makespan}.`),
            metadata: {
                totalOperationsCommitted: scheduledOperations.length,
                totalOperations: this.instance.numOperations,
                totalIdleTime: this.calculateIdleTime(dispatcher.schedule),
                timestamp: this.formatUtc(DateTime.now()),
            },
        };
    }

    private toRecords(schedule: Schedule): ScheduledOperationRecord[] {
        const records = schedule.sequences.flatMap((sequence) =>
            sequence.map((scheduled) => ({
                operationId: scheduled.operation.id,
                jobId: scheduled.jobId,
                positionInJob: scheduled.positionInJob,
                machineId: scheduled.machineId,
                startTime: scheduled.startTime,
                endTime: scheduled.endTime,
            })),
        );
        return records.sort((a, b) => a.startTime - b.startTime || a.machineId - b.machineId);
    }

    /** Gaps on each machine between time 0 and its last scheduled end. */
    private calculateIdleTime(schedule: Schedule): number {
        return schedule.sequences.reduce((acc, sequence) => {
            let cursor = 0;
            for (const scheduled of sequence) {
                acc += scheduled.startTime - cursor;
                cursor = scheduled.endTime;
            }
            return acc;
        }, 0);
    }
}
