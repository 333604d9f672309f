import { ValidationError } from './errors';
import type { Schedule } from './schedule';
import type { ScheduledOperation } from './scheduled-operation';

export class ConstraintChecker {
    /**
     * Re-checks a schedule by brute force, independently of the incremental
     * bookkeeping that built it. Throws a ValidationError on the first violation.
     */
    static validate(schedule: Schedule): void {
        const { instance } = schedule;
        const byJob: ScheduledOperation[][] = Array.from({ length: instance.numJobs }, () => []);
        const seen = new Set<number>();

        schedule.sequences.forEach((sequence, machineId) => {
            for (const scheduled of sequence) {
                // 1. Eligibility and uniqueness
                if (!scheduled.operation.isEligible(machineId) || scheduled.machineId !== machineId) {
                    throw new ValidationError(
                        `Eligibility Violation: operation ${scheduled.operation.id} is on machine ${machineId}.`,
                    );
                }
                if (seen.has(scheduled.operation.id)) {
                    throw new ValidationError(`Duplicate Operation: ${scheduled.operation.id} is scheduled twice.`);
                }
                seen.add(scheduled.operation.id);
                byJob[scheduled.jobId].push(scheduled);
            }

            // 2. Machine Overlaps (Resource Conflict)
            for (let i = 0; i < sequence.length; i++) {
                for (let j = i + 1; j < sequence.length; j++) {
                    if (this.overlaps(sequence[i], sequence[j])) {
                        throw new ValidationError(
                            `Capacity Conflict: operations ${sequence[i].operation.id} and ${sequence[j].operation.id} overlap on machine ${machineId}.`,
                        );
                    }
                }
                if (i > 0 && sequence[i].startTime < sequence[i - 1].startTime) {
                    throw new ValidationError(`Ordering Violation: machine ${machineId} sequence is not sorted by start time.`);
                }
            }
        });

        // 3. Job Precedence: predecessor end <= successor start
        byJob.forEach((sequence, jobId) => {
            const sorted = [...sequence].sort((a, b) => a.positionInJob - b.positionInJob);
            sorted.forEach((scheduled, index) => {
                if (scheduled.positionInJob !== index) {
                    throw new ValidationError(
                        `Precedence Violation: job ${jobId} has position ${scheduled.positionInJob} scheduled without position ${index}.`,
                    );
                }
                const predecessor = sorted[index - 1];
                if (predecessor !== undefined && scheduled.startTime < predecessor.endTime) {
                    throw new ValidationError(
                        `Precedence Violation: operation ${scheduled.operation.id} starts before operation ${predecessor.operation.id} ends.`,
                    );
                }
            });
        });
    }

    private static overlaps(a: ScheduledOperation, b: ScheduledOperation): boolean {
        return a.startTime < b.endTime && b.startTime < a.endTime;
    }
}
