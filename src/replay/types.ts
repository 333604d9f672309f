import { z } from 'zod';

const nonNegative = z.number().finite().nonnegative();
const machineId = z.number().int().nonnegative();

export const DispatchStepSchema = z.object({
    operationId: z.number().int().nonnegative(),
    machineId: machineId.optional(),
    startTime: nonNegative.optional(),
});

export const InstanceDocumentSchema = z.object({
    name: z.string().min(1).optional(),
    durationMatrix: z.array(z.array(z.union([nonNegative, z.array(nonNegative).min(1)]))),
    machinesMatrix: z.array(z.array(z.union([machineId, z.array(machineId).min(1)]))),
    metadata: z
        .object({
            optimum: z.number().nullable().optional(),
            lowerBound: z.number().optional(),
            upperBound: z.number().optional(),
            reference: z.string().optional(),
        })
        .passthrough()
        .optional(),
    /** Commits to replay, in order. */
    dispatchSequence: z.array(DispatchStepSchema).default([]),
});

export type DispatchStep = z.infer<typeof DispatchStepSchema>;
export type InstanceDocument = z.infer<typeof InstanceDocumentSchema>;

/**
 * Replay output types
 */
export interface ScheduledOperationRecord {
    operationId: number;
    jobId: number;
    positionInJob: number;
    machineId: number;
    startTime: number;
    endTime: number;
}

export interface ReplayResult {
    instanceName: string;
    scheduledOperations: ScheduledOperationRecord[];
    makespan: number;
    isComplete: boolean;
    explanation: string;
    metadata: {
        totalOperationsCommitted: number;
        totalOperations: number;
        totalIdleTime: number;
        timestamp: string; // ISO-8601 UTC
    };
}
