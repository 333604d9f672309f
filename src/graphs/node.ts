import { UninitializedAttributeError } from '../core/errors';
import type { Operation } from '../core/operation';

export type NodeType = 'OPERATION' | 'MACHINE' | 'JOB' | 'GLOBAL' | 'SOURCE' | 'SINK';

export type NodePayload =
    | { nodeType: 'OPERATION'; operation: Operation }
    | { nodeType: 'MACHINE'; machineId: number }
    | { nodeType: 'JOB'; jobId: number }
    | { nodeType: 'GLOBAL' | 'SOURCE' | 'SINK' };

/**
 * A graph vertex. `nodeId` is its index in the owning graph's arena and never
 * changes, even after the node is removed.
 */
export class Node {
    constructor(
        readonly nodeId: number,
        private readonly payload: NodePayload,
    ) {}

    get nodeType(): NodeType {
        return this.payload.nodeType;
    }

    get operation(): Operation {
        if (this.payload.nodeType !== 'OPERATION') {
            throw new UninitializedAttributeError(`Node ${this.nodeId} (${this.nodeType}) has no operation.`);
        }
        return this.payload.operation;
    }

    get machineId(): number {
        if (this.payload.nodeType !== 'MACHINE') {
            throw new UninitializedAttributeError(`Node ${this.nodeId} (${this.nodeType}) has no machine id.`);
        }
        return this.payload.machineId;
    }

    get jobId(): number {
        if (this.payload.nodeType !== 'JOB') {
            throw new UninitializedAttributeError(`Node ${this.nodeId} (${this.nodeType}) has no job id.`);
        }
        return this.payload.jobId;
    }

    toString(): string {
        switch (this.payload.nodeType) {
            case 'OPERATION':
                return `Node(id=${this.nodeId}, type=OPERATION, operation=${this.payload.operation.id})`;
            case 'MACHINE':
                return `Node(id=${this.nodeId}, type=MACHINE, machine=${this.payload.machineId})`;
            case 'JOB':
                return `Node(id=${this.nodeId}, type=JOB, job=${this.payload.jobId})`;
            default:
                return `Node(id=${this.nodeId}, type=${this.payload.nodeType})`;
        }
    }
}
