import { ValidationError } from '../core/errors';
import type { JobShopInstance } from '../core/job-shop-instance';
import { Node, type NodePayload, type NodeType } from './node';

export type EdgeType = 'CONJUNCTIVE' | 'DISJUNCTIVE' | 'RESOURCE';

export interface Edge {
    source: number;
    target: number;
    edgeType: EdgeType;
}

export interface JobShopGraphOptions {
    /** Add one node per operation, in operation id order. Defaults to true. */
    addOperationNodes?: boolean;
}

/**
 * Directed graph over an instance, stored as an arena of nodes plus a removed
 * bitset. Removing a node only flips its bit: node ids stay valid, and edges
 * touching a removed node are hidden from queries until {@link restore}.
 */
export class JobShopGraph {
    private readonly nodeArena: Node[] = [];
    private readonly removed: boolean[] = [];
    private readonly edgeList: Edge[] = [];
    private readonly outgoing: number[][] = [];
    private readonly incoming: number[][] = [];
    private readonly byType = new Map<NodeType, Node[]>();
    private readonly operationNodes = new Map<number, Node>();
    private readonly machineNodes = new Map<number, Node>();
    private readonly jobNodes = new Map<number, Node>();
    private removedCount = 0;

    constructor(
        readonly instance: JobShopInstance,
        options: JobShopGraphOptions = {},
    ) {
        if (options.addOperationNodes ?? true) {
            for (const operation of instance.operations) {
                this.addNode({ nodeType: 'OPERATION', operation });
            }
        }
    }

    get nodes(): readonly Node[] {
        return this.nodeArena;
    }

    get numNodes(): number {
        return this.nodeArena.length;
    }

    get numRemovedNodes(): number {
        return this.removedCount;
    }

    addNode(payload: NodePayload): Node {
        const node = new Node(this.nodeArena.length, payload);
        const entry = this.typedIndex(payload);
        if (entry) {
            const [index, key] = entry;
            if (index.has(key)) {
                throw new ValidationError(`The graph already has a ${payload.nodeType} node for id ${key}.`);
            }
            index.set(key, node);
        }

        this.nodeArena.push(node);
        this.removed.push(false);
        this.outgoing.push([]);
        this.incoming.push([]);
        const sameType = this.byType.get(node.nodeType) ?? [];
        sameType.push(node);
        this.byType.set(node.nodeType, sameType);
        return node;
    }

    addEdge(source: number, target: number, edgeType: EdgeType): void {
        this.assertActive(source);
        this.assertActive(target);
        const edgeIndex = this.edgeList.length;
        this.edgeList.push({ source, target, edgeType });
        this.outgoing[source].push(edgeIndex);
        this.incoming[target].push(edgeIndex);
    }

    getNode(nodeId: number): Node {
        const node = this.nodeArena[nodeId];
        if (node === undefined) {
            throw new ValidationError(`Node ${nodeId} does not exist.`);
        }
        return node;
    }

    getOperationNode(operationId: number): Node {
        return this.lookup(this.operationNodes, operationId, 'operation');
    }

    getMachineNode(machineId: number): Node {
        return this.lookup(this.machineNodes, machineId, 'machine');
    }

    getJobNode(jobId: number): Node {
        return this.lookup(this.jobNodes, jobId, 'job');
    }

    /** Every node of the type, removed ones included. */
    nodesByType(nodeType: NodeType): readonly Node[] {
        return this.byType.get(nodeType) ?? [];
    }

    hasNodesOfType(nodeType: NodeType): boolean {
        return this.nodesByType(nodeType).length > 0;
    }

    activeNodes(nodeType?: NodeType): Node[] {
        const nodes = nodeType === undefined ? this.nodeArena : this.nodesByType(nodeType);
        return nodes.filter((node) => !this.removed[node.nodeId]);
    }

    isRemoved(nodeId: number): boolean {
        this.getNode(nodeId);
        return this.removed[nodeId];
    }

    /** Marks the node removed. Removing a removed node does nothing. */
    removeNode(nodeId: number): void {
        if (this.isRemoved(nodeId)) {
            return;
        }
        this.removed[nodeId] = true;
        this.removedCount++;
    }

    /** Un-removes every node. */
    restore(): void {
        this.removed.fill(false);
        this.removedCount = 0;
    }

    /** Edges whose endpoints are both present. */
    edges(edgeType?: EdgeType): Edge[] {
        return this.edgeList.filter(
            (edge) =>
                (edgeType === undefined || edge.edgeType === edgeType) &&
                !this.removed[edge.source] &&
                !this.removed[edge.target],
        );
    }

    successors(nodeId: number): number[] {
        this.getNode(nodeId);
        return this.outgoing[nodeId]
            .map((edgeIndex) => this.edgeList[edgeIndex])
            .filter((edge) => !this.removed[edge.source] && !this.removed[edge.target])
            .map((edge) => edge.target);
    }

    predecessors(nodeId: number): number[] {
        this.getNode(nodeId);
        return this.incoming[nodeId]
            .map((edgeIndex) => this.edgeList[edgeIndex])
            .filter((edge) => !this.removed[edge.source] && !this.removed[edge.target])
            .map((edge) => edge.source);
    }

    private typedIndex(payload: NodePayload): [Map<number, Node>, number] | undefined {
        switch (payload.nodeType) {
            case 'OPERATION':
                return [this.operationNodes, payload.operation.id];
            case 'MACHINE':
                return [this.machineNodes, payload.machineId];
            case 'JOB':
                return [this.jobNodes, payload.jobId];
            default:
                return undefined;
        }
    }

    private lookup(index: Map<number, Node>, id: number, label: string): Node {
        const node = index.get(id);
        if (node === undefined) {
            throw new ValidationError(`The graph has no node for ${label} ${id}.`);
        }
        return node;
    }

    private assertActive(nodeId: number): void {
        if (this.isRemoved(nodeId)) {
            throw new ValidationError(`Node ${nodeId} has been removed.`);
        }
    }
}
