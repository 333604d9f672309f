import type { JobShopInstance } from '../core/job-shop-instance';
import { JobShopGraph } from './job-shop-graph';

/**
 * Classic disjunctive graph: a source and a sink, conjunctive edges along each
 * job (source -> first op -> ... -> last op -> sink) and disjunctive edges in
 * both directions between operations that can run on the same machine.
 */
export function buildDisjunctiveGraph(instance: JobShopInstance): JobShopGraph {
    const graph = new JobShopGraph(instance);
    const source = graph.addNode({ nodeType: 'SOURCE' });
    const sink = graph.addNode({ nodeType: 'SINK' });

    for (const job of instance.jobs) {
        let previous = source.nodeId;
        for (const operation of job) {
            const current = graph.getOperationNode(operation.id).nodeId;
            graph.addEdge(previous, current, 'CONJUNCTIVE');
            previous = current;
        }
        graph.addEdge(previous, sink.nodeId, 'CONJUNCTIVE');
    }

    for (const operations of instance.operationsByMachine) {
        for (let i = 0; i < operations.length; i++) {
            for (let j = i + 1; j < operations.length; j++) {
                const a = graph.getOperationNode(operations[i].id).nodeId;
                const b = graph.getOperationNode(operations[j].id).nodeId;
                graph.addEdge(a, b, 'DISJUNCTIVE');
                graph.addEdge(b, a, 'DISJUNCTIVE');
            }
        }
    }
    return graph;
}

/**
 * Operations, machines and jobs as nodes, plus one global node. Operations are
 * linked both ways to their eligible machines and to their job, and follow
 * their job predecessor through a conjunctive edge. Machines and jobs are
 * linked both ways to the global node.
 */
export function buildResourceTaskGraph(instance: JobShopInstance): JobShopGraph {
    const graph = new JobShopGraph(instance);
    const machineNodes = Array.from({ length: instance.numMachines }, (_, machineId) =>
        graph.addNode({ nodeType: 'MACHINE', machineId }),
    );
    const jobNodes = instance.jobs.map((_, jobId) => graph.addNode({ nodeType: 'JOB', jobId }));
    const global = graph.addNode({ nodeType: 'GLOBAL' });

    for (const operation of instance.operations) {
        const node = graph.getOperationNode(operation.id).nodeId;
        for (const machineId of operation.machines) {
            graph.addEdge(node, machineNodes[machineId].nodeId, 'RESOURCE');
            graph.addEdge(machineNodes[machineId].nodeId, node, 'RESOURCE');
        }
        graph.addEdge(node, jobNodes[operation.jobId].nodeId, 'RESOURCE');
        graph.addEdge(jobNodes[operation.jobId].nodeId, node, 'RESOURCE');
        if (operation.positionInJob > 0) {
            const predecessor = instance.jobs[operation.jobId][operation.positionInJob - 1];
            graph.addEdge(graph.getOperationNode(predecessor.id).nodeId, node, 'CONJUNCTIVE');
        }
    }

    for (const node of [...machineNodes, ...jobNodes]) {
        graph.addEdge(node.nodeId, global.nodeId, 'RESOURCE');
        graph.addEdge(global.nodeId, node.nodeId, 'RESOURCE');
    }
    return graph;
}
