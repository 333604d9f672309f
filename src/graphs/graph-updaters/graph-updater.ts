import { ValidationError } from '../../core/errors';
import type { ScheduledOperation } from '../../core/scheduled-operation';
import type { Dispatcher } from '../../dispatching/dispatcher';
import { DispatcherObserver, type ObserverOptions } from '../../dispatching/dispatcher-observer';
import type { JobShopGraph } from '../job-shop-graph';

/**
 * Observer that keeps a {@link JobShopGraph} in step with the dispatcher.
 * It is the only writer of that graph while subscribed.
 */
export abstract class GraphUpdater extends DispatcherObserver {
    constructor(
        dispatcher: Dispatcher,
        readonly graph: JobShopGraph,
        options: ObserverOptions = {},
    ) {
        super(dispatcher, options);
        if (graph.instance !== dispatcher.instance) {
            throw new ValidationError(
                `Graph for instance ${graph.instance.name} cannot follow a dispatcher for ${dispatcher.instance.name}.`,
            );
        }
    }

    /** Restores the full graph, then applies the current state to it. */
    initializeFromCurrentState(): void {
        this.graph.restore();
        this.applyCurrentState();
    }

    update(_scheduledOperation: ScheduledOperation): void {
        this.applyCurrentState();
    }

    protected abstract applyCurrentState(): void;
}

/** Removes the node of every completed operation that is still present. */
export function removeCompletedOperations(graph: JobShopGraph, completedOperations: readonly ScheduledOperation[]): void {
    for (const scheduled of completedOperations) {
        const node = graph.getOperationNode(scheduled.operation.id);
        if (!graph.isRemoved(node.nodeId)) {
            graph.removeNode(node.nodeId);
        }
    }
}
