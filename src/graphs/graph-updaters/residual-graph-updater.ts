import { UninitializedAttributeError } from '../../core/errors';
import type { Dispatcher } from '../../dispatching/dispatcher';
import { createOrGetObserver, type ObserverOptions } from '../../dispatching/dispatcher-observer';
import type { FeatureType } from '../../dispatching/feature-observers/feature-observer';
import { IsCompletedObserver } from '../../dispatching/feature-observers/is-completed-observer';
import type { JobShopGraph } from '../job-shop-graph';
import { GraphUpdater, removeCompletedOperations } from './graph-updater';

export interface ResidualGraphUpdaterOptions extends ObserverOptions {
    /** Defaults to true. */
    removeCompletedMachineNodes?: boolean;
    /** Defaults to true. */
    removeCompletedJobNodes?: boolean;
}

/**
 * Shrinks the graph to what is left to schedule: completed operation nodes are
 * removed after every commit, and, when enabled, machine and job nodes once
 * an {@link IsCompletedObserver} reports them complete.
 */
export class ResidualGraphUpdater extends GraphUpdater {
    readonly kind = 'residual-graph-updater';
    readonly removeCompletedMachineNodes: boolean;
    readonly removeCompletedJobNodes: boolean;
    private readonly completionObserver?: IsCompletedObserver;

    constructor(dispatcher: Dispatcher, graph: JobShopGraph, options: ResidualGraphUpdaterOptions = {}) {
        super(dispatcher, graph, options);
        this.removeCompletedMachineNodes = options.removeCompletedMachineNodes ?? true;
        this.removeCompletedJobNodes = options.removeCompletedJobNodes ?? true;

        const featureTypes: FeatureType[] = [];
        if (this.removeCompletedMachineNodes) {
            featureTypes.push('machines');
        }
        if (this.removeCompletedJobNodes) {
            featureTypes.push('jobs');
        }
        // Obtained before subscribing so that it is notified first.
        if (featureTypes.length > 0) {
            this.completionObserver = createOrGetObserver(
                dispatcher,
                IsCompletedObserver,
                (observer) => featureTypes.every((featureType) => observer.hasFeatureType(featureType)),
                { featureTypes },
            );
        }
        this.activate(options.subscribe);
    }

    get isCompletedObserver(): IsCompletedObserver {
        if (this.completionObserver === undefined) {
            throw new UninitializedAttributeError(
                'The completion observer is not initialized. Set removeCompletedMachineNodes or ' +
                    'removeCompletedJobNodes to true when creating the ResidualGraphUpdater.',
            );
        }
        return this.completionObserver;
    }

    protected applyCurrentState(): void {
        removeCompletedOperations(this.graph, this.dispatcher.completedOperations());

        if (this.removeCompletedMachineNodes && this.graph.hasNodesOfType('MACHINE')) {
            this.removeCompletedNodes('machines', (machineId) => this.graph.getMachineNode(machineId).nodeId);
        }
        if (this.removeCompletedJobNodes && this.graph.hasNodesOfType('JOB')) {
            this.removeCompletedNodes('jobs', (jobId) => this.graph.getJobNode(jobId).nodeId);
        }
    }

    private removeCompletedNodes(featureType: FeatureType, nodeIdOf: (entityId: number) => number): void {
        const isCompleted = this.isCompletedObserver.getFeatures(featureType).column(0);
        isCompleted.forEach((value, entityId) => {
            if (value !== 1) {
                return;
            }
            const nodeId = nodeIdOf(entityId);
            if (!this.graph.isRemoved(nodeId)) {
                this.graph.removeNode(nodeId);
            }
        });
    }
}
