import { describe, it, expect } from "vitest";
import { UninitializedAttributeError, ValidationError } from "../../core/errors";
import { JobShopInstance } from "../../core/job-shop-instance";
import { Dispatcher } from "../../dispatching/dispatcher";
import { IsCompletedObserver } from "../../dispatching/feature-observers";
import { buildResourceTaskGraph } from "../builders";
import { ResidualGraphUpdater } from "./residual-graph-updater";
import { twoByTwoInstance } from "../../testing/fixtures";

/**
 * job0 = [(m0, 2), (m1, 3)], job1 = [(m0, 1), (m1, 2)].
 * Operation ids: 0 = j0p0, 1 = j0p1, 2 = j1p0, 3 = j1p1.
 */
function sharedMachinesInstance(): JobShopInstance {
    return JobShopInstance.fromMatrices(
        [
            [2, 3],
            [1, 2],
        ],
        [
            [0, 1],
            [0, 1],
        ],
        { name: "shared-machines" },
    );
}

describe("ResidualGraphUpdater", () => {
    it("removes a machine node right after its last operation is committed", () => {
        const instance = sharedMachinesInstance();
        const dispatcher = new Dispatcher(instance);
        const graph = buildResourceTaskGraph(instance);
        const updater = new ResidualGraphUpdater(dispatcher, graph, { removeCompletedJobNodes: false });
        const machine0 = graph.getMachineNode(0).nodeId;
        const machine1 = graph.getMachineNode(1).nodeId;
        const [op0, op1, op2, op3] = instance.operations;

        expect(dispatcher.subscribers).toEqual([updater.isCompletedObserver, updater]);
        expect(updater.isCompletedObserver.featureTypes).toEqual(["machines"]);

        dispatcher.commit(op0, 0, 0);
        expect(graph.isRemoved(machine0)).toBe(false);

        dispatcher.commit(op2, 0, 2); // now = 2, op0 ended at 2
        expect(graph.isRemoved(machine0)).toBe(true);
        expect(graph.isRemoved(graph.getOperationNode(0).nodeId)).toBe(true);
        expect(graph.isRemoved(graph.getOperationNode(2).nodeId)).toBe(false);

        dispatcher.commit(op1, 1, 2);
        expect(graph.isRemoved(machine1)).toBe(false);

        dispatcher.commit(op3, 1, 5); // now = 5, op1 ended at 5
        expect(graph.isRemoved(machine1)).toBe(true);
        expect(graph.activeNodes("OPERATION").map((node) => node.operation.id)).toEqual([3]);
        expect(graph.activeNodes("JOB")).toHaveLength(2);
        expect(graph.numRemovedNodes).toBe(5);
    });

    it("removes job nodes once their operations are all committed", () => {
        const instance = sharedMachinesInstance();
        const dispatcher = new Dispatcher(instance);
        const graph = buildResourceTaskGraph(instance);
        new ResidualGraphUpdater(dispatcher, graph);

        dispatcher.commit(instance.operations[2], 0, 0);
        dispatcher.commit(instance.operations[3], 1, 1);

        expect(graph.isRemoved(graph.getJobNode(1).nodeId)).toBe(true);
        expect(graph.isRemoved(graph.getJobNode(0).nodeId)).toBe(false);
        expect(graph.isRemoved(graph.getMachineNode(1).nodeId)).toBe(false);
    });

    it("reuses a subscribed completion observer covering its feature types", () => {
        const instance = sharedMachinesInstance();
        const dispatcher = new Dispatcher(instance);
        const existing = new IsCompletedObserver(dispatcher);
        const updater = new ResidualGraphUpdater(dispatcher, buildResourceTaskGraph(instance));

        expect(updater.isCompletedObserver).toBe(existing);
        expect(dispatcher.subscribers).toHaveLength(2);
    });

    it("fails on first use of the completion observer when no removal mode is set", () => {
        const instance = sharedMachinesInstance();
        const dispatcher = new Dispatcher(instance);
        const updater = new ResidualGraphUpdater(dispatcher, buildResourceTaskGraph(instance), {
            removeCompletedMachineNodes: false,
            removeCompletedJobNodes: false,
        });

        expect(dispatcher.subscribers).toEqual([updater]);
        expect(() => updater.isCompletedObserver).toThrow(UninitializedAttributeError);

        dispatcher.commit(instance.operations[0], 0, 0);
        dispatcher.commit(instance.operations[2], 0, 2);
        expect(updater.graph.numRemovedNodes).toBe(1);
    });

    it("returns to the state of a fresh setup on reset", () => {
        const instance = sharedMachinesInstance();
        const dispatcher = new Dispatcher(instance);
        const graph = buildResourceTaskGraph(instance);
        const updater = new ResidualGraphUpdater(dispatcher, graph);
        dispatcher.commit(instance.operations[2], 0, 0);
        dispatcher.commit(instance.operations[3], 1, 1); // now = 1: op2 and job1 are done
        expect(graph.numRemovedNodes).toBe(2);

        dispatcher.reset();

        const freshInstance = sharedMachinesInstance();
        const freshGraph = buildResourceTaskGraph(freshInstance);
        const fresh = new ResidualGraphUpdater(new Dispatcher(freshInstance), freshGraph);
        expect(graph.numRemovedNodes).toBe(0);
        expect(graph.activeNodes().map((node) => node.nodeId)).toEqual(freshGraph.activeNodes().map((node) => node.nodeId));
        expect(graph.edges()).toEqual(freshGraph.edges());
        for (const featureType of ["machines", "jobs"] as const) {
            expect(updater.isCompletedObserver.getFeatures(featureType).toArray()).toEqual(
                fresh.isCompletedObserver.getFeatures(featureType).toArray(),
            );
        }
        expect(updater.isCompletedObserver.remainingOperationsPerMachine).toEqual([2, 2]);
        expect(updater.isCompletedObserver.remainingOperationsPerJob).toEqual([2, 2]);
    });

    it("rejects a graph built for another instance", () => {
        const dispatcher = new Dispatcher(sharedMachinesInstance());
        expect(() => new ResidualGraphUpdater(dispatcher, buildResourceTaskGraph(twoByTwoInstance()))).toThrow(
            ValidationError,
        );
    });
});
