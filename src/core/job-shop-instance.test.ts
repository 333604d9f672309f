import { describe, it, expect } from "vitest";
import { JobShopInstance } from "./job-shop-instance";
import { ValidationError } from "./errors";
import { threeByThreeInstance, twoByTwoInstance } from "../testing/fixtures";

describe("JobShopInstance", () => {
    it("assigns dense ids in job-major, position-minor order", () => {
        const instance = threeByThreeInstance();
        expect(instance.operations.map((op) => [op.id, op.jobId, op.positionInJob])).toEqual([
            [0, 0, 0], [1, 0, 1], [2, 0, 2],
            [3, 1, 0], [4, 1, 1], [5, 1, 2],
            [6, 2, 0], [7, 2, 1], [8, 2, 2],
        ]);
    });

    it("derives counts and duration bounds", () => {
        const instance = threeByThreeInstance();
        expect(instance.numJobs).toBe(3);
        expect(instance.numMachines).toBe(3);
        expect(instance.numOperations).toBe(9);
        expect(instance.maxDuration).toBe(4);
        expect(instance.maxDurationPerJob).toEqual([3, 4, 4]);
        expect(instance.maxDurationPerMachine).toEqual([3, 4, 3]);
        expect(instance.totalDuration).toBe(22);
        expect(instance.isFlexible).toBe(false);
    });

    it("lists eligible operations per machine", () => {
        const instance = twoByTwoInstance();
        expect(instance.operationsByMachine.map((ops) => ops.map((op) => op.id))).toEqual([[0, 3], [1, 2]]);
    });

    it("shares a scalar duration across eligible machines and keeps per-machine durations", () => {
        const instance = JobShopInstance.fromMatrices([[5, [2, 7]]], [[[0, 1], [1, 2]]]);
        const [first, second] = instance.jobs[0];
        expect(first.durationOn(0)).toBe(5);
        expect(first.durationOn(1)).toBe(5);
        expect(second.durationOn(2)).toBe(7);
        expect(second.minDuration).toBe(2);
        expect(instance.isFlexible).toBe(true);
        expect(instance.numMachines).toBe(3);
        expect(instance.machinesMatrix).toEqual([[[0, 1], [1, 2]]]);
        expect(instance.durationsMatrix).toEqual([[[5, 5], [2, 7]]]);
    });

    it("keeps name and metadata", () => {
        const instance = JobShopInstance.fromMatrices([[1]], [[0]], {
            name: "tiny",
            metadata: { optimum: 1, reference: "made up" },
        });
        expect(instance.name).toBe("tiny");
        expect(instance.metadata).toEqual({ optimum: 1, reference: "made up" });
    });

    it("rejects machine ids that leave a gap", () => {
        expect(() => JobShopInstance.fromMatrices([[1, 1]], [[0, 2]])).toThrow(
            "Machine ids must be dense: no operation uses machine 1, but machine 2 is referenced.",
        );
        expect(() => JobShopInstance.fromMatrices([[1]], [[1e15]])).toThrow(ValidationError);
    });

    it("rejects an operation without eligible machines", () => {
        expect(() => JobShopInstance.fromMatrices([[1]], [[[]]])).toThrow(ValidationError);
    });

    it("rejects negative durations", () => {
        expect(() => JobShopInstance.fromMatrices([[-1]], [[0]])).toThrow(/Invalid duration -1/);
    });

    it("rejects negative or fractional machine ids", () => {
        expect(() => JobShopInstance.fromMatrices([[1]], [[-2]])).toThrow(/Invalid machine id -2/);
        expect(() => JobShopInstance.fromMatrices([[1]], [[0.5]])).toThrow(ValidationError);
    });

    it("rejects mismatched matrix shapes", () => {
        expect(() => JobShopInstance.fromMatrices([[1, 2]], [[0]])).toThrow(/2 durations but 1 machine entries/);
        expect(() => JobShopInstance.fromMatrices([[1]], [[0], [1]])).toThrow(ValidationError);
        expect(() => JobShopInstance.fromMatrices([[[1, 2, 3]]], [[[0, 1]]])).toThrow(/Expected 2 durations/);
    });

    it("rejects repeated machines within one operation", () => {
        expect(() => JobShopInstance.fromMatrices([[1]], [[[1, 1]]])).toThrow(/Repeated machine ids/);
    });

    it("throws on unknown operation ids", () => {
        const instance = twoByTwoInstance();
        expect(instance.getOperation(3).jobId).toBe(1);
        expect(() => instance.getOperation(4)).toThrow(ValidationError);
    });
});
