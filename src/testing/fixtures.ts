import { JobShopInstance } from '../core/job-shop-instance';
import type { OperationSpec } from '../core/operation';
import type { Dispatcher } from '../dispatching/dispatcher';

/** Deterministic PRNG (mulberry32) returning values in [0, 1). */
export function seededRandom(seed: number): () => number {
    let a = seed >>> 0;
    return () => {
        a = (a + 0x6d2b79f5) >>> 0;
        let t = a;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

export function pick<T>(random: () => number, items: readonly T[]): T {
    return items[Math.floor(random() * items.length)];
}

/**
 * job0 = [(m0, 3), (m1, 2)], job1 = [(m1, 4), (m0, 1)].
 * Operation ids: 0 = j0p0, 1 = j0p1, 2 = j1p0, 3 = j1p1.
 */
export function twoByTwoInstance(): JobShopInstance {
    return JobShopInstance.fromMatrices(
        [
            [3, 2],
            [4, 1],
        ],
        [
            [0, 1],
            [1, 0],
        ],
        { name: 'two-by-two' },
    );
}

export function threeByThreeInstance(): JobShopInstance {
    return JobShopInstance.fromMatrices(
        [
            [3, 2, 2],
            [2, 1, 4],
            [4, 3, 1],
        ],
        [
            [0, 1, 2],
            [0, 2, 1],
            [1, 2, 0],
        ],
        { name: 'three-by-three' },
    );
}

/** Job-shop instance where every job visits every machine once, in random order. */
export function randomInstance(
    random: () => number,
    numJobs: number,
    numMachines: number,
    options: { flexible?: boolean } = {},
): JobShopInstance {
    const jobs: OperationSpec[][] = [];
    for (let jobId = 0; jobId < numJobs; jobId++) {
        const order = Array.from({ length: numMachines }, (_, m) => m);
        for (let i = order.length - 1; i > 0; i--) {
            const j = Math.floor(random() * (i + 1));
            [order[i], order[j]] = [order[j], order[i]];
        }
        jobs.push(
            order.map((machineId): OperationSpec => {
                const duration = 1 + Math.floor(random() * 9);
                if (!options.flexible || random() < 0.5) {
                    return { machines: machineId, duration };
                }
                const other = (machineId + 1 + Math.floor(random() * (numMachines - 1))) % numMachines;
                return { machines: [machineId, other], duration: [duration, 1 + Math.floor(random() * 9)] };
            }),
        );
    }
    return new JobShopInstance(jobs, { name: `random-${numJobs}x${numMachines}` });
}

/**
 * Commits one random ready operation on a random eligible machine, sometimes
 * later than its earliest start. Returns false when nothing is left.
 */
export function commitRandomStep(dispatcher: Dispatcher, random: () => number): boolean {
    const ready = dispatcher.readyOperations();
    if (ready.length === 0) {
        return false;
    }
    const operation = pick(random, ready);
    const machineId = pick(random, operation.machines);
    const delay = random() < 0.3 ? Math.floor(random() * 3) : 0;
    dispatcher.commit(operation, machineId, dispatcher.earliestStartTime(operation, machineId) + delay);
    return true;
}
