#!/usr/bin/env node
import fs from 'fs';
import { performance } from 'perf_hooks';
import { ReplayService } from './replay/replay.service';
import { getLogger } from './utils/logger';

const logger = getLogger();

async function main() {
    const inputPath = process.argv[2] ?? './data/example-instance.json';

    if (!fs.existsSync(inputPath)) {
        logger.error(`Input file not found at ${inputPath}`);
        process.exit(1);
    }

    // 1. Load Data
    const rawData = fs.readFileSync(inputPath, 'utf8');
    let document: unknown;
    try {
        document = JSON.parse(rawData);
    } catch (err) {
        logger.error(`Input file ${inputPath} is not valid JSON`, { error: err instanceof Error ? err.message : String(err) });
        process.exit(1);
    }

    // 2. Build Instance and Replay
    const startTime = performance.now();
    let result;
    try {
        const service = new ReplayService(document);
        console.log('-------------------------------------------');
        console.log('Job-Shop Dispatch Replay');
        console.log(
            `Input: ${service.instance.name}, ${service.instance.numJobs} jobs, ` +
                `${service.instance.numMachines} machines, ${service.instance.numOperations} operations`,
        );
        console.log('-------------------------------------------');
        result = service.replay();
    } catch (err) {
        logger.error('Replay failed', { error: err instanceof Error ? err.message : String(err) });
        process.exit(1);
    }
    const endTime = performance.now();

    // 3. Print Metrics
    console.log(`Runtime: ${(endTime - startTime).toFixed(2)} ms`);
    console.log(`Committed: ${result.metadata.totalOperationsCommitted}/${result.metadata.totalOperations} operations`);
    console.log(`Makespan: ${result.makespan}${result.isComplete ? '' : ' (partial)'}`);
    console.log(`Idle time: ${result.metadata.totalIdleTime}`);
    for (const op of result.scheduledOperations) {
        console.log(
            `  job ${op.jobId} op ${op.positionInJob} (id ${op.operationId}) on machine ${op.machineId}: ${op.startTime} -> ${op.endTime}`,
        );
    }
    console.log('-------------------------------------------');
    logger.info(result.explanation, { timestamp: result.metadata.timestamp });
}

main().catch((err) => {
    logger.error('Fatal unhandled error', { error: err instanceof Error ? err.stack : String(err) });
    process.exit(1);
});
