// src/simulation/runDeskSimulation.ts

import { Patient } from '../models/Patient';
import { TriageSession } from '../session/triageSession';
import { handleArrival } from '../events/arrivalHandler';
import { handleServe } from '../events/serveHandler';
import { capacityStatus, queueRows, severityStatistics } from '../engine/queueReports';
import type { Logger } from '../utils/logger';

/**
 * Scripted desk session
 *
 * Replays one short shift and times it:
 * - queue capacity 5
 * - three arrivals
 * - one patient served
 * - queue displayed
 */

export const SIMULATION_CAPACITY = 5;

export const SIMULATION_ARRIVALS = [
    { id: 101, name: 'John', severity: 3 },
    { id: 102, name: 'Sarah', severity: 4 },
    { id: 103, name: 'Mike', severity: 2 }
];

export interface SimulationResult {
    served: Patient | null;
    remaining: Patient[];
    violations: string[];
    elapsedMs: number;
}

function logSection(logger: Logger, title: string): void {
    logger.info('='.repeat(60));
    logger.info(title);
    logger.info('='.repeat(60));
}

export function runDeskSimulation(logger: Logger): SimulationResult {
    const startedAt = performance.now();

    logSection(logger, 'TRIAGE DESK SIMULATION - START');

    // Open the desk
    const session = new TriageSession(SIMULATION_CAPACITY);
    logger.info(`System initialized with capacity: ${SIMULATION_CAPACITY}`);

    // ========== STEP 1: Arrivals ==========
    logSection(logger, 'STEP 1: Patient arrivals');
    for (const arrival of SIMULATION_ARRIVALS) {
        handleArrival(session, arrival, logger);
    }

    // ========== STEP 2: Serve ==========
    logSection(logger, 'STEP 2: Serve next patient');
    const outcome = handleServe(session, logger);
    const served = outcome.served ? outcome.patient : null;

    // ========== STEP 3: Display ==========
    logSection(logger, 'STEP 3: Queue (front to rear)');
    const remaining = session.queue.traverseForward();
    for (const row of queueRows(remaining)) {
        logger.info(
            `  ${row.position}. ${row.name} (ID ${row.id}) ${row.severityBar} Patient #${row.arrivalTime}`
        );
    }

    const status = capacityStatus(session.queue);
    logger.info(`Total patients in queue: ${status.size}/${status.capacity ?? 'Unlimited'}`);

    const stats = severityStatistics(remaining);
    if (stats) {
        logger.info(`Severity avg ${stats.average}/5, min ${stats.min}/5, max ${stats.max}/5`);
    }

    // ========== STEP 4: Invariant verification ==========
    logSection(logger, 'STEP 4: Invariant verification');
    const violations = session.queue.findInvariantViolations();
    for (const violation of violations) {
        logger.error(`  ✗ VIOLATED: ${violation}`);
    }
    logger.info(`All invariants hold: ${violations.length === 0 ? '✓ YES' : '✗ NO'}`);

    const elapsedMs = performance.now() - startedAt;
    logSection(logger, 'SIMULATION COMPLETE');
    logger.info(`Execution time: ${elapsedMs.toFixed(2)} milliseconds`);

    return { served, remaining, violations, elapsedMs };
}
