// src/models/QueueCondition.ts

/**
 * Externally meaningful queue conditions
 *
 * Transitions happen only through arrive / serveNext:
 * - EMPTY → PARTIAL (arrive, capacity > 1 or unbounded)
 * - EMPTY → FULL (arrive, capacity == 1)
 * - PARTIAL → FULL (arrive filling the last place)
 * - FULL → PARTIAL / EMPTY (serveNext)
 * - PARTIAL → EMPTY (serveNext of the last patient)
 *
 * serveNext on EMPTY and arrive on FULL are reported no-ops.
 */
export enum QueueCondition {
    EMPTY = 'EMPTY',
    PARTIAL = 'PARTIAL',
    FULL = 'FULL'
}
