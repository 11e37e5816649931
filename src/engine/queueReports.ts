// src/engine/queueReports.ts

import { Patient, MAX_SEVERITY } from '../models/Patient';
import { QueueCondition } from '../models/QueueCondition';
import { TriageQueue } from './triageQueue';

export interface CapacityStatus {
    size: number;
    capacity: number | null;       // null = unlimited
    condition: QueueCondition;
    isFull: boolean;
    isEmpty: boolean;
    usagePercent: number | null;   // null when unlimited
}

export interface SeverityStatistics {
    count: number;
    average: number;
    min: number;
    max: number;
}

export interface QueueRow {
    position: number;
    id: number;
    name: string;
    severity: number;
    severityBar: string;
    arrivalTime: number;
}

function roundToTenth(value: number): number {
    return Math.round(value * 10) / 10;
}

/**
 * Size, capacity and usage of a queue
 *
 * Pure read, no side effects on the queue
 */
export function capacityStatus(queue: TriageQueue): CapacityStatus {
    const size = queue.size();
    const capacity = queue.capacity();

    return {
        size,
        capacity,
        condition: queue.condition(),
        isFull: queue.isFull(),
        isEmpty: queue.isEmpty(),
        usagePercent: capacity === null ? null : roundToTenth((size / capacity) * 100)
    };
}

/**
 * Average / min / max severity over a snapshot
 *
 * @param patients Snapshot, usually traverseForward()
 * @returns Statistics, or null if the snapshot is empty
 */
export function severityStatistics(patients: readonly Patient[]): SeverityStatistics | null {
    if (patients.length === 0) {
        return null;
    }

    let total = 0;
    let min = Infinity;
    let max = -Infinity;
    for (const patient of patients) {
        total += patient.severity;
        min = Math.min(min, patient.severity);
        max = Math.max(max, patient.severity);
    }

    return {
        count: patients.length,
        average: roundToTenth(total / patients.length),
        min,
        max
    };
}

/**
 * Fixed-width severity gauge, e.g. 3 → "[***  ]"
 *
 * Out-of-domain values are clamped so any record renders.
 */
export function severityBar(severity: number): string {
    const stars = Math.max(0, Math.min(MAX_SEVERITY, Math.trunc(severity)));
    return '[' + '*'.repeat(stars) + ' '.repeat(MAX_SEVERITY - stars) + ']';
}

/**
 * Display rows for a snapshot, numbered from 1 at the front
 */
export function queueRows(patients: readonly Patient[]): QueueRow[] {
    return patients.map((patient, index) => ({
        position: index + 1,
        id: patient.id,
        name: patient.name,
        severity: patient.severity,
        severityBar: severityBar(patient.severity),
        arrivalTime: patient.arrivalTime
    }));
}
