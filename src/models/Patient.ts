// src/models/Patient.ts

/**
 * Suggested severity domain for a patient record
 *
 * Informational only. Queue order never depends on it.
 */
export const MIN_SEVERITY = 1;  // Low
export const MAX_SEVERITY = 5;  // Critical

/**
 * Patient model - one admission event at the triage desk
 *
 * Data only, no methods. Field domains are checked by the input
 * validation layer, never by the queue engine.
 *
 * Note: id uniqueness is not enforced anywhere, two records with the
 * same id may be queued at once.
 */
export interface Patient {
    readonly id: number;
    readonly name: string;
    readonly severity: number;     // 1 (low) to 5 (critical)
    readonly arrivalTime: number;  // Stamped by the session, display label only
}

/**
 * Fields the desk supplies for a new arrival; arrivalTime is stamped on admission
 */
export type PatientInput = Omit<Patient, 'arrivalTime'>;
