// src/session/triageSession.ts

import { Patient, PatientInput } from '../models/Patient';
import { TriageQueue } from '../engine/triageQueue';

export interface AdmissionResult {
    admitted: boolean;
    patient: Patient;
}

/**
 * One run of the triage desk
 *
 * Owns the queue and the arrival counter. Created once per run and
 * passed to everything that admits patients.
 */
export class TriageSession {
    readonly queue: TriageQueue;
    private arrivalCounter = 0;

    /**
     * @param capacity Queue capacity, null for unbounded
     */
    constructor(capacity: number | null = null) {
        this.queue = new TriageQueue(capacity);
    }

    /**
     * Stamp the next arrival time and try to admit the patient
     *
     * The counter advances on every attempt, including one rejected
     * because the queue is full.
     */
    admit(input: PatientInput): AdmissionResult {
        this.arrivalCounter++;

        const patient: Patient = {
            id: input.id,
            name: input.name,
            severity: input.severity,
            arrivalTime: this.arrivalCounter
        };

        return { admitted: this.queue.arrive(patient), patient };
    }

    serveNext(): Patient | null {
        return this.queue.serveNext();
    }

    /**
     * Number of arrival times stamped so far
     */
    get arrivalsRecorded(): number {
        return this.arrivalCounter;
    }
}
