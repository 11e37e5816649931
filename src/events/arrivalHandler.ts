// src/events/arrivalHandler.ts

import { Patient } from '../models/Patient';
import { TriageSession } from '../session/triageSession';
import { parsePatientInput } from '../validation/patientInput';
import type { Logger } from '../utils/logger';

export type ArrivalOutcome =
    | { admitted: true; patient: Patient }
    | { admitted: false; patient: Patient; reason: 'QUEUE_FULL' };

/**
 * Handle a patient arriving at the desk
 *
 * Side effects:
 * 1. Advance the session's arrival counter
 * 2. Append the patient at the rear, unless the queue is full
 *
 * @param rawInput Unvalidated { id, name, severity }
 * @throws ValidationError if the input is malformed (session untouched)
 */
export function handleArrival(session: TriageSession, rawInput: unknown, logger: Logger): ArrivalOutcome {
    const input = parsePatientInput(rawInput);
    const { admitted, patient } = session.admit(input);

    if (!admitted) {
        logger.warn(
            { patientId: patient.id, capacity: session.queue.capacity() },
            `Cannot admit '${patient.name}': queue is at full capacity`
        );
        return { admitted: false, patient, reason: 'QUEUE_FULL' };
    }

    logger.info(
        { patientId: patient.id, arrivalTime: patient.arrivalTime, size: session.queue.size() },
        `Patient '${patient.name}' added to queue`
    );
    return { admitted: true, patient };
}
