// src/events/serveHandler.ts

import { Patient } from '../models/Patient';
import { TriageSession } from '../session/triageSession';
import type { Logger } from '../utils/logger';

export type ServeOutcome =
    | { served: true; patient: Patient }
    | { served: false; reason: 'QUEUE_EMPTY' };

/**
 * Serve the next patient in FIFO order
 *
 * An empty queue is reported, not raised.
 */
export function handleServe(session: TriageSession, logger: Logger): ServeOutcome {
    const patient = session.serveNext();

    if (patient === null) {
        logger.warn('Cannot serve: queue is empty');
        return { served: false, reason: 'QUEUE_EMPTY' };
    }

    logger.info(
        { patientId: patient.id, arrivalTime: patient.arrivalTime, remaining: session.queue.size() },
        `Now serving: ${patient.name}`
    );
    return { served: true, patient };
}
