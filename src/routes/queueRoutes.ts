// src/routes/queueRoutes.ts

import { Router, Request, Response } from 'express';
import { TriageSession } from '../session/triageSession';
import { handleArrival } from '../events/arrivalHandler';
import { handleServe } from '../events/serveHandler';
import { capacityStatus, queueRows, severityStatistics } from '../engine/queueReports';
import { ValidationError } from '../errors';
import type { Logger } from '../utils/logger';

/**
 * Queue routes - HTTP mapping only
 * Business logic delegated to engine/events
 */
export function createQueueRoutes(session: TriageSession, logger: Logger): Router {
    const router = Router();
    const queue = session.queue;

    /**
     * Admit a patient at the rear
     * POST /queue/patients
     * Body: { id, name, severity }
     */
    router.post('/patients', (req: Request, res: Response) => {
        try {
            const outcome = handleArrival(session, req.body, logger);

            if (!outcome.admitted) {
                res.status(409).json({
                    error: 'Queue is at full capacity',
                    reason: outcome.reason,
                    capacity: queue.capacity()
                });
                return;
            }

            res.status(201).json({ patient: outcome.patient, size: queue.size() });
        } catch (error) {
            if (error instanceof ValidationError) {
                res.status(400).json({ error: error.message, issues: error.issues });
                return;
            }
            throw error;
        }
    });

    /**
     * Serve the next patient
     * POST /queue/serve
     */
    router.post('/serve', (_req: Request, res: Response) => {
        const outcome = handleServe(session, logger);

        if (!outcome.served) {
            res.status(404).json({ error: 'Queue is empty', reason: outcome.reason });
            return;
        }

        res.json({ patient: outcome.patient, size: queue.size() });
    });

    /**
     * Snapshot of the whole queue
     * GET /queue?direction=forward|backward
     */
    router.get('/', (req: Request, res: Response) => {
        const direction = req.query.direction ?? 'forward';

        if (direction !== 'forward' && direction !== 'backward') {
            res.status(400).json({ error: "direction must be 'forward' or 'backward'" });
            return;
        }

        const patients = direction === 'forward' ? queue.traverseForward() : queue.traverseBackward();

        res.json({
            direction,
            size: patients.length,
            patients: queueRows(patients)
        });
    });

    /**
     * Next patient to be served
     * GET /queue/front
     */
    router.get('/front', (_req: Request, res: Response) => {
        const patient = queue.peekFront();
        if (patient === null) {
            res.status(404).json({ error: 'Queue is empty' });
            return;
        }

        res.json({ patient });
    });

    /**
     * Last patient in line
     * GET /queue/rear
     */
    router.get('/rear', (_req: Request, res: Response) => {
        const patient = queue.peekRear();
        if (patient === null) {
            res.status(404).json({ error: 'Queue is empty' });
            return;
        }

        res.json({ patient });
    });

    /**
     * Full / empty / usage
     * GET /queue/status
     */
    router.get('/status', (_req: Request, res: Response) => {
        res.json(capacityStatus(queue));
    });

    /**
     * Capacity information and severity statistics
     * GET /queue/stats
     */
    router.get('/stats', (_req: Request, res: Response) => {
        res.json({
            capacity: capacityStatus(queue),
            severity: severityStatistics(queue.traverseForward())
        });
    });

    return router;
}
