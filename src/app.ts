// src/app.ts

import express from 'express';
import { TriageSession } from './session/triageSession';
import { createQueueRoutes } from './routes/queueRoutes';
import type { Logger } from './utils/logger';

/**
 * Express application setup
 *
 * In-memory state lives in the session:
 * - queue: the FCFS admission queue
 * - arrival counter: stamps each admitted patient
 */
export function createApp(session: TriageSession, logger: Logger): express.Express {
    const app = express();

    // Middleware
    app.use(express.json());

    // Routes
    app.use('/queue', createQueueRoutes(session, logger));

    // Health check
    app.get('/health', (_req, res) => {
        res.json({
            status: 'healthy',
            queueSize: session.queue.size(),
            capacity: session.queue.capacity()
        });
    });

    // Error handling
    app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
        // Body parser rejects unparsable JSON before any route runs
        if ('type' in err && err.type === 'entity.parse.failed') {
            logger.warn({ err }, 'Malformed JSON body');
            res.status(400).json({ error: 'Malformed JSON body' });
            return;
        }

        logger.error(err, 'Unhandled request error');
        res.status(500).json({ error: err.message });
    });

    return app;
}
