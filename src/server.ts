// src/server.ts

import dotenv from 'dotenv';
import { z } from 'zod';
import { type AppConfig, appConfigSchema } from './config/config';
import { createApp } from './app';
import { TriageSession } from './session/triageSession';
import { createLogger } from './utils/logger';

dotenv.config();

const result = appConfigSchema.safeParse(process.env);
if (!result.success) {
    console.error('Invalid environment variable configuration:', z.treeifyError(result.error));
    process.exit(1);
}

const config: AppConfig = result.data;

const logger = createLogger({
    level: config.logLevel,
    pretty: config.logPretty ?? process.stdout.isTTY
});

const session = new TriageSession(config.queueCapacity);
const app = createApp(session, logger);

const server = app.listen(config.port, () => {
    logger.info(
        `Triage desk running on port ${config.port} (capacity: ${config.queueCapacity ?? 'unlimited'})`
    );
});

// Graceful shutdown for both SIGINT (Ctrl-C) and SIGTERM
const shutdown = () => {
    logger.info('Shutting down triage desk...');
    server.close(error => {
        if (error) {
            logger.error(error, 'Error while closing server');
            process.exit(1);
        }
        process.exit(0);
    });
};
process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
