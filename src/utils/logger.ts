// src/utils/logger.ts

import pino, { type Logger } from 'pino';
import type { LogLevel } from '../config/config';

export type { Logger };

export interface LoggerOptions {
    level?: LogLevel;
    pretty?: boolean;
}

/**
 * Create the process logger
 *
 * Pretty output goes through the pino-pretty transport; otherwise plain JSON lines.
 */
export function createLogger({ level = 'info', pretty = false }: LoggerOptions = {}): Logger {
    if (!pretty) {
        return pino({ level });
    }

    return pino({
        level,
        transport: {
            target: 'pino-pretty',
            options: { translateTime: 'dd-mm-yyyy HH:MM:ss Z' }
        }
    });
}
