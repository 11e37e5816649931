// src/config/config.ts

import { z } from 'zod';

export const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug', 'silent']);

export type LogLevel = z.infer<typeof logLevelSchema>;

const emptyAsUnset = (value: unknown) => (value === '' ? undefined : value);

/**
 * Environment configuration
 *
 * QUEUE_CAPACITY left empty or unset means an unbounded queue.
 * LOG_PRETTY unset means "pretty when stdout is a terminal" (decided by the caller).
 */
export const appConfigSchema = z
    .object({
        PORT: z.preprocess(emptyAsUnset, z.coerce.number().int().min(0).max(65535).default(3000)),
        QUEUE_CAPACITY: z.preprocess(emptyAsUnset, z.coerce.number().int().positive().optional()),
        LOG_LEVEL: z.preprocess(emptyAsUnset, logLevelSchema.default('info')),
        LOG_PRETTY: z.preprocess(emptyAsUnset, z.enum(['true', 'false']).optional())
    })
    .transform(env => ({
        port: env.PORT,
        queueCapacity: env.QUEUE_CAPACITY ?? null,
        logLevel: env.LOG_LEVEL,
        logPretty: env.LOG_PRETTY === undefined ? null : env.LOG_PRETTY === 'true'
    }));

export type AppConfig = z.infer<typeof appConfigSchema>;
