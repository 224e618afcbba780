import pino from 'pino';
import { mkdirSync } from 'fs';
import { env } from '../config/env.js';

/**
 * Logger utilities for the event-suite backend.
 *
 * Outside of tests the logger writes to two Pino transport targets:
 *
 * 1. `pino/file` - `.run/backend.log` for local file access
 * 2. `pino-pretty` - stdout with colorised, human-readable formatting
 *
 * Under `NODE_ENV=test` no transport worker is started and the level defaults
 * to `silent`, so test runs stay quiet and exit cleanly.
 *
 * Modules derive scoped loggers with `logger.child({ module: '<id>' })`.
 */

function resolveLevel(): pino.LevelWithSilent {
    if (env.LOG_LEVEL) {
        return env.LOG_LEVEL;
    }
    if (env.NODE_ENV === 'test') {
        return 'silent';
    }
    return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

/**
 * Creates a Pino logger with the standard configuration.
 *
 * @returns Configured Pino logger instance
 */
export function createLogger(): pino.Logger {
    const level = resolveLevel();
    const base = { service: 'event-suite-backend' };

    if (env.NODE_ENV === 'test') {
        return pino({ level, base });
    }

    mkdirSync('.run', { recursive: true });

    const targets: pino.TransportTargetOptions[] = [
        {
            level,
            target: 'pino/file',
            options: { destination: '.run/backend.log' }
        },
        {
            level,
            target: 'pino-pretty',
            options: {
                colorize: true,
                singleLine: false,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname'
            }
        }
    ];

    return pino({ level, base }, pino.transport({ targets }));
}

/**
 * Application logger singleton.
 *
 * @example
 * import { logger } from './lib/logger.js';
 * logger.info({ port }, 'Server started');
 */
export const logger = createLogger();
