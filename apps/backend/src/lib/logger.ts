import pino from 'pino';
import { mkdirSync } from 'fs';
import { env } from '../config/env.js';

/**
 * Logger utilities for the TubePulse backend.
 *
 * Components never import this module directly; they take an `ILogger` in
 * their constructor and the bootstrap hands them `logger.child({ module })`.
 * Only the process entry point, loaders and HTTP middleware use the singleton.
 */

const LOG_FILE = '.run/backend.log';

/**
 * Creates a Pino logger instance with the standard TubePulse configuration.
 *
 * **Transport targets:**
 *
 * 1. `pino/file` - Writes to `.run/backend.log` (development and production)
 * 2. `pino-pretty` - Colorized console output (development only; production writes JSON to stdout)
 *
 * **Log levels:**
 *
 * - Production: `info` and above
 * - Development: `debug` and above
 * - Test: silent, no transports
 *
 * @returns Configured Pino logger instance
 */
export function createLogger(): pino.Logger {
    const base = { service: 'tubepulse-backend' };

    if (env.NODE_ENV === 'test') {
        return pino({ level: 'silent', base });
    }

    const level = env.NODE_ENV === 'production' ? 'info' : 'debug';

    try {
        mkdirSync('.run', { recursive: true });
    } catch (err) {
        console.error('Warning: Could not create .run directory:', err);
    }

    const targets: pino.TransportTargetOptions[] = [
        {
            level,
            target: 'pino/file',
            options: { destination: LOG_FILE }
        },
        env.NODE_ENV === 'production'
            ? {
                level,
                target: 'pino/file',
                options: { destination: 1 }
            }
            : {
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

    const transport = pino.transport({ targets });

    return pino({ level, base }, transport);
}

/**
 * Application logger singleton.
 *
 * @example
 * import { logger } from './lib/logger.js';
 * logger.info('Server started');
 * logger.error({ error }, 'Failed to connect');
 */
export const logger = createLogger();
