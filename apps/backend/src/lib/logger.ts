import pino from 'pino';
import type { ILogger } from '@meshstate/types';
import { env } from '../config/env.js';

/**
 * Logger utilities for the meshstate backend.
 *
 * Components never import the singleton directly; they accept an `ILogger`
 * and derive a child with `logger.child({ module })`, so tests can hand in a
 * mock and embedders can hand in their own pino instance.
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
 * Creates a Pino logger with the standard meshstate configuration.
 *
 * Outside production and tests the output goes through `pino-pretty`;
 * production writes newline-delimited JSON to stdout.
 *
 * @param service - Value of the `service` base binding
 */
export function createLogger(service = 'meshstate-backend'): pino.Logger {
    const level = resolveLevel();
    const options: pino.LoggerOptions = {
        level,
        base: { service }
    };

    if (env.NODE_ENV === 'production' || env.NODE_ENV === 'test') {
        return pino(options);
    }

    const transport = pino.transport({
        target: 'pino-pretty',
        options: {
            colorize: true,
            singleLine: false,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname'
        }
    });

    return pino(options, transport);
}

/**
 * Process-wide logger used by the entry point and the Redis loader.
 */
export const logger: ILogger = createLogger();
