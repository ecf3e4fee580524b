/**
 * Structured Logging with Pino
 * Logs go to stderr; stdout is reserved for the CLI's progress lines.
 */

import pino, { type Logger } from 'pino';
import { config } from '../config/index.js';

const STDERR = 2;

const loggerOptions = {
    level: config.logging.level,
};

let logger: Logger;

if (config.logging.pretty) {
    logger = pino({
        ...loggerOptions,
        transport: {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
                destination: STDERR,
            },
        },
    });
} else {
    logger = pino(loggerOptions, pino.destination(STDERR));
}

export { logger };

/**
 * Create a child logger for a pipeline component
 */
export function createComponentLogger(component: string): Logger {
    return logger.child({ component });
}
