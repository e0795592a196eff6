/**
 * @module
 * Root logger.
 */
import pino from 'pino';
import type {
    Logger,
} from 'pino';

export type {
    Logger,
} from 'pino';

/** Field names whose values never reach the log output. */
const REDACTED_FIELDS = ['secret', 'password', 'token', 'auth'];

/**
 * Creates a logger that masks secret fields. Writes to stdout unless a destination is given.
 */
export function createLogger(level: string, destination?: pino.DestinationStream): Logger {
    const options: pino.LoggerOptions = {
        level,
        name: 'hoistbuild',
        redact: {
            censor: '[MASKED]',
            paths: [...REDACTED_FIELDS, ...REDACTED_FIELDS.map(x => `*.${x}`)],
        },
    };
    return destination ? pino(options, destination) : pino(options);
}

export const logger: Logger = createLogger(process.env.LOG_LEVEL ?? 'info');

/**
 * Returns a child logger tagged with `component`.
 */
export function childLogger(component: string, parent: Logger = logger): Logger {
    return parent.child({ component });
}
