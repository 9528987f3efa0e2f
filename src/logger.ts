import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

/**
 * Creates the application logger. Logs go to stderr so they never mix
 * with the board printed on stdout.
 */
export function createLogger(level: string = 'warn'): Logger {
    return pino({ name: 'mnk', level }, pino.destination(2));
}

/**
 * Default for library code that was not handed a logger
 */
export const silentLogger: Logger = pino({ enabled: false });
