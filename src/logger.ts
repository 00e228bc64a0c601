import { pino } from 'pino';
import type { Logger } from 'pino';

export type { Logger };

/**
 * Logger used when the caller passes none. Library code stays quiet unless
 * the caller opts in with its own pino instance.
 */
export const silentLogger: Logger = pino({ name: 'xml-record-mapper', level: 'silent' });
