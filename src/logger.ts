import pino, { type Logger } from 'pino';

export type { Logger };

export function createLogger(level: string = process.env.LOG_LEVEL?.trim() || 'info'): Logger {
  return pino({
    name: 'momentum',
    level,
    base: undefined,
  });
}

/** Logger for tests and library callers that do not want output. */
export const silentLogger: Logger = pino({ level: 'silent' });
