import pino, { type Logger } from 'pino';

export type { Logger };

/**
 * Root logger shared by Fastify and the components it serves.
 * Components take a child via `logger.child({ component })` so lines can be filtered.
 */
export function createLogger(level = 'info'): Logger {
  return pino({
    name: 'fable-rag',
    level,
    base: { service: 'fable-rag' },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export const silentLogger: Logger = pino({ level: 'silent' });
