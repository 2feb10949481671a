import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export type { Logger };

/**
 * Structured logger for services and scripts.
 * HTTP request logging goes through Fastify's own logger.
 */
export function createLogger(level: LevelWithSilent = 'info', name = 'pagecite-api'): Logger {
  return pino({
    name,
    level,
    base: { service: name },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
