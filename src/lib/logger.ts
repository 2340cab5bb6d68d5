import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

/**
 * Root logger shared by the HTTP server, the facade and the batch scripts.
 * Components take a child logger tagged with their name.
 */
export const logger: Logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'scheduling-engine' },
});

/** Logger that drops everything; used as the default outside the server */
export const silentLogger: Logger = pino({ level: 'silent' });
