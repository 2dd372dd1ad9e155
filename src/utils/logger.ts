import pino from 'pino';

/**
 * Application logger. Writes to stderr: in stdio mode stdout carries the
 * tool-invocation protocol and must stay clean.
 */
export const logger = pino(
  {
    name: 'memobird-print-bridge',
    level: process.env.LOG_LEVEL || 'info',
    redact: ['ak', '*.ak', 'apiKey', '*.apiKey'],
  },
  pino.destination(2)
);
