/**
 * Logger utility (pino wrapper)
 *
 * Structured JSON logging shared by every package. Token plaintexts and
 * hashes must never be passed to it.
 */

import { pino } from 'pino';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level: (label: string) => {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = typeof logger;
