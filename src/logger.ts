/**
 * Logger module - structured logging with pino
 */

import pino from 'pino';

// Under Jest (NODE_ENV=test) logging is silenced unless LOG_LEVEL asks otherwise
const level = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info');

// LOG_FILE redirects output away from stdout
const destination = process.env.LOG_FILE
  ? pino.destination({ dest: process.env.LOG_FILE, mkdir: true, sync: false })
  : pino.destination(1);

export const logger = pino(
  {
    level,
    base: { service: 'registry-manager' },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
  },
  destination
);

// Create child loggers for different modules
export const createLogger = (name: string) => {
  return logger.child({ module: name });
};

export type Logger = ReturnType<typeof createLogger>;

export default logger;
