// Structured logging
import winston from 'winston';

export type Logger = winston.Logger;

const level = process.env.LOG_LEVEL || 'info';

export const logger: Logger = winston.createLogger({
  level: level === 'silent' ? 'error' : level,
  silent: level === 'silent',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: 'strata-rag' },
  transports: [
    new winston.transports.Console({
      // All levels go to stderr, leaving stdout to the process embedding the library
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple(),
      ),
    }),
  ],
});

/**
 * Child logger tagged with the emitting component
 */
export function createLogger(component: string): Logger {
  return logger.child({ component });
}
