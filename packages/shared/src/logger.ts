/**
 * @module: Logger
 * @risk: low
 * @scope: utility
 *
 * @description
 * Winston-based logging utility with console and file transports. Provides structured logging for the bot host and its extensions.
 *
 * @impact
 * Risk: Logging failures can make debugging difficult but won't break command dispatch.
 */

import fs from 'fs';
import { createLogger, format, transports } from 'winston';
import { format as dateFnsFormat } from 'date-fns';

const { combine, timestamp, printf, colorize } = format;

/**
 * Custom log format function
 * @private
 */
const logFormat = printf(({ level, message, timestamp, module }) => {
  const prefix = typeof module === 'string' ? ` (${module})` : '';
  return `${timestamp} [${level}]${prefix}: ${message}`;
});

const logDirectory = process.env.LOG_DIR || 'logs';
fs.mkdirSync(logDirectory, { recursive: true });

const defaultLevel = process.env.NODE_ENV === 'production' ? 'info' : 'debug';

/**
 * Winston logger instance with console and file transports
 */
export const logger = createLogger({
  level: process.env.LOG_LEVEL || defaultLevel,
  format: combine(
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    colorize({ all: true }),
    logFormat
  ),
  transports: [
    new transports.Console(),
    new transports.File({
      filename: `${logDirectory}/${dateFnsFormat(new Date(), 'yyyy-MM-dd')}.log`,
      format: format.combine(
        format.uncolorize(),
        format.timestamp(),
        format.json()
      )
    })
  ],
  exitOnError: false
});

const SENSITIVE_KEY_PATTERN = /token|secret|password|key/i;
export const REDACTED = '[redacted]';

/**
 * Returns a copy of `value` safe to put in a log line: values stored under
 * secret-looking keys are replaced with {@link REDACTED}, at any depth.
 */
export const sanitizeLogData = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map((entry) => sanitizeLogData(entry));
  }

  if (value instanceof Date || value instanceof URL) {
    return value.toString();
  }

  if (typeof value === 'object' && value !== null) {
    const sanitized: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      sanitized[key] = SENSITIVE_KEY_PATTERN.test(key) && entry !== undefined && entry !== ''
        ? REDACTED
        : sanitizeLogData(entry);
    }
    return sanitized;
  }

  return value;
};

/**
 * Renders an unknown thrown value as a single line, following `cause` chains.
 */
export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    const base = `${error.name}: ${error.message}`;
    return error.cause === undefined ? base : `${base} (caused by ${describeError(error.cause)})`;
  }
  return String(error);
};
