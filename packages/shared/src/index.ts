/**
 * @description Public exports for shared utilities.
 * @scope interface
 * @module SharedIndex
 */

/**
 * Logging utilities.
 */
export { logger, sanitizeLogData, describeError, REDACTED } from './logger.js';
