/**
 * @module: Logger
 * @risk: low
 * @scope: utility
 *
 * @description
 * Re-export shared Winston-based logging utilities to keep a single source of truth.
 */
export { logger, sanitizeLogData, describeError } from '@cogwheel/shared';
