/**
 * @repo/observability
 *
 * Structured logging for Mini Venmo.
 */

export { createLogger, logger, maskCardNumbers } from './logger.js';
export type { Logger } from './logger.js';
