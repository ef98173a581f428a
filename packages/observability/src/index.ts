/**
 * @spendbook/observability
 *
 * Structured logging for the expense tracker, built on Pino.
 */

export { createLogger, createLogDestination } from './logger.js';
export type { Logger, LogLevel, LogDestinationOptions } from './logger.js';
