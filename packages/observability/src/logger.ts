import pino from 'pino';

/**
 * Redact personal free text from logs
 * - Expense descriptions are user notes and never leave the ledger files
 */
const REDACTION_PATHS = ['description', 'record.description', 'records[*].description'];

export type Logger = pino.Logger;
export type LogLevel = pino.LevelWithSilent;

export interface LogDestinationOptions {
  /**
   * Append to this file instead of writing to stderr
   */
  file?: string | undefined;
}

/**
 * Resolve where log lines go
 *
 * Interactive sessions own stdout, so logs default to stderr (fd 2).
 * Writes are synchronous so the last lines survive process.exit().
 */
export function createLogDestination(options: LogDestinationOptions = {}): pino.DestinationStream {
  if (options.file) {
    return pino.destination({ dest: options.file, sync: true, mkdir: true, append: true });
  }
  return pino.destination({ dest: 2, sync: true });
}

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log levels
 * - Redaction of expense descriptions
 * - ISO 8601 timestamps
 */
export function createLogger(
  options?: pino.LoggerOptions,
  destination?: pino.DestinationStream
): Logger {
  const config: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...options,
  };

  return destination ? pino(config, destination) : pino(config);
}
