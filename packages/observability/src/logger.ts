import { pino } from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';

/**
 * Redact session identifiers and credentials from logs
 * - Authorization and cookie headers
 * - The x-session-id header that selects a ledger
 */
const REDACTION_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'req.headers["x-session-id"]',
  'headers.authorization',
  'headers.cookie',
  'headers["x-session-id"]',
  'sessionId',
];

/**
 * Create a structured logger instance with Pino
 *
 * - Level from LOG_LEVEL (default: info)
 * - ISO 8601 timestamps
 * - Session and credential redaction
 *
 * Pass a destination stream to capture output (tests do this).
 */
export function createLogger(options?: LoggerOptions, destination?: DestinationStream): Logger {
  const config: LoggerOptions = {
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

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();

export type { Logger };
