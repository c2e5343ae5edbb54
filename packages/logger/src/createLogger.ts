/**
 * @fileoverview Logger factory.
 * Creates configured Winston logger instances with structured logging,
 * PII redaction, and console/file transports.
 */

import winston, { format } from 'winston';
import type { ChildLoggerContext, LoggerConfig, Logger } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance with structured logging and PII redaction.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Scheduler started', { targets: 6, interval_minutes: 10 });
 * ```
 *
 * @example
 * ```typescript
 * // Per-component logger
 * const logger = createLogger({ level: 'debug', filePath: './logs/airwatch.log' });
 * const refreshLogger = logger.child({ component: 'refresh', target: 'Tuzla' });
 * refreshLogger.debug('Skipping snapshot write', { index: 64 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    silent = false,
  } = config;

  // Redaction must run before anything serializes the entry
  const logFormat = format.combine(redactPII(), standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    silent,
    // errorHandler.ts decides when to exit
    exitOnError: false,
  });
}

/**
 * Creates a child logger whose entries all carry the given context fields.
 *
 * @example
 * ```typescript
 * const cacheLogger = createChildLogger(logger, { component: 'ttl-cache' });
 * cacheLogger.debug('Evicted stale entry', { namespace: 'live', key: 'zenica' });
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
