/**
 * @fileoverview Public API of @airwatch/logger: structured logging and
 * process-level error handling.
 */

export { createLogger, createChildLogger } from './createLogger.js';

export { attachGlobalHandlers } from './errorHandler.js';

export {
  generateRequestId,
  getRequestContext,
  getRequestId,
  withRequestContext,
} from './request-context.js';

export { startTimer, measureAsync } from './perf-timer.js';

export { redactPII, redactSensitiveFields, isSensitiveFieldName } from './formats.js';

export type { Logger, LoggerConfig, LogLevel, LogEntry, ChildLoggerContext } from './types.js';
export type { GlobalHandlerOptions } from './errorHandler.js';
export type { RequestContext } from './request-context.js';
export type { PerfTimer } from './perf-timer.js';
