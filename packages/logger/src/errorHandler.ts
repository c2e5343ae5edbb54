/**
 * @fileoverview Process-level handlers for uncaught exceptions and unhandled
 * rejections. Both are logged with full context, then the process exits.
 */

import type { Logger } from './types.js';

/**
 * How long transports get to flush before a forced exit.
 */
const FLUSH_TIMEOUT_MS = 3000;

export interface GlobalHandlerOptions {
  /** @default process.exit */
  exit?: (code: number) => void;
}

let handlersAttached = false;

/**
 * Logs and exits on `uncaughtException` / `unhandledRejection`; logs
 * process warnings without exiting. Only the first call attaches anything.
 *
 * @returns Detaches the handlers again
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger, options: GlobalHandlerOptions = {}): () => void {
  if (handlersAttached) {
    logger.warn('Global error handlers already attached, skipping');
    return () => undefined;
  }

  const exit = options.exit ?? ((code: number) => process.exit(code));

  const uncaughtExceptionHandler = (error: Error) => {
    logger.error('Uncaught exception detected - process will exit', {
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      event: 'uncaughtException',
      fatal: true,
    });
    gracefulExit(logger, 1, exit);
  };

  const unhandledRejectionHandler = (reason: unknown) => {
    const errorInfo =
      reason instanceof Error
        ? { name: reason.name, message: reason.message, stack: reason.stack }
        : { message: String(reason) };

    logger.error('Unhandled promise rejection detected - process will exit', {
      error: errorInfo,
      event: 'unhandledRejection',
      fatal: true,
    });
    gracefulExit(logger, 1, exit);
  };

  const warningHandler = (warning: Error) => {
    logger.warn('Process warning emitted', {
      warning: { name: warning.name, message: warning.message },
      event: 'warning',
    });
  };

  process.on('uncaughtException', uncaughtExceptionHandler);
  process.on('unhandledRejection', unhandledRejectionHandler);
  process.on('warning', warningHandler);
  handlersAttached = true;

  logger.debug('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection', 'warning'],
  });

  return () => {
    process.off('uncaughtException', uncaughtExceptionHandler);
    process.off('unhandledRejection', unhandledRejectionHandler);
    process.off('warning', warningHandler);
    handlersAttached = false;
  };
}

/**
 * Exits once the logger has flushed, or after FLUSH_TIMEOUT_MS.
 */
function gracefulExit(logger: Logger, exitCode: number, exit: (code: number) => void): void {
  let exited = false;
  const finish = () => {
    if (!exited) {
      exited = true;
      clearTimeout(timeoutId);
      exit(exitCode);
    }
  };

  const timeoutId = setTimeout(() => {
    console.error(`[Logger] Flush timeout expired (${FLUSH_TIMEOUT_MS}ms), forcing exit`);
    finish();
  }, FLUSH_TIMEOUT_MS);
  timeoutId.unref();

  logger.once('finish', finish);
  logger.end();
}
