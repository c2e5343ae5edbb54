#!/usr/bin/env node

/**
 * Main application entry point
 * Wires all services together and runs the refresh scheduler until signalled
 */

// Load environment variables from .env file
import 'dotenv/config';

import { attachGlobalHandlers, createLogger, startTimer, withRequestContext, type Logger } from '@airwatch/logger';
import { createAppContainer } from './bootstrap.js';
import { getConfigSummary, loadConfig } from './config/index.js';
import type { AppServices, Container } from './container/index.js';

/**
 * Main startup function
 */
async function start(): Promise<void> {
  let logger: Logger | undefined;
  let container: Container<AppServices> | undefined;

  try {
    const config = loadConfig();

    logger = createLogger({
      level: config.logging.level,
      json: config.logging.format === 'json',
      filePath: config.logging.filePath,
    });
    const rootLogger = logger;

    attachGlobalHandlers(rootLogger);

    const created = createAppContainer(config, rootLogger);
    container = created;

    await withRequestContext(async () => {
      const startupTimer = startTimer();

      rootLogger.info('Starting airwatch', {
        ...getConfigSummary(config),
        operation: 'app_startup',
      });

      const initTimer = startTimer();
      await created.initializeAll();
      rootLogger.info('Services initialized', {
        operation: 'service_init',
        duration_ms: initTimer.stop(),
        result: 'success',
      });

      rootLogger.debug(`Service wiring graph\n${created.getWiringGraph()}`);

      rootLogger.info('airwatch startup complete', {
        operation: 'app_startup',
        duration_ms: startupTimer.stop(),
        result: 'success',
      });
    });

    registerShutdown(created, rootLogger);
  } catch (error) {
    if (logger) {
      logger.error('Application startup failed', { error });
    } else {
      console.error('Application startup failed:', error);
    }

    if (container) {
      await container.shutdownAll();
    }

    process.exitCode = 1;
  }
}

/**
 * Stop the scheduler and close connections on SIGINT/SIGTERM
 */
function registerShutdown(container: Container<AppServices>, logger: Logger): void {
  let stopping = false;

  const onSignal = (signal: NodeJS.Signals) => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info('Shutting down...', { signal });

    container
      .shutdownAll()
      .then(() => {
        logger.info('Shutdown complete');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error('Shutdown failed', { error });
        process.exit(1);
      });
  };

  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
}

start().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
