#!/usr/bin/env node

/**
 * airwatch command line
 *
 * One-shot commands against the same pipeline the long-running process
 * uses; the scheduler is never started.
 */

import 'dotenv/config';

import { Command } from 'commander';
import chalk from 'chalk';
import { createLogger, type Logger } from '@airwatch/logger';
import { listTargets } from '@airwatch/provider-waqi';
import { createAppContainer } from './bootstrap.js';
import { parseWindowDays } from './cli-args.js';
import { loadConfig } from './config/index.js';
import { TOKENS, type AppServices, type Container } from './container/index.js';
import type { AirQualityService } from './services/air-quality.service.js';

interface GlobalOptions {
  verbose: boolean;
}

const program = new Command();

program
  .name('airwatch')
  .description('Air quality freshness pipeline')
  .version('0.1.0')
  .option('-v, --verbose', 'Log pipeline activity to the console', false);

/**
 * Runs `fn` with an initialized snapshot store, then closes it.
 */
async function withAirQuality<T>(fn: (service: AirQualityService) => Promise<T>): Promise<T> {
  const options = program.opts<GlobalOptions>();
  const config = loadConfig();
  const logger: Logger = createLogger({
    level: options.verbose ? config.logging.level : 'error',
    json: config.logging.format === 'json',
  });

  const container: Container<AppServices> = createAppContainer(config, logger);
  const store = container.resolve(TOKENS.SnapshotStore);
  await store.initialize();
  try {
    return await fn(container.resolve(TOKENS.AirQuality));
  } finally {
    await store.shutdown();
  }
}

function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

program
  .command('refresh')
  .description('Fetch, persist and print the live view for a target')
  .argument('<target>', 'Target name, e.g. Sarajevo')
  .action(async (target: string) => {
    const result = await withAirQuality((service) => service.refreshOne(target));
    print(result.live);
  });

program
  .command('timeline')
  .description('Print the rolling daily history for a target')
  .argument('<target>', 'Target name, e.g. Sarajevo')
  .option('-d, --days <n>', 'Window length in days', parseWindowDays)
  .action(async (target: string, options: { days?: number }) => {
    print(await withAirQuality((service) => service.getTimeline(target, options.days)));
  });

program
  .command('compare')
  .description('Print live conditions for several targets side by side')
  .argument('<targets...>', 'Target names, separated by spaces or commas')
  .action(async (targets: string[]) => {
    const view = await withAirQuality((service) => service.compareTargets(targets));
    for (const entry of view.targets) {
      const index = entry.index === null ? chalk.gray('n/a') : chalk.hex(entry.color)(String(entry.index));
      const detail = entry.error ?? `${entry.category}, ${entry.dominantPollutant ?? 'unknown'}`;
      console.log(`${entry.target.padEnd(10)} ${index} ${chalk.dim(detail)}`);
    }
  });

program
  .command('targets')
  .description('List known targets')
  .action(() => {
    for (const target of listTargets()) {
      console.log(target);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(`✖ ${error instanceof Error ? error.message : String(error)}`));
  process.exitCode = 1;
});
