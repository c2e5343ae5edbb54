/**
 * Service registration shared by the long-running process and the CLI
 */

import { policiesFromMinutes } from '@airwatch/aqi-cache';
import { PersistenceGuard, TimelineBuilder } from '@airwatch/aqi-core';
import { systemClock } from '@airwatch/contracts';
import type { AirQualityFetcher, Clock } from '@airwatch/contracts';
import { createChildLogger, type Logger } from '@airwatch/logger';
import { createWaqiProvider, resolveStation } from '@airwatch/provider-waqi';
import type { Config } from './config/index.js';
import { Container, TOKENS, type AppServices } from './container/index.js';
import { AirQualityService } from './services/air-quality.service.js';
import { ViewCache } from './services/cache/view-cache.service.js';
import { SnapshotStoreService } from './services/persistence/snapshot-store.service.js';
import { RefreshPipeline } from './services/refresh/refresh-pipeline.js';
import { RefreshScheduler, type SleepFn } from './services/refresh/refresh-scheduler.js';

const MS_PER_MINUTE = 60_000;

export interface ContainerOverrides {
  clock?: Clock;
  fetcher?: AirQualityFetcher;
  sleep?: SleepFn;
}

/**
 * Builds the application container. Nothing connects or starts until
 * initializeAll().
 *
 * @param overrides - Replacements for the clock, the upstream fetcher and the scheduler sleep
 */
export function createAppContainer(
  config: Config,
  logger: Logger,
  overrides: ContainerOverrides = {}
): Container<AppServices> {
  const container = new Container<AppServices>(logger);

  container.register(TOKENS.Config, () => config);
  container.register(TOKENS.Logger, () => logger);
  container.register(TOKENS.Clock, () => overrides.clock ?? systemClock);

  container.register(
    TOKENS.Fetcher,
    (c) => {
      if (overrides.fetcher) {
        return overrides.fetcher;
      }
      if (!config.provider.token) {
        throw new Error('WAQI_API_TOKEN is not set');
      }
      return createWaqiProvider({
        token: config.provider.token,
        baseUrl: config.provider.baseUrl,
        timeout: config.provider.timeout,
        clock: c.resolve(TOKENS.Clock),
        logger: createChildLogger(logger, { component: 'provider-waqi' }),
      });
    },
    { dependencies: [TOKENS.Clock] }
  );

  container.register(
    TOKENS.SnapshotStore,
    () =>
      new SnapshotStoreService({
        databaseUrl: config.database.url,
        logger: createChildLogger(logger, { component: 'snapshot-store' }),
      })
  );

  container.register(
    TOKENS.ViewCache,
    (c) =>
      new ViewCache({
        logger: createChildLogger(logger, { component: 'view-cache' }),
        policies: policiesFromMinutes({
          live: config.cache.liveTtlMinutes,
          forecast: config.cache.forecastTtlMinutes,
        }),
        clock: c.resolve(TOKENS.Clock),
      }),
    { dependencies: [TOKENS.Clock] }
  );

  container.register(
    TOKENS.PersistenceGuard,
    (c) =>
      new PersistenceGuard({
        dedupWindowMs: config.persistence.dedupWindowMinutes * MS_PER_MINUTE,
        clock: c.resolve(TOKENS.Clock),
      }),
    { dependencies: [TOKENS.Clock] }
  );

  container.register(
    TOKENS.RefreshPipeline,
    (c) =>
      new RefreshPipeline({
        fetcher: c.resolve(TOKENS.Fetcher),
        store: c.resolve(TOKENS.SnapshotStore),
        cache: c.resolve(TOKENS.ViewCache),
        guard: c.resolve(TOKENS.PersistenceGuard),
        clock: c.resolve(TOKENS.Clock),
        logger: createChildLogger(logger, { component: 'refresh-pipeline' }),
      }),
    {
      dependencies: [TOKENS.Fetcher, TOKENS.SnapshotStore, TOKENS.ViewCache, TOKENS.PersistenceGuard, TOKENS.Clock],
    }
  );

  container.register(
    TOKENS.TimelineBuilder,
    (c) =>
      new TimelineBuilder({
        store: c.resolve(TOKENS.SnapshotStore),
        live: c.resolve(TOKENS.RefreshPipeline),
        clock: c.resolve(TOKENS.Clock),
        logger: createChildLogger(logger, { component: 'timeline' }),
        defaultIndex: config.timeline.defaultIndex,
      }),
    { dependencies: [TOKENS.SnapshotStore, TOKENS.RefreshPipeline, TOKENS.Clock] }
  );

  container.register(
    TOKENS.AirQuality,
    (c) =>
      new AirQualityService({
        cache: c.resolve(TOKENS.ViewCache),
        refresher: c.resolve(TOKENS.RefreshPipeline),
        timeline: c.resolve(TOKENS.TimelineBuilder),
        logger: createChildLogger(logger, { component: 'air-quality' }),
        resolveTarget: (target) => resolveStation(target).name,
        timelineDays: config.timeline.windowDays,
        clock: c.resolve(TOKENS.Clock),
      }),
    { dependencies: [TOKENS.ViewCache, TOKENS.RefreshPipeline, TOKENS.TimelineBuilder, TOKENS.Clock] }
  );

  container.register(
    TOKENS.Scheduler,
    (c) =>
      new RefreshScheduler({
        refresher: c.resolve(TOKENS.RefreshPipeline),
        targets: config.targets,
        intervalMs: config.scheduler.intervalMinutes * MS_PER_MINUTE,
        clock: c.resolve(TOKENS.Clock),
        sleep: overrides.sleep,
        logger: createChildLogger(logger, { component: 'scheduler' }),
      }),
    { dependencies: [TOKENS.RefreshPipeline, TOKENS.Clock] }
  );

  return container;
}
