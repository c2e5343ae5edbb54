/**
 * Service tokens for dependency injection
 */

import type { PersistenceGuard, TimelineBuilder } from '@airwatch/aqi-core';
import type { AirQualityFetcher, Clock } from '@airwatch/contracts';
import type { Logger } from '@airwatch/logger';
import type { Config } from '../config/index.js';
import type { AirQualityService } from '../services/air-quality.service.js';
import type { ViewCache } from '../services/cache/view-cache.service.js';
import type { SnapshotStoreService } from '../services/persistence/snapshot-store.service.js';
import type { RefreshPipeline } from '../services/refresh/refresh-pipeline.js';
import type { RefreshScheduler } from '../services/refresh/refresh-scheduler.js';

/**
 * Everything the application container can resolve
 */
export interface AppServices {
  config: Config;
  logger: Logger;
  clock: Clock;
  fetcher: AirQualityFetcher;
  snapshotStore: SnapshotStoreService;
  viewCache: ViewCache;
  persistenceGuard: PersistenceGuard;
  refreshPipeline: RefreshPipeline;
  timelineBuilder: TimelineBuilder;
  airQuality: AirQualityService;
  scheduler: RefreshScheduler;
}

export const TOKENS = {
  Config: 'config',
  Logger: 'logger',
  Clock: 'clock',
  Fetcher: 'fetcher',
  SnapshotStore: 'snapshotStore',
  ViewCache: 'viewCache',
  PersistenceGuard: 'persistenceGuard',
  RefreshPipeline: 'refreshPipeline',
  TimelineBuilder: 'timelineBuilder',
  AirQuality: 'airQuality',
  Scheduler: 'scheduler',
} as const satisfies Record<string, keyof AppServices>;

export type ServiceToken = (typeof TOKENS)[keyof typeof TOKENS];
