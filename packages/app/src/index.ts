/**
 * @airwatch/app
 *
 * Configuration, container wiring, the refresh pipeline and scheduler,
 * and the cache-facing read API.
 */

export { createAppContainer } from './bootstrap.js';
export type { ContainerOverrides } from './bootstrap.js';

export { loadConfig, getConfigSummary, configSchema, envMapping } from './config/index.js';
export type { Config } from './config/index.js';

export { Container, isService, TOKENS } from './container/index.js';
export type { AppServices, HealthStatus, Service, ServiceToken } from './container/index.js';

export { AirQualityService, NO_DATA_CATEGORY, NO_DATA_COLOR } from './services/air-quality.service.js';
export type {
  ComparisonEntry,
  ComparisonView,
  CompleteView,
  HealthAdviceView,
} from './services/air-quality.service.js';
export { ViewCache } from './services/cache/view-cache.service.js';
export { SnapshotStoreService } from './services/persistence/snapshot-store.service.js';
export { RefreshPipeline } from './services/refresh/refresh-pipeline.js';
export { RefreshScheduler, sleepUntilAborted, MIN_INTERVAL_MS } from './services/refresh/refresh-scheduler.js';
export type { SleepFn } from './services/refresh/refresh-scheduler.js';
export type { CycleSummary, RefreshResult, SchedulerState, TargetRefresher } from './services/refresh/types.js';
