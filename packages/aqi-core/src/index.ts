/**
 * @airwatch/aqi-core
 *
 * Pure air quality computations: classification, concentration conversion,
 * forecast alignment, rolling timelines and write deduplication.
 */

export {
  CATEGORY_BANDS,
  PM25_BREAKPOINTS,
  classifyIndex,
  convertConcentrationToIndex,
  roundHalfAwayFromZero,
} from './classifier.js';
export type { Breakpoint, CategoryBand, Classification } from './classifier.js';

export { alignForecast, DEFAULT_FORECAST_DAYS } from './forecast.js';

export { TimelineBuilder, DEFAULT_TIMELINE_DAYS, DEFAULT_SEED_INDEX } from './timeline.js';
export type { LiveIndexSource, SeedSource, TimelineBuilderOptions } from './timeline.js';

export { PersistenceGuard, DEFAULT_DEDUP_WINDOW_MS } from './persistence-guard.js';
export type { PersistedMarker, PersistenceGuardOptions } from './persistence-guard.js';

export { buildSnapshot, listMeasurements, toLiveView } from './snapshot.js';

export { HEALTH_GROUPS, getHealthAdvice, getRiskLevel } from './health-advice.js';
export type { GroupAdvice, HealthGroup, HealthGroupId, RiskLevel } from './health-advice.js';

export {
  MS_PER_DAY,
  addDays,
  normalizeCalendarDate,
  parseCalendarDate,
  startOfUtcDay,
  toCalendarDate,
  weekdayNames,
} from './dates.js';

export type { Logger } from './types.js';
