/**
 * @fileoverview Main entry point for @airwatch/contracts.
 *
 * Shared types, collaborator contracts and the error taxonomy.
 *
 * @module @airwatch/contracts
 */

// Categories
export { AqiCategory } from './categories.js';

// Pollutants
export {
  POLLUTANTS,
  FORECAST_POLLUTANTS,
  isPollutant,
  getPollutantLabel,
  getPollutantUnit,
} from './pollutants.js';

export type { Pollutant, ForecastPollutant } from './pollutants.js';

// Data types
export type {
  CalendarDate,
  PollutantConcentrations,
  MetricSnapshot,
  DayPoint,
  PollutantRange,
  ForecastSeries,
  ForecastDayEntry,
  TimelineEntry,
  RawPayload,
  Measurement,
  LiveView,
  ForecastView,
  TimelineView,
} from './air-quality.js';

// Collaborators
export { systemClock } from './collaborators.js';
export type { Clock, AirQualityFetcher, SnapshotStore } from './collaborators.js';

// Errors
export {
  AirwatchError,
  FetchUnavailableError,
  MalformedPayloadError,
  NotConfiguredError,
  WriteFailureError,
  DataUnavailableError,
  isAirwatchError,
  isFetchUnavailableError,
  isMalformedPayloadError,
  isNotConfiguredError,
  isWriteFailureError,
  isDataUnavailableError,
} from './errors.js';

export type {
  FetchUnavailableData,
  MalformedPayloadData,
  ViewKind,
} from './errors.js';
