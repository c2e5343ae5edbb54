/**
 * @fileoverview Air quality data types shared by the pipeline packages.
 *
 * Pure data structures with no I/O. Timestamps are Unix epoch milliseconds
 * (UTC); calendar days are 'YYYY-MM-DD' strings.
 *
 * @module @airwatch/contracts/air-quality
 */

import type { AqiCategory } from './categories.js';
import type { ForecastPollutant, Pollutant } from './pollutants.js';

/**
 * Calendar day in 'YYYY-MM-DD' form, without time or zone.
 */
export type CalendarDate = string;

/**
 * Concentration per pollutant; null where the reading omitted it.
 */
export type PollutantConcentrations = Record<Pollutant, number | null>;

/**
 * One measured reading for a target, as persisted.
 *
 * @invariant index is a non-negative integer
 * @invariant timestamp is UTC epoch milliseconds
 *
 * @example
 * ```typescript
 * const snapshot: MetricSnapshot = {
 *   target: 'Sarajevo',
 *   timestamp: Date.parse('2025-01-15T10:00:00Z'),
 *   index: 158,
 *   dominantPollutant: 'pm25',
 *   concentrations: { pm25: 70, pm10: 41, o3: null, no2: 12, so2: null, co: null },
 * };
 * ```
 */
export interface MetricSnapshot {
  readonly target: string;
  readonly timestamp: number;
  readonly index: number;
  /** Upstream pollutant code (e.g. 'pm25'); empty when not reported */
  readonly dominantPollutant: string;
  readonly concentrations: Readonly<PollutantConcentrations>;
}

/**
 * One day of a single pollutant's forecast series.
 */
export interface DayPoint {
  date: CalendarDate;
  avg: number;
  min: number;
  max: number;
}

export interface PollutantRange {
  avg: number;
  min: number;
  max: number;
}

/**
 * Independent per-pollutant day series as delivered upstream.
 * Only pollutants the source reported are present.
 */
export type ForecastSeries = Partial<Record<ForecastPollutant, DayPoint[]>>;

/**
 * One aligned forecast day.
 *
 * @invariant pollutants holds null for every pollutant with no point on this date
 */
export interface ForecastDayEntry {
  readonly date: CalendarDate;
  readonly pollutants: Readonly<Record<ForecastPollutant, PollutantRange | null>>;
  readonly index: number;
  readonly category: AqiCategory;
  readonly color: string;
}

/**
 * One day of the rolling history.
 */
export interface TimelineEntry {
  readonly date: CalendarDate;
  /** e.g. 'Wednesday' */
  readonly weekdayLong: string;
  /** e.g. 'Wed' */
  readonly weekdayShort: string;
  readonly index: number;
  readonly category: AqiCategory;
  readonly color: string;
}

/**
 * Result of an upstream fetch, before classification.
 *
 * Any pollutant may be absent, and the forecast may be missing entirely.
 */
export interface RawPayload {
  target: string;
  timestamp: number;
  /** Overall index as reported; null when the source did not report one */
  index: number | null;
  dominantPollutant: string | null;
  concentrations: Partial<Record<Pollutant, number>>;
  forecast?: ForecastSeries;
}

export interface Measurement {
  pollutant: Pollutant;
  label: string;
  value: number;
  unit: string;
}

/**
 * Current conditions for a target, as published in the live cache namespace.
 */
export interface LiveView {
  target: string;
  index: number;
  category: AqiCategory;
  color: string;
  advisory: string;
  /** Display label (e.g. 'PM2.5') */
  dominantPollutant: string;
  /** ISO 8601 */
  timestamp: string;
  measurements: Measurement[];
}

/**
 * Aligned forecast for a target, as published in the forecast cache namespace.
 */
export interface ForecastView {
  target: string;
  /** ISO 8601 */
  retrievedAt: string;
  days: ForecastDayEntry[];
}

export interface TimelineView {
  target: string;
  /** e.g. 'Last 7 days' */
  period: string;
  days: TimelineEntry[];
}
