/**
 * Forecast alignment.
 *
 * Upstream forecasts arrive as independent per-pollutant day series with
 * different lengths and start days. alignForecast merges them into one
 * ascending list of days, each carrying every pollutant's range (or null)
 * and a representative index.
 */

import { FORECAST_POLLUTANTS } from '@airwatch/contracts';
import type {
  CalendarDate,
  ForecastDayEntry,
  ForecastPollutant,
  ForecastSeries,
  PollutantRange,
} from '@airwatch/contracts';
import { classifyIndex, convertConcentrationToIndex } from './classifier.js';
import { normalizeCalendarDate } from './dates.js';

export const DEFAULT_FORECAST_DAYS = 7;

type DayAccumulator = Partial<Record<ForecastPollutant, PollutantRange>>;

/**
 * Merges per-pollutant series into aligned forecast days.
 *
 * Algorithm:
 * 1. Group every point by calendar day under its pollutant (unparseable days are skipped;
 *    a repeated day within one series keeps the later point)
 * 2. Sort days ascending
 * 3. Keep days >= windowStart, at most maxDays of them
 * 4. Representative index: the first of PM2.5, PM10, O3 with an avg that day,
 *    converted through convertConcentrationToIndex; 0 when none has one
 * 5. Category and color from classifyIndex
 *
 * Pollutants without a point on a day are null for that day, never
 * interpolated.
 *
 * @param series - Per-pollutant day series; absent pollutants are simply missing
 * @param windowStart - First day to keep ('YYYY-MM-DD')
 * @param maxDays - Upper bound on the number of returned days
 *
 * @example
 * ```typescript
 * alignForecast(
 *   {
 *     pm25: [{ date: '2025-01-15', avg: 70, min: 50, max: 90 }],
 *     o3: [{ date: '2025-01-15', avg: 20, min: 10, max: 30 }, { date: '2025-01-16', avg: 8, min: 4, max: 12 }],
 *   },
 *   '2025-01-15'
 * );
 * // [
 * //   { date: '2025-01-15', pollutants: { pm25: {...}, pm10: null, o3: {...} }, index: 158, category: 'Unhealthy', ... },
 * //   { date: '2025-01-16', pollutants: { pm25: null, pm10: null, o3: {...} }, index: 33, category: 'Good', ... },
 * // ]
 * ```
 */
export function alignForecast(
  series: ForecastSeries,
  windowStart: CalendarDate,
  maxDays: number = DEFAULT_FORECAST_DAYS
): ForecastDayEntry[] {
  const start = normalizeCalendarDate(windowStart);
  if (start === null) {
    throw new Error(`Invalid forecast window start: ${windowStart}`);
  }
  if (maxDays <= 0) {
    return [];
  }

  const byDate = new Map<CalendarDate, DayAccumulator>();
  for (const pollutant of FORECAST_POLLUTANTS) {
    for (const point of series[pollutant] ?? []) {
      const date = normalizeCalendarDate(point.date);
      if (date === null) {
        continue;
      }
      const day = byDate.get(date) ?? {};
      day[pollutant] = { avg: point.avg, min: point.min, max: point.max };
      byDate.set(date, day);
    }
  }

  return [...byDate.keys()]
    .sort()
    .filter((date) => date >= start)
    .slice(0, maxDays)
    .map((date) => toEntry(date, byDate.get(date) ?? {}));
}

function toEntry(date: CalendarDate, day: DayAccumulator): ForecastDayEntry {
  const index = representativeIndex(day);
  const { category, color } = classifyIndex(index);

  return {
    date,
    pollutants: {
      pm25: day.pm25 ?? null,
      pm10: day.pm10 ?? null,
      o3: day.o3 ?? null,
    },
    index,
    category,
    color,
  };
}

function representativeIndex(day: DayAccumulator): number {
  for (const pollutant of FORECAST_POLLUTANTS) {
    const avg = day[pollutant]?.avg;
    if (avg !== undefined && Number.isFinite(avg)) {
      return convertConcentrationToIndex(avg);
    }
  }
  return 0;
}
