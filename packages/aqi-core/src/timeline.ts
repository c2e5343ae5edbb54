/**
 * Rolling daily history with gap filling.
 */

import { systemClock } from '@airwatch/contracts';
import type { Clock, MetricSnapshot, SnapshotStore, TimelineEntry, TimelineView } from '@airwatch/contracts';
import { classifyIndex, roundHalfAwayFromZero } from './classifier.js';
import { MS_PER_DAY, startOfUtcDay, toCalendarDate, weekdayNames } from './dates.js';
import { noopLogger, type Logger } from './types.js';

export const DEFAULT_TIMELINE_DAYS = 7;

/** Moderate: neither alarming nor falsely reassuring */
export const DEFAULT_SEED_INDEX = 75;

/**
 * Fresh read of a target's current index, bypassing any cached view.
 */
export interface LiveIndexSource {
  fetchIndex(target: string): Promise<number>;
}

export type SeedSource = 'history' | 'live' | 'default';

export interface TimelineBuilderOptions {
  store: SnapshotStore;
  live: LiveIndexSource;
  clock?: Clock;
  logger?: Logger;
  /** Last-resort seed. @default 75 */
  defaultIndex?: number;
}

/**
 * Builds an N-day timeline ending today (UTC), one entry per day.
 *
 * Each day with persisted samples gets the rounded mean of their indices and
 * that value becomes the carry-forward value. A day without samples repeats
 * the carry-forward value. When the first day has no samples, the value is
 * seeded from, in order:
 *
 * 1. the latest snapshot strictly before the window
 * 2. a fresh live fetch
 * 3. `defaultIndex`
 *
 * Store and fetch failures count as "no data" and are logged at warn level;
 * build() itself does not reject.
 *
 * @example
 * ```typescript
 * const builder = new TimelineBuilder({ store, live: { fetchIndex: (t) => refresher.fetchIndex(t) } });
 * const days = await builder.build('Sarajevo');
 * days.map((d) => `${d.weekdayShort} ${d.index}`); // ['Thu 81', 'Fri 81', ..., 'Wed 64']
 * ```
 */
export class TimelineBuilder {
  private readonly store: SnapshotStore;
  private readonly live: LiveIndexSource;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly defaultIndex: number;

  constructor(options: TimelineBuilderOptions) {
    this.store = options.store;
    this.live = options.live;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? noopLogger;
    this.defaultIndex = options.defaultIndex ?? DEFAULT_SEED_INDEX;
  }

  /**
   * @param windowDays - Number of days; fractions are floored, values below 1
   *   become 1 and non-finite values fall back to DEFAULT_TIMELINE_DAYS
   */
  async build(target: string, windowDays: number = DEFAULT_TIMELINE_DAYS): Promise<TimelineEntry[]> {
    const days = Number.isFinite(windowDays) ? Math.max(1, Math.floor(windowDays)) : DEFAULT_TIMELINE_DAYS;
    const windowStart = startOfUtcDay(this.clock.now()) - (days - 1) * MS_PER_DAY;
    const dayStarts = Array.from({ length: days }, (_, i) => windowStart + i * MS_PER_DAY);

    const dailyIndices = await Promise.all(dayStarts.map((dayStart) => this.readDay(target, dayStart)));

    let lastKnown = dailyIndices[0] ?? (await this.seed(target, windowStart)).index;

    return dayStarts.map((dayStart, i) => {
      const measured = dailyIndices[i];
      if (measured !== null && measured !== undefined) {
        lastKnown = measured;
      }
      return toEntry(dayStart, lastKnown);
    });
  }

  async buildView(target: string, windowDays: number = DEFAULT_TIMELINE_DAYS): Promise<TimelineView> {
    const days = await this.build(target, windowDays);
    return { target, period: `Last ${days.length} days`, days };
  }

  /**
   * Carry-forward value for a window whose first day has no samples.
   */
  async seed(target: string, windowStart: number): Promise<{ index: number; source: SeedSource }> {
    try {
      const previous = await this.store.getLatest(target, windowStart);
      if (previous) {
        return { index: previous.index, source: 'history' };
      }
    } catch (error) {
      this.logger.warn('Timeline seed: history read failed', { target, error: String(error) });
    }

    try {
      const index = await this.live.fetchIndex(target);
      if (Number.isFinite(index) && index >= 0) {
        return { index: roundHalfAwayFromZero(index), source: 'live' };
      }
      this.logger.warn('Timeline seed: live index out of range', { target, index });
    } catch (error) {
      this.logger.warn('Timeline seed: live fetch failed', { target, error: String(error) });
    }

    this.logger.debug('Timeline seed: using default index', { target, index: this.defaultIndex });
    return { index: this.defaultIndex, source: 'default' };
  }

  /**
   * Rounded mean index of the day's samples, or null when there are none.
   */
  private async readDay(target: string, dayStart: number): Promise<number | null> {
    let samples: MetricSnapshot[];
    try {
      samples = await this.store.getRange(target, dayStart, dayStart + MS_PER_DAY);
    } catch (error) {
      this.logger.warn('Timeline day read failed', {
        target,
        date: toCalendarDate(dayStart),
        error: String(error),
      });
      return null;
    }

    if (samples.length === 0) {
      return null;
    }
    const sum = samples.reduce((total, sample) => total + sample.index, 0);
    return roundHalfAwayFromZero(sum / samples.length);
  }
}

function toEntry(dayStart: number, index: number): TimelineEntry {
  const { long, short } = weekdayNames(dayStart);
  const { category, color } = classifyIndex(index);
  return {
    date: toCalendarDate(dayStart),
    weekdayLong: long,
    weekdayShort: short,
    index,
    category,
    color,
  };
}
