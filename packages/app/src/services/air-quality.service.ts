/**
 * Cache-facing read API
 */

import { classifyIndex, getHealthAdvice, type GroupAdvice, type TimelineBuilder } from '@airwatch/aqi-core';
import { DataUnavailableError, isNotConfiguredError, systemClock } from '@airwatch/contracts';
import type { AqiCategory, Clock, ForecastDayEntry, LiveView, TimelineView, ViewKind } from '@airwatch/contracts';
import { withRequestContext, type Logger } from '@airwatch/logger';
import type { ViewCache } from './cache/view-cache.service.js';
import type { RefreshResult, TargetRefresher } from './refresh/types.js';

export interface AirQualityServiceConfig {
  cache: ViewCache;
  refresher: TargetRefresher;
  timeline: TimelineBuilder;
  logger: Logger;
  /** Canonical target name; throws NotConfiguredError for unknown targets */
  resolveTarget: (target: string) => string;
  /** @default 7 */
  timelineDays?: number;
  clock?: Clock;
}

export interface CompleteView {
  live: LiveView;
  /** Empty when no forecast is available */
  forecast: ForecastDayEntry[];
}

export const NO_DATA_CATEGORY = 'No Data';
export const NO_DATA_COLOR = '#CCCCCC';

/**
 * One row of a comparison; a target whose live view failed gets the
 * No Data placeholder and its error message.
 */
export interface ComparisonEntry {
  target: string;
  index: number | null;
  category: AqiCategory | typeof NO_DATA_CATEGORY;
  color: string;
  dominantPollutant: string | null;
  /** ISO 8601 */
  timestamp: string | null;
  error?: string;
}

export interface ComparisonView {
  /** ISO 8601 */
  comparedAt: string;
  total: number;
  targets: ComparisonEntry[];
}

export interface HealthAdviceView {
  target: string;
  index: number;
  category: AqiCategory;
  groups: GroupAdvice[];
}

/**
 * Serves published views from the cache. A miss triggers a synchronous
 * refresh of that target and a second read; concurrent misses for the
 * same target share one refresh.
 */
export class AirQualityService {
  private cache: ViewCache;
  private refresher: TargetRefresher;
  private timeline: TimelineBuilder;
  private logger: Logger;
  private resolveTarget: (target: string) => string;
  private timelineDays?: number;
  private clock: Clock;
  private inFlight = new Map<string, Promise<RefreshResult>>();

  constructor(config: AirQualityServiceConfig) {
    this.cache = config.cache;
    this.refresher = config.refresher;
    this.timeline = config.timeline;
    this.logger = config.logger;
    this.resolveTarget = config.resolveTarget;
    this.timelineDays = config.timelineDays;
    this.clock = config.clock ?? systemClock;
  }

  /**
   * @throws NotConfiguredError for unknown targets
   * @throws DataUnavailableError when nothing is cached and the refresh failed
   */
  async getLiveView(target: string): Promise<LiveView> {
    const name = this.resolveTarget(target);
    const cached = this.cache.getLive(name);
    if (cached) {
      return cached;
    }

    await this.refreshOnMiss(name, 'live');
    const refreshed = this.cache.getLive(name);
    if (!refreshed) {
      throw new DataUnavailableError(name, 'live');
    }
    return refreshed;
  }

  /**
   * Forecast days starting today.
   *
   * @throws NotConfiguredError for unknown targets
   * @throws DataUnavailableError when no forecast is cached and the refresh produced none
   */
  async getForecastView(target: string): Promise<ForecastDayEntry[]> {
    const name = this.resolveTarget(target);
    const cached = this.cache.getForecast(name);
    if (cached) {
      return cached.days;
    }

    await this.refreshOnMiss(name, 'forecast');
    const refreshed = this.cache.getForecast(name);
    if (!refreshed) {
      throw new DataUnavailableError(name, 'forecast');
    }
    return refreshed.days;
  }

  /**
   * Live view plus forecast; a missing forecast is an empty list.
   */
  async getCompleteView(target: string): Promise<CompleteView> {
    const live = await this.getLiveView(target);
    try {
      return { live, forecast: await this.getForecastView(target) };
    } catch (error) {
      if (error instanceof DataUnavailableError) {
        this.logger.debug('Complete view without forecast', { target: live.target });
        return { live, forecast: [] };
      }
      throw error;
    }
  }

  /**
   * Rolling daily history ending today. Never fails for a known target.
   */
  async getTimeline(target: string, windowDays?: number): Promise<TimelineView> {
    const name = this.resolveTarget(target);
    return this.timeline.buildView(name, windowDays ?? this.timelineDays);
  }

  /**
   * Per-group advice for the current live index.
   */
  async getHealthAdvice(target: string): Promise<HealthAdviceView> {
    const live = await this.getLiveView(target);
    return {
      target: live.target,
      index: live.index,
      category: classifyIndex(live.index).category,
      groups: getHealthAdvice(live.index),
    };
  }

  /**
   * Live conditions side by side. Entries may be comma lists; names are
   * trimmed and de-duplicated case-insensitively, first spelling wins.
   * A failing target yields a No Data row instead of failing the call.
   *
   * @throws Error when no target is named
   */
  async compareTargets(targets: string[]): Promise<ComparisonView> {
    const requested = parseTargetList(targets);
    if (requested.length === 0) {
      throw new Error('At least one target must be specified');
    }

    const entries = await Promise.all(requested.map((target) => this.compareOne(target)));
    return {
      comparedAt: new Date(this.clock.now()).toISOString(),
      total: entries.length,
      targets: entries,
    };
  }

  /**
   * Forces a refresh regardless of cache state. Errors propagate unchanged.
   */
  async refreshOne(target: string): Promise<RefreshResult> {
    const name = this.resolveTarget(target);
    return this.singleFlight(name);
  }

  private async compareOne(target: string): Promise<ComparisonEntry> {
    try {
      const live = await this.getLiveView(target);
      return {
        target: live.target,
        index: live.index,
        category: live.category,
        color: live.color,
        dominantPollutant: live.dominantPollutant,
        timestamp: live.timestamp,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn('Comparison entry unavailable', { target, error: message });
      return {
        target,
        index: null,
        category: NO_DATA_CATEGORY,
        color: NO_DATA_COLOR,
        dominantPollutant: null,
        timestamp: null,
        error: message,
      };
    }
  }

  private async refreshOnMiss(target: string, kind: ViewKind): Promise<void> {
    this.logger.debug('Cache miss, refreshing', { target, namespace: kind, cache: 'miss' });
    try {
      await this.singleFlight(target);
    } catch (error) {
      if (isNotConfiguredError(error)) {
        throw error;
      }
      this.logger.warn('Read-path refresh failed', {
        target,
        namespace: kind,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new DataUnavailableError(target, kind, error);
    }
  }

  private singleFlight(target: string): Promise<RefreshResult> {
    const key = target.toLowerCase();
    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const refresh = withRequestContext(() => this.refresher.refreshOne(target)).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, refresh);
    return refresh;
  }
}

function parseTargetList(targets: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const target of targets.flatMap((entry) => entry.split(','))) {
    const name = target.trim();
    const key = name.toLowerCase();
    if (name && !seen.has(key)) {
      seen.add(key);
      result.push(name);
    }
  }
  return result;
}
