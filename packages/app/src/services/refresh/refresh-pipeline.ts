/**
 * Single-target refresh: fetch, persist, align and publish
 */

import { alignForecast, buildSnapshot, PersistenceGuard, toCalendarDate, toLiveView } from '@airwatch/aqi-core';
import type { LiveIndexSource } from '@airwatch/aqi-core';
import { systemClock, WriteFailureError, isWriteFailureError } from '@airwatch/contracts';
import type { AirQualityFetcher, Clock, ForecastView, RawPayload, SnapshotStore } from '@airwatch/contracts';
import { startTimer, type Logger } from '@airwatch/logger';
import type { ViewCache } from '../cache/view-cache.service.js';
import type { RefreshResult, TargetRefresher } from './types.js';

export interface RefreshPipelineConfig {
  fetcher: AirQualityFetcher;
  store: SnapshotStore;
  cache: ViewCache;
  guard: PersistenceGuard;
  logger: Logger;
  clock?: Clock;
  /** Forecast days to publish, counting today */
  forecastDays?: number;
}

/**
 * Runs one target through the pipeline, strictly in order:
 * fetch → snapshot → dedup decision → append → align → cache publish.
 *
 * Persistence precedes publication: a failed append aborts the refresh
 * and leaves the cached views untouched.
 */
export class RefreshPipeline implements TargetRefresher, LiveIndexSource {
  private fetcher: AirQualityFetcher;
  private store: SnapshotStore;
  private cache: ViewCache;
  private guard: PersistenceGuard;
  private logger: Logger;
  private clock: Clock;
  private forecastDays?: number;

  constructor(config: RefreshPipelineConfig) {
    this.fetcher = config.fetcher;
    this.store = config.store;
    this.cache = config.cache;
    this.guard = config.guard;
    this.logger = config.logger;
    this.clock = config.clock ?? systemClock;
    this.forecastDays = config.forecastDays;
  }

  /**
   * Refreshes a target and publishes its views.
   *
   * @throws NotConfiguredError, FetchUnavailableError, MalformedPayloadError or WriteFailureError
   */
  async refreshOne(target: string): Promise<RefreshResult> {
    const timer = startTimer();

    const payload = await this.fetcher.fetch(target);
    const snapshot = buildSnapshot(payload);

    const last = await this.store.getLatest(snapshot.target);
    const persisted = this.guard.shouldWrite(snapshot.target, snapshot.index, snapshot.timestamp, last);

    if (persisted) {
      try {
        await this.store.append(snapshot);
      } catch (error) {
        throw isWriteFailureError(error)
          ? error
          : new WriteFailureError(`Failed to persist snapshot for ${snapshot.target}`, { target: snapshot.target }, error);
      }
    } else {
      this.logger.debug('Skipping snapshot write', {
        target: snapshot.target,
        index: snapshot.index,
        last_persisted_at: last ? new Date(last.timestamp).toISOString() : null,
        dedup_window_ms: this.guard.dedupWindowMs,
      });
    }

    const live = toLiveView(snapshot);
    const forecast = this.buildForecastView(snapshot.target, payload.forecast);

    this.cache.setLive(live);
    if (forecast) {
      this.cache.setForecast(forecast);
    }

    this.logger.info('Target refreshed', {
      target: snapshot.target,
      index: snapshot.index,
      persisted,
      forecast_days: forecast?.days.length ?? 0,
      duration_ms: timer.stop(),
      result: 'success',
    });

    return { live, forecast, persisted };
  }

  /**
   * Fresh index straight from upstream. Runs a full refresh so the reading
   * is persisted and published like any other.
   */
  async fetchIndex(target: string): Promise<number> {
    const { live } = await this.refreshOne(target);
    return live.index;
  }

  /**
   * Null when there is nothing from today on; the previously published
   * forecast then stays in place until it expires.
   */
  private buildForecastView(target: string, series: RawPayload['forecast']): ForecastView | null {
    if (!series) {
      return null;
    }

    const now = this.clock.now();
    const days = alignForecast(series, toCalendarDate(now), this.forecastDays);
    if (days.length === 0) {
      this.logger.debug('Upstream forecast has no current days', { target });
      return null;
    }
    return { target, retrievedAt: new Date(now).toISOString(), days };
  }
}
