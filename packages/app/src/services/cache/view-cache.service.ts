/**
 * Published-view cache
 */

import { TtlCache, getTTL, DEFAULT_FRESHNESS_POLICIES } from '@airwatch/aqi-cache';
import type { CacheStats, FreshnessPolicy } from '@airwatch/aqi-cache';
import type { Clock, ForecastView, LiveView } from '@airwatch/contracts';
import type { Logger } from '@airwatch/logger';
import type { HealthStatus, Service } from '../../container/types.js';
import type { ViewNamespace, ViewNamespaces } from './types.js';

export interface ViewCacheConfig {
  logger: Logger;
  policies?: FreshnessPolicy[];
  clock?: Clock;
}

/**
 * Holds the latest live and forecast view per target.
 *
 * One instance is shared by the scheduler and the read path; there is no
 * process-wide cache.
 */
export class ViewCache implements Service {
  readonly name = 'ViewCache';
  readonly dependencies: string[] = [];

  private logger: Logger;
  private policies: FreshnessPolicy[];
  private cache: TtlCache<ViewNamespaces>;

  constructor(config: ViewCacheConfig) {
    this.logger = config.logger;
    this.policies = config.policies ?? DEFAULT_FRESHNESS_POLICIES;
    this.cache = new TtlCache<ViewNamespaces>({ clock: config.clock });
  }

  async initialize(): Promise<void> {
    this.logger.info('View cache initializing', {
      liveTtlMs: this.ttlFor('live'),
      forecastTtlMs: this.ttlFor('forecast'),
    });
  }

  async shutdown(): Promise<void> {
    this.logger.info('View cache shutting down', { ...this.cache.getStats() });
  }

  healthCheck(): HealthStatus {
    return {
      healthy: true,
      message: 'View cache is healthy',
      details: { ...this.cache.getStats() },
    };
  }

  getLive(target: string): LiveView | null {
    return this.read('live', target);
  }

  getForecast(target: string): ForecastView | null {
    return this.read('forecast', target);
  }

  setLive(view: LiveView): void {
    this.cache.set('live', view.target, view);
  }

  setForecast(view: ForecastView): void {
    this.cache.set('forecast', view.target, view);
  }

  getStats(): CacheStats {
    return this.cache.getStats();
  }

  private read<N extends ViewNamespace>(namespace: N, target: string): ViewNamespaces[N] | null {
    const lookup = this.cache.get(namespace, target, this.ttlFor(namespace));
    this.logger.debug('View cache lookup', { namespace, target, cache: lookup.hit ? 'hit' : 'miss' });
    return lookup.hit ? lookup.value : null;
  }

  private ttlFor(namespace: ViewNamespace): number {
    return getTTL(namespace, this.policies);
  }
}
