/**
 * Cache service types and interfaces
 */

import type { ForecastView, LiveView } from '@airwatch/contracts';

/**
 * Payload type stored under each cache namespace
 */
export type ViewNamespaces = {
  live: LiveView;
  forecast: ForecastView;
};

export type ViewNamespace = 'live' | 'forecast';

/**
 * Cache configuration
 */
export interface ViewCacheTtls {
  liveTtlMs: number;
  forecastTtlMs: number;
}
