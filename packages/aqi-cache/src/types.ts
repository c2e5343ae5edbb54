/**
 * Type definitions for @airwatch/aqi-cache
 */

/**
 * A cached payload and the instant it was stored (Unix ms).
 */
export interface CacheEntry<T> {
  readonly payload: T
  readonly storedAt: number
}

/**
 * Result of a cache read. A stale or absent entry is a miss.
 */
export type CacheLookup<T> = { hit: true; value: T; storedAt: number } | { hit: false }

/**
 * Maps each namespace to the payload type stored under it. Declare it with
 * a type alias: interfaces have no implicit index signature.
 *
 * Example:
 * ```typescript
 * type ViewNamespaces = {
 *   live: LiveView
 *   forecast: ForecastView
 * }
 * const cache = new TtlCache<ViewNamespaces>()
 * ```
 */
export type NamespaceMap = Record<string, unknown>

/**
 * Cache counters since construction.
 */
export interface CacheStats {
  hits: number
  misses: number
  sets: number
  /** Stale entries removed by a read */
  evictions: number
  /** Entries held per namespace, stale ones included until a read evicts them */
  size: Record<string, number>
}
