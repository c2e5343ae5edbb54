/**
 * Namespaced time-to-live cache with lazy, read-time expiration.
 *
 * Each namespace ("live", "forecast", ...) is an independent key space with
 * its own payload type; the TTL is supplied on every read so namespaces can
 * carry different freshness budgets. There is no sweeper and no delete: a
 * stale entry is removed by the read that finds it stale, and a set always
 * replaces the previous entry.
 */

import { systemClock } from '@airwatch/contracts'
import type { Clock } from '@airwatch/contracts'
import { isFresh } from './freshness.js'
import type { CacheEntry, CacheLookup, CacheStats, NamespaceMap } from './types.js'

type NamespaceStores<TMap extends NamespaceMap> = {
  [N in keyof TMap]?: Map<string, CacheEntry<TMap[N]>>
}

/**
 * Keys are case-insensitive and ignore surrounding whitespace.
 */
function normalizeKey(key: string): string {
  return key.trim().toLowerCase()
}

export interface TtlCacheOptions {
  /** Time source for storedAt and staleness checks */
  clock?: Clock
}

/**
 * In-memory TTL cache keyed by (namespace, key).
 *
 * Every get/set touches exactly one Map slot and never awaits, so
 * concurrent refresh tasks see either the previous or the new entry for a
 * key, never a partial one; last set wins.
 *
 * Example:
 * ```typescript
 * const cache = new TtlCache<{ live: LiveView; forecast: ForecastView }>()
 *
 * cache.set('live', 'Sarajevo', view)
 * const lookup = cache.get('live', 'sarajevo', getTTL('live'))
 * if (lookup.hit) {
 *   render(lookup.value)
 * }
 * ```
 */
export class TtlCache<TMap extends NamespaceMap> {
  private stores: NamespaceStores<TMap> = {}
  private namespaces = new Set<keyof TMap & string>()
  private clock: Clock
  private counters = { hits: 0, misses: 0, sets: 0, evictions: 0 }

  constructor(options: TtlCacheOptions = {}) {
    this.clock = options.clock ?? systemClock
  }

  /**
   * Read a payload if it is still fresh.
   *
   * Fresh means `now - storedAt <= ttlMs`. A stale entry is evicted before
   * the miss is returned.
   *
   * @param ttlMs - Freshness budget for this read
   */
  get<N extends keyof TMap & string>(namespace: N, key: string, ttlMs: number): CacheLookup<TMap[N]> {
    const store = this.stores[namespace]
    const normalized = normalizeKey(key)
    const entry = store?.get(normalized)

    if (store === undefined || entry === undefined) {
      this.counters.misses++
      return { hit: false }
    }

    if (!isFresh(entry.storedAt, ttlMs, this.clock.now())) {
      store.delete(normalized)
      this.counters.evictions++
      this.counters.misses++
      return { hit: false }
    }

    this.counters.hits++
    return { hit: true, value: entry.payload, storedAt: entry.storedAt }
  }

  /**
   * Store a payload, replacing any previous entry, stamped with the current time.
   */
  set<N extends keyof TMap & string>(namespace: N, key: string, value: TMap[N]): void {
    this.storeFor(namespace).set(normalizeKey(key), { payload: value, storedAt: this.clock.now() })
    this.counters.sets++
  }

  /**
   * Number of entries held in a namespace, stale ones included.
   */
  size<N extends keyof TMap & string>(namespace: N): number {
    return this.stores[namespace]?.size ?? 0
  }

  getStats(): CacheStats {
    const size: Record<string, number> = {}
    for (const namespace of this.namespaces) {
      size[namespace] = this.size(namespace)
    }
    return { ...this.counters, size }
  }

  private storeFor<N extends keyof TMap & string>(namespace: N): Map<string, CacheEntry<TMap[N]>> {
    const existing = this.stores[namespace]
    if (existing !== undefined) {
      return existing
    }
    const created = new Map<string, CacheEntry<TMap[N]>>()
    this.stores[namespace] = created
    this.namespaces.add(namespace)
    return created
  }
}
