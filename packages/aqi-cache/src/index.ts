/**
 * @airwatch/aqi-cache
 *
 * Namespaced TTL cache for published views, plus in-memory and SQL
 * implementations of the snapshot history store.
 */

export { TtlCache } from './ttlCache.js'
export type { TtlCacheOptions } from './ttlCache.js'

export { DEFAULT_FRESHNESS_POLICIES, getTTL, isFresh, policiesFromMinutes } from './freshness.js'
export type { FreshnessPolicy } from './freshness.js'

export { MemorySnapshotStore } from './memorySnapshotStore.js'
export { DbSnapshotStore } from './dbSnapshotStore.js'

export type { CacheEntry, CacheLookup, CacheStats, NamespaceMap } from './types.js'
