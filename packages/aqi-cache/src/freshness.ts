/**
 * Freshness budgets per cache namespace.
 *
 * Live readings change hourly upstream and are refreshed every cycle, so
 * they stay fresh for 10 minutes. Forecasts change a few times a day and
 * stay fresh for 2 hours.
 */

/**
 * Time-to-live policy for one namespace.
 */
export interface FreshnessPolicy {
  namespace: string
  ttlMs: number
}

export const DEFAULT_FRESHNESS_POLICIES: FreshnessPolicy[] = [
  { namespace: 'live', ttlMs: 10 * 60 * 1000 }, // 10 minutes
  { namespace: 'forecast', ttlMs: 2 * 60 * 60 * 1000 }, // 2 hours
]

/**
 * Fallback for namespaces without a policy.
 */
const DEFAULT_TTL_MS = 10 * 60 * 1000

/**
 * TTL for a namespace.
 *
 * Example:
 * ```typescript
 * getTTL('forecast') // 7200000
 * getTTL('anything-else') // 600000
 * ```
 */
export function getTTL(namespace: string, policies: FreshnessPolicy[] = DEFAULT_FRESHNESS_POLICIES): number {
  const policy = policies.find((p) => p.namespace === namespace)
  return policy?.ttlMs ?? DEFAULT_TTL_MS
}

/**
 * An entry is fresh while its age does not exceed the TTL.
 */
export function isFresh(storedAt: number, ttlMs: number, now: number = Date.now()): boolean {
  return now - storedAt <= ttlMs
}

/**
 * Builds policies from minute values, as configuration supplies them.
 */
export function policiesFromMinutes(minutes: Record<string, number>): FreshnessPolicy[] {
  return Object.entries(minutes).map(([namespace, value]) => ({ namespace, ttlMs: value * 60 * 1000 }))
}
