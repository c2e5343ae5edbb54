/**
 * Database URL handling
 */

import type { DbType } from './types.js'

export interface ParsedDatabaseUrl {
  type: DbType
  /** The full connection string handed to the driver */
  location: string
}

/**
 * Check a database URL and name its driver.
 *
 * Accepts `postgres://…` and `postgresql://…`.
 *
 * @throws Error for any other scheme
 */
export function parseDatabaseUrl(databaseUrl: string): ParsedDatabaseUrl {
  if (/^postgres(ql)?:\/\//.test(databaseUrl)) {
    return { type: 'postgres', location: databaseUrl }
  }

  throw new Error(`Unsupported database URL format: ${databaseUrl}. Expected postgresql://...`)
}

/**
 * Mask the password of a URL for logging
 *
 * Example:
 * ```typescript
 * redactDatabaseUrl('postgres://airwatch:pw@db/airwatch') // 'postgres://airwatch:***@db/airwatch'
 * ```
 */
export function redactDatabaseUrl(databaseUrl: string): string {
  return databaseUrl.replace(/:[^:@/]+@/, ':***@')
}
