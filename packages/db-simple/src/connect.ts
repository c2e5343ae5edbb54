/**
 * Opening connections from a database URL
 */

import pg from 'pg'
import { PostgresConnection } from './connections.js'
import { withRetry } from './retry.js'
import { noopLogger, type ConnectOptions, type DbConnection } from './types.js'
import { parseDatabaseUrl, redactDatabaseUrl } from './url.js'

/**
 * Connect to PostgreSQL.
 *
 * The pool is probed with `SELECT 1` so a bad URL fails here, not on the
 * first query.
 *
 * Example:
 * ```typescript
 * const db = await connect('postgresql://airwatch@localhost:5432/airwatch', { logger })
 * ```
 */
export async function connect(databaseUrl: string, options: ConnectOptions = {}): Promise<DbConnection> {
  const logger = options.logger ?? noopLogger
  const { location } = parseDatabaseUrl(databaseUrl)

  logger.info('Connecting to PostgreSQL', { url: redactDatabaseUrl(location) })
  return withRetry(
    async () => {
      const pool = new pg.Pool({ connectionString: location })
      try {
        await pool.query('SELECT 1')
      } catch (error) {
        await pool.end()
        throw error
      }
      return new PostgresConnection(pool, logger)
    },
    'PostgreSQL connection',
    options.retry,
    logger
  )
}
