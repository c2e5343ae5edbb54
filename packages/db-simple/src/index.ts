/**
 * @airwatch/db-simple
 *
 * Minimal PostgreSQL connection layer with retry
 */

export { connect } from './connect.js'
export { columnType, paramList, paramMarker } from './dialect.js'
export { parseDatabaseUrl, redactDatabaseUrl } from './url.js'
export type { ParsedDatabaseUrl } from './url.js'
export { isRetryableError, backoffDelay, withRetry } from './retry.js'
export type { ColumnKind, ConnectOptions, DbConnection, DbRow, DbType, Logger, RetryOptions } from './types.js'
