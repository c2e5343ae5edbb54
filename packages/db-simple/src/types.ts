/**
 * Shared types for the connection layer
 */

/**
 * Minimal logger interface for dependency injection
 */
export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void
  warn(message: string, meta?: Record<string, unknown>): void
}

export const noopLogger: Logger = {
  info: () => {},
  warn: () => {},
}

/**
 * One result row, keyed by column name. Callers validate the values.
 */
export type DbRow = Record<string, unknown>

export type DbType = 'postgres'

/**
 * Portable column kinds; see columnType() for the per-dialect spelling
 */
export type ColumnKind = 'text' | 'integer' | 'epochMillis' | 'real'

/**
 * Unified database connection interface
 */
export interface DbConnection {
  readonly dbType: DbType

  /**
   * Execute SQL without returning results (DDL, INSERT, UPDATE, DELETE)
   */
  exec(sql: string, params?: unknown[]): Promise<void>

  /**
   * Execute SQL and return its rows (SELECT)
   */
  query(sql: string, params?: unknown[]): Promise<DbRow[]>

  /**
   * Positional parameter marker, 1-based (`$n`)
   */
  param(position: number): string

  close(): Promise<void>
}

export interface RetryOptions {
  maxRetries?: number
  initialDelayMs?: number
  backoffMultiplier?: number
  jitterPercent?: number
}

export interface ConnectOptions {
  logger?: Logger
  /**
   * Applied to transient errors while connecting
   */
  retry?: RetryOptions
}
