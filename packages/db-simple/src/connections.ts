/**
 * Pool-backed DbConnection
 */

import type { Pool } from 'pg'
import { paramMarker } from './dialect.js'
import type { DbConnection, DbRow, Logger } from './types.js'

export class PostgresConnection implements DbConnection {
  readonly dbType = 'postgres' as const

  constructor(
    private pool: Pool,
    private logger: Logger
  ) {}

  async exec(sql: string, params: unknown[] = []): Promise<void> {
    await this.pool.query(sql, params)
  }

  async query(sql: string, params: unknown[] = []): Promise<DbRow[]> {
    const result = await this.pool.query<DbRow>(sql, params)
    return result.rows
  }

  param(position: number): string {
    return paramMarker(position)
  }

  async close(): Promise<void> {
    await this.pool.end()
    this.logger.info('PostgreSQL connection pool closed')
  }
}
