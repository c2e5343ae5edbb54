import type { DbConnection, DbRow } from '@airwatch/db-simple'

/**
 * In-process DbConnection that understands the statements DbSnapshotStore
 * issues. Rows come back the way pg returns them: BIGINT as a string.
 */
export class FakeDbConnection implements DbConnection {
  readonly dbType = 'postgres' as const
  readonly statements: string[] = []
  private table: DbRow[] | null = null

  async exec(sql: string, params: unknown[] = []): Promise<void> {
    const statement = this.record(sql)

    if (statement.startsWith('CREATE TABLE')) {
      this.table ??= []
      return
    }
    if (statement.startsWith('CREATE INDEX')) {
      this.requireTable()
      return
    }

    const columns = /^INSERT INTO air_quality_snapshots \(([^)]+)\) VALUES/.exec(statement)?.[1]?.split(', ')
    if (columns === undefined) {
      throw new Error(`syntax error at or near "${statement.split(' ')[0]}"`)
    }
    const row: DbRow = {}
    columns.forEach((column, i) => {
      row[column] = column === 'observed_at' ? String(params[i]) : params[i]
    })
    this.requireTable().push(row)
  }

  async query(sql: string, params: unknown[] = []): Promise<DbRow[]> {
    const statement = this.record(sql)
    const [key, bound, upper] = params
    const observed = (row: DbRow) => Number(row['observed_at'])
    const rows = this.requireTable().filter((row) => row['target_key'] === key)

    if (statement.endsWith('LIMIT 1')) {
      return rows
        .filter((row) => typeof bound !== 'number' || observed(row) < bound)
        .sort((a, b) => observed(b) - observed(a))
        .slice(0, 1)
        .map((row) => ({ ...row }))
    }

    const from = typeof bound === 'number' ? bound : Number.NEGATIVE_INFINITY
    const to = typeof upper === 'number' ? upper : Number.POSITIVE_INFINITY
    return rows
      .filter((row) => observed(row) >= from && observed(row) < to)
      .sort((a, b) => observed(a) - observed(b))
      .map((row) => ({ ...row }))
  }

  param(position: number): string {
    return `$${position}`
  }

  async close(): Promise<void> {
    this.table = null
  }

  private record(sql: string): string {
    const statement = sql.replace(/\s+/g, ' ').replace(/\( /g, '(').replace(/ \)/g, ')').trim()
    this.statements.push(statement)
    return statement
  }

  private requireTable(): DbRow[] {
    if (this.table === null) {
      throw new Error('relation "air_quality_snapshots" does not exist')
    }
    return this.table
  }
}
