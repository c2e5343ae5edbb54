/**
 * Database-backed snapshot history.
 *
 * Stores one row per persisted reading in `air_quality_snapshots` on
 * PostgreSQL through @airwatch/db-simple.
 */

import { POLLUTANTS, WriteFailureError } from '@airwatch/contracts'
import type { MetricSnapshot, SnapshotStore } from '@airwatch/contracts'
import { columnType, paramList } from '@airwatch/db-simple'
import type { ColumnKind, DbConnection, DbRow } from '@airwatch/db-simple'
import { z } from 'zod'

const nullableNumber = z.coerce.number().nullable()

/**
 * Row shape as pg returns it. BIGINT arrives as a string.
 */
const snapshotRowSchema = z.object({
  target: z.string(),
  observed_at: z.coerce.number(),
  aqi: z.coerce.number(),
  dominant_pollutant: z.string(),
  pm25: nullableNumber,
  pm10: nullableNumber,
  o3: nullableNumber,
  no2: nullableNumber,
  so2: nullableNumber,
  co: nullableNumber,
})

const COLUMNS = ['target', 'observed_at', 'aqi', 'dominant_pollutant', ...POLLUTANTS].join(', ')

function toSnapshot(row: DbRow): MetricSnapshot {
  const parsed = snapshotRowSchema.parse(row)
  return {
    target: parsed.target,
    timestamp: parsed.observed_at,
    index: parsed.aqi,
    dominantPollutant: parsed.dominant_pollutant,
    concentrations: {
      pm25: parsed.pm25,
      pm10: parsed.pm10,
      o3: parsed.o3,
      no2: parsed.no2,
      so2: parsed.so2,
      co: parsed.co,
    },
  }
}

/**
 * Snapshot store over a DbConnection.
 *
 * Schema:
 * - target_key: lower-cased target, the lookup column
 * - observed_at: reading time, Unix ms
 * - one nullable column per pollutant concentration
 *
 * Example:
 * ```typescript
 * const db = await connect('postgresql://airwatch@localhost:5432/airwatch')
 * const store = new DbSnapshotStore(db)
 * await store.init()
 * await store.append(snapshot)
 * ```
 */
export class DbSnapshotStore implements SnapshotStore {
  private db: DbConnection

  constructor(db: DbConnection) {
    this.db = db
  }

  /**
   * Create the table and its lookup index if missing. Safe to call repeatedly.
   *
   * @throws Error if table creation fails
   */
  async init(): Promise<void> {
    const type = (kind: ColumnKind) => columnType(this.db.dbType, kind)
    const pollutantColumns = POLLUTANTS.map((p) => `${p} ${type('real')}`).join(',\n          ')

    try {
      await this.db.exec(`
        CREATE TABLE IF NOT EXISTS air_quality_snapshots (
          target_key ${type('text')} NOT NULL,
          target ${type('text')} NOT NULL,
          observed_at ${type('epochMillis')} NOT NULL,
          aqi ${type('integer')} NOT NULL,
          dominant_pollutant ${type('text')} NOT NULL,
          ${pollutantColumns}
        )
      `)

      await this.db.exec(`
        CREATE INDEX IF NOT EXISTS idx_air_quality_snapshots_lookup
        ON air_quality_snapshots (target_key, observed_at)
      `)
    } catch (error) {
      throw new Error(`Failed to initialize air_quality_snapshots table: ${error}`, { cause: error })
    }
  }

  async getLatest(target: string, before?: number): Promise<MetricSnapshot | null> {
    const params: unknown[] = [target.toLowerCase()]
    let where = `target_key = ${this.db.param(1)}`
    if (before !== undefined) {
      params.push(before)
      where += ` AND observed_at < ${this.db.param(2)}`
    }

    try {
      const rows = await this.db.query(
        `SELECT ${COLUMNS} FROM air_quality_snapshots WHERE ${where} ORDER BY observed_at DESC LIMIT 1`,
        params
      )
      const row = rows[0]
      return row === undefined ? null : toSnapshot(row)
    } catch (error) {
      throw new Error(`Failed to read latest snapshot for ${target}: ${error}`, { cause: error })
    }
  }

  async getRange(target: string, from: number, to: number): Promise<MetricSnapshot[]> {
    try {
      const rows = await this.db.query(
        `SELECT ${COLUMNS} FROM air_quality_snapshots
         WHERE target_key = ${this.db.param(1)}
           AND observed_at >= ${this.db.param(2)}
           AND observed_at < ${this.db.param(3)}
         ORDER BY observed_at ASC`,
        [target.toLowerCase(), from, to]
      )
      return rows.map(toSnapshot)
    } catch (error) {
      throw new Error(`Failed to read snapshots for ${target}: ${error}`, { cause: error })
    }
  }

  async append(snapshot: MetricSnapshot): Promise<void> {
    const { concentrations: c } = snapshot
    const values = [
      snapshot.target.toLowerCase(),
      snapshot.target,
      snapshot.timestamp,
      snapshot.index,
      snapshot.dominantPollutant,
      ...POLLUTANTS.map((p) => c[p]),
    ]
    const placeholders = paramList(values.length)

    try {
      await this.db.exec(`INSERT INTO air_quality_snapshots (target_key, ${COLUMNS}) VALUES (${placeholders})`, values)
    } catch (error) {
      throw new WriteFailureError(
        `Failed to append snapshot for ${snapshot.target}: ${error}`,
        { target: snapshot.target, timestamp: snapshot.timestamp },
        error
      )
    }
  }
}
