import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { WriteFailureError } from '@airwatch/contracts'
import type { MetricSnapshot, SnapshotStore } from '@airwatch/contracts'
import { DbSnapshotStore } from '../src/dbSnapshotStore.js'
import { MemorySnapshotStore } from '../src/memorySnapshotStore.js'
import { FakeDbConnection } from './fakeDb.js'

function snapshot(target: string, iso: string, index: number, pm25: number | null = null): MetricSnapshot {
  return {
    target,
    timestamp: Date.parse(iso),
    index,
    dominantPollutant: 'pm25',
    concentrations: { pm25, pm10: null, o3: null, no2: null, so2: null, co: 0.4 },
  }
}

function describeStore(name: string, setup: () => Promise<{ store: SnapshotStore; teardown: () => Promise<void> }>) {
  describe(name, () => {
    let store: SnapshotStore
    let teardown: () => Promise<void>

    beforeEach(async () => {
      ;({ store, teardown } = await setup())
    })

    afterEach(async () => {
      await teardown()
    })

    it('should return null when nothing was stored', async () => {
      expect(await store.getLatest('Sarajevo')).toBeNull()
    })

    it('should return the most recent snapshot regardless of target case', async () => {
      await store.append(snapshot('Sarajevo', '2024-03-01T08:00:00Z', 40, 9.5))
      await store.append(snapshot('Sarajevo', '2024-03-01T09:00:00Z', 55, 13.1))

      expect(await store.getLatest('sarajevo')).toEqual(snapshot('Sarajevo', '2024-03-01T09:00:00Z', 55, 13.1))
    })

    it('should honour the before bound', async () => {
      await store.append(snapshot('Tuzla', '2024-03-01T08:00:00Z', 40))
      await store.append(snapshot('Tuzla', '2024-03-01T09:00:00Z', 55))

      const latest = await store.getLatest('Tuzla', Date.parse('2024-03-01T09:00:00Z'))

      expect(latest?.index).toBe(40)
    })

    it('should return a half-open range in ascending order', async () => {
      await store.append(snapshot('Zenica', '2024-03-02T00:00:00Z', 70))
      await store.append(snapshot('Zenica', '2024-03-01T12:00:00Z', 60))
      await store.append(snapshot('Zenica', '2024-03-01T00:00:00Z', 50))
      await store.append(snapshot('Mostar', '2024-03-01T06:00:00Z', 20))

      const range = await store.getRange('Zenica', Date.parse('2024-03-01T00:00:00Z'), Date.parse('2024-03-02T00:00:00Z'))

      expect(range.map((s) => s.index)).toEqual([50, 60])
    })
  })
}

describeStore('MemorySnapshotStore', async () => {
  const store = new MemorySnapshotStore()
  return { store, teardown: async () => undefined }
})

describeStore('DbSnapshotStore', async () => {
  const db = new FakeDbConnection()
  const store = new DbSnapshotStore(db)
  await store.init()
  return { store, teardown: () => db.close() }
})

describe('MemorySnapshotStore.count', () => {
  it('should count snapshots across targets', async () => {
    const store = new MemorySnapshotStore()
    await store.append(snapshot('Sarajevo', '2024-03-01T08:00:00Z', 40))
    await store.append(snapshot('Bihac', '2024-03-01T08:00:00Z', 30))

    expect(store.count()).toBe(2)
  })
})

describe('DbSnapshotStore SQL', () => {
  let db: FakeDbConnection

  beforeEach(() => {
    db = new FakeDbConnection()
  })

  it('should create wide columns for timestamps and concentrations', async () => {
    await new DbSnapshotStore(db).init()

    expect(db.statements[0]).toContain('observed_at BIGINT NOT NULL')
    expect(db.statements[0]).toContain('pm25 DOUBLE PRECISION, pm10 DOUBLE PRECISION')
    expect(db.statements[1]).toBe(
      'CREATE INDEX IF NOT EXISTS idx_air_quality_snapshots_lookup ON air_quality_snapshots (target_key, observed_at)'
    )
  })

  it('should insert with numbered parameters and a lower-cased lookup key', async () => {
    const store = new DbSnapshotStore(db)
    await store.init()
    await store.append(snapshot('Bihac', '2024-03-01T08:00:00Z', 30, 7.2))

    expect(db.statements[2]).toBe(
      'INSERT INTO air_quality_snapshots (target_key, target, observed_at, aqi, dominant_pollutant, pm25, pm10, o3, no2, so2, co) ' +
        'VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)'
    )
    expect(await store.getLatest('BIHAC')).toEqual(snapshot('Bihac', '2024-03-01T08:00:00Z', 30, 7.2))
  })

  it('should be safe to initialise twice', async () => {
    const store = new DbSnapshotStore(db)
    await store.init()
    await store.init()

    expect(await store.getLatest('Sarajevo')).toBeNull()
  })

  it('should wrap append failures in WriteFailureError', async () => {
    const store = new DbSnapshotStore(db)

    // Table was never created
    const error = await store.append(snapshot('Travnik', '2024-03-01T08:00:00Z', 35)).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(WriteFailureError)
    expect(error).toMatchObject({ code: 'WRITE_FAILURE', data: { target: 'Travnik' } })
  })

  it('should reject reads when the table is missing', async () => {
    const store = new DbSnapshotStore(db)

    await expect(store.getLatest('Travnik')).rejects.toThrow('Failed to read latest snapshot for Travnik')
  })
})
