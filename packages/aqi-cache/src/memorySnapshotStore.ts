/**
 * In-process snapshot history.
 *
 * Used when DATABASE_URL is "memory:" and as the store behind scheduler
 * and read-path tests. History is lost on restart.
 */

import type { MetricSnapshot, SnapshotStore } from '@airwatch/contracts'

/**
 * Example:
 * ```typescript
 * const store = new MemorySnapshotStore()
 * await store.append(snapshot)
 * await store.getLatest('Sarajevo') // snapshot
 * ```
 */
export class MemorySnapshotStore implements SnapshotStore {
  /** Per normalized target, ascending by timestamp */
  private history = new Map<string, MetricSnapshot[]>()

  async getLatest(target: string, before?: number): Promise<MetricSnapshot | null> {
    const series = this.history.get(target.toLowerCase()) ?? []
    for (let i = series.length - 1; i >= 0; i--) {
      const snapshot = series[i]
      if (snapshot !== undefined && (before === undefined || snapshot.timestamp < before)) {
        return snapshot
      }
    }
    return null
  }

  async getRange(target: string, from: number, to: number): Promise<MetricSnapshot[]> {
    const series = this.history.get(target.toLowerCase()) ?? []
    return series.filter((snapshot) => snapshot.timestamp >= from && snapshot.timestamp < to)
  }

  async append(snapshot: MetricSnapshot): Promise<void> {
    const key = snapshot.target.toLowerCase()
    const series = this.history.get(key) ?? []

    // Keep ascending order even when an older reading arrives late
    let position = series.length
    while (position > 0 && (series[position - 1]?.timestamp ?? 0) > snapshot.timestamp) {
      position--
    }
    series.splice(position, 0, snapshot)
    this.history.set(key, series)
  }

  /**
   * Total number of snapshots across all targets.
   */
  count(): number {
    let total = 0
    for (const series of this.history.values()) {
      total += series.length
    }
    return total
  }
}
