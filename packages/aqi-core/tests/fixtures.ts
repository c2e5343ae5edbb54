import type { Clock, MetricSnapshot, SnapshotStore } from '@airwatch/contracts';

export function fixedClock(iso: string): Clock {
  const now = Date.parse(iso);
  return { now: () => now };
}

export function snapshot(target: string, iso: string, index: number): MetricSnapshot {
  return {
    target,
    timestamp: Date.parse(iso),
    index,
    dominantPollutant: 'pm25',
    concentrations: { pm25: null, pm10: null, o3: null, no2: null, so2: null, co: null },
  };
}

/**
 * Array-backed store; `failRange` makes getRange reject for matching windows.
 */
export class FakeStore implements SnapshotStore {
  failRange: (from: number) => boolean = () => false;
  failLatest = false;

  constructor(readonly snapshots: MetricSnapshot[] = []) {}

  async getLatest(target: string, before?: number): Promise<MetricSnapshot | null> {
    if (this.failLatest) {
      throw new Error('store offline');
    }
    const candidates = this.snapshots
      .filter((s) => s.target === target && (before === undefined || s.timestamp < before))
      .sort((a, b) => b.timestamp - a.timestamp);
    return candidates[0] ?? null;
  }

  async getRange(target: string, from: number, to: number): Promise<MetricSnapshot[]> {
    if (this.failRange(from)) {
      throw new Error('range read failed');
    }
    return this.snapshots.filter((s) => s.target === target && s.timestamp >= from && s.timestamp < to);
  }

  async append(snapshot: MetricSnapshot): Promise<void> {
    this.snapshots.push(snapshot);
  }
}
