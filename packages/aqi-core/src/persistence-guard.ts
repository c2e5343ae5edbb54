/**
 * Snapshot write deduplication.
 */

import { systemClock } from '@airwatch/contracts';
import type { Clock, MetricSnapshot } from '@airwatch/contracts';

export const DEFAULT_DEDUP_WINDOW_MS = 5 * 60 * 1000;

export type PersistedMarker = Pick<MetricSnapshot, 'target' | 'timestamp' | 'index'>;

export interface PersistenceGuardOptions {
  /** @default 5 minutes */
  dedupWindowMs?: number;
  clock?: Clock;
}

/**
 * Decides whether a new sample is worth persisting.
 *
 * A write is skipped only when the last persisted sample for the same target
 * has the same index AND is less than `dedupWindowMs` older than the
 * candidate. A changed index is always written.
 *
 * @example
 * ```typescript
 * const guard = new PersistenceGuard();
 * const last = { target: 'Tuzla', timestamp: t0, index: 50 };
 * guard.shouldWrite('Tuzla', 50, t0 + 2 * 60_000, last);  // false
 * guard.shouldWrite('Tuzla', 51, t0 + 2 * 60_000, last);  // true
 * guard.shouldWrite('Tuzla', 50, t0 + 10 * 60_000, last); // true
 * ```
 */
export class PersistenceGuard {
  readonly dedupWindowMs: number;
  private readonly clock: Clock;

  constructor(options: PersistenceGuardOptions = {}) {
    this.dedupWindowMs = options.dedupWindowMs ?? DEFAULT_DEDUP_WINDOW_MS;
    this.clock = options.clock ?? systemClock;
  }

  shouldWrite(
    target: string,
    candidateIndex: number,
    candidateTime: number,
    lastPersisted: PersistedMarker | null
  ): boolean {
    if (lastPersisted === null) {
      return true;
    }
    if (lastPersisted.target.toLowerCase() !== target.toLowerCase()) {
      return true;
    }

    const elapsed = candidateTime - lastPersisted.timestamp;
    return !(elapsed < this.dedupWindowMs && candidateIndex === lastPersisted.index);
  }

  /**
   * shouldWrite with the candidate stamped at the clock's current time.
   */
  shouldWriteNow(target: string, candidateIndex: number, lastPersisted: PersistedMarker | null): boolean {
    return this.shouldWrite(target, candidateIndex, this.clock.now(), lastPersisted);
  }
}
