/**
 * Refresh pipeline and scheduler types
 */

import type { ForecastView, LiveView } from '@airwatch/contracts';

/**
 * Outcome of one successful single-target refresh
 */
export interface RefreshResult {
  live: LiveView;
  /** Null when the upstream sent no forecast or none from today on */
  forecast: ForecastView | null;
  /** False when the guard skipped the snapshot write */
  persisted: boolean;
}

/**
 * Anything that can refresh one target on demand
 */
export interface TargetRefresher {
  refreshOne(target: string): Promise<RefreshResult>;
}

export type SchedulerState = 'idle' | 'running' | 'waiting' | 'stopped';

/**
 * Summary of one scheduler cycle
 */
export interface CycleSummary {
  succeeded: string[];
  failed: string[];
  duration_ms: number;
}
