/**
 * @fileoverview Contracts for the pipeline's external collaborators.
 *
 * Implementations live in provider and storage packages; the core only
 * depends on these interfaces.
 *
 * @module @airwatch/contracts/collaborators
 */

import type { MetricSnapshot, RawPayload } from './air-quality.js';

/**
 * Source of the current time in epoch milliseconds.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Upstream air quality source.
 *
 * Rejects with FetchUnavailableError, MalformedPayloadError or
 * NotConfiguredError.
 */
export interface AirQualityFetcher {
  fetch(target: string): Promise<RawPayload>;
}

/**
 * Append-only snapshot history.
 *
 * @invariant getLatest observes every append that resolved before it was called
 */
export interface SnapshotStore {
  /**
   * Most recent snapshot for the target, or null when there is none.
   *
   * @param before - When given, only snapshots strictly before this epoch ms qualify
   */
  getLatest(target: string, before?: number): Promise<MetricSnapshot | null>;

  /**
   * Snapshots with from <= timestamp < to, ascending by timestamp.
   */
  getRange(target: string, from: number, to: number): Promise<MetricSnapshot[]>;

  /**
   * Rejects with WriteFailureError when the write does not happen.
   */
  append(snapshot: MetricSnapshot): Promise<void>;
}
