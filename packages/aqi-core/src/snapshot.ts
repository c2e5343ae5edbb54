/**
 * Turns upstream payloads into snapshots and snapshots into live views.
 */

import {
  MalformedPayloadError,
  POLLUTANTS,
  getPollutantLabel,
  getPollutantUnit,
} from '@airwatch/contracts';
import type { LiveView, Measurement, MetricSnapshot, PollutantConcentrations, RawPayload } from '@airwatch/contracts';
import { classifyIndex, convertConcentrationToIndex, roundHalfAwayFromZero } from './classifier.js';

/**
 * Builds the immutable snapshot for a fetched payload.
 *
 * The overall index is the reported one (rounded, never negative); when the
 * source reported none it is derived from the PM2.5 concentration.
 *
 * @throws MalformedPayloadError when neither an index nor PM2.5 is available,
 *   or the timestamp is not a finite number
 */
export function buildSnapshot(payload: RawPayload): MetricSnapshot {
  const issues: string[] = [];
  if (!Number.isFinite(payload.timestamp)) {
    issues.push('timestamp: not a finite epoch');
  }

  const concentrations: PollutantConcentrations = {
    pm25: null,
    pm10: null,
    o3: null,
    no2: null,
    so2: null,
    co: null,
  };
  for (const pollutant of POLLUTANTS) {
    const value = payload.concentrations[pollutant];
    if (value !== undefined && Number.isFinite(value)) {
      concentrations[pollutant] = value;
    }
  }

  let index: number | null = null;
  if (payload.index !== null && Number.isFinite(payload.index)) {
    index = Math.max(0, roundHalfAwayFromZero(payload.index));
  } else if (concentrations.pm25 !== null) {
    index = convertConcentrationToIndex(concentrations.pm25);
  } else {
    issues.push('index: neither an overall index nor a PM2.5 concentration was reported');
  }

  if (index === null || issues.length > 0) {
    throw new MalformedPayloadError(`Unusable air quality payload for ${payload.target}`, {
      target: payload.target,
      issues,
    });
  }

  return Object.freeze({
    target: payload.target,
    timestamp: payload.timestamp,
    index,
    dominantPollutant: payload.dominantPollutant?.trim().toLowerCase() ?? '',
    concentrations: Object.freeze(concentrations),
  });
}

/**
 * Non-null concentrations in display order.
 */
export function listMeasurements(concentrations: Readonly<PollutantConcentrations>): Measurement[] {
  const measurements: Measurement[] = [];
  for (const pollutant of POLLUTANTS) {
    const value = concentrations[pollutant];
    if (value !== null) {
      measurements.push({
        pollutant,
        label: getPollutantLabel(pollutant),
        value,
        unit: getPollutantUnit(pollutant),
      });
    }
  }
  return measurements;
}

export function toLiveView(snapshot: MetricSnapshot): LiveView {
  const { category, color, advisory } = classifyIndex(snapshot.index);
  return {
    target: snapshot.target,
    index: snapshot.index,
    category,
    color,
    advisory,
    dominantPollutant: getPollutantLabel(snapshot.dominantPollutant),
    timestamp: new Date(snapshot.timestamp).toISOString(),
    measurements: listMeasurements(snapshot.concentrations),
  };
}
