/**
 * @fileoverview Pollutant identifiers, display labels and units.
 *
 * @module @airwatch/contracts/pollutants
 */

/**
 * Pollutants reported in a live reading, in display order.
 */
export const POLLUTANTS = ['pm25', 'pm10', 'o3', 'no2', 'so2', 'co'] as const;

export type Pollutant = (typeof POLLUTANTS)[number];

/**
 * Pollutants that carry daily forecast series, in representative-index priority order.
 */
export const FORECAST_POLLUTANTS = ['pm25', 'pm10', 'o3'] as const;

export type ForecastPollutant = (typeof FORECAST_POLLUTANTS)[number];

const LABELS: Record<Pollutant, string> = {
  pm25: 'PM2.5',
  pm10: 'PM10',
  o3: 'O3',
  no2: 'NO2',
  so2: 'SO2',
  co: 'CO',
};

const UNITS: Record<Pollutant, string> = {
  pm25: 'μg/m³',
  pm10: 'μg/m³',
  o3: 'μg/m³',
  no2: 'μg/m³',
  so2: 'μg/m³',
  co: 'mg/m³',
};

/**
 * Type guard for pollutant codes as the upstream feed spells them.
 */
export function isPollutant(value: unknown): value is Pollutant {
  return typeof value === 'string' && POLLUTANTS.some((pollutant) => pollutant === value);
}

/**
 * Human-readable label for a pollutant code.
 *
 * Unrecognized or missing codes yield 'Unknown'.
 *
 * @example
 * ```typescript
 * getPollutantLabel('pm25'); // 'PM2.5'
 * getPollutantLabel('uvi');  // 'Unknown'
 * ```
 */
export function getPollutantLabel(code: string | null | undefined): string {
  const normalized = code?.trim().toLowerCase();
  return isPollutant(normalized) ? LABELS[normalized] : 'Unknown';
}

export function getPollutantUnit(pollutant: Pollutant): string {
  return UNITS[pollutant];
}
