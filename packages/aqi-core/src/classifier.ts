/**
 * AQI classification and concentration conversion.
 *
 * Both lookups are table-driven: every caller in the pipeline goes through
 * CATEGORY_BANDS for category, color and advisory, and through a breakpoint
 * table for concentration conversion. The palette is the classic EPA set.
 */

import { AqiCategory } from '@airwatch/contracts';

/**
 * One row of the category table. An index belongs to the first band whose
 * upper bound it does not exceed.
 */
export interface CategoryBand {
  upper: number;
  category: AqiCategory;
  color: string;
  advisory: string;
}

export interface Classification {
  category: AqiCategory;
  /** '#RRGGBB' */
  color: string;
  advisory: string;
}

/**
 * One piecewise-linear segment: concentrations in [concLow, concHigh] map
 * linearly onto [indexLow, indexHigh].
 */
export interface Breakpoint {
  concLow: number;
  concHigh: number;
  indexLow: number;
  indexHigh: number;
}

export const CATEGORY_BANDS: readonly CategoryBand[] = [
  {
    upper: 50,
    category: AqiCategory.Good,
    color: '#00E400',
    advisory: 'Air quality is considered satisfactory, and air pollution poses little or no risk.',
  },
  {
    upper: 100,
    category: AqiCategory.Moderate,
    color: '#FFFF00',
    advisory:
      'Air quality is acceptable for most people. However, for some pollutants there may be a moderate health concern for a very small number of people who are unusually sensitive to air pollution.',
  },
  {
    upper: 150,
    category: AqiCategory.UnhealthyForSensitiveGroups,
    color: '#FF7E00',
    advisory:
      'Members of sensitive groups may experience health effects. The general public is not likely to be affected.',
  },
  {
    upper: 200,
    category: AqiCategory.Unhealthy,
    color: '#FF0000',
    advisory:
      'Everyone may begin to experience health effects; members of sensitive groups may experience more serious health effects.',
  },
  {
    upper: 300,
    category: AqiCategory.VeryUnhealthy,
    color: '#8F3F97',
    advisory: 'Health warnings of emergency conditions. The entire population is more likely to be affected.',
  },
  {
    upper: Number.POSITIVE_INFINITY,
    category: AqiCategory.Hazardous,
    color: '#7E0023',
    advisory: 'Health alert: everyone may experience more serious health effects.',
  },
];

/**
 * PM2.5 (μg/m³, 24-hour) breakpoints. Concentrations above the last
 * segment are extrapolated along its slope.
 */
export const PM25_BREAKPOINTS: readonly Breakpoint[] = [
  { concLow: 0.0, concHigh: 12.0, indexLow: 0, indexHigh: 50 },
  { concLow: 12.1, concHigh: 35.4, indexLow: 51, indexHigh: 100 },
  { concLow: 35.5, concHigh: 55.4, indexLow: 101, indexHigh: 150 },
  { concLow: 55.5, concHigh: 150.4, indexLow: 151, indexHigh: 200 },
  { concLow: 150.5, concHigh: 250.4, indexLow: 201, indexHigh: 300 },
  { concLow: 250.5, concHigh: 500.4, indexLow: 301, indexHigh: 500 },
];

/**
 * Rounds halves away from zero (2.5 → 3, -2.5 → -3).
 */
export function roundHalfAwayFromZero(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value));
}

function bandFor(index: number): CategoryBand {
  const value = Number.isNaN(index) || index < 0 ? 0 : index;
  const band = CATEGORY_BANDS.find((candidate) => value <= candidate.upper);
  if (!band) {
    // Unreachable: the last band is unbounded
    throw new Error(`No category band for index ${index}`);
  }
  return band;
}

/**
 * Category, color and advisory for an AQI value.
 *
 * Total: negative or NaN input classifies as 0, anything above 300 is Hazardous.
 *
 * @example
 * ```typescript
 * classifyIndex(158);
 * // { category: 'Unhealthy', color: '#FF0000', advisory: 'Everyone may begin...' }
 * ```
 */
export function classifyIndex(index: number): Classification {
  const { category, color, advisory } = bandFor(index);
  return { category, color, advisory };
}

/**
 * Converts a pollutant concentration to an AQI value:
 *
 *   round((indexHigh - indexLow) / (concHigh - concLow) * (c - concLow) + indexLow)
 *
 * using the first segment whose upper concentration is not exceeded. Values
 * between two segments (e.g. 12.05) use the upper segment. Negative or NaN
 * input counts as 0.
 *
 * @example
 * ```typescript
 * convertConcentrationToIndex(70.0); // 158
 * ```
 */
export function convertConcentrationToIndex(
  concentration: number,
  breakpoints: readonly Breakpoint[] = PM25_BREAKPOINTS
): number {
  const c = Number.isNaN(concentration) || concentration < 0 ? 0 : concentration;
  const last = breakpoints[breakpoints.length - 1];
  if (last === undefined) {
    throw new Error('Breakpoint table is empty');
  }

  const segment = breakpoints.find((candidate) => c <= candidate.concHigh) ?? last;
  const slope = (segment.indexHigh - segment.indexLow) / (segment.concHigh - segment.concLow);
  const index = roundHalfAwayFromZero(slope * (c - segment.concLow) + segment.indexLow);

  return Math.max(0, index);
}
