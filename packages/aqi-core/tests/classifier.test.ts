import { describe, it, expect } from 'vitest';
import { AqiCategory } from '@airwatch/contracts';
import {
  CATEGORY_BANDS,
  PM25_BREAKPOINTS,
  classifyIndex,
  convertConcentrationToIndex,
  roundHalfAwayFromZero,
} from '../src/classifier.js';

describe('classifyIndex', () => {
  it('should map boundaries to their categories', () => {
    expect(classifyIndex(0).category).toBe(AqiCategory.Good);
    expect(classifyIndex(50).category).toBe(AqiCategory.Good);
    expect(classifyIndex(51).category).toBe(AqiCategory.Moderate);
    expect(classifyIndex(100).category).toBe(AqiCategory.Moderate);
    expect(classifyIndex(101).category).toBe(AqiCategory.UnhealthyForSensitiveGroups);
    expect(classifyIndex(150).category).toBe(AqiCategory.UnhealthyForSensitiveGroups);
    expect(classifyIndex(151).category).toBe(AqiCategory.Unhealthy);
    expect(classifyIndex(200).category).toBe(AqiCategory.Unhealthy);
    expect(classifyIndex(201).category).toBe(AqiCategory.VeryUnhealthy);
    expect(classifyIndex(300).category).toBe(AqiCategory.VeryUnhealthy);
    expect(classifyIndex(301).category).toBe(AqiCategory.Hazardous);
  });

  it('should put very large values in the last bucket', () => {
    expect(classifyIndex(999_999)).toEqual({
      category: AqiCategory.Hazardous,
      color: '#7E0023',
      advisory: 'Health alert: everyone may experience more serious health effects.',
    });
  });

  it('should treat negative and NaN input as 0', () => {
    expect(classifyIndex(-10).category).toBe(AqiCategory.Good);
    expect(classifyIndex(Number.NaN).category).toBe(AqiCategory.Good);
  });

  it('should use the classic palette', () => {
    expect(CATEGORY_BANDS.map((band) => band.color)).toEqual([
      '#00E400',
      '#FFFF00',
      '#FF7E00',
      '#FF0000',
      '#8F3F97',
      '#7E0023',
    ]);
  });

  it('should be monotonic in category rank', () => {
    const severity = Object.values(AqiCategory);
    let previous = -1;
    for (let index = 0; index <= 600; index++) {
      const rank = severity.indexOf(classifyIndex(index).category);
      expect(rank).toBeGreaterThanOrEqual(previous);
      previous = rank;
    }
  });
});

describe('convertConcentrationToIndex', () => {
  it('should return 0 for 0 and for negative input', () => {
    expect(convertConcentrationToIndex(0)).toBe(0);
    expect(convertConcentrationToIndex(-3)).toBe(0);
    expect(convertConcentrationToIndex(Number.NaN)).toBe(0);
  });

  it('should convert 70.0 µg/m³ to 158 (Unhealthy)', () => {
    const index = convertConcentrationToIndex(70.0);

    expect(index).toBe(158);
    expect(classifyIndex(index).category).toBe(AqiCategory.Unhealthy);
  });

  it('should hit the index bounds at each segment edge', () => {
    expect(PM25_BREAKPOINTS.map((bp) => convertConcentrationToIndex(bp.concLow))).toEqual([
      0, 51, 101, 151, 201, 301,
    ]);
    expect(PM25_BREAKPOINTS.map((bp) => convertConcentrationToIndex(bp.concHigh))).toEqual([
      50, 100, 150, 200, 300, 500,
    ]);
  });

  it('should be continuous across breakpoints within rounding', () => {
    for (let i = 0; i < PM25_BREAKPOINTS.length - 1; i++) {
      const upper = PM25_BREAKPOINTS[i]?.concHigh ?? 0;
      const nextLower = PM25_BREAKPOINTS[i + 1]?.concLow ?? 0;
      const gap = convertConcentrationToIndex(nextLower) - convertConcentrationToIndex(upper);
      expect(gap).toBeLessThanOrEqual(1);
      expect(gap).toBeGreaterThanOrEqual(0);
    }
  });

  it('should place values between segments in the upper segment', () => {
    expect(convertConcentrationToIndex(12.05)).toBe(51);
  });

  it('should interpolate inside segments', () => {
    expect(convertConcentrationToIndex(6)).toBe(25);
    expect(convertConcentrationToIndex(25)).toBe(78);
    expect(convertConcentrationToIndex(45.2)).toBe(125);
  });

  it('should extrapolate beyond the table along the last slope', () => {
    expect(convertConcentrationToIndex(600)).toBe(579);
  });
});

describe('roundHalfAwayFromZero', () => {
  it('should round halves away from zero', () => {
    expect(roundHalfAwayFromZero(2.5)).toBe(3);
    expect(roundHalfAwayFromZero(-2.5)).toBe(-3);
    expect(roundHalfAwayFromZero(65.5)).toBe(66);
    expect(roundHalfAwayFromZero(2.4)).toBe(2);
  });
});
