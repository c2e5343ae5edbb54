import { describe, it, expect } from 'vitest';
import { AqiCategory } from '@airwatch/contracts';
import type { DayPoint } from '@airwatch/contracts';
import { alignForecast } from '../src/forecast.js';

function days(start: number, count: number, avg: number): DayPoint[] {
  return Array.from({ length: count }, (_, i) => ({
    date: `2025-01-${String(start + i).padStart(2, '0')}`,
    avg,
    min: avg - 5,
    max: avg + 5,
  }));
}

describe('alignForecast', () => {
  it('should return nothing for an empty series map', () => {
    expect(alignForecast({}, '2025-01-15')).toEqual([]);
  });

  it('should keep PM2.5-only days with null PM10 and O3', () => {
    const result = alignForecast({ pm25: days(15, 7, 70) }, '2025-01-15');

    expect(result).toHaveLength(7);
    for (const entry of result) {
      expect(entry.pollutants.pm10).toBeNull();
      expect(entry.pollutants.o3).toBeNull();
      expect(entry.pollutants.pm25).toEqual({ avg: 70, min: 65, max: 75 });
      expect(entry.index).toBe(158);
      expect(entry.category).toBe(AqiCategory.Unhealthy);
      expect(entry.color).toBe('#FF0000');
    }
  });

  it('should drop days before the window start and cap the count', () => {
    const result = alignForecast({ pm25: days(10, 12, 6) }, '2025-01-15', 5);

    expect(result.map((entry) => entry.date)).toEqual([
      '2025-01-15',
      '2025-01-16',
      '2025-01-17',
      '2025-01-18',
      '2025-01-19',
    ]);
  });

  it('should return fewer than maxDays when fewer days remain', () => {
    const result = alignForecast({ pm25: days(13, 4, 6) }, '2025-01-15');

    expect(result.map((entry) => entry.date)).toEqual(['2025-01-15', '2025-01-16']);
  });

  it('should merge series with different lengths into ascending days', () => {
    const result = alignForecast(
      {
        o3: days(15, 3, 20),
        pm10: days(16, 1, 40),
        pm25: [{ date: '2025-01-15', avg: 70, min: 50, max: 90 }],
      },
      '2025-01-15'
    );

    expect(result.map((entry) => entry.date)).toEqual(['2025-01-15', '2025-01-16', '2025-01-17']);
    expect(result[0]?.pollutants).toEqual({
      pm25: { avg: 70, min: 50, max: 90 },
      pm10: null,
      o3: { avg: 20, min: 15, max: 25 },
    });
    expect(result[1]?.pollutants.pm25).toBeNull();
    expect(result[1]?.pollutants.pm10).toEqual({ avg: 40, min: 35, max: 45 });
    expect(result[2]?.pollutants.pm10).toBeNull();
  });

  it('should pick the representative pollutant by priority', () => {
    const result = alignForecast(
      {
        o3: days(15, 3, 8),
        pm10: days(16, 1, 25),
        pm25: [{ date: '2025-01-15', avg: 70, min: 50, max: 90 }],
      },
      '2025-01-15'
    );

    // PM2.5, then PM10, then O3
    expect(result.map((entry) => entry.index)).toEqual([158, 78, 33]);
    expect(result.map((entry) => entry.category)).toEqual([
      AqiCategory.Unhealthy,
      AqiCategory.Moderate,
      AqiCategory.Good,
    ]);
  });

  it('should use index 0 when no priority pollutant has a finite avg', () => {
    const result = alignForecast(
      { pm25: [{ date: '2025-01-15', avg: Number.NaN, min: 0, max: 0 }] },
      '2025-01-15'
    );

    expect(result[0]?.index).toBe(0);
    expect(result[0]?.category).toBe(AqiCategory.Good);
  });

  it('should skip unparseable days and normalize day strings', () => {
    const result = alignForecast(
      {
        pm25: [
          { date: 'not-a-day', avg: 10, min: 5, max: 15 },
          { date: '2025-02-30', avg: 10, min: 5, max: 15 },
          { date: '2025-01-15T00:00:00', avg: 12, min: 5, max: 15 },
        ],
      },
      '2025-01-15'
    );

    expect(result).toHaveLength(1);
    expect(result[0]?.date).toBe('2025-01-15');
    expect(result[0]?.index).toBe(50);
  });

  it('should keep the later point for a repeated day', () => {
    const result = alignForecast(
      {
        pm25: [
          { date: '2025-01-15', avg: 6, min: 1, max: 9 },
          { date: '2025-01-15', avg: 25, min: 20, max: 30 },
        ],
      },
      '2025-01-15'
    );

    expect(result[0]?.pollutants.pm25).toEqual({ avg: 25, min: 20, max: 30 });
  });

  it('should return nothing for a non-positive maxDays', () => {
    expect(alignForecast({ pm25: days(15, 3, 6) }, '2025-01-15', 0)).toEqual([]);
  });

  it('should reject an invalid window start', () => {
    expect(() => alignForecast({}, '15/01/2025')).toThrow('Invalid forecast window start: 15/01/2025');
  });
});
