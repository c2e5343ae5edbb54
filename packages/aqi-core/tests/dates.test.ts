import { describe, it, expect } from 'vitest';
import {
  addDays,
  normalizeCalendarDate,
  parseCalendarDate,
  startOfUtcDay,
  toCalendarDate,
  weekdayNames,
} from '../src/dates.js';

describe('calendar helpers', () => {
  it('should format the UTC day of an instant', () => {
    expect(toCalendarDate(Date.parse('2025-01-15T23:59:59.999Z'))).toBe('2025-01-15');
    expect(toCalendarDate(Date.parse('2025-01-16T00:00:00Z'))).toBe('2025-01-16');
  });

  it('should parse real days and reject rollovers', () => {
    expect(parseCalendarDate('2025-01-15')).toBe(Date.parse('2025-01-15T00:00:00Z'));
    expect(parseCalendarDate('2024-02-29')).toBe(Date.parse('2024-02-29T00:00:00Z'));
    expect(parseCalendarDate('2025-02-29')).toBeNull();
    expect(parseCalendarDate('yesterday')).toBeNull();
  });

  it('should normalize day strings with a time part', () => {
    expect(normalizeCalendarDate('2025-01-15T08:30:00+01:00')).toBe('2025-01-15');
  });

  it('should shift across month and year ends', () => {
    expect(addDays('2025-01-01', -1)).toBe('2024-12-31');
    expect(addDays('2025-02-27', 2)).toBe('2025-03-01');
    expect(() => addDays('bad', 1)).toThrow('Invalid calendar date: bad');
  });

  it('should truncate to the start of the UTC day', () => {
    expect(startOfUtcDay(Date.parse('2025-01-15T17:45:00Z'))).toBe(Date.parse('2025-01-15T00:00:00Z'));
  });

  it('should name weekdays in English', () => {
    expect(weekdayNames(Date.parse('2025-01-15T00:00:00Z'))).toEqual({ long: 'Wednesday', short: 'Wed' });
    expect(weekdayNames(Date.parse('2025-01-12T00:00:00Z'))).toEqual({ long: 'Sunday', short: 'Sun' });
  });
});
