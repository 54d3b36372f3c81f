import { describe, it, expect } from 'vitest';
import {
  assertIsoDate,
  daysBetween,
  eachIsoDate,
  isIsoDate,
  shiftIsoDate,
  todayIsoDate,
} from '../../utils/dates.js';
import { ValidationError } from '../../utils/errors.js';

describe('dates', () => {
  it('accepts real calendar dates only', () => {
    expect(isIsoDate('2024-02-29')).toBe(true);
    expect(isIsoDate('2026-02-29')).toBe(false);
    expect(isIsoDate('2026-3-01')).toBe(false);
    expect(isIsoDate('2026-03-01T00:00')).toBe(false);
  });

  it('names the field when a date is rejected', () => {
    expect(() => assertIsoDate('yesterday', 'from')).toThrow(ValidationError);
    expect(() => assertIsoDate('yesterday', 'from')).toThrow(
      'from must be a calendar date in YYYY-MM-DD form, got "yesterday"'
    );
  });

  it('shifts across month boundaries', () => {
    expect(shiftIsoDate('2026-03-31', 1)).toBe('2026-04-01');
    expect(shiftIsoDate('2026-03-01', -1)).toBe('2026-02-28');
  });

  it('counts calendar days between dates', () => {
    expect(daysBetween('2026-03-01', '2026-03-08')).toBe(7);
    expect(daysBetween('2026-03-08', '2026-03-01')).toBe(-7);
  });

  it('lists every date in an inclusive range', () => {
    expect(eachIsoDate('2026-02-27', '2026-03-02')).toEqual([
      '2026-02-27',
      '2026-02-28',
      '2026-03-01',
      '2026-03-02',
    ]);
    expect(eachIsoDate('2026-03-02', '2026-03-01')).toEqual([]);
  });

  it('formats the local date', () => {
    expect(todayIsoDate(new Date(2026, 9, 18, 12, 0))).toBe('2026-10-18');
  });
});
