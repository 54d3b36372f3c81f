import { describe, it, expect } from 'vitest';
import {
  formatSleepDayOffset,
  normalizeTimeOfDay,
  parseTimeOfDay,
  toSleepDayDateTime,
} from '../../core/sleepDay/normalizer.js';
import { ValidationError } from '../../utils/errors.js';

describe('normalizer', () => {
  it('places 18:00 at the start of the sleep day', () => {
    expect(normalizeTimeOfDay('18:00')).toBe(0);
    expect(normalizeTimeOfDay('23:00')).toBe(300);
  });

  it('reads times before 18:00 as the following morning', () => {
    expect(normalizeTimeOfDay('00:00')).toBe(360);
    expect(normalizeTimeOfDay('06:30')).toBe(750);
    expect(normalizeTimeOfDay('17:59')).toBe(1439);
  });

  it('keeps seconds as a fraction of a minute', () => {
    expect(parseTimeOfDay('07:30:30')).toBe(450.5);
  });

  it('rejects malformed times with the field name', () => {
    expect(() => parseTimeOfDay('7:30', 'bedtime')).toThrow(ValidationError);
    expect(() => parseTimeOfDay('24:00', 'bedtime')).toThrow(
      'bedtime must be a time of day in HH:MM or HH:MM:SS form, got "24:00"'
    );
  });

  it('formats an offset back to a clock time', () => {
    expect(formatSleepDayOffset(750)).toBe('06:30');
    expect(formatSleepDayOffset(0)).toBe('18:00');
  });

  it('resolves diary times to absolute date-times', () => {
    expect(toSleepDayDateTime('2026-03-01', '23:15')).toBe('2026-03-01T23:15:00');
    expect(toSleepDayDateTime('2026-03-01', '06:30')).toBe('2026-03-02T06:30:00');
    expect(toSleepDayDateTime('2026-02-28', '00:10:05')).toBe('2026-03-01T00:10:05');
  });
});
