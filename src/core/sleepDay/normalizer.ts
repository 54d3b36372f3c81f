import type { IsoDate, TimeOfDay } from '../types.js';
import { shiftIsoDate } from '../../utils/dates.js';
import { ValidationError } from '../../utils/errors.js';

export const MINUTES_PER_DAY = 24 * 60;

/** Clock time at which one sleep day ends and the next begins. */
export const SLEEP_DAY_PIVOT_MINUTES = 18 * 60;

const TIME_PATTERN = /^(\d{2}):(\d{2})(?::(\d{2}))?$/;

export function isTimeOfDay(value: string): boolean {
  const match = TIME_PATTERN.exec(value);
  if (!match) return false;
  const [, h, m, s] = match;
  return Number(h) < 24 && Number(m) < 60 && (s === undefined || Number(s) < 60);
}

/** Minutes since midnight; seconds become a fraction of a minute. */
export function parseTimeOfDay(value: TimeOfDay, field = 'time'): number {
  const match = TIME_PATTERN.exec(value);
  if (!match || !isTimeOfDay(value)) {
    throw new ValidationError(`${field} must be a time of day in HH:MM or HH:MM:SS form, got "${value}"`);
  }
  const [, h, m, s] = match;
  return Number(h) * 60 + Number(m) + Number(s ?? 0) / 60;
}

/**
 * Position of a clock time on the sleep-day axis, in minutes. 18:00 maps to 0;
 * anything earlier than 18:00 is read as belonging to the following calendar
 * day, so 06:30 maps to 750 and 17:59 to 1439.
 */
export function normalizeTimeOfDay(value: TimeOfDay, field?: string): number {
  return toSleepDayOffset(parseTimeOfDay(value, field));
}

export function toSleepDayOffset(minutesOfDay: number): number {
  return (minutesOfDay - SLEEP_DAY_PIVOT_MINUTES + MINUTES_PER_DAY) % MINUTES_PER_DAY;
}

export function formatSleepDayOffset(offset: number): TimeOfDay {
  const minutesOfDay = (Math.round(offset) + SLEEP_DAY_PIVOT_MINUTES) % MINUTES_PER_DAY;
  return formatMinutesOfDay(minutesOfDay);
}

export function formatMinutesOfDay(minutesOfDay: number): TimeOfDay {
  const wrapped = ((Math.round(minutesOfDay) % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  const h = Math.floor(wrapped / 60);
  const m = wrapped % 60;
  return `${String(h).padStart(2, '0')}:${String(m).padStart(2, '0')}`;
}

/** Absolute local date-time (`YYYY-MM-DDTHH:MM:SS`) of a diary time for display. */
export function toSleepDayDateTime(logDate: IsoDate, value: TimeOfDay): string {
  const minutesOfDay = parseTimeOfDay(value);
  const calendarDate = minutesOfDay >= SLEEP_DAY_PIVOT_MINUTES ? logDate : shiftIsoDate(logDate, 1);
  const clock = value.length === 5 ? `${value}:00` : value;
  return `${calendarDate}T${clock}`;
}
