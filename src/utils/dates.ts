import { addDays, differenceInCalendarDays, format, isValid, parse } from 'date-fns';
import { ValidationError } from './errors.js';

/** Calendar date as `YYYY-MM-DD`, local wall clock, no timezone. */
export type IsoDate = string;

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const ISO_DATE_FORMAT = 'yyyy-MM-dd';
// Fixed reference so parsing never depends on the current day
const REFERENCE_DATE = new Date(2000, 0, 1);

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE_PATTERN.test(value)) return false;
  const parsed = parse(value, ISO_DATE_FORMAT, REFERENCE_DATE);
  // Round-trip rejects out-of-range days such as 2026-02-30
  return isValid(parsed) && format(parsed, ISO_DATE_FORMAT) === value;
}

export function assertIsoDate(value: string, field = 'date'): IsoDate {
  if (!isIsoDate(value)) {
    throw new ValidationError(`${field} must be a calendar date in YYYY-MM-DD form, got "${value}"`);
  }
  return value;
}

function toDate(value: IsoDate): Date {
  return parse(assertIsoDate(value), ISO_DATE_FORMAT, REFERENCE_DATE);
}

export function shiftIsoDate(value: IsoDate, days: number): IsoDate {
  return format(addDays(toDate(value), days), ISO_DATE_FORMAT);
}

export function daysBetween(from: IsoDate, to: IsoDate): number {
  return differenceInCalendarDays(toDate(to), toDate(from));
}

/** Inclusive list of dates from `from` to `to`; empty when `to` precedes `from`. */
export function eachIsoDate(from: IsoDate, to: IsoDate): IsoDate[] {
  const span = daysBetween(from, to);
  const dates: IsoDate[] = [];
  for (let i = 0; i <= span; i += 1) {
    dates.push(shiftIsoDate(from, i));
  }
  return dates;
}

export function todayIsoDate(now: Date = new Date()): IsoDate {
  return format(now, ISO_DATE_FORMAT);
}

/** ISO dates sort lexicographically in calendar order. */
export function compareIsoDates(a: IsoDate, b: IsoDate): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
