import {
  NIGHT_TIMESTAMP_FIELDS,
  type DiaryEntry,
  type NightResult,
  type NightTimestampField,
  type TimeInterval,
} from '../types.js';
import { normalizeTimeOfDay, parseTimeOfDay } from '../sleepDay/normalizer.js';
import { assertIsoDate } from '../../utils/dates.js';
import { ValidationError } from '../../utils/errors.js';

type NormalizedTimestamps = Record<NightTimestampField, number>;

interface Span {
  start: number;
  end: number;
}

/**
 * Derives TIB, WASO, TST and SE for one diary entry. Pure; throws
 * ValidationError for out-of-order timestamps or misplaced intervals, and
 * returns an `incomplete` result (never SE = 0) when the night cannot be
 * measured.
 */
export function computeNightMetrics(entry: DiaryEntry): NightResult {
  const logDate = assertIsoDate(entry.logDate, 'logDate');
  const napTotal = sumNaps(entry.naps);

  const missing = NIGHT_TIMESTAMP_FIELDS.filter((field) => entry[field] === undefined);
  if (missing.length > 0) {
    // Present fields must still parse and keep their order; awakenings cannot be placed yet
    assertTimestampOrder(normalizePresentTimestamps(entry));
    for (const [i, interval] of entry.awakenings.entries()) {
      parseTimeOfDay(interval.start, `awakenings[${i}].start`);
      parseTimeOfDay(interval.end, `awakenings[${i}].end`);
    }
    return { status: 'incomplete', logDate, reason: 'missing-timestamps', missing, napTotal };
  }

  const t = normalizeTimestamps(entry);
  assertTimestampOrder(t);

  const waso = sumAwakenings(entry.awakenings, t.sleepOnset, t.finalWake);
  const timeInBed = t.riseTime - t.bedtime;
  if (timeInBed <= 0) {
    return { status: 'incomplete', logDate, reason: 'zero-time-in-bed', missing: [], napTotal };
  }

  const totalSleepTime = Math.max(0, t.finalWake - t.sleepOnset - waso);

  return {
    status: 'complete',
    logDate,
    metrics: {
      timeInBed,
      waso,
      totalSleepTime,
      sleepEfficiency: (100 * totalSleepTime) / timeInBed,
      sleepOnsetLatency: t.sleepOnset - t.lightsOff,
      awakeningCount: entry.awakenings.length,
      napTotal,
    },
  };
}

function normalizeTimestamps(entry: DiaryEntry): NormalizedTimestamps {
  const read = (field: NightTimestampField): number => {
    const value = entry[field];
    if (value === undefined) {
      throw new ValidationError(`${field} is required`);
    }
    return normalizeTimeOfDay(value, field);
  };
  return {
    bedtime: read('bedtime'),
    lightsOff: read('lightsOff'),
    sleepOnset: read('sleepOnset'),
    finalWake: read('finalWake'),
    riseTime: read('riseTime'),
  };
}

function normalizePresentTimestamps(entry: DiaryEntry): Partial<NormalizedTimestamps> {
  const t: Partial<NormalizedTimestamps> = {};
  for (const field of NIGHT_TIMESTAMP_FIELDS) {
    const value = entry[field];
    if (value !== undefined) {
      t[field] = normalizeTimeOfDay(value, field);
    }
  }
  return t;
}

/** Compares each recorded timestamp with the nearest recorded one before it. */
function assertTimestampOrder(t: Partial<NormalizedTimestamps>): void {
  const issues: string[] = [];
  let previous: { field: NightTimestampField; value: number } | undefined;
  for (const field of NIGHT_TIMESTAMP_FIELDS) {
    const value = t[field];
    if (value === undefined) continue;
    if (previous && previous.value > value) {
      issues.push(`${previous.field} must not be later than ${field}`);
    }
    previous = { field, value };
  }
  if (issues.length > 0) {
    throw new ValidationError('Diary timestamps are out of order', issues);
  }
}

function sumAwakenings(awakenings: TimeInterval[], sleepOnset: number, finalWake: number): number {
  const spans = awakenings.map((interval, i): Span => ({
    start: normalizeTimeOfDay(interval.start, `awakenings[${i}].start`),
    end: normalizeTimeOfDay(interval.end, `awakenings[${i}].end`),
  }));

  const issues: string[] = [];
  spans.forEach((span, i) => {
    if (span.end <= span.start) {
      issues.push(`awakenings[${i}] must end after it starts`);
    }
    if (span.start < sleepOnset || span.end > finalWake) {
      issues.push(`awakenings[${i}] must lie between sleepOnset and finalWake`);
    }
    const previous = spans[i - 1];
    if (previous && span.start < previous.end) {
      issues.push(`awakenings[${i}] overlaps or precedes awakenings[${i - 1}]`);
    }
  });
  if (issues.length > 0) {
    throw new ValidationError('Nightly awakenings are invalid', issues);
  }

  return spans.reduce(
    (sum, span) => sum + Math.max(0, Math.min(span.end, finalWake) - Math.max(span.start, sleepOnset)),
    0
  );
}

function sumNaps(naps: TimeInterval[]): number {
  const spans = naps.map((interval, i): Span => ({
    start: parseTimeOfDay(interval.start, `naps[${i}].start`),
    end: parseTimeOfDay(interval.end, `naps[${i}].end`),
  }));

  const issues: string[] = [];
  spans.forEach((span, i) => {
    if (span.end <= span.start) {
      issues.push(`naps[${i}] must end after it starts on the same day`);
    }
    const previous = spans[i - 1];
    if (previous && span.start < previous.end) {
      issues.push(`naps[${i}] overlaps or precedes naps[${i - 1}]`);
    }
  });
  if (issues.length > 0) {
    throw new ValidationError('Daytime naps are invalid', issues);
  }

  return spans.reduce((sum, span) => sum + (span.end - span.start), 0);
}
