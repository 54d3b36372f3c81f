import type { IsoDate, NightResult } from '../types.js';
import { assertIsoDate, compareIsoDates, shiftIsoDate } from '../../utils/dates.js';
import { ValidationError } from '../../utils/errors.js';

export const DEFAULT_ROLLING_WINDOW_DAYS = 7;

export interface RollingWindowOptions {
  /** Last date of the window, included. */
  today: IsoDate;
  days?: number;
  /** Nights before this date are ignored even when inside the window. */
  since?: IsoDate;
  /** Complete nights needed before an average is reported. */
  minNights?: number;
}

interface WindowBounds {
  windowStart: IsoDate;
  windowEnd: IsoDate;
  nightsCounted: number;
  nightsIncomplete: number;
}

export type RollingSummary =
  | (WindowBounds & {
      status: 'ok';
      averageSe: number;
      averageTst: number;
      averageTib: number;
    })
  | (WindowBounds & { status: 'insufficient-data' });

/**
 * Trailing average of sleep efficiency over the complete nights of the last
 * `days` calendar dates. Incomplete nights are skipped rather than counted as
 * zero; a window without enough complete nights yields `insufficient-data`.
 */
export function aggregateRollingWindow(nights: readonly NightResult[], options: RollingWindowOptions): RollingSummary {
  const days = options.days ?? DEFAULT_ROLLING_WINDOW_DAYS;
  if (!Number.isInteger(days) || days < 1) {
    throw new ValidationError(`Rolling window must span at least one whole day, got ${days}`);
  }
  const windowEnd = assertIsoDate(options.today, 'today');
  let windowStart = shiftIsoDate(windowEnd, -(days - 1));
  if (options.since !== undefined && compareIsoDates(assertIsoDate(options.since, 'since'), windowStart) > 0) {
    windowStart = options.since;
  }

  // One result per date; a later result for the same date replaces an earlier one
  const byDate = new Map<IsoDate, NightResult>();
  for (const night of nights) {
    if (compareIsoDates(night.logDate, windowStart) >= 0 && compareIsoDates(night.logDate, windowEnd) <= 0) {
      byDate.set(night.logDate, night);
    }
  }

  let seSum = 0;
  let tstSum = 0;
  let tibSum = 0;
  let nightsCounted = 0;
  let nightsIncomplete = 0;
  for (const night of byDate.values()) {
    if (night.status === 'incomplete') {
      nightsIncomplete += 1;
      continue;
    }
    seSum += night.metrics.sleepEfficiency;
    tstSum += night.metrics.totalSleepTime;
    tibSum += night.metrics.timeInBed;
    nightsCounted += 1;
  }

  const bounds: WindowBounds = { windowStart, windowEnd, nightsCounted, nightsIncomplete };
  const minNights = Math.max(1, options.minNights ?? 1);
  if (nightsCounted < minNights) {
    return { status: 'insufficient-data', ...bounds };
  }

  return {
    status: 'ok',
    ...bounds,
    averageSe: seSum / nightsCounted,
    averageTst: tstSum / nightsCounted,
    averageTib: tibSum / nightsCounted,
  };
}
