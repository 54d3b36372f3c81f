import type { IsoDate } from '../utils/dates.js';

export type { IsoDate };

/** `HH:MM` or `HH:MM:SS`, 24-hour local wall clock. */
export type TimeOfDay = string;

export interface TimeInterval {
  start: TimeOfDay;
  end: TimeOfDay;
}

/** One logged night, attributed to the evening it started on. */
export interface DiaryEntry {
  logDate: IsoDate;
  bedtime?: TimeOfDay;
  lightsOff?: TimeOfDay;
  sleepOnset?: TimeOfDay;
  finalWake?: TimeOfDay;
  riseTime?: TimeOfDay;
  /** Ordered, within [sleepOnset, finalWake]. */
  awakenings: TimeInterval[];
  /** Ordered and disjoint, on the plain clock of the associated calendar date. */
  naps: TimeInterval[];
  notes?: string;
}

export const NIGHT_TIMESTAMP_FIELDS = ['bedtime', 'lightsOff', 'sleepOnset', 'finalWake', 'riseTime'] as const;

export type NightTimestampField = (typeof NIGHT_TIMESTAMP_FIELDS)[number];

/** All durations in minutes; sleepEfficiency in percent. */
export interface NightMetrics {
  timeInBed: number;
  waso: number;
  totalSleepTime: number;
  sleepEfficiency: number;
  sleepOnsetLatency: number;
  awakeningCount: number;
  napTotal: number;
}

export type IncompleteReason = 'missing-timestamps' | 'zero-time-in-bed';

export type NightResult =
  | { status: 'complete'; logDate: IsoDate; metrics: NightMetrics }
  | {
      status: 'incomplete';
      logDate: IsoDate;
      reason: IncompleteReason;
      missing: NightTimestampField[];
      napTotal: number;
    };

export interface SleepWindow {
  targetWakeTime: TimeOfDay;
  durationMinutes: number;
}

export type AdjustmentDirection = 'increase' | 'decrease';

export type RecordRationale = 'initial' | 'manual-edit' | AdjustmentDirection;

export interface WindowHistoryRecord {
  effectiveFrom: IsoDate;
  window: SleepWindow;
  rationale: RecordRationale;
}

export interface DiaryProfile {
  name: string;
  createdOn: IsoDate;
}

/** What the persistence collaborator loads and saves as one unit. */
export interface DiarySnapshot {
  profile: DiaryProfile;
  entries: DiaryEntry[];
  history: WindowHistoryRecord[];
}
