import { z } from 'zod';
import { isTimeOfDay } from '../core/sleepDay/normalizer.js';
import { MAX_WINDOW_MINUTES, MIN_WINDOW_MINUTES, WINDOW_STEP_MINUTES } from '../core/window/sleepWindow.js';
import { isIsoDate } from '../utils/dates.js';
import { ValidationError } from '../utils/errors.js';

export const IsoDateSchema = z.string().refine(isIsoDate, 'must be a calendar date in YYYY-MM-DD form');

export const TimeOfDaySchema = z.string().refine(isTimeOfDay, 'must be a time of day in HH:MM or HH:MM:SS form');

export const TimeIntervalSchema = z.object({
  start: TimeOfDaySchema,
  end: TimeOfDaySchema,
});

export const DiaryEntrySchema = z.object({
  logDate: IsoDateSchema,
  bedtime: TimeOfDaySchema.optional(),
  lightsOff: TimeOfDaySchema.optional(),
  sleepOnset: TimeOfDaySchema.optional(),
  finalWake: TimeOfDaySchema.optional(),
  riseTime: TimeOfDaySchema.optional(),
  awakenings: z.array(TimeIntervalSchema).default([]),
  naps: z.array(TimeIntervalSchema).default([]),
  notes: z.string().max(2000).optional(),
});

/** Entry body for `PUT /entries/:date`; the date comes from the path. */
export const DiaryEntryBodySchema = DiaryEntrySchema.omit({ logDate: true });

export const SleepWindowSchema = z.object({
  targetWakeTime: TimeOfDaySchema,
  durationMinutes: z
    .number()
    .int()
    .min(MIN_WINDOW_MINUTES)
    .max(MAX_WINDOW_MINUTES)
    .multipleOf(WINDOW_STEP_MINUTES),
});

export const RecordRationaleSchema = z.enum(['initial', 'manual-edit', 'increase', 'decrease']);

export const WindowHistoryRecordSchema = z.object({
  effectiveFrom: IsoDateSchema,
  window: SleepWindowSchema,
  rationale: RecordRationaleSchema,
});

/** Manual append from a caller: rationale defaults to a manual edit. */
export const WindowAppendSchema = z.object({
  effectiveFrom: IsoDateSchema,
  window: SleepWindowSchema,
  rationale: RecordRationaleSchema.default('manual-edit'),
});

export const DiaryProfileSchema = z.object({
  name: z.string(),
  createdOn: IsoDateSchema,
});

export const DiarySnapshotSchema = z.object({
  profile: DiaryProfileSchema,
  entries: z.array(DiaryEntrySchema),
  history: z.array(WindowHistoryRecordSchema).min(1),
});

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/** Parses `value` or throws a ValidationError carrying every zod issue. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid ${what}`, formatZodIssues(result.error));
  }
  return result.data;
}
