import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const timeOfDay = z.string().regex(/^([01][0-9]|2[0-3]):[0-5][0-9]$/, 'must be HH:MM');

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const configSchema = z.object({
  // Storage
  storeDriver: z.enum(['sqlite', 'json']).default('sqlite'),
  databasePath: z.string().optional(),
  diaryFilePath: z.string().optional(),
  diaryOwnerName: z.string().default(''),

  // Analysis
  rollingWindowDays: z.coerce.number().int().min(1).max(28).default(7),
  minNightsForAdvice: z.coerce.number().int().min(1).max(28).default(1),
  adherenceToleranceMinutes: z.coerce.number().int().min(0).max(180).default(30),

  // Initial prescription for a fresh diary
  initialTargetWake: timeOfDay.default('07:00'),
  initialWindowMinutes: z.coerce
    .number()
    .int()
    .min(300)
    .refine((minutes) => minutes % 15 === 0, 'must be a multiple of 15 minutes')
    .default(360),

  // Weekly review
  reviewTime: timeOfDay.default('08:00'),
  reviewWeekday: z.coerce.number().int().min(0).max(6).default(1),
  autoApplyAdjustments: booleanFlag,
  timezone: z.string().default('UTC'),

  // App
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  host: z.string().default('0.0.0.0'),
  port: z.coerce.number().int().positive().default(5000),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Empty strings in .env mean "use the default"
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    storeDriver: env('STORE_DRIVER'),
    databasePath: env('DATABASE_PATH'),
    diaryFilePath: env('DIARY_FILE_PATH'),
    diaryOwnerName: env('DIARY_OWNER_NAME'),
    rollingWindowDays: env('ROLLING_WINDOW_DAYS'),
    minNightsForAdvice: env('MIN_NIGHTS_FOR_ADVICE'),
    adherenceToleranceMinutes: env('ADHERENCE_TOLERANCE_MINUTES'),
    initialTargetWake: env('INITIAL_TARGET_WAKE'),
    initialWindowMinutes: env('INITIAL_WINDOW_MINUTES'),
    reviewTime: env('REVIEW_TIME'),
    reviewWeekday: env('REVIEW_WEEKDAY'),
    autoApplyAdjustments: env('AUTO_APPLY_ADJUSTMENTS'),
    timezone: env('TIMEZONE'),
    logLevel: env('LOG_LEVEL'),
    host: env('HOST'),
    port: env('PORT'),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`);
  }
  return result.data;
}

export const config = loadConfig();
