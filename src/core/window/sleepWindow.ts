import type { SleepWindow, TimeOfDay } from '../types.js';
import { formatMinutesOfDay, isTimeOfDay, parseTimeOfDay } from '../sleepDay/normalizer.js';
import { ValidationError } from '../../utils/errors.js';

export const MIN_WINDOW_MINUTES = 5 * 60;
export const MAX_WINDOW_MINUTES = 12 * 60;
export const WINDOW_STEP_MINUTES = 15;

export function sleepWindowIssues(window: SleepWindow): string[] {
  const issues: string[] = [];
  if (!isTimeOfDay(window.targetWakeTime)) {
    issues.push(`targetWakeTime must be HH:MM or HH:MM:SS, got "${window.targetWakeTime}"`);
  }
  const { durationMinutes } = window;
  if (!Number.isInteger(durationMinutes) || durationMinutes % WINDOW_STEP_MINUTES !== 0) {
    issues.push(`durationMinutes must be a whole multiple of ${WINDOW_STEP_MINUTES}, got ${durationMinutes}`);
  }
  if (durationMinutes < MIN_WINDOW_MINUTES) {
    issues.push(`durationMinutes must be at least ${MIN_WINDOW_MINUTES}, got ${durationMinutes}`);
  }
  if (durationMinutes > MAX_WINDOW_MINUTES) {
    issues.push(`durationMinutes must be at most ${MAX_WINDOW_MINUTES}, got ${durationMinutes}`);
  }
  return issues;
}

export function validateSleepWindow(window: SleepWindow): SleepWindow {
  const issues = sleepWindowIssues(window);
  if (issues.length > 0) {
    throw new ValidationError('Sleep window is invalid', issues);
  }
  return window;
}

/** Target wake time minus the window duration, as a wall-clock time. */
export function prescribedBedtime(window: SleepWindow): TimeOfDay {
  return formatMinutesOfDay(parseTimeOfDay(window.targetWakeTime, 'targetWakeTime') - window.durationMinutes);
}
