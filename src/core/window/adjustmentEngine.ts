import type { SleepWindow } from '../types.js';
import type { RollingSummary } from '../metrics/rollingAggregator.js';
import { MAX_WINDOW_MINUTES, MIN_WINDOW_MINUTES, WINDOW_STEP_MINUTES } from './sleepWindow.js';

/** Above this rolling SE the window grows. */
export const SE_INCREASE_THRESHOLD = 85;
/** Below this rolling SE the window shrinks. */
export const SE_DECREASE_THRESHOLD = 80;

export type AdjustmentRationale =
  | 'increase'
  | 'decrease'
  | 'no-change'
  | 'no-change-at-minimum'
  | 'no-change-at-maximum'
  | 'insufficient-data';

export const RATIONALE_LABELS: Record<AdjustmentRationale, string> = {
  increase: `Sleep efficiency above ${SE_INCREASE_THRESHOLD}%: extend the window by ${WINDOW_STEP_MINUTES} minutes`,
  decrease: `Sleep efficiency below ${SE_DECREASE_THRESHOLD}%: shorten the window by ${WINDOW_STEP_MINUTES} minutes`,
  'no-change': `Sleep efficiency within ${SE_DECREASE_THRESHOLD}-${SE_INCREASE_THRESHOLD}%: keep the current window`,
  'no-change-at-minimum': 'Sleep efficiency is low but the window is already at the 5 hour minimum',
  'no-change-at-maximum': 'Sleep efficiency is high but the window is already at the 12 hour maximum',
  'insufficient-data': 'Not enough complete nights logged to recommend a change',
};

export interface WindowProposal {
  rationale: AdjustmentRationale;
  changed: boolean;
  current: SleepWindow;
  proposed: SleepWindow;
  /** Absent when the rolling window had insufficient data. */
  averageSe?: number;
}

/**
 * Applies the CBT-i threshold rules to a rolling summary. Only the window
 * duration moves; the target wake time is carried over untouched.
 */
export function proposeWindowAdjustment(summary: RollingSummary, current: SleepWindow): WindowProposal {
  const base = { targetWakeTime: current.targetWakeTime, durationMinutes: current.durationMinutes };

  if (summary.status === 'insufficient-data') {
    return { rationale: 'insufficient-data', changed: false, current: { ...base }, proposed: { ...base } };
  }

  const averageSe = summary.averageSe;

  if (averageSe > SE_INCREASE_THRESHOLD) {
    if (base.durationMinutes >= MAX_WINDOW_MINUTES) {
      return { rationale: 'no-change-at-maximum', changed: false, current: { ...base }, proposed: { ...base }, averageSe };
    }
    return {
      rationale: 'increase',
      changed: true,
      current: { ...base },
      proposed: {
        ...base,
        durationMinutes: Math.min(MAX_WINDOW_MINUTES, base.durationMinutes + WINDOW_STEP_MINUTES),
      },
      averageSe,
    };
  }

  if (averageSe < SE_DECREASE_THRESHOLD) {
    if (base.durationMinutes <= MIN_WINDOW_MINUTES) {
      return { rationale: 'no-change-at-minimum', changed: false, current: { ...base }, proposed: { ...base }, averageSe };
    }
    return {
      rationale: 'decrease',
      changed: true,
      current: { ...base },
      proposed: {
        ...base,
        durationMinutes: Math.max(MIN_WINDOW_MINUTES, base.durationMinutes - WINDOW_STEP_MINUTES),
      },
      averageSe,
    };
  }

  return { rationale: 'no-change', changed: false, current: { ...base }, proposed: { ...base }, averageSe };
}
