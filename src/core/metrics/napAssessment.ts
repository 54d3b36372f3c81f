import type { NightResult } from '../types.js';

export type NapFrequency = 'none' | 'single' | 'some' | 'frequent';
export type NapDuration = 'short' | 'moderate' | 'long';
export type NapSeverity = 'ok' | 'info' | 'warning';

export interface NapAssessment {
  daysLogged: number;
  daysWithNaps: number;
  totalNapMinutes: number;
  /** Averaged over every logged day, including days without a nap. */
  averageNapMinutesPerDay: number;
  frequency: NapFrequency;
  duration: NapDuration | null;
  severity: NapSeverity;
  messages: string[];
}

export const NAP_FREQUENCY_LABELS: Record<NapFrequency, string> = {
  none: 'No daytime sleep logged in this period.',
  single: 'One day with daytime sleep. Occasional naps can still reduce sleep pressure a little.',
  some: 'A few days with daytime sleep. This can start to weaken the effect of sleep restriction.',
  frequent: 'Daytime sleep on most days. This is likely to work against sleep restriction; avoid napping for now.',
};

export const NAP_DURATION_LABELS: Record<NapDuration, string> = {
  short: 'Average nap time is low and usually has little effect.',
  moderate: 'Average nap time may reduce sleep pressure. Keep naps under 10-15 minutes.',
  long: 'Average nap time is likely to noticeably reduce sleep pressure.',
};

export function assessNaps(nights: readonly NightResult[]): NapAssessment {
  const napTotals = nights.map((night) => (night.status === 'complete' ? night.metrics.napTotal : night.napTotal));

  const daysLogged = napTotals.length;
  const daysWithNaps = napTotals.filter((minutes) => minutes > 0).length;
  const totalNapMinutes = napTotals.reduce((sum, minutes) => sum + minutes, 0);
  const averageNapMinutesPerDay = daysLogged > 0 ? totalNapMinutes / daysLogged : 0;

  const frequency = napFrequency(daysWithNaps);
  const duration = daysWithNaps > 0 ? napDuration(averageNapMinutesPerDay) : null;

  let severity: NapSeverity = 'ok';
  if (frequency === 'frequent') {
    severity = 'warning';
  } else if (frequency !== 'none') {
    severity = duration === 'long' ? 'warning' : 'info';
  }

  return {
    daysLogged,
    daysWithNaps,
    totalNapMinutes,
    averageNapMinutesPerDay,
    frequency,
    duration,
    severity,
    messages:
      duration === null
        ? [NAP_FREQUENCY_LABELS[frequency]]
        : [NAP_FREQUENCY_LABELS[frequency], NAP_DURATION_LABELS[duration]],
  };
}

function napFrequency(daysWithNaps: number): NapFrequency {
  if (daysWithNaps === 0) return 'none';
  if (daysWithNaps === 1) return 'single';
  if (daysWithNaps <= 3) return 'some';
  return 'frequent';
}

function napDuration(averageMinutes: number): NapDuration {
  if (averageMinutes < 10) return 'short';
  if (averageMinutes < 30) return 'moderate';
  return 'long';
}
