import type { DiaryEntry, IsoDate, SleepWindow } from '../types.js';
import { MINUTES_PER_DAY, SLEEP_DAY_PIVOT_MINUTES, normalizeTimeOfDay, parseTimeOfDay } from '../sleepDay/normalizer.js';

export const DEFAULT_ADHERENCE_TOLERANCE_MINUTES = 30;

export interface NightAdherence {
  logDate: IsoDate;
  window: SleepWindow;
  /** Actual minus prescribed, in minutes; positive means later than planned. */
  bedtimeDeviation: number;
  riseDeviation: number;
  adherent: boolean;
}

export type AdherenceBand = 'high' | 'partial' | 'low' | 'no-data';

export interface AdherenceSummary {
  nights: NightAdherence[];
  adherentNights: number;
  nightsChecked: number;
  rate: number | null;
  band: AdherenceBand;
}

/**
 * Did the sleeper go to bed and get up within `toleranceMinutes` of the
 * window prescribed for each night? Only timing counts here, not how long
 * they slept. Entries without both bedtime and riseTime are skipped.
 */
export function assessAdherence(
  entries: readonly DiaryEntry[],
  windowFor: (date: IsoDate) => SleepWindow,
  toleranceMinutes: number = DEFAULT_ADHERENCE_TOLERANCE_MINUTES
): AdherenceSummary {
  const nights: NightAdherence[] = [];

  for (const entry of entries) {
    if (entry.bedtime === undefined || entry.riseTime === undefined) continue;
    const window = windowFor(entry.logDate);

    // The target wake time always falls on the morning after the log date
    const plannedRise = parseTimeOfDay(window.targetWakeTime) + MINUTES_PER_DAY - SLEEP_DAY_PIVOT_MINUTES;
    const plannedBed = plannedRise - window.durationMinutes;

    const bedtimeDeviation = normalizeTimeOfDay(entry.bedtime, 'bedtime') - plannedBed;
    const riseDeviation = normalizeTimeOfDay(entry.riseTime, 'riseTime') - plannedRise;

    nights.push({
      logDate: entry.logDate,
      window,
      bedtimeDeviation,
      riseDeviation,
      adherent: Math.abs(bedtimeDeviation) <= toleranceMinutes && Math.abs(riseDeviation) <= toleranceMinutes,
    });
  }

  const adherentNights = nights.filter((night) => night.adherent).length;
  const nightsChecked = nights.length;
  const rate = nightsChecked > 0 ? adherentNights / nightsChecked : null;

  return { nights, adherentNights, nightsChecked, rate, band: adherenceBand(rate) };
}

function adherenceBand(rate: number | null): AdherenceBand {
  if (rate === null) return 'no-data';
  // 0.7 is roughly five nights out of seven
  if (rate >= 0.7) return 'high';
  if (rate < 0.3) return 'low';
  return 'partial';
}
