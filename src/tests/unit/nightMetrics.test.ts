import { describe, it, expect } from 'vitest';
import { computeNightMetrics } from '../../core/metrics/nightMetrics.js';
import type { DiaryEntry } from '../../core/types.js';
import { ValidationError } from '../../utils/errors.js';

function entry(overrides: Partial<DiaryEntry> = {}): DiaryEntry {
  return {
    logDate: '2026-03-01',
    bedtime: '22:00',
    lightsOff: '22:00',
    sleepOnset: '22:30',
    finalWake: '06:30',
    riseTime: '07:00',
    awakenings: [],
    naps: [],
    ...overrides,
  };
}

function captureValidation(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('computeNightMetrics', () => {
  it('measures a plain night', () => {
    const result = computeNightMetrics(entry());

    expect(result.status).toBe('complete');
    if (result.status !== 'complete') return;
    expect(result.metrics.timeInBed).toBe(540);
    expect(result.metrics.totalSleepTime).toBe(480);
    expect(result.metrics.sleepEfficiency).toBeCloseTo(88.889, 3);
    expect(result.metrics.sleepOnsetLatency).toBe(30);
    expect(result.metrics.waso).toBe(0);
  });

  it('subtracts awakenings from total sleep time', () => {
    const result = computeNightMetrics(
      entry({
        awakenings: [
          { start: '02:00', end: '02:20' },
          { start: '04:00', end: '04:10' },
        ],
      })
    );

    expect(result.status).toBe('complete');
    if (result.status !== 'complete') return;
    expect(result.metrics.waso).toBe(30);
    expect(result.metrics.totalSleepTime).toBe(450);
    expect(result.metrics.sleepEfficiency).toBeCloseTo(83.333, 3);
    expect(result.metrics.awakeningCount).toBe(2);
  });

  it('handles a night that starts after midnight', () => {
    const result = computeNightMetrics(
      entry({ bedtime: '23:30', lightsOff: '23:45', sleepOnset: '00:15', finalWake: '06:00', riseTime: '06:15' })
    );

    expect(result.status).toBe('complete');
    if (result.status !== 'complete') return;
    expect(result.metrics.timeInBed).toBe(405);
    expect(result.metrics.totalSleepTime).toBe(345);
    expect(result.metrics.sleepOnsetLatency).toBe(30);
  });

  it('reports missing timestamps instead of a zero efficiency', () => {
    const result = computeNightMetrics(entry({ riseTime: undefined }));

    expect(result).toEqual({
      status: 'incomplete',
      logDate: '2026-03-01',
      reason: 'missing-timestamps',
      missing: ['riseTime'],
      napTotal: 0,
    });
  });

  it('lists every missing timestamp in diary order', () => {
    const result = computeNightMetrics({ logDate: '2026-03-01', awakenings: [], naps: [] });

    expect(result.status).toBe('incomplete');
    if (result.status !== 'incomplete') return;
    expect(result.missing).toEqual(['bedtime', 'lightsOff', 'sleepOnset', 'finalWake', 'riseTime']);
  });

  it('marks a night with no time in bed as incomplete', () => {
    const result = computeNightMetrics(
      entry({ bedtime: '23:00', lightsOff: '23:00', sleepOnset: '23:00', finalWake: '23:00', riseTime: '23:00' })
    );

    expect(result).toEqual({
      status: 'incomplete',
      logDate: '2026-03-01',
      reason: 'zero-time-in-bed',
      missing: [],
      napTotal: 0,
    });
  });

  it('adds up daytime naps on both complete and incomplete nights', () => {
    const naps = [
      { start: '13:00', end: '13:20' },
      { start: '16:00', end: '16:15' },
    ];

    const complete = computeNightMetrics(entry({ naps }));
    const incomplete = computeNightMetrics(entry({ naps, finalWake: undefined }));

    expect(complete.status === 'complete' && complete.metrics.napTotal).toBe(35);
    expect(incomplete.status === 'incomplete' && incomplete.napTotal).toBe(35);
  });

  it('rejects out-of-order timestamps', () => {
    const error = captureValidation(() => computeNightMetrics(entry({ sleepOnset: '21:50' })));

    expect(error.message).toBe('Diary timestamps are out of order');
    expect(error.issues).toEqual(['lightsOff must not be later than sleepOnset']);
  });

  it('rejects awakenings outside the sleep period', () => {
    const error = captureValidation(() =>
      computeNightMetrics(entry({ awakenings: [{ start: '06:40', end: '06:50' }] }))
    );

    expect(error.message).toBe('Nightly awakenings are invalid');
    expect(error.issues).toEqual(['awakenings[0] must lie between sleepOnset and finalWake']);
  });

  it('rejects overlapping awakenings', () => {
    const error = captureValidation(() =>
      computeNightMetrics(
        entry({
          awakenings: [
            { start: '02:00', end: '02:30' },
            { start: '02:20', end: '02:40' },
          ],
        })
      )
    );

    expect(error.issues).toEqual(['awakenings[1] overlaps or precedes awakenings[0]']);
  });

  it('rejects a nap that crosses midnight', () => {
    const error = captureValidation(() => computeNightMetrics(entry({ naps: [{ start: '23:50', end: '00:20' }] })));

    expect(error.message).toBe('Daytime naps are invalid');
    expect(error.issues).toEqual(['naps[0] must end after it starts on the same day']);
  });

  it('still rejects malformed awakening times on an incomplete night', () => {
    expect(() =>
      computeNightMetrics(entry({ riseTime: undefined, awakenings: [{ start: '2:00', end: '02:10' }] }))
    ).toThrow(ValidationError);
  });

  it('rejects a malformed timestamp on an incomplete night', () => {
    const error = captureValidation(() =>
      computeNightMetrics({ logDate: '2026-03-02', bedtime: '99:99', riseTime: '07:00', awakenings: [], naps: [] })
    );

    expect(error.message).toBe('bedtime must be a time of day in HH:MM or HH:MM:SS form, got "99:99"');
  });

  it('checks the order of the timestamps an incomplete night does have', () => {
    const error = captureValidation(() =>
      computeNightMetrics({
        logDate: '2026-03-02',
        bedtime: '23:00',
        lightsOff: '22:00',
        sleepOnset: '21:00',
        awakenings: [],
        naps: [],
      })
    );

    expect(error.message).toBe('Diary timestamps are out of order');
    expect(error.issues).toEqual([
      'bedtime must not be later than lightsOff',
      'lightsOff must not be later than sleepOnset',
    ]);
  });

  it('compares across a missing timestamp', () => {
    const error = captureValidation(() => computeNightMetrics(entry({ bedtime: '23:00', lightsOff: undefined })));

    expect(error.issues).toEqual(['bedtime must not be later than sleepOnset']);
  });

  it('rejects an invalid log date', () => {
    expect(() => computeNightMetrics(entry({ logDate: '2026-02-30' }))).toThrow(
      'logDate must be a calendar date in YYYY-MM-DD form, got "2026-02-30"'
    );
  });
});
