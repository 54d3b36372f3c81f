import { describe, it, expect } from 'vitest';
import { proposeWindowAdjustment } from '../../core/window/adjustmentEngine.js';
import type { RollingSummary } from '../../core/metrics/rollingAggregator.js';
import type { SleepWindow } from '../../core/types.js';

function summaryWithSe(averageSe: number): RollingSummary {
  return {
    status: 'ok',
    windowStart: '2026-03-01',
    windowEnd: '2026-03-07',
    nightsCounted: 7,
    nightsIncomplete: 0,
    averageSe,
    averageTst: 330,
    averageTib: 360,
  };
}

const sixHours: SleepWindow = { targetWakeTime: '07:00', durationMinutes: 360 };

describe('proposeWindowAdjustment', () => {
  it('extends the window by 15 minutes above 85%', () => {
    const proposal = proposeWindowAdjustment(summaryWithSe(86), sixHours);

    expect(proposal).toEqual({
      rationale: 'increase',
      changed: true,
      current: { targetWakeTime: '07:00', durationMinutes: 360 },
      proposed: { targetWakeTime: '07:00', durationMinutes: 375 },
      averageSe: 86,
    });
  });

  it('shortens the window by 15 minutes below 80%', () => {
    const proposal = proposeWindowAdjustment(summaryWithSe(75), sixHours);

    expect(proposal.rationale).toBe('decrease');
    expect(proposal.proposed).toEqual({ targetWakeTime: '07:00', durationMinutes: 345 });
  });

  it('never goes below the five hour floor', () => {
    const proposal = proposeWindowAdjustment(summaryWithSe(75), { targetWakeTime: '06:30', durationMinutes: 300 });

    expect(proposal.rationale).toBe('no-change-at-minimum');
    expect(proposal.changed).toBe(false);
    expect(proposal.proposed.durationMinutes).toBe(300);
  });

  it('never goes above the twelve hour ceiling', () => {
    const proposal = proposeWindowAdjustment(summaryWithSe(95), { targetWakeTime: '07:00', durationMinutes: 720 });

    expect(proposal.rationale).toBe('no-change-at-maximum');
    expect(proposal.changed).toBe(false);
    expect(proposal.proposed.durationMinutes).toBe(720);
  });

  it('still extends a window one step below the ceiling', () => {
    const proposal = proposeWindowAdjustment(summaryWithSe(95), { targetWakeTime: '07:00', durationMinutes: 705 });

    expect(proposal.rationale).toBe('increase');
    expect(proposal.proposed.durationMinutes).toBe(720);
  });

  it('keeps the window between the thresholds', () => {
    expect(proposeWindowAdjustment(summaryWithSe(82), sixHours).rationale).toBe('no-change');
  });

  it('treats the thresholds themselves as no change', () => {
    expect(proposeWindowAdjustment(summaryWithSe(85), sixHours).rationale).toBe('no-change');
    expect(proposeWindowAdjustment(summaryWithSe(80), sixHours).rationale).toBe('no-change');
  });

  it('makes no recommendation without data', () => {
    const proposal = proposeWindowAdjustment(
      {
        status: 'insufficient-data',
        windowStart: '2026-03-01',
        windowEnd: '2026-03-07',
        nightsCounted: 0,
        nightsIncomplete: 3,
      },
      sixHours
    );

    expect(proposal.rationale).toBe('insufficient-data');
    expect(proposal.changed).toBe(false);
    expect(proposal).not.toHaveProperty('averageSe');
  });

  it('returns the same proposal for the same inputs and leaves the input alone', () => {
    const current: SleepWindow = { targetWakeTime: '07:00', durationMinutes: 360 };

    const first = proposeWindowAdjustment(summaryWithSe(90), current);
    const second = proposeWindowAdjustment(summaryWithSe(90), current);
    first.proposed.durationMinutes = 999;

    expect(second.proposed.durationMinutes).toBe(375);
    expect(current).toEqual({ targetWakeTime: '07:00', durationMinutes: 360 });
  });
});
