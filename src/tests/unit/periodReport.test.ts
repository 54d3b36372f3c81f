import { describe, it, expect } from 'vitest';
import { buildPeriodReport, renderPeriodReportText } from '../../core/report/periodReport.js';
import type { DiaryEntry, SleepWindow } from '../../core/types.js';
import { ValidationError } from '../../utils/errors.js';

const window: SleepWindow = { targetWakeTime: '07:00', durationMinutes: 360 };

const entries: DiaryEntry[] = [
  {
    logDate: '2026-03-02',
    bedtime: '22:00',
    lightsOff: '22:10',
    sleepOnset: '22:40',
    finalWake: '06:30',
    awakenings: [],
    naps: [{ start: '13:00', end: '13:20' }],
  },
  {
    logDate: '2026-03-01',
    bedtime: '22:00',
    lightsOff: '22:00',
    sleepOnset: '22:30',
    finalWake: '06:30',
    riseTime: '07:00',
    awakenings: [],
    naps: [],
  },
  {
    logDate: '2026-02-20',
    bedtime: '22:00',
    lightsOff: '22:00',
    sleepOnset: '22:30',
    finalWake: '06:30',
    riseTime: '07:00',
    awakenings: [],
    naps: [],
  },
];

describe('buildPeriodReport', () => {
  it('collects the nights in the period in date order', () => {
    const report = buildPeriodReport(entries, () => window, { from: '2026-03-01', to: '2026-03-02' });

    expect(report.rows.map((row) => row.logDate)).toEqual(['2026-03-01', '2026-03-02']);
    expect(report.nightsLogged).toBe(2);
    expect(report.nightsComplete).toBe(1);
    expect(report.rows[0]?.prescribedBedtime).toBe('01:00');
  });

  it('averages only the complete nights', () => {
    const report = buildPeriodReport(entries, () => window, { from: '2026-03-01', to: '2026-03-02' });

    expect(report.averages?.totalSleepTime).toBe(480);
    expect(report.averages?.timeInBed).toBe(540);
    expect(report.averages?.sleepEfficiency).toBeCloseTo(88.889, 3);
    expect(report.averages?.napTotal).toBe(0);
  });

  it('gives chart bars on the sleep-day axis for complete nights', () => {
    const report = buildPeriodReport(entries, () => window, { from: '2026-03-01', to: '2026-03-02' });

    expect(report.rows[0]?.bars).toEqual({ inBed: [240, 780], asleep: [270, 750], awakenings: [] });
    expect(report.rows[1]?.bars).toBeNull();
  });

  it('has no averages when nothing is complete', () => {
    const report = buildPeriodReport(entries, () => window, { from: '2026-03-02', to: '2026-03-05' });

    expect(report.averages).toBeNull();
  });

  it('rejects a period that ends before it starts', () => {
    expect(() => buildPeriodReport(entries, () => window, { from: '2026-03-05', to: '2026-03-01' })).toThrow(
      ValidationError
    );
  });
});

describe('renderPeriodReportText', () => {
  it('renders the summary and a fixed-width table', () => {
    const report = buildPeriodReport(entries, () => window, { from: '2026-03-01', to: '2026-03-02' });

    expect(renderPeriodReportText(report).split('\n')).toEqual([
      'Sleep diary report 2026-03-01 to 2026-03-02',
      'Nights logged: 2 (1 complete)',
      '',
      'Averages:',
      '- SE: 88.9%',
      '- TST: 8h',
      '- TIB: 9h',
      '- WASO: 0 min',
      '- Nap: 0 min',
      '',
      '| Date       | SE     | TST     | TIB     | WASO  | Nap   |',
      '| ---------- | ------ | ------- | ------- | ----- | ----- |',
      '| 2026-03-01 | 88.9%  | 8h      | 9h      | 0m    | 0m    |',
      '| 2026-03-02 | -      | -       | -       | -     | 20m   |',
    ]);
  });

  it('says so when there is nothing to average', () => {
    const report = buildPeriodReport([], () => window, { from: '2026-03-01', to: '2026-03-07' });

    expect(renderPeriodReportText(report).split('\n').slice(0, 4)).toEqual([
      'Sleep diary report 2026-03-01 to 2026-03-07',
      'Nights logged: 0 (0 complete)',
      '',
      'Averages: no complete nights in this period',
    ]);
  });
});
