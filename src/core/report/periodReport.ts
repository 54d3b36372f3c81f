import type { DiaryEntry, IsoDate, NightResult, SleepWindow } from '../types.js';
import { computeNightMetrics } from '../metrics/nightMetrics.js';
import { normalizeTimeOfDay } from '../sleepDay/normalizer.js';
import { prescribedBedtime } from '../window/sleepWindow.js';
import { assertIsoDate, compareIsoDates } from '../../utils/dates.js';
import { formatMinutesAsHm, formatPercent } from '../../utils/format.js';
import { ValidationError } from '../../utils/errors.js';

/** Sleep-day axis offsets (minutes after 18:00) for drawing one night as bars. */
export interface NightBars {
  inBed: [number, number];
  asleep: [number, number];
  awakenings: Array<[number, number]>;
}

export interface ReportRow {
  logDate: IsoDate;
  night: NightResult;
  window: SleepWindow;
  prescribedBedtime: string;
  bars: NightBars | null;
}

export interface ReportAverages {
  sleepEfficiency: number;
  totalSleepTime: number;
  timeInBed: number;
  waso: number;
  napTotal: number;
}

export interface PeriodReport {
  from: IsoDate;
  to: IsoDate;
  nightsLogged: number;
  nightsComplete: number;
  /** Null when no night in the period is complete. */
  averages: ReportAverages | null;
  rows: ReportRow[];
}

export function buildPeriodReport(
  entries: readonly DiaryEntry[],
  windowFor: (date: IsoDate) => SleepWindow,
  range: { from: IsoDate; to: IsoDate }
): PeriodReport {
  const from = assertIsoDate(range.from, 'from');
  const to = assertIsoDate(range.to, 'to');
  if (compareIsoDates(from, to) > 0) {
    throw new ValidationError(`Report period starts (${from}) after it ends (${to})`);
  }

  const rows = entries
    .filter((entry) => compareIsoDates(entry.logDate, from) >= 0 && compareIsoDates(entry.logDate, to) <= 0)
    .sort((a, b) => compareIsoDates(a.logDate, b.logDate))
    .map((entry): ReportRow => {
      const night = computeNightMetrics(entry);
      const window = windowFor(entry.logDate);
      return {
        logDate: entry.logDate,
        night,
        window,
        prescribedBedtime: prescribedBedtime(window),
        bars: night.status === 'complete' ? nightBars(entry) : null,
      };
    });

  const complete = rows.flatMap((row) => (row.night.status === 'complete' ? [row.night.metrics] : []));
  const mean = (pick: (metrics: (typeof complete)[number]) => number): number =>
    complete.reduce((sum, metrics) => sum + pick(metrics), 0) / complete.length;

  return {
    from,
    to,
    nightsLogged: rows.length,
    nightsComplete: complete.length,
    averages:
      complete.length === 0
        ? null
        : {
            sleepEfficiency: mean((m) => m.sleepEfficiency),
            totalSleepTime: mean((m) => m.totalSleepTime),
            timeInBed: mean((m) => m.timeInBed),
            waso: mean((m) => m.waso),
            napTotal: mean((m) => m.napTotal),
          },
    rows,
  };
}

function nightBars(entry: DiaryEntry): NightBars | null {
  const { bedtime, sleepOnset, finalWake, riseTime } = entry;
  if (bedtime === undefined || sleepOnset === undefined || finalWake === undefined || riseTime === undefined) {
    return null;
  }
  return {
    inBed: [normalizeTimeOfDay(bedtime), normalizeTimeOfDay(riseTime)],
    asleep: [normalizeTimeOfDay(sleepOnset), normalizeTimeOfDay(finalWake)],
    awakenings: entry.awakenings.map((interval): [number, number] => [
      normalizeTimeOfDay(interval.start),
      normalizeTimeOfDay(interval.end),
    ]),
  };
}

const COLUMNS = [
  { header: 'Date', width: 10 },
  { header: 'SE', width: 6 },
  { header: 'TST', width: 7 },
  { header: 'TIB', width: 7 },
  { header: 'WASO', width: 5 },
  { header: 'Nap', width: 5 },
] as const;

function tableLine(values: readonly string[]): string {
  const cells = COLUMNS.map((column, i) => ` ${(values[i] ?? '').padEnd(column.width)} `);
  return `|${cells.join('|')}|`;
}

/** Plain-text summary with a fixed-width day-by-day table, for copying into notes. */
export function renderPeriodReportText(report: PeriodReport): string {
  const lines: string[] = [];
  lines.push(`Sleep diary report ${report.from} to ${report.to}`);
  lines.push(`Nights logged: ${report.nightsLogged} (${report.nightsComplete} complete)`);
  lines.push('');

  if (report.averages) {
    const a = report.averages;
    lines.push('Averages:');
    lines.push(`- SE: ${formatPercent(a.sleepEfficiency)}`);
    lines.push(`- TST: ${formatMinutesAsHm(a.totalSleepTime)}`);
    lines.push(`- TIB: ${formatMinutesAsHm(a.timeInBed)}`);
    lines.push(`- WASO: ${Math.round(a.waso)} min`);
    lines.push(`- Nap: ${Math.round(a.napTotal)} min`);
  } else {
    lines.push('Averages: no complete nights in this period');
  }
  lines.push('');

  lines.push(tableLine(COLUMNS.map((column) => column.header)));
  lines.push(tableLine(COLUMNS.map((column) => '-'.repeat(column.width))));
  for (const row of report.rows) {
    const night = row.night;
    if (night.status === 'complete') {
      const m = night.metrics;
      lines.push(
        tableLine([
          row.logDate,
          formatPercent(m.sleepEfficiency),
          formatMinutesAsHm(m.totalSleepTime),
          formatMinutesAsHm(m.timeInBed),
          `${Math.round(m.waso)}m`,
          `${Math.round(m.napTotal)}m`,
        ])
      );
    } else {
      lines.push(tableLine([row.logDate, '-', '-', '-', '-', `${Math.round(night.napTotal)}m`]));
    }
  }

  return lines.join('\n');
}
