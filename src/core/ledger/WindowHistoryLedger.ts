import type { IsoDate, SleepWindow, WindowHistoryRecord } from '../types.js';
import { sleepWindowIssues, validateSleepWindow } from '../window/sleepWindow.js';
import { assertIsoDate, compareIsoDates, eachIsoDate, isIsoDate } from '../../utils/dates.js';
import { ValidationError } from '../../utils/errors.js';

export interface ActiveWindow {
  record: WindowHistoryRecord;
  /** True when the date precedes every record and the earliest one stood in. */
  gap: boolean;
  warning?: string;
}

export interface TimelineDay extends ActiveWindow {
  date: IsoDate;
}

function cloneRecord(record: WindowHistoryRecord): WindowHistoryRecord {
  return {
    effectiveFrom: record.effectiveFrom,
    window: { targetWakeTime: record.window.targetWakeTime, durationMinutes: record.window.durationMinutes },
    rationale: record.rationale,
  };
}

export function ledgerIssues(records: readonly WindowHistoryRecord[]): string[] {
  if (records.length === 0) {
    return ['window history must contain at least the initial record'];
  }
  const issues: string[] = [];
  records.forEach((record, i) => {
    if (!isIsoDate(record.effectiveFrom)) {
      issues.push(`record ${i}: effectiveFrom "${record.effectiveFrom}" is not a YYYY-MM-DD date`);
    }
    for (const issue of sleepWindowIssues(record.window)) {
      issues.push(`record ${record.effectiveFrom}: ${issue}`);
    }
    const previous = records[i - 1];
    if (previous && compareIsoDates(previous.effectiveFrom, record.effectiveFrom) >= 0) {
      issues.push(
        `record ${record.effectiveFrom} must be effective after the preceding record ${previous.effectiveFrom}`
      );
    }
  });
  return issues;
}

/**
 * Effective-dated history of prescribed sleep windows. Records are strictly
 * ordered by `effectiveFrom` and the earliest record is the initial plan,
 * which can be edited but never removed. Every mutation is checked on a
 * scratch copy and only committed when the whole history is still valid.
 */
export class WindowHistoryLedger {
  private ordered: WindowHistoryRecord[];

  private constructor(records: WindowHistoryRecord[]) {
    this.ordered = records;
  }

  static create(initial: { effectiveFrom: IsoDate; window: SleepWindow }): WindowHistoryLedger {
    validateSleepWindow(initial.window);
    return WindowHistoryLedger.fromRecords([{ ...initial, rationale: 'initial' }]);
  }

  static fromRecords(records: readonly WindowHistoryRecord[]): WindowHistoryLedger {
    const copy = records.map(cloneRecord);
    const issues = ledgerIssues(copy);
    if (issues.length > 0) {
      throw new ValidationError('Window history is inconsistent', issues);
    }
    return new WindowHistoryLedger(copy);
  }

  get size(): number {
    return this.ordered.length;
  }

  records(): WindowHistoryRecord[] {
    return this.ordered.map(cloneRecord);
  }

  earliest(): WindowHistoryRecord {
    return cloneRecord(this.at(0));
  }

  latest(): WindowHistoryRecord {
    return cloneRecord(this.at(this.ordered.length - 1));
  }

  append(record: WindowHistoryRecord): void {
    assertIsoDate(record.effectiveFrom, 'effectiveFrom');
    const latest = this.at(this.ordered.length - 1);
    if (compareIsoDates(record.effectiveFrom, latest.effectiveFrom) <= 0) {
      throw new ValidationError(
        `Cannot append a window effective ${record.effectiveFrom}; it must come after ${latest.effectiveFrom}`
      );
    }
    this.commit((draft) => {
      draft.push(cloneRecord(record));
    });
  }

  /** Replaces the window at an existing date. Dates and record count never change. */
  edit(effectiveFrom: IsoDate, window: SleepWindow): void {
    const index = this.indexOf(effectiveFrom);
    this.commit((draft) => {
      draft[index] = {
        effectiveFrom,
        window: { targetWakeTime: window.targetWakeTime, durationMinutes: window.durationMinutes },
        rationale: 'manual-edit',
      };
    });
  }

  remove(effectiveFrom: IsoDate): WindowHistoryRecord {
    const index = this.indexOf(effectiveFrom);
    if (index === 0) {
      throw new ValidationError(`Cannot remove the initial window record effective ${effectiveFrom}`);
    }
    const removed = this.at(index);
    this.commit((draft) => {
      draft.splice(index, 1);
    });
    return cloneRecord(removed);
  }

  /** The record with the greatest effectiveFrom on or before `date`. Never throws for a valid date. */
  activeWindowOn(date: IsoDate): ActiveWindow {
    assertIsoDate(date);
    let active: WindowHistoryRecord | undefined;
    for (const record of this.ordered) {
      if (compareIsoDates(record.effectiveFrom, date) > 0) break;
      active = record;
    }
    if (active) {
      return { record: cloneRecord(active), gap: false };
    }
    const earliest = this.at(0);
    return {
      record: cloneRecord(earliest),
      gap: true,
      warning: `No window was prescribed on ${date}; using the initial window effective ${earliest.effectiveFrom}`,
    };
  }

  timeline(from: IsoDate, to: IsoDate): TimelineDay[] {
    return eachIsoDate(assertIsoDate(from, 'from'), assertIsoDate(to, 'to')).map((date) => ({
      date,
      ...this.activeWindowOn(date),
    }));
  }

  private at(index: number): WindowHistoryRecord {
    const record = this.ordered[index];
    if (!record) {
      throw new RangeError(`No window record at position ${index}`);
    }
    return record;
  }

  private indexOf(effectiveFrom: IsoDate): number {
    const index = this.ordered.findIndex((record) => record.effectiveFrom === effectiveFrom);
    if (index === -1) {
      throw new ValidationError(`No window record is effective from ${effectiveFrom}`);
    }
    return index;
  }

  private commit(mutate: (draft: WindowHistoryRecord[]) => void): void {
    const draft = this.ordered.map(cloneRecord);
    mutate(draft);
    const issues = ledgerIssues(draft);
    if (issues.length > 0) {
      throw new ValidationError('Window history change rejected', issues);
    }
    this.ordered = draft;
  }
}
