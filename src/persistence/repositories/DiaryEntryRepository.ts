import type { Database } from 'better-sqlite3';
import type { DiaryEntry, TimeInterval } from '../../core/types.js';
import { CorruptStoreError } from '../../utils/errors.js';
import { getDatabase } from '../database.js';

type DiaryEntryRow = {
  log_date: string;
  bedtime: string | null;
  lights_off: string | null;
  sleep_onset: string | null;
  final_wake: string | null;
  rise_time: string | null;
  awakenings: string;
  naps: string;
  notes: string | null;
};

/** Row shape before schema validation; interval columns are decoded JSON. */
export interface RawDiaryEntry {
  logDate: string;
  bedtime?: string;
  lightsOff?: string;
  sleepOnset?: string;
  finalWake?: string;
  riseTime?: string;
  awakenings: unknown;
  naps: unknown;
  notes?: string;
}

function decodeIntervals(row: DiaryEntryRow, column: 'awakenings' | 'naps'): unknown {
  try {
    const decoded: unknown = JSON.parse(row[column]);
    return decoded;
  } catch (error) {
    throw new CorruptStoreError(`Entry ${row.log_date} has an unreadable ${column} column`, { cause: error });
  }
}

function rowToEntry(row: DiaryEntryRow): RawDiaryEntry {
  const entry: RawDiaryEntry = {
    logDate: row.log_date,
    awakenings: decodeIntervals(row, 'awakenings'),
    naps: decodeIntervals(row, 'naps'),
  };
  if (row.bedtime != null) entry.bedtime = row.bedtime;
  if (row.lights_off != null) entry.lightsOff = row.lights_off;
  if (row.sleep_onset != null) entry.sleepOnset = row.sleep_onset;
  if (row.final_wake != null) entry.finalWake = row.final_wake;
  if (row.rise_time != null) entry.riseTime = row.rise_time;
  if (row.notes != null) entry.notes = row.notes;
  return entry;
}

function encodeIntervals(intervals: TimeInterval[]): string {
  return JSON.stringify(intervals.map(({ start, end }) => ({ start, end })));
}

export class DiaryEntryRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db ?? getDatabase();
  }

  listAll(): RawDiaryEntry[] {
    const rows = this.db.prepare<[], DiaryEntryRow>('SELECT * FROM diary_entries ORDER BY log_date ASC').all();
    return rows.map(rowToEntry);
  }

  upsert(entry: DiaryEntry): void {
    this.db
      .prepare(
        `INSERT INTO diary_entries (
          log_date, bedtime, lights_off, sleep_onset, final_wake, rise_time, awakenings, naps, notes
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(log_date) DO UPDATE SET
          bedtime = excluded.bedtime,
          lights_off = excluded.lights_off,
          sleep_onset = excluded.sleep_onset,
          final_wake = excluded.final_wake,
          rise_time = excluded.rise_time,
          awakenings = excluded.awakenings,
          naps = excluded.naps,
          notes = excluded.notes,
          updated_at = strftime('%s', 'now')`
      )
      .run(
        entry.logDate,
        entry.bedtime ?? null,
        entry.lightsOff ?? null,
        entry.sleepOnset ?? null,
        entry.finalWake ?? null,
        entry.riseTime ?? null,
        encodeIntervals(entry.awakenings),
        encodeIntervals(entry.naps),
        entry.notes ?? null
      );
  }

  /** Replaces the whole collection. Callers wrap this in a transaction. */
  replaceAll(entries: readonly DiaryEntry[]): void {
    this.db.prepare('DELETE FROM diary_entries').run();
    for (const entry of entries) {
      this.upsert(entry);
    }
  }
}
