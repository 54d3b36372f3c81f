import type { Database } from 'better-sqlite3';
import type { WindowHistoryRecord } from '../../core/types.js';
import { getDatabase } from '../database.js';

type WindowHistoryRow = {
  effective_from: string;
  target_wake_time: string;
  duration_minutes: number;
  rationale: string;
};

/** Row shape before schema validation; rationale is not narrowed yet. */
export interface RawWindowHistoryRecord {
  effectiveFrom: string;
  window: { targetWakeTime: string; durationMinutes: number };
  rationale: string;
}

function rowToRecord(row: WindowHistoryRow): RawWindowHistoryRecord {
  return {
    effectiveFrom: row.effective_from,
    window: { targetWakeTime: row.target_wake_time, durationMinutes: row.duration_minutes },
    rationale: row.rationale,
  };
}

export class WindowHistoryRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db ?? getDatabase();
  }

  listAll(): RawWindowHistoryRecord[] {
    const rows = this.db
      .prepare<[], WindowHistoryRow>('SELECT * FROM window_history ORDER BY effective_from ASC')
      .all();
    return rows.map(rowToRecord);
  }

  /** Replaces the whole history. Callers wrap this in a transaction. */
  replaceAll(records: readonly WindowHistoryRecord[]): void {
    this.db.prepare('DELETE FROM window_history').run();
    const insert = this.db.prepare(
      `INSERT INTO window_history (effective_from, target_wake_time, duration_minutes, rationale)
       VALUES (?, ?, ?, ?)`
    );
    for (const record of records) {
      insert.run(record.effectiveFrom, record.window.targetWakeTime, record.window.durationMinutes, record.rationale);
    }
  }
}
