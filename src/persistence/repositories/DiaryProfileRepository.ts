import type { Database } from 'better-sqlite3';
import type { DiaryProfile } from '../../core/types.js';
import { getDatabase } from '../database.js';

type DiaryProfileRow = {
  name: string;
  created_on: string;
};

export class DiaryProfileRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db ?? getDatabase();
  }

  get(): { name: string; createdOn: string } | null {
    const row = this.db.prepare<[], DiaryProfileRow>('SELECT name, created_on FROM diary_profile WHERE id = 1').get();
    if (!row) return null;
    return { name: row.name, createdOn: row.created_on };
  }

  upsert(profile: DiaryProfile): void {
    this.db
      .prepare(
        `INSERT INTO diary_profile (id, name, created_on) VALUES (1, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           name = excluded.name,
           created_on = excluded.created_on,
           updated_at = strftime('%s', 'now')`
      )
      .run(profile.name, profile.createdOn);
  }
}
