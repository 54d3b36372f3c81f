import type { Database } from 'better-sqlite3';
import type { DiaryStorePort } from '../../ports/DiaryStorePort.js';
import type { DiarySnapshot } from '../../core/types.js';
import { DiaryEntryRepository } from '../../persistence/repositories/DiaryEntryRepository.js';
import { WindowHistoryRepository } from '../../persistence/repositories/WindowHistoryRepository.js';
import { DiaryProfileRepository } from '../../persistence/repositories/DiaryProfileRepository.js';
import { decodeSnapshot } from './snapshotCodec.js';
import { createLogger } from '../../utils/logger.js';

export class SqliteDiaryStore implements DiaryStorePort {
  private readonly logger = createLogger({ component: 'SqliteDiaryStore' });
  private readonly profiles: DiaryProfileRepository;
  private readonly entries: DiaryEntryRepository;
  private readonly history: WindowHistoryRepository;

  constructor(private readonly db: Database) {
    this.profiles = new DiaryProfileRepository(db);
    this.entries = new DiaryEntryRepository(db);
    this.history = new WindowHistoryRepository(db);
  }

  async load(): Promise<DiarySnapshot | null> {
    // One read transaction so entries and history come from the same commit
    const read = this.db.transaction(() => ({
      profile: this.profiles.get(),
      entries: this.entries.listAll(),
      history: this.history.listAll(),
    }));
    const parts = read();
    const snapshot = decodeSnapshot(parts, 'SQLite diary store');
    this.logger.debug(
      { entries: parts.entries.length, history: parts.history.length, empty: snapshot === null },
      'Loaded diary'
    );
    return snapshot;
  }

  async save(snapshot: DiarySnapshot): Promise<void> {
    const write = this.db.transaction((value: DiarySnapshot) => {
      this.profiles.upsert(value.profile);
      this.entries.replaceAll(value.entries);
      this.history.replaceAll(value.history);
    });
    write(snapshot);
    this.logger.debug({ entries: snapshot.entries.length, history: snapshot.history.length }, 'Saved diary');
  }
}
