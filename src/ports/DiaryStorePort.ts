import type { DiarySnapshot } from '../core/types.js';

/**
 * Persistence collaborator. Entries and window history always travel
 * together: `load` returns both or raises CorruptStoreError, never one
 * without the other.
 */
export interface DiaryStorePort {
  /** Null when nothing has been saved yet. */
  load(): Promise<DiarySnapshot | null>;
  save(snapshot: DiarySnapshot): Promise<void>;
}
