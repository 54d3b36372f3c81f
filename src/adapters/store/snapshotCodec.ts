import type { DiarySnapshot } from '../../core/types.js';
import { ledgerIssues } from '../../core/ledger/WindowHistoryLedger.js';
import { DiarySnapshotSchema, formatZodIssues } from '../../validation/schemas.js';
import { CorruptStoreError } from '../../utils/errors.js';

export interface StoredParts {
  profile?: unknown;
  entries: unknown[];
  history: unknown[];
}

/**
 * Turns whatever a store read back into a snapshot, or rejects it. An
 * entirely empty store is `null`; one holding entries without a window
 * history (or the other way round) is corrupt, never silently defaulted.
 */
export function decodeSnapshot(parts: StoredParts, source: string): DiarySnapshot | null {
  const hasProfile = parts.profile !== null && parts.profile !== undefined;
  if (!hasProfile && parts.entries.length === 0 && parts.history.length === 0) {
    return null;
  }
  if (!hasProfile || parts.history.length === 0) {
    const missing = !hasProfile ? 'diary profile' : 'window history';
    throw new CorruptStoreError(`${source} is incomplete: the ${missing} is missing`);
  }

  const result = DiarySnapshotSchema.safeParse(parts);
  if (!result.success) {
    throw new CorruptStoreError(`${source} holds invalid records: ${formatZodIssues(result.error).join('; ')}`);
  }
  const snapshot = result.data;

  const seen = new Set<string>();
  for (const entry of snapshot.entries) {
    if (seen.has(entry.logDate)) {
      throw new CorruptStoreError(`${source} holds more than one entry for ${entry.logDate}`);
    }
    seen.add(entry.logDate);
  }

  const issues = ledgerIssues(snapshot.history);
  if (issues.length > 0) {
    throw new CorruptStoreError(`${source} holds an inconsistent window history: ${issues.join('; ')}`);
  }

  return snapshot;
}
