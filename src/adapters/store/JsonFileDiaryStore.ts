import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { DiaryStorePort } from '../../ports/DiaryStorePort.js';
import type { DiarySnapshot } from '../../core/types.js';
import { decodeSnapshot } from './snapshotCodec.js';
import { CorruptStoreError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

export const DIARY_DOCUMENT_VERSION = 1;

// Shape check only; record contents are validated by decodeSnapshot
const DocumentEnvelopeSchema = z.object({
  version: z.number().int().optional(),
  profile: z.unknown(),
  entries: z.array(z.unknown()),
  history: z.array(z.unknown()),
});

/** Keeps the whole diary as one JSON document, replaced atomically on save. */
export class JsonFileDiaryStore implements DiaryStorePort {
  private readonly logger = createLogger({ component: 'JsonFileDiaryStore' });

  constructor(private readonly filePath: string) {}

  async load(): Promise<DiarySnapshot | null> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.logger.info({ filePath: this.filePath }, 'No diary file yet');
        return null;
      }
      throw error;
    }

    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (error) {
      throw new CorruptStoreError(`Diary file ${this.filePath} is not valid JSON`, { cause: error });
    }

    const envelope = DocumentEnvelopeSchema.safeParse(document);
    if (!envelope.success) {
      throw new CorruptStoreError(`Diary file ${this.filePath} must hold profile, entries and history together`);
    }
    if (envelope.data.version !== undefined && envelope.data.version > DIARY_DOCUMENT_VERSION) {
      throw new CorruptStoreError(
        `Diary file ${this.filePath} has version ${envelope.data.version}; only ${DIARY_DOCUMENT_VERSION} is supported`
      );
    }

    return decodeSnapshot(envelope.data, `Diary file ${this.filePath}`);
  }

  async save(snapshot: DiarySnapshot): Promise<void> {
    const document = {
      version: DIARY_DOCUMENT_VERSION,
      profile: snapshot.profile,
      entries: snapshot.entries,
      history: snapshot.history,
    };
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await mkdir(dirname(this.filePath), { recursive: true });
    try {
      await writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
    this.logger.debug({ filePath: this.filePath, entries: snapshot.entries.length }, 'Saved diary file');
  }
}
