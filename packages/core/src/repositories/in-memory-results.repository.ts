import type { NewsBatchResult, ResultFileInfo } from '@newscheck/shared/src/types/news.types.js';
import type { ResultsRepository } from './results.repository.js';
import {
  assertValidSnapshotName,
  candidateName,
  formatFileTimestamp,
  RESULTS_FILE_PREFIX,
} from './snapshot-names.js';

interface StoredSnapshot {
  readonly batch: NewsBatchResult;
  readonly sizeBytes: number;
  readonly modified: Date;
}

export function createInMemoryResultsRepository(now: () => Date = () => new Date()): ResultsRepository {
  const snapshots = new Map<string, StoredSnapshot>();

  return {
    save(batch: NewsBatchResult): Promise<string> {
      const modified = now();
      const base = `${RESULTS_FILE_PREFIX}${formatFileTimestamp(modified)}`;

      let attempt = 0;
      while (snapshots.has(candidateName(base, attempt))) {
        attempt++;
      }
      const filename = candidateName(base, attempt);

      const json = JSON.stringify(batch, null, 2);
      snapshots.set(filename, {
        batch: structuredClone(batch),
        sizeBytes: Buffer.byteLength(json, 'utf-8'),
        modified,
      });
      return Promise.resolve(filename);
    },

    async get(filename: string): Promise<NewsBatchResult | null> {
      assertValidSnapshotName(filename);
      return snapshots.get(filename)?.batch ?? null;
    },

    list(): Promise<readonly ResultFileInfo[]> {
      const files = [...snapshots.entries()]
        .map(([filename, snapshot]) => ({
          filename,
          sizeBytes: snapshot.sizeBytes,
          modified: snapshot.modified,
        }))
        .sort(
          (a, b) =>
            b.modified.getTime() - a.modified.getTime() || b.filename.localeCompare(a.filename),
        );
      return Promise.resolve(files);
    },
  };
}
