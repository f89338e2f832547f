import { mkdir, readdir, readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { NewsBatchResult, ResultFileInfo } from '@newscheck/shared/src/types/news.types.js';
import { validateNewsBatch } from '@newscheck/schemas/src/validators.js';
import { createChildLogger } from '@newscheck/shared/src/logger.js';
import { PersistenceError } from '@newscheck/shared/src/utils/errors.js';
import type { ResultsRepository } from '../repositories/results.repository.js';
import {
  assertValidSnapshotName,
  formatFileTimestamp,
  isValidSnapshotName,
  RESULTS_FILE_PREFIX,
} from '../repositories/snapshot-names.js';
import { writeExclusive, isNotFound } from './fs-snapshot.js';

const log = createChildLogger('infrastructure:results');

export function createFsResultsRepository(
  resultsDir: string,
  now: () => Date = () => new Date(),
): ResultsRepository {
  return {
    async save(batch: NewsBatchResult): Promise<string> {
      try {
        await mkdir(resultsDir, { recursive: true });
        const base = `${RESULTS_FILE_PREFIX}${formatFileTimestamp(now())}`;
        const filename = await writeExclusive(resultsDir, base, JSON.stringify(batch, null, 2));
        log.info({ filename, processedCount: batch.processed_count }, 'Results snapshot saved');
        return filename;
      } catch (error) {
        throw new PersistenceError(
          `Failed to save results snapshot: ${error instanceof Error ? error.message : String(error)}`,
          error instanceof Error ? error : undefined,
        );
      }
    },

    async get(filename: string): Promise<NewsBatchResult | null> {
      assertValidSnapshotName(filename);

      let raw: string;
      try {
        raw = await readFile(join(resultsDir, filename), 'utf-8');
      } catch (error) {
        if (isNotFound(error)) {
          return null;
        }
        throw new PersistenceError(
          `Failed to read results snapshot ${filename}`,
          error instanceof Error ? error : undefined,
        );
      }

      let data: unknown;
      try {
        data = JSON.parse(raw);
      } catch (error) {
        throw new PersistenceError(
          `Results snapshot ${filename} is not valid JSON`,
          error instanceof Error ? error : undefined,
        );
      }
      return validateNewsBatch(data);
    },

    async list(): Promise<readonly ResultFileInfo[]> {
      let entries: string[];
      try {
        entries = await readdir(resultsDir);
      } catch (error) {
        if (isNotFound(error)) {
          return [];
        }
        throw new PersistenceError(
          `Failed to list results in ${resultsDir}`,
          error instanceof Error ? error : undefined,
        );
      }

      const names = entries.filter(
        (name) => name.startsWith(RESULTS_FILE_PREFIX) && isValidSnapshotName(name),
      );
      const files = await Promise.all(
        names.map(async (filename) => {
          const info = await stat(join(resultsDir, filename));
          return { filename, sizeBytes: info.size, modified: info.mtime };
        }),
      );

      return files.sort(
        (a, b) => b.modified.getTime() - a.modified.getTime() || b.filename.localeCompare(a.filename),
      );
    },
  };
}
