import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { DebugArtifact } from '@newscheck/shared/src/types/fact-check.types.js';
import { createChildLogger } from '@newscheck/shared/src/logger.js';
import { PersistenceError } from '@newscheck/shared/src/utils/errors.js';
import type { DebugArtifactStore } from '../repositories/debug-artifact.repository.js';
import { DEBUG_FILE_PREFIX, formatFileTimestamp } from '../repositories/snapshot-names.js';
import { writeExclusive } from './fs-snapshot.js';

const log = createChildLogger('infrastructure:debug-artifacts');

export function createFsDebugArtifactStore(
  artifactsDir: string,
  now: () => Date = () => new Date(),
): DebugArtifactStore {
  return {
    async save(artifact: DebugArtifact): Promise<string> {
      try {
        await mkdir(artifactsDir, { recursive: true });
        const base = `${DEBUG_FILE_PREFIX}${artifact.domainCategory}_${formatFileTimestamp(now())}`;
        const filename = await writeExclusive(artifactsDir, base, JSON.stringify(artifact, null, 4));
        const path = join(artifactsDir, filename);
        log.info({ path }, 'Debug artifact saved');
        return path;
      } catch (error) {
        throw new PersistenceError(
          `Failed to save debug artifact: ${error instanceof Error ? error.message : String(error)}`,
          error instanceof Error ? error : undefined,
        );
      }
    },
  };
}
