import type { DebugArtifact } from '@newscheck/shared/src/types/fact-check.types.js';
import type { DebugArtifactStore } from './debug-artifact.repository.js';
import { candidateName, DEBUG_FILE_PREFIX, formatFileTimestamp } from './snapshot-names.js';

export interface InMemoryDebugArtifactStore extends DebugArtifactStore {
  readonly artifacts: ReadonlyMap<string, DebugArtifact>;
}

export function createInMemoryDebugArtifactStore(
  now: () => Date = () => new Date(),
): InMemoryDebugArtifactStore {
  const artifacts = new Map<string, DebugArtifact>();

  return {
    artifacts,

    save(artifact: DebugArtifact): Promise<string> {
      const base = `${DEBUG_FILE_PREFIX}${artifact.domainCategory}_${formatFileTimestamp(now())}`;

      let attempt = 0;
      while (artifacts.has(candidateName(base, attempt))) {
        attempt++;
      }
      const filename = candidateName(base, attempt);

      artifacts.set(filename, structuredClone(artifact));
      return Promise.resolve(filename);
    },
  };
}
