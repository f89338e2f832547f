import type { DebugArtifact } from '@newscheck/shared/src/types/fact-check.types.js';

export interface DebugArtifactStore {
  /** Writes the artifact and returns where it was stored. */
  save(artifact: DebugArtifact): Promise<string>;
}
