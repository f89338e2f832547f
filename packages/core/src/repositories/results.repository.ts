import type { NewsBatchResult, ResultFileInfo } from '@newscheck/shared/src/types/news.types.js';

export interface ResultsRepository {
  /** Stores a batch snapshot and returns its file name. */
  save(batch: NewsBatchResult): Promise<string>;
  get(filename: string): Promise<NewsBatchResult | null>;
  /** Newest first. */
  list(): Promise<readonly ResultFileInfo[]>;
}
