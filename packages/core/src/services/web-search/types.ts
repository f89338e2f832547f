import type { SearchHit } from '@newscheck/shared/src/types/fact-check.types.js';

export interface SearchPage {
  readonly query: string;
  readonly start: number;
  readonly hits: readonly SearchHit[];
}

export interface WebSearchClient {
  /** False when credentials are missing; callers treat that as "no sources". */
  readonly configured: boolean;
  searchPage(query: string, start: number, num: number): Promise<SearchPage>;
}
