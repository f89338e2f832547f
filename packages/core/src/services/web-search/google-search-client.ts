import axios from 'axios';
import type { AxiosInstance } from 'axios';
import type { SearchSettings } from '@newscheck/schemas/src/settings.schema.js';
import type { SearchHit } from '@newscheck/shared/src/types/fact-check.types.js';
import { createChildLogger } from '@newscheck/shared/src/logger.js';
import type { SearchPage, WebSearchClient } from './types.js';

const log = createChildLogger('web-search:google');

export const GOOGLE_SEARCH_URL = 'https://www.googleapis.com/customsearch/v1';

/** Credentials may be absent; the client then reports itself unconfigured. */
export type GoogleSearchClientConfig = Readonly<
  Partial<Pick<SearchSettings, 'apiKey' | 'engineId'>> & Pick<SearchSettings, 'timeoutMs'>
>;

interface CustomSearchItem {
  readonly link?: unknown;
}

interface CustomSearchResponse {
  readonly items?: readonly CustomSearchItem[];
}

function toHits(data: CustomSearchResponse, start: number): SearchHit[] {
  const hits: SearchHit[] = [];
  for (const item of data.items ?? []) {
    if (typeof item.link === 'string' && item.link.length > 0) {
      hits.push({ link: item.link, position: start + hits.length });
    }
  }
  return hits;
}

export function createGoogleSearchClient(
  config: GoogleSearchClientConfig,
  http: Pick<AxiosInstance, 'get'> = axios,
): WebSearchClient {
  const { apiKey, engineId, timeoutMs } = config;
  const configured = Boolean(apiKey && engineId);

  if (!configured) {
    log.warn('Google Custom Search API key or engine id not configured');
  }

  return {
    configured,

    async searchPage(query: string, start: number, num: number): Promise<SearchPage> {
      log.debug({ query, start, num }, 'Requesting search page');

      const response = await http.get<CustomSearchResponse>(GOOGLE_SEARCH_URL, {
        params: { key: apiKey, cx: engineId, q: query, num, start },
        timeout: timeoutMs,
      });

      const hits = toHits(response.data, start);
      log.debug({ query, start, hitCount: hits.length }, 'Search page received');

      return { query, start, hits };
    },
  };
}
