import type { SearchSettings } from '@newscheck/schemas/src/settings.schema.js';
import type { RecencyCategory, SearchHit } from '@newscheck/shared/src/types/fact-check.types.js';
import { createChildLogger } from '@newscheck/shared/src/logger.js';
import type { TrustCatalog } from '../../catalog/trust-catalog.js';
import type { WebSearchClient } from '../web-search/types.js';

const log = createChildLogger('search:gateway');

export const RESULT_CAPS: Readonly<Record<RecencyCategory, number>> = {
  Evergreen: 5,
  Realtime: 8,
};

const REALTIME_MIN_TRUSTED = 3;
const REALTIME_FALLBACK_KEYWORDS = ['news', 'live', 'breaking', 'latest'] as const;
const MAX_QUERY_LENGTH = 2048;

const DEFAULT_MAX_RESULTS = 50;
const DEFAULT_PAGE_SIZE = 10;
/** Custom Search accepts `num` in 1..10. */
const MAX_PAGE_SIZE = 10;

export interface SearchGatewayDeps {
  readonly webSearchClient: WebSearchClient;
  readonly trustCatalog: TrustCatalog;
}

/** `pageDelayMs` is waited before every page after the first, for both recency variants. */
export type SearchGatewayConfig = Readonly<Pick<SearchSettings, 'pageDelayMs'>>;

export interface SearchGateway {
  search(
    query: string,
    domainCategory: string,
    recencyCategory: RecencyCategory,
    maxResults?: number,
    pageSize?: number,
  ): Promise<string[]>;
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function matchesAny(url: string, fragments: readonly string[]): boolean {
  return fragments.some((fragment) => url.includes(fragment));
}

export function createSearchGateway(
  deps: SearchGatewayDeps,
  config: SearchGatewayConfig,
): SearchGateway {
  const { webSearchClient, trustCatalog } = deps;

  return {
    async search(
      query: string,
      domainCategory: string,
      recencyCategory: RecencyCategory,
      maxResults = DEFAULT_MAX_RESULTS,
      pageSize = DEFAULT_PAGE_SIZE,
    ): Promise<string[]> {
      if (!webSearchClient.configured) {
        log.error('Search API key or engine id not configured, no sources available');
        return [];
      }

      const searchQuery = query.slice(0, MAX_QUERY_LENGTH);
      const trustedHosts = trustCatalog.trustedHosts(domainCategory, recencyCategory);
      const cap = RESULT_CAPS[recencyCategory];
      const step = Math.min(Math.max(Math.trunc(pageSize), 1), MAX_PAGE_SIZE);

      log.info(
        { domainCategory, recencyCategory, queryLength: searchQuery.length, cap, pageSize: step },
        'Searching for trusted sources',
      );

      const accepted: string[] = [];
      const collected: string[] = [];

      for (let offset = 0; offset < maxResults && accepted.length < cap; offset += step) {
        if (offset > 0 && config.pageDelayMs > 0) {
          await sleep(config.pageDelayMs);
        }

        const start = offset + 1;
        const num = Math.min(step, maxResults - offset);

        let hits: readonly SearchHit[];
        try {
          hits = (await webSearchClient.searchPage(searchQuery, start, num)).hits;
        } catch (error) {
          log.error(
            { start, error: error instanceof Error ? error.message : String(error) },
            'Search page request failed',
          );
          break;
        }

        if (hits.length === 0) {
          break;
        }

        for (const hit of hits) {
          collected.push(hit.link);
          if (
            accepted.length < cap &&
            matchesAny(hit.link, trustedHosts) &&
            !accepted.includes(hit.link)
          ) {
            accepted.push(hit.link);
          }
        }
      }

      if (recencyCategory === 'Realtime' && accepted.length < REALTIME_MIN_TRUSTED) {
        log.info(
          { trustedCount: accepted.length },
          'Few trusted real-time sources, widening to news-like URLs',
        );
        for (const link of collected) {
          if (accepted.length >= cap) break;
          if (matchesAny(link, REALTIME_FALLBACK_KEYWORDS) && !accepted.includes(link)) {
            accepted.push(link);
          }
        }
      }

      log.info(
        { collectedCount: collected.length, acceptedCount: accepted.length },
        'Source discovery complete',
      );

      return accepted;
    },
  };
}
