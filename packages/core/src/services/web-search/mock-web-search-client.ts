import { createChildLogger } from '@newscheck/shared/src/logger.js';
import type { SearchPage, WebSearchClient } from './types.js';

const log = createChildLogger('web-search:mock');

const DEFAULT_LINKS: readonly string[] = [
  'https://en.wikipedia.org/wiki/Rice',
  'https://www.healthline.com/nutrition/rice-and-weight',
  'https://www.example.com/blog/rice-myths',
];

/**
 * In-process search client. Links are served in pages exactly as the paged
 * API would: `start` is 1-based, `num` items per page.
 */
export function createMockWebSearchClient(
  responses?: Map<string, readonly string[]>,
): WebSearchClient {
  log.info('Using mock web search client');

  return {
    configured: true,

    searchPage(query: string, start: number, num: number): Promise<SearchPage> {
      log.debug({ query, start, num }, 'Mock search page');

      const links = responses?.get(query) ?? DEFAULT_LINKS;
      const pageLinks = links.slice(start - 1, start - 1 + num);

      return Promise.resolve({
        query,
        start,
        hits: pageLinks.map((link, index) => ({ link, position: start + index })),
      });
    },
  };
}
