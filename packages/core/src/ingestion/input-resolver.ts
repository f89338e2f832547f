import { createChildLogger } from '@newscheck/shared/src/logger.js';
import { extractMainText } from '../services/scraper/content-extractor.js';
import { BROWSER_HEADERS } from '../services/scraper/scrape-engine.js';
import type { PageFetcher } from '../services/scraper/types.js';

const log = createChildLogger('ingestion:input');

const URL_PATTERN = /^https?:\/\//i;

export interface InputResolverConfig {
  readonly timeoutMs: number;
}

export interface InputResolver {
  /**
   * Text for a news item: the extracted page text for an http(s) URL, the
   * trimmed input otherwise. `undefined` when nothing usable comes out.
   */
  resolveInput(content: string): Promise<string | undefined>;
}

export function createInputResolver(fetcher: PageFetcher, config: InputResolverConfig): InputResolver {
  async function resolveUrl(url: string): Promise<string | undefined> {
    log.info({ url }, 'Fetching article from URL');

    try {
      const response = await fetcher.fetchPage(url, {
        timeoutMs: config.timeoutMs,
        headers: BROWSER_HEADERS,
      });

      if (response.status >= 400) {
        log.warn({ url, status: response.status }, 'Article fetch failed');
        return undefined;
      }

      const text = extractMainText(response.body);
      if (!text) {
        log.warn({ url }, 'No text extracted from article');
        return undefined;
      }

      log.info({ url, characterCount: text.length }, 'Article text extracted');
      return text;
    } catch (error) {
      log.warn(
        { url, error: error instanceof Error ? error.message : String(error) },
        'Article fetch failed',
      );
      return undefined;
    }
  }

  return {
    resolveInput(content: string): Promise<string | undefined> {
      const trimmed = content.trim();

      if (URL_PATTERN.test(trimmed)) {
        return resolveUrl(trimmed);
      }

      log.info({ characterCount: trimmed.length }, 'Processing text input');
      return Promise.resolve(trimmed || undefined);
    },
  };
}
