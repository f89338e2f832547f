import type { ScrapeResult } from '@newscheck/shared/src/types/fact-check.types.js';
import { createChildLogger } from '@newscheck/shared/src/logger.js';
import type { ScraperSettings } from '@newscheck/schemas/src/settings.schema.js';
import { extractMainText } from './content-extractor.js';
import { createProxyRotator } from './proxy-rotation.js';
import type { ProxyRotator } from './proxy-rotation.js';
import type { PageFetcher, PageResponse } from './types.js';

const log = createChildLogger('scraper:engine');

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

export const BROWSER_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent': BROWSER_USER_AGENT,
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
};

const MAX_ATTEMPTS = 2;
const DEFAULT_RATE_LIMIT_DELAY_MS = { min: 5_000, max: 15_000 } as const;

export interface DelayRange {
  readonly min: number;
  readonly max: number;
}

export interface ScrapeEngineConfig extends Readonly<ScraperSettings> {
  /** Wait before the single retry that follows a 429. */
  readonly rateLimitDelayMs?: DelayRange;
  readonly random?: () => number;
}

export interface ScrapeEngine {
  /** Extracted text of every URL that was fetched successfully, in no particular order. */
  scrapeAll(urls: readonly string[]): Promise<string[]>;
  scrapeDetailed(urls: readonly string[]): Promise<ScrapeResult[]>;
}

type AttemptOutcome =
  | { readonly kind: 'content'; readonly content: string }
  | { readonly kind: 'rate-limited' }
  | { readonly kind: 'failed'; readonly reason: string };

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function classifyResponse(response: PageResponse): AttemptOutcome {
  if (response.status === 429) {
    return { kind: 'rate-limited' };
  }
  if (response.status === 403) {
    return { kind: 'failed', reason: 'HTTP 403 Forbidden' };
  }
  if (response.status >= 400) {
    return { kind: 'failed', reason: `HTTP ${String(response.status)}` };
  }

  const content = extractMainText(response.body);
  if (!content) {
    return { kind: 'failed', reason: 'No extractable content' };
  }
  return { kind: 'content', content };
}

export function createScrapeEngine(fetcher: PageFetcher, config: ScrapeEngineConfig): ScrapeEngine {
  const random = config.random ?? Math.random;
  const delayRange = config.rateLimitDelayMs ?? DEFAULT_RATE_LIMIT_DELAY_MS;

  function rateLimitDelay(): number {
    return delayRange.min + random() * (delayRange.max - delayRange.min);
  }

  async function attempt(url: string, proxy: string | undefined): Promise<AttemptOutcome> {
    try {
      const response = await fetcher.fetchPage(url, {
        proxy,
        timeoutMs: config.timeoutMs,
        headers: BROWSER_HEADERS,
      });
      return classifyResponse(response);
    } catch (error) {
      return {
        kind: 'failed',
        reason: error instanceof Error ? error.message : String(error),
      };
    }
  }

  async function scrapeUrl(
    url: string,
    firstProxy: string | undefined,
    rotator: ProxyRotator | undefined,
  ): Promise<ScrapeResult> {
    let proxy = firstProxy;

    for (let attempts = 1; attempts <= MAX_ATTEMPTS; attempts++) {
      const outcome = await attempt(url, proxy);

      if (outcome.kind === 'content') {
        log.debug({ url, proxy, attempts, length: outcome.content.length }, 'Page scraped');
        return { url, content: outcome.content, proxy, attempts };
      }

      if (outcome.kind === 'failed') {
        log.warn({ url, proxy, attempts, reason: outcome.reason }, 'Scrape failed');
        return { url, proxy, attempts, failure: outcome.reason };
      }

      if (attempts < MAX_ATTEMPTS) {
        const delayMs = rateLimitDelay();
        log.warn({ url, proxy, delayMs }, 'Rate limited, retrying with next proxy');
        await sleep(delayMs);
        proxy = rotator?.next();
      }
    }

    log.warn({ url, proxy }, 'Rate limited again, giving up');
    return { url, proxy, attempts: MAX_ATTEMPTS, failure: 'HTTP 429 Too Many Requests' };
  }

  async function scrapeDetailed(urls: readonly string[]): Promise<ScrapeResult[]> {
    log.info({ urlCount: urls.length, proxyCount: config.proxies.length }, 'Scraping batch');

    const rotator =
      config.proxies.length > 0 ? createProxyRotator(config.proxies, random) : undefined;
    const assignments = urls.map((url) => ({ url, proxy: rotator?.next() }));

    const results = await Promise.all(
      assignments.map(({ url, proxy }) => scrapeUrl(url, proxy, rotator)),
    );

    log.info(
      {
        urlCount: urls.length,
        succeeded: results.filter((r) => r.content !== undefined).length,
      },
      'Scrape batch complete',
    );

    return results;
  }

  return {
    scrapeDetailed,

    async scrapeAll(urls: readonly string[]): Promise<string[]> {
      const results = await scrapeDetailed(urls);
      const contents: string[] = [];
      for (const result of results) {
        if (result.content !== undefined) {
          contents.push(result.content);
        }
      }
      return contents;
    },
  };
}
