import type { OpenAPIHono } from '@hono/zod-openapi';
import type { LlmClient, LlmRequest } from '@newscheck/core/src/llm/llm-client.js';
import type { PageFetcher, PageResponse } from '@newscheck/core/src/services/scraper/types.js';
import { createTrustCatalog } from '@newscheck/core/src/catalog/trust-catalog.js';
import { createMockWebSearchClient } from '@newscheck/core/src/services/web-search/mock-web-search-client.js';
import { createSearchGateway } from '@newscheck/core/src/services/search/search-gateway.js';
import { createScrapeEngine } from '@newscheck/core/src/services/scraper/scrape-engine.js';
import { createAssessmentEngine } from '@newscheck/core/src/services/assessment/assessment-engine.js';
import { createFactChecker } from '@newscheck/core/src/orchestration/fact-check-pipeline.js';
import { createNewsClassifier } from '@newscheck/core/src/agents/classifier.js';
import { createInputResolver } from '@newscheck/core/src/ingestion/input-resolver.js';
import { createNewsProcessor } from '@newscheck/core/src/services/news-processing/news-processor.js';
import { createInMemoryResultsRepository } from '@newscheck/core/src/repositories/in-memory-results.repository.js';
import { createInMemoryDebugArtifactStore } from '@newscheck/core/src/repositories/in-memory-debug-artifact.repository.js';
import type { ResultsRepository } from '@newscheck/core/src/repositories/results.repository.js';
import { createApp } from './app.js';
import type { AppEnv } from './types.js';

export interface TestAppOptions {
  /** Search links served per query. */
  readonly searchLinks?: Map<string, readonly string[]>;
  /** Page bodies by URL; unknown URLs answer 404. */
  readonly pages?: Record<string, PageResponse>;
  /** LLM answers by request purpose. */
  readonly llmResponses?: Partial<Record<LlmRequest['purpose'], string>>;
  readonly resultsRepository?: ResultsRepository;
  readonly now?: () => Date;
}

export interface TestApp {
  readonly app: OpenAPIHono<AppEnv>;
  readonly resultsRepository: ResultsRepository;
}

const DEFAULT_LLM_RESPONSES: Record<LlmRequest['purpose'], string> = {
  classification: 'News Type: Evergreen News, Misinformation Domain: Health',
  summary: 'Weight depends on overall calorie balance.',
  education: '1. Read official dietary guidance.',
  verdict: 'Potentially Misleading. Rice alone does not cause weight gain.',
};

/**
 * App wired to in-process fakes: no network, no disk.
 * For use in unit tests only.
 */
export function createTestApp(options: TestAppOptions = {}): TestApp {
  const now = options.now ?? ((): Date => new Date(2026, 0, 5, 9, 3, 7));
  const pages = options.pages ?? {};
  const llmResponses = { ...DEFAULT_LLM_RESPONSES, ...options.llmResponses };

  const llmClient: LlmClient = {
    invoke: (request) => Promise.resolve({ content: llmResponses[request.purpose] }),
  };
  const pageFetcher: PageFetcher = {
    fetchPage: (url) => Promise.resolve(pages[url] ?? { status: 404, body: '' }),
  };

  const factChecker = createFactChecker({
    searchGateway: createSearchGateway(
      {
        webSearchClient: createMockWebSearchClient(options.searchLinks),
        trustCatalog: createTrustCatalog({
          version: '1.0.0',
          evergreen: { General: ['wikipedia.org'], Health: ['cdc.gov', 'nhs.uk'] },
          realtime: { General: ['reuters.com', 'apnews.com'] },
        }),
      },
      { pageDelayMs: 0 },
    ),
    scrapeEngine: createScrapeEngine(pageFetcher, { proxies: [], timeoutMs: 1000 }),
    assessmentEngine: createAssessmentEngine(llmClient),
    debugArtifactStore: createInMemoryDebugArtifactStore(now),
    now,
  });

  const newsProcessor = createNewsProcessor({
    inputResolver: createInputResolver(pageFetcher, { timeoutMs: 1000 }),
    classifier: createNewsClassifier(llmClient),
    factChecker,
    now,
  });

  const resultsRepository = options.resultsRepository ?? createInMemoryResultsRepository(now);

  return {
    app: createApp({ newsProcessor, resultsRepository, requestLogging: false }),
    resultsRepository,
  };
}
