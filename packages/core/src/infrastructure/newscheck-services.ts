import type { Settings } from '@newscheck/schemas/src/settings.schema.js';
import type { TrustCatalogData } from '@newscheck/schemas/src/trust-catalog.schema.js';
import { createChildLogger } from '@newscheck/shared/src/logger.js';
import { createTrustCatalog } from '../catalog/trust-catalog.js';
import { createLlmClient, type LlmClient } from '../llm/llm-client.js';
import type { WebSearchClient } from '../services/web-search/types.js';
import { createGoogleSearchClient } from '../services/web-search/google-search-client.js';
import { createMockWebSearchClient } from '../services/web-search/mock-web-search-client.js';
import { createSearchGateway } from '../services/search/search-gateway.js';
import { createAxiosPageFetcher } from '../services/scraper/page-fetcher.js';
import { createScrapeEngine } from '../services/scraper/scrape-engine.js';
import { createAssessmentEngine } from '../services/assessment/assessment-engine.js';
import { createFactChecker, type FactChecker } from '../orchestration/fact-check-pipeline.js';
import { createNewsClassifier } from '../agents/classifier.js';
import { createInputResolver } from '../ingestion/input-resolver.js';
import {
  createNewsProcessor,
  type NewsProcessor,
} from '../services/news-processing/news-processor.js';
import type { ResultsRepository } from '../repositories/results.repository.js';
import type { DebugArtifactStore } from '../repositories/debug-artifact.repository.js';
import { createFsResultsRepository } from './fs-results.repository.js';
import { createFsDebugArtifactStore } from './fs-debug-artifact.repository.js';

const log = createChildLogger('infrastructure:services');

export interface NewscheckServices {
  readonly llmClient: LlmClient;
  readonly webSearchClient: WebSearchClient;
  readonly factChecker: FactChecker;
  readonly newsProcessor: NewsProcessor;
  readonly resultsRepository: ResultsRepository;
  readonly debugArtifactStore: DebugArtifactStore;
}

/** Wires the production stack from validated settings. */
export async function createNewscheckServices(
  settings: Settings,
  trustCatalogData: TrustCatalogData,
): Promise<NewscheckServices> {
  const llmClient = await createLlmClient(settings.llm);

  const webSearchClient = settings.llm.mock
    ? createMockWebSearchClient()
    : createGoogleSearchClient(settings.search);

  const pageFetcher = createAxiosPageFetcher();
  const debugArtifactStore = createFsDebugArtifactStore(settings.storage.debugArtifactsDir);
  const resultsRepository = createFsResultsRepository(settings.storage.resultsDir);

  const factChecker = createFactChecker({
    searchGateway: createSearchGateway(
      { webSearchClient, trustCatalog: createTrustCatalog(trustCatalogData) },
      settings.search,
    ),
    scrapeEngine: createScrapeEngine(pageFetcher, settings.scraper),
    assessmentEngine: createAssessmentEngine(llmClient),
    debugArtifactStore,
  });

  const newsProcessor = createNewsProcessor({
    inputResolver: createInputResolver(pageFetcher, { timeoutMs: settings.scraper.timeoutMs }),
    classifier: createNewsClassifier(llmClient),
    factChecker,
  });

  log.info(
    {
      mockLlm: settings.llm.mock,
      searchConfigured: webSearchClient.configured,
      proxyCount: settings.scraper.proxies.length,
    },
    'Services initialized',
  );

  return { llmClient, webSearchClient, factChecker, newsProcessor, resultsRepository, debugArtifactStore };
}
