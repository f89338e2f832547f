import { StateGraph, START, END } from '@langchain/langgraph';
import type {
  Claim,
  DomainCategory,
  FactCheckReport,
} from '@newscheck/shared/src/types/fact-check.types.js';
import { createChildLogger } from '@newscheck/shared/src/logger.js';
import type { SearchGateway } from '../services/search/search-gateway.js';
import type { ScrapeEngine } from '../services/scraper/scrape-engine.js';
import type { AssessmentEngine } from '../services/assessment/assessment-engine.js';
import { computeTrustScore } from '../services/assessment/trust-score.js';
import type { DebugArtifactStore } from '../repositories/debug-artifact.repository.js';
import { parseDomainCategory, parseRecencyCategory } from '../catalog/categories.js';
import { FactCheckGraphAnnotation, type FactCheckGraphState } from './fact-check-state.js';
import { failedReport, reportFromState, unsupportedReport } from './fact-check-report.js';

const log = createChildLogger('orchestration:fact-check');

export const NO_SOURCES_ERROR = 'No trusted sources found';
export const NO_SOURCES_ASSESSMENT = 'N/A - No trusted sources found';
export const NO_CONTENT_ERROR = 'Could not scrape content from any trusted URLs';
export const NO_CONTENT_ASSESSMENT = 'N/A - No content scraped from trusted URLs';

export interface FactCheckerDeps {
  readonly searchGateway: SearchGateway;
  readonly scrapeEngine: ScrapeEngine;
  readonly assessmentEngine: AssessmentEngine;
  readonly debugArtifactStore: DebugArtifactStore;
  readonly now?: () => Date;
}

export interface FactCheckerConfig {
  readonly maxSearchResults: number;
  readonly searchPageSize: number;
}

export interface FactChecker {
  /**
   * Runs a fact-check for one claim. Never throws: every failure ends up in
   * the report's `processingErrors` and `status`.
   */
  initializeFactChecker(
    recencyCategory: string,
    claimText: string,
    domainCategory: string,
    claimId?: string,
  ): Promise<FactCheckReport>;
}

const DEFAULT_CONFIG: FactCheckerConfig = {
  maxSearchResults: 50,
  searchPageSize: 10,
};

type FactCheckNode = (state: FactCheckGraphState) => Promise<Partial<FactCheckGraphState>>;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function guardNode(stage: string, node: FactCheckNode): FactCheckNode {
  return async (state) => {
    try {
      return await node(state);
    } catch (error) {
      log.error({ stage, claimId: state.claim.id, error: errorMessage(error) }, 'Fact-check stage failed');
      return {
        processingErrors: [`Fact-checking failed: ${errorMessage(error)}`],
        status: 'failed',
      };
    }
  };
}

function routeUnlessFinished(next: string): (state: FactCheckGraphState) => string {
  return (state) => (state.status === undefined ? next : '__end__');
}

export function createFactChecker(
  deps: FactCheckerDeps,
  config: FactCheckerConfig = DEFAULT_CONFIG,
): FactChecker {
  const { searchGateway, scrapeEngine, assessmentEngine, debugArtifactStore } = deps;
  const now = deps.now ?? (() => new Date());

  const sourceDiscoveryNode: FactCheckNode = async (state) => {
    const { claim } = state;
    const trustedUrls = await searchGateway.search(
      claim.text,
      claim.domainCategory,
      claim.recencyCategory,
      config.maxSearchResults,
      config.searchPageSize,
    );

    if (trustedUrls.length === 0) {
      log.warn({ claimId: claim.id }, 'No trusted sources found');
      return {
        trustedUrls,
        processingErrors: [NO_SOURCES_ERROR],
        factCheckAssessment: NO_SOURCES_ASSESSMENT,
        trustScore: 0,
        status: 'no_sources',
      };
    }

    log.info({ claimId: claim.id, urlCount: trustedUrls.length }, 'Trusted sources found');
    return { trustedUrls };
  };

  const scrapingNode: FactCheckNode = async (state) => {
    const scrapedContents = await scrapeEngine.scrapeAll(state.trustedUrls);

    if (scrapedContents.length === 0) {
      log.warn({ claimId: state.claim.id }, 'No content scraped from trusted sources');
      return {
        scrapedContents,
        processingErrors: [NO_CONTENT_ERROR],
        factCheckAssessment: NO_CONTENT_ASSESSMENT,
        trustScore: 0,
        status: 'no_content',
      };
    }

    log.info({ claimId: state.claim.id, scrapedCount: scrapedContents.length }, 'Sources scraped');
    return { scrapedContents };
  };

  const synthesisNode: FactCheckNode = async (state) => {
    const { claim, scrapedContents } = state;

    const summarizedAnswer = await assessmentEngine.summarize(scrapedContents);
    const furtherEducationSuggestions = await assessmentEngine.educate(claim.text, claim.domainCategory);
    const factCheckAssessment = await assessmentEngine.verdict(
      claim.recencyCategory,
      claim.text,
      scrapedContents,
    );

    return { summarizedAnswer, furtherEducationSuggestions, factCheckAssessment };
  };

  const scoringNode: FactCheckNode = (state) =>
    Promise.resolve({
      trustScore: computeTrustScore(state.claim.recencyCategory, state.factCheckAssessment),
    });

  const persistenceNode: FactCheckNode = async (state) => {
    const { claim } = state;
    let savedFile: string | undefined;

    try {
      savedFile = await debugArtifactStore.save({
        inputNewsText: claim.text,
        recencyCategory: claim.recencyCategory,
        domainCategory: claim.domainCategory,
        trustedUrlsFound: state.trustedUrls,
        scrapedContents: state.scrapedContents,
        summarizedAnswer: state.summarizedAnswer,
        factCheckAssessment: state.factCheckAssessment,
        furtherEducationSuggestions: state.furtherEducationSuggestions,
        trustScore: state.trustScore,
        timestamp: now().toISOString(),
      });
    } catch (error) {
      log.error({ claimId: claim.id, error: errorMessage(error) }, 'Failed to save debug artifact');
    }

    return { savedFile, status: 'completed' };
  };

  const graph = new StateGraph(FactCheckGraphAnnotation)
    .addNode('sourceDiscovery', guardNode('sourceDiscovery', sourceDiscoveryNode))
    .addNode('scraping', guardNode('scraping', scrapingNode))
    .addNode('synthesis', guardNode('synthesis', synthesisNode))
    .addNode('scoring', guardNode('scoring', scoringNode))
    .addNode('persistence', guardNode('persistence', persistenceNode))
    .addEdge(START, 'sourceDiscovery')
    .addConditionalEdges('sourceDiscovery', routeUnlessFinished('scraping'), {
      scraping: 'scraping',
      __end__: END,
    })
    .addConditionalEdges('scraping', routeUnlessFinished('synthesis'), {
      synthesis: 'synthesis',
      __end__: END,
    })
    .addConditionalEdges('synthesis', routeUnlessFinished('scoring'), {
      scoring: 'scoring',
      __end__: END,
    })
    .addConditionalEdges('scoring', routeUnlessFinished('persistence'), {
      persistence: 'persistence',
      __end__: END,
    })
    .addEdge('persistence', END)
    .compile();

  return {
    async initializeFactChecker(
      recencyCategory: string,
      claimText: string,
      domainCategory: string,
      claimId?: string,
    ): Promise<FactCheckReport> {
      const domain: DomainCategory = parseDomainCategory(domainCategory) ?? 'General';
      const recency = parseRecencyCategory(recencyCategory);

      if (!recency) {
        log.warn({ claimId, recencyCategory }, 'Recency category not recognized, skipping fact-check');
        return unsupportedReport(domain, claimId);
      }

      const claim: Claim = {
        id: claimId,
        text: claimText,
        recencyCategory: recency,
        domainCategory: domain,
      };

      log.info(
        { claimId, recencyCategory: recency, domainCategory: domain, preview: claimText.slice(0, 100) },
        'Starting fact-check',
      );

      try {
        const result = await graph.invoke({
          claim,
          trustedUrls: [],
          scrapedContents: [],
          summarizedAnswer: '',
          furtherEducationSuggestions: '',
          factCheckAssessment: '',
          trustScore: 0,
          status: undefined,
          savedFile: undefined,
        });

        const report = reportFromState(result);
        log.info(
          { claimId, status: report.status, trustScore: report.trustScore },
          'Fact-check complete',
        );
        return report;
      } catch (error) {
        log.error({ claimId, error: errorMessage(error) }, 'Fact-check run failed');
        return failedReport(claim, errorMessage(error));
      }
    },
  };
}
