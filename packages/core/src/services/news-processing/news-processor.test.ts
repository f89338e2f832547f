import { describe, it, expect, vi } from 'vitest';
import type { FactCheckReport } from '@newscheck/shared/src/types/fact-check.types.js';
import type { NewsClassification } from '@newscheck/shared/src/types/news.types.js';
import { ClassificationError } from '@newscheck/shared/src/utils/errors.js';
import type { NewsClassifier } from '../../agents/classifier.js';
import type { InputResolver } from '../../ingestion/input-resolver.js';
import type { FactChecker } from '../../orchestration/fact-check-pipeline.js';
import { createNewsProcessor } from './news-processor.js';
import type { NewsProcessorDeps } from './news-processor.js';

const NOW = new Date('2026-01-05T09:03:07.000Z');

const evergreenHealth: NewsClassification = {
  recencyCategory: 'Evergreen',
  domainCategory: 'Health',
  newsTypeLabel: 'Evergreen News',
  domainLabel: 'Health',
  rawOutput: 'News Type: Evergreen News, Misinformation Domain: Health',
};

const completedReport: FactCheckReport = {
  claimId: 'n1',
  recencyCategory: 'Evergreen',
  domainCategory: 'Health',
  trustedUrls: ['https://www.cdc.gov/rice'],
  sourcesUsed: ['https://www.cdc.gov/rice'],
  scrapedContents: ['Rice is a staple food.'],
  scrapedContentCount: 1,
  summarizedAnswer: 'summary',
  factCheckAssessment: 'Potentially Misleading.',
  furtherEducationSuggestions: 'suggestions',
  trustScore: 5,
  processingErrors: [],
  status: 'completed',
  success: true,
  debugData: { savedFile: 'debug/scraped_data_Health_20260105_090307.json' },
};

function createDeps(overrides: Partial<NewsProcessorDeps> = {}) {
  const inputResolver: InputResolver = {
    resolveInput: vi.fn((content: string) => Promise.resolve(content.trim() || undefined)),
  };
  const classifier: NewsClassifier = { classifyNews: vi.fn().mockResolvedValue(evergreenHealth) };
  const factChecker: FactChecker = {
    initializeFactChecker: vi.fn().mockResolvedValue(completedReport),
  };

  return {
    inputResolver,
    classifier,
    factChecker,
    now: () => NOW,
    generateId: () => 'generated-id',
    ...overrides,
  };
}

describe('createNewsProcessor', () => {
  it('should classify, fact-check and merge the report', async () => {
    const deps = createDeps();
    const processor = createNewsProcessor(deps);

    const result = await processor.processNewsItem({ id: 'n1', text: 'Eating rice makes you fat' });

    expect(result).toEqual({
      id: 'n1',
      status: 'processed',
      original_text: 'Eating rice makes you fat',
      original_url: '',
      processed_content: 'Eating rice makes you fat',
      raw_classifier_output: 'News Type: Evergreen News, Misinformation Domain: Health',
      news_type: 'Evergreen News',
      misinformation_domain: 'Health',
      timestamp: '2026-01-05T09:03:07.000Z',
      news_id: 'n1',
      trusted_urls: ['https://www.cdc.gov/rice'],
      scraped_content_count: 1,
      summarized_answer: 'summary',
      fact_check_assessment: 'Potentially Misleading.',
      further_education_suggestions: 'suggestions',
      trust_score: 5,
      processing_errors: [],
      sources_used: ['https://www.cdc.gov/rice'],
      fact_check_status: 'completed',
      success: true,
      debug_data: { saved_file: 'debug/scraped_data_Health_20260105_090307.json' },
      fact_check_completed: true,
    });
    expect(deps.factChecker.initializeFactChecker).toHaveBeenCalledWith(
      'Evergreen',
      'Eating rice makes you fat',
      'Health',
      'n1',
    );
  });

  it('should prefer text over url and generate an id', async () => {
    const deps = createDeps();
    const processor = createNewsProcessor(deps);

    const result = await processor.processNewsItem({
      text: 'Eating rice makes you fat',
      url: 'https://news.example.test/rice',
    });

    expect(result.id).toBe('generated-id');
    expect(deps.inputResolver.resolveInput).toHaveBeenCalledWith('Eating rice makes you fat');
  });

  it('should resolve the url when there is no text', async () => {
    const deps = createDeps();
    const processor = createNewsProcessor(deps);

    const result = await processor.processNewsItem({ id: 'n2', url: 'https://news.example.test/rice' });

    expect(deps.inputResolver.resolveInput).toHaveBeenCalledWith('https://news.example.test/rice');
    expect(result).toMatchObject({ status: 'processed', original_text: '', original_url: 'https://news.example.test/rice' });
  });

  it('should fail an item with neither text nor url', async () => {
    const processor = createNewsProcessor(createDeps());

    expect(await processor.processNewsItem({ id: 'n3' })).toEqual({
      id: 'n3',
      status: 'failed',
      error: 'No text or URL provided',
    });
  });

  it('should fail an item whose input cannot be resolved', async () => {
    const inputResolver: InputResolver = { resolveInput: vi.fn().mockResolvedValue(undefined) };
    const processor = createNewsProcessor(createDeps({ inputResolver }));

    expect(await processor.processNewsItem({ id: 'n4', url: 'https://down.example.test' })).toEqual({
      id: 'n4',
      status: 'failed',
      error: 'Could not process input content',
    });
  });

  it('should fail an item that cannot be classified', async () => {
    const classifier: NewsClassifier = {
      classifyNews: vi.fn().mockRejectedValue(new ClassificationError('quota exceeded')),
    };
    const processor = createNewsProcessor(createDeps({ classifier }));

    expect(await processor.processNewsItem({ id: 'n5', text: 'text' })).toEqual({
      id: 'n5',
      status: 'failed',
      error: 'Could not categorize news',
    });
  });

  it('should skip the fact-check when the news type is not recognized', async () => {
    const classifier: NewsClassifier = {
      classifyNews: vi.fn().mockResolvedValue({
        ...evergreenHealth,
        recencyCategory: undefined,
        newsTypeLabel: 'N/A',
        rawOutput: 'I cannot tell.',
      }),
    };
    const deps = createDeps({ classifier });
    const processor = createNewsProcessor(deps);

    const result = await processor.processNewsItem({ id: 'n6', text: 'text' });

    expect(result).toMatchObject({
      status: 'processed',
      news_type: 'N/A',
      fact_check_completed: false,
      fact_check_result: 'Not applicable for this news type',
    });
    expect(deps.factChecker.initializeFactChecker).not.toHaveBeenCalled();
  });

  it('should mark the fact-check incomplete when the report is unsuccessful', async () => {
    const factChecker: FactChecker = {
      initializeFactChecker: vi.fn().mockResolvedValue({
        ...completedReport,
        status: 'no_sources',
        success: false,
        processingErrors: ['No trusted sources found'],
      }),
    };
    const processor = createNewsProcessor(createDeps({ factChecker }));

    const result = await processor.processNewsItem({ id: 'n7', text: 'text' });

    expect(result).toMatchObject({
      fact_check_completed: false,
      fact_check_status: 'no_sources',
      processing_errors: ['No trusted sources found'],
    });
  });

  it('should record an unexpected fact-check exception on the item', async () => {
    const factChecker: FactChecker = {
      initializeFactChecker: vi.fn().mockRejectedValue(new Error('unexpected')),
    };
    const processor = createNewsProcessor(createDeps({ factChecker }));

    const result = await processor.processNewsItem({ id: 'n8', text: 'text' });

    expect(result).toMatchObject({ status: 'processed', fact_check_completed: false, fact_check_error: 'unexpected' });
  });

  it('should process a batch sequentially and report its size', async () => {
    const order: string[] = [];
    const inputResolver: InputResolver = {
      resolveInput: vi.fn(async (content: string) => {
        order.push(`start:${content}`);
        await Promise.resolve();
        order.push(`end:${content}`);
        return content;
      }),
    };
    const processor = createNewsProcessor(createDeps({ inputResolver }));

    const batch = await processor.processBatch([
      { id: 'a', text: 'first' },
      { id: 'b' },
      { id: 'c', text: 'second' },
    ]);

    expect(batch.processed_count).toBe(3);
    expect(batch.status).toBe('completed');
    expect(batch.timestamp).toBe('2026-01-05T09:03:07.000Z');
    expect(batch.results.map((r) => [r.id, r.status])).toEqual([
      ['a', 'processed'],
      ['b', 'failed'],
      ['c', 'processed'],
    ]);
    expect(order).toEqual(['start:first', 'end:first', 'start:second', 'end:second']);
  });

  it('should return an empty batch for no items', async () => {
    const batch = await createNewsProcessor(createDeps()).processBatch([]);

    expect(batch).toEqual({
      processed_count: 0,
      results: [],
      status: 'completed',
      timestamp: '2026-01-05T09:03:07.000Z',
    });
  });
});
