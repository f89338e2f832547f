import { randomUUID } from 'node:crypto';
import type {
  FailedNewsItemResult,
  NewsBatchResult,
  NewsClassification,
  NewsItemInput,
  NewsItemResult,
  ProcessedNewsItemResult,
} from '@newscheck/shared/src/types/news.types.js';
import { createChildLogger } from '@newscheck/shared/src/logger.js';
import { ClassificationError } from '@newscheck/shared/src/utils/errors.js';
import type { NewsClassifier } from '../../agents/classifier.js';
import type { InputResolver } from '../../ingestion/input-resolver.js';
import type { FactChecker } from '../../orchestration/fact-check-pipeline.js';
import { toReportRecord } from '../../orchestration/fact-check-report.js';

const log = createChildLogger('news:processor');

export const NOT_APPLICABLE = 'Not applicable for this news type';

export interface NewsProcessorDeps {
  readonly inputResolver: InputResolver;
  readonly classifier: NewsClassifier;
  readonly factChecker: FactChecker;
  readonly now?: () => Date;
  readonly generateId?: () => string;
}

export interface NewsProcessor {
  processNewsItem(item: NewsItemInput): Promise<NewsItemResult>;
  /** Items run one after another, in input order. */
  processBatch(items: readonly NewsItemInput[]): Promise<NewsBatchResult>;
}

function failed(id: string, error: string): FailedNewsItemResult {
  return { id, status: 'failed', error };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createNewsProcessor(deps: NewsProcessorDeps): NewsProcessor {
  const { inputResolver, classifier, factChecker } = deps;
  const now = deps.now ?? (() => new Date());
  const generateId = deps.generateId ?? randomUUID;

  async function processItem(item: NewsItemInput, id: string): Promise<NewsItemResult> {
    const text = item.text ?? '';
    const url = item.url ?? '';

    if (!text && !url) {
      return failed(id, 'No text or URL provided');
    }

    const inputContent = text || url;
    log.info({ newsId: id, preview: inputContent.slice(0, 100) }, 'Processing news item');

    const processedContent = await inputResolver.resolveInput(inputContent);
    if (!processedContent) {
      return failed(id, 'Could not process input content');
    }

    let classification: NewsClassification;
    try {
      classification = await classifier.classifyNews(processedContent);
    } catch (error) {
      if (error instanceof ClassificationError) {
        log.error({ newsId: id, error: error.message }, 'Classification failed');
        return failed(id, 'Could not categorize news');
      }
      throw error;
    }

    const base = {
      id,
      status: 'processed',
      original_text: text,
      original_url: url,
      processed_content: processedContent,
      raw_classifier_output: classification.rawOutput,
      news_type: classification.newsTypeLabel,
      misinformation_domain: classification.domainLabel,
      timestamp: now().toISOString(),
    } as const;

    if (!classification.recencyCategory) {
      log.info({ newsId: id, newsType: classification.newsTypeLabel }, 'Fact-check not applicable');
      return { ...base, fact_check_completed: false, fact_check_result: NOT_APPLICABLE };
    }

    try {
      const report = await factChecker.initializeFactChecker(
        classification.recencyCategory,
        processedContent,
        classification.domainCategory,
        id,
      );
      const result: ProcessedNewsItemResult = {
        ...base,
        ...toReportRecord(report),
        fact_check_completed: report.success,
      };
      return result;
    } catch (error) {
      log.error({ newsId: id, error: errorMessage(error) }, 'Fact-check failed');
      return { ...base, fact_check_completed: false, fact_check_error: errorMessage(error) };
    }
  }

  async function processNewsItem(item: NewsItemInput): Promise<NewsItemResult> {
    const id = item.id ?? generateId();

    try {
      return await processItem(item, id);
    } catch (error) {
      log.error({ newsId: id, error: errorMessage(error) }, 'Processing news item failed');
      return failed(id, `Processing failed: ${errorMessage(error)}`);
    }
  }

  return {
    processNewsItem,

    async processBatch(items: readonly NewsItemInput[]): Promise<NewsBatchResult> {
      log.info({ itemCount: items.length }, 'Processing news batch');

      const results: NewsItemResult[] = [];
      for (const item of items) {
        results.push(await processNewsItem(item));
      }

      log.info(
        { itemCount: items.length, failed: results.filter((r) => r.status === 'failed').length },
        'News batch processed',
      );

      return {
        processed_count: results.length,
        results,
        status: 'completed',
        timestamp: now().toISOString(),
      };
    },
  };
}
