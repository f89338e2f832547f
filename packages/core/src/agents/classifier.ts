import type { NewsClassification } from '@newscheck/shared/src/types/news.types.js';
import { createChildLogger } from '@newscheck/shared/src/logger.js';
import { ClassificationError } from '@newscheck/shared/src/utils/errors.js';
import type { GenerationConfig, LlmClient } from '../llm/llm-client.js';
import { parseDomainCategory, parseRecencyCategory } from '../catalog/categories.js';

const log = createChildLogger('agent:classifier');

const CLASSIFIER_GENERATION: GenerationConfig = { temperature: 0.2, maxOutputTokens: 60 };

const NOT_AVAILABLE = 'N/A';

const NEWS_TYPE_PATTERN = /News Type:\s*([^,\n]*)/i;
const DOMAIN_PATTERN = /Misinformation Domain:\s*([^,\n]*)/i;

export interface NewsClassifier {
  classifyNews(text: string): Promise<NewsClassification>;
}

function buildClassifierPrompt(text: string): string {
  return `Categorize the following news text into two aspects:
1. News Type: 'Real-time News' or 'Evergreen News'.
   - Real-time news refers to current events, breaking news, or topics with a short shelf-life.
   - Evergreen news refers to content that remains relevant over a long period, often educational, how-to, or historical.
2. Misinformation Domain: 'Health', 'Finance', 'General', or 'Other'.
   - Health misinformation relates to medical treatments, diseases, or public health.
   - Finance misinformation relates to investments, economic claims, or financial advice.
   - General misinformation covers social, political, or miscellaneous topics not falling into Health or Finance.
   - Other is for categories not explicitly listed.

News Text: ${text}

Please provide the output in the format: News Type: [Category], Misinformation Domain: [Category].`;
}

function extractLabel(raw: string, pattern: RegExp): string {
  const match = pattern.exec(raw);
  const label = (match?.[1] ?? '').replace(/[[\]'"*.]/g, '').trim();
  return label || NOT_AVAILABLE;
}

export function parseClassifierOutput(raw: string): NewsClassification {
  const newsTypeLabel = extractLabel(raw, NEWS_TYPE_PATTERN);
  const domainLabel = extractLabel(raw, DOMAIN_PATTERN);

  return {
    recencyCategory: parseRecencyCategory(newsTypeLabel),
    domainCategory: parseDomainCategory(domainLabel) ?? 'General',
    newsTypeLabel,
    domainLabel,
    rawOutput: raw,
  };
}

export function createNewsClassifier(llmClient: LlmClient): NewsClassifier {
  return {
    async classifyNews(text: string): Promise<NewsClassification> {
      log.info({ textLength: text.length }, 'Classifying news item');

      let raw: string;
      try {
        const response = await llmClient.invoke({
          purpose: 'classification',
          prompt: buildClassifierPrompt(text),
          generation: CLASSIFIER_GENERATION,
        });
        raw = response.content.trim();
      } catch (error) {
        throw new ClassificationError(
          `News classification failed: ${error instanceof Error ? error.message : String(error)}`,
          error instanceof Error ? error : undefined,
        );
      }

      const classification = parseClassifierOutput(raw);

      log.info(
        {
          recencyCategory: classification.recencyCategory,
          domainCategory: classification.domainCategory,
          newsTypeLabel: classification.newsTypeLabel,
        },
        'Classification complete',
      );

      return classification;
    },
  };
}
