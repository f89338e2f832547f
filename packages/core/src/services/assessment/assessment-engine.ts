import type { RecencyCategory } from '@newscheck/shared/src/types/fact-check.types.js';
import { createChildLogger } from '@newscheck/shared/src/logger.js';
import type { GenerationConfig, LlmClient, LlmPurpose } from '../../llm/llm-client.js';
import { buildEducationPrompt, buildSummaryPrompt, buildVerdictPrompt } from './prompts.js';

const log = createChildLogger('assessment:engine');

export const SUMMARY_FALLBACK = 'Summarization failed due to an error.';
export const EDUCATION_FALLBACK = 'Further education suggestions failed due to an error.';
export const VERDICT_FALLBACK = 'Fact-checking failed due to an error.';

const SUMMARY_GENERATION: GenerationConfig = { temperature: 0.2, maxOutputTokens: 500, topP: 1, topK: 1 };
const EDUCATION_GENERATION: GenerationConfig = { temperature: 0.3, maxOutputTokens: 300, topP: 1, topK: 1 };

const VERDICT_GENERATION: Readonly<Record<RecencyCategory, GenerationConfig>> = {
  Evergreen: { temperature: 0.1, maxOutputTokens: 300, topP: 1, topK: 1 },
  Realtime: { temperature: 0.2, maxOutputTokens: 400, topP: 1, topK: 1 },
};

export interface AssessmentEngine {
  summarize(scrapedContents: readonly string[]): Promise<string>;
  educate(claimText: string, domainCategory: string): Promise<string>;
  verdict(
    recencyCategory: RecencyCategory,
    claimText: string,
    scrapedContents: readonly string[],
  ): Promise<string>;
}

/**
 * LLM-backed synthesis steps of a fact-check. Every call degrades to its own
 * fallback text instead of throwing, so one failed step never blocks the others.
 */
export function createAssessmentEngine(llmClient: LlmClient): AssessmentEngine {
  async function generate(
    purpose: LlmPurpose,
    prompt: string,
    generation: GenerationConfig,
    fallback: string,
  ): Promise<string> {
    try {
      const response = await llmClient.invoke({ purpose, prompt, generation });
      return response.content.trim();
    } catch (error) {
      log.error(
        { purpose, error: error instanceof Error ? error.message : String(error) },
        'Assessment call failed, using fallback text',
      );
      return fallback;
    }
  }

  return {
    summarize(scrapedContents: readonly string[]): Promise<string> {
      log.info({ sourceCount: scrapedContents.length }, 'Summarizing trusted sources');
      return generate('summary', buildSummaryPrompt(scrapedContents), SUMMARY_GENERATION, SUMMARY_FALLBACK);
    },

    educate(claimText: string, domainCategory: string): Promise<string> {
      log.info({ domainCategory }, 'Generating further education suggestions');
      return generate(
        'education',
        buildEducationPrompt(claimText, domainCategory),
        EDUCATION_GENERATION,
        EDUCATION_FALLBACK,
      );
    },

    verdict(
      recencyCategory: RecencyCategory,
      claimText: string,
      scrapedContents: readonly string[],
    ): Promise<string> {
      log.info({ recencyCategory, sourceCount: scrapedContents.length }, 'Assessing claim');
      return generate(
        'verdict',
        buildVerdictPrompt(recencyCategory, claimText, scrapedContents),
        VERDICT_GENERATION[recencyCategory],
        VERDICT_FALLBACK,
      );
    },
  };
}
