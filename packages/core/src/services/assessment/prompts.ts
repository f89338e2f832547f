import type { RecencyCategory } from '@newscheck/shared/src/types/fact-check.types.js';

export const SUMMARY_SOURCE_LIMIT = 3000;

export const VERDICT_SOURCE_LIMITS: Readonly<Record<RecencyCategory, number>> = {
  Evergreen: 2000,
  Realtime: 4000,
};

export function buildSummaryPrompt(scrapedContents: readonly string[]): string {
  const combined = scrapedContents.join('\n\n').slice(0, SUMMARY_SOURCE_LIMIT);

  return `Based on the following content from trusted sources, provide a concise summary of the key information related to the topic.

Trusted Sources Content:
${combined}

Summary:`;
}

export function buildEducationPrompt(claimText: string, domainCategory: string): string {
  return `Given the original news topic: "${claimText}" (categorized as ${domainCategory} misinformation), suggest 3-5 key areas or reputable resources for an individual to further educate themselves to avoid similar misinformation in the future. Focus on critical thinking, media literacy, and understanding the ${domainCategory} domain.

Suggestions:`;
}

function buildEvergreenVerdictPrompt(claimText: string, sources: string): string {
  return `Given the following original news text and content from trusted sources, analyze if the original news text contains misinformation related to evergreen topics.
Focus on factual accuracy and consistency with the trusted sources.

Original News Text: ${claimText}

Trusted Sources Content: ${sources}

Based on the comparison, state clearly if the Original News Text is likely 'True', 'Potentially Misleading', or 'False'. Also, provide a brief explanation for your assessment.`;
}

function buildRealtimeVerdictPrompt(claimText: string, sources: string): string {
  return `Given the following breaking or developing news text and recent reporting from trusted outlets, assess whether the news text is supported by that reporting.

News Text: ${claimText}

Recent Reporting: ${sources}

Start your answer with exactly one of 'true', 'needs verification', or 'false'. Then give your reasoning in a few sentences, and note that coverage of an ongoing event may still change.`;
}

export function buildVerdictPrompt(
  recencyCategory: RecencyCategory,
  claimText: string,
  scrapedContents: readonly string[],
): string {
  const sources = scrapedContents.join(' ').slice(0, VERDICT_SOURCE_LIMITS[recencyCategory]);

  return recencyCategory === 'Evergreen'
    ? buildEvergreenVerdictPrompt(claimText, sources)
    : buildRealtimeVerdictPrompt(claimText, sources);
}
