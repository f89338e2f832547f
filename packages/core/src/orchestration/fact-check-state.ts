import { Annotation } from '@langchain/langgraph';
import type { Claim, FactCheckStatus } from '@newscheck/shared/src/types/fact-check.types.js';

export const FactCheckGraphAnnotation = Annotation.Root({
  claim: Annotation<Claim>,
  trustedUrls: Annotation<readonly string[]>,
  scrapedContents: Annotation<readonly string[]>,
  summarizedAnswer: Annotation<string>,
  furtherEducationSuggestions: Annotation<string>,
  factCheckAssessment: Annotation<string>,
  trustScore: Annotation<number>,
  processingErrors: Annotation<readonly string[]>({
    reducer: (current, update) => [...current, ...update],
    default: () => [],
  }),
  /** Set once a terminal state is reached; routing ends the graph when present. */
  status: Annotation<FactCheckStatus | undefined>,
  savedFile: Annotation<string | undefined>,
});

export type FactCheckGraphState = typeof FactCheckGraphAnnotation.State;
