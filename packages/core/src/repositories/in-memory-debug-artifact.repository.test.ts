import { describe, it, expect } from 'vitest';
import type { DebugArtifact } from '@newscheck/shared/src/types/fact-check.types.js';
import { createInMemoryDebugArtifactStore } from './in-memory-debug-artifact.repository.js';

const artifact: DebugArtifact = {
  inputNewsText: 'Eating rice makes you fat',
  recencyCategory: 'Evergreen',
  domainCategory: 'Health',
  trustedUrlsFound: ['https://www.cdc.gov/rice'],
  scrapedContents: ['Rice is a staple food.'],
  summarizedAnswer: 'summary',
  factCheckAssessment: 'Potentially Misleading.',
  furtherEducationSuggestions: 'suggestions',
  trustScore: 5,
  timestamp: '2026-01-05T09:03:07.000Z',
};

describe('InMemoryDebugArtifactStore', () => {
  it('should name artifacts by domain and time and keep a copy', async () => {
    const store = createInMemoryDebugArtifactStore(() => new Date(2026, 0, 5, 9, 3, 7));

    const first = await store.save(artifact);
    const second = await store.save(artifact);

    expect(first).toBe('scraped_data_Health_20260105_090307.json');
    expect(second).toBe('scraped_data_Health_20260105_090307_1.json');
    expect(store.artifacts.get(first)).toEqual(artifact);
    expect(store.artifacts.get(first)).not.toBe(artifact);
  });
});
