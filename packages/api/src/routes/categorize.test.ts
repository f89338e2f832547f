import { describe, it, expect, vi } from 'vitest';
import type { ResultsRepository } from '@newscheck/core/src/repositories/results.repository.js';
import { createTestApp } from '../test-helpers.js';

const RICE = 'Eating rice makes you fat';

function post(body: unknown): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

function riceApp(overrides: { resultsRepository?: ResultsRepository } = {}) {
  return createTestApp({
    searchLinks: new Map([[RICE, ['https://www.example.com/diet', 'https://www.cdc.gov/rice']]]),
    pages: {
      'https://www.cdc.gov/rice': {
        status: 200,
        body: '<html><body><p>Rice can be part of a healthy diet.</p></body></html>',
      },
    },
    ...overrides,
  });
}

describe('POST /categorize', () => {
  it('should classify and fact-check a single item', async () => {
    const { app } = riceApp();

    const res = await app.request('/categorize', post({ id: 'n1', text: RICE }));

    expect(res.status).toBe(200);
    const body = (await res.json()) as Record<string, unknown>;
    expect(body).toHaveProperty('processed_count', 1);
    expect(body).toHaveProperty('status', 'completed');
    expect(body).toHaveProperty('results_file', 'categorization_results_20260105_090307.json');

    const [item] = body['results'] as Record<string, unknown>[];
    expect(item).toMatchObject({
      id: 'n1',
      status: 'processed',
      original_text: RICE,
      news_type: 'Evergreen News',
      misinformation_domain: 'Health',
      fact_check_completed: true,
      fact_check_status: 'completed',
      trusted_urls: ['https://www.cdc.gov/rice'],
      scraped_content_count: 1,
      fact_check_assessment: 'Potentially Misleading. Rice alone does not cause weight gain.',
      trust_score: 5,
      debug_data: { saved_file: 'scraped_data_Health_20260105_090307.json' },
    });
  });

  it('should accept an array of items and report failures inline', async () => {
    const { app } = riceApp();

    const res = await app.request('/categorize', post([{ id: 'a', text: RICE }, { id: 'b' }]));

    expect(res.status).toBe(200);
    const body = (await res.json()) as { processed_count: number; results: Record<string, unknown>[] };
    expect(body.processed_count).toBe(2);
    expect(body.results[1]).toEqual({ id: 'b', status: 'failed', error: 'No text or URL provided' });
  });

  it('should accept a news_items envelope', async () => {
    const { app } = riceApp();

    const res = await app.request('/categorize', post({ news_items: [{ id: 7, text: RICE }] }));

    expect(res.status).toBe(200);
    const body = (await res.json()) as { results: Record<string, unknown>[] };
    expect(body.results[0]).toHaveProperty('id', '7');
  });

  it('should skip the fact-check for an unclassifiable news type', async () => {
    const { app } = createTestApp({ llmResponses: { classification: 'Unable to determine.' } });

    const res = await app.request('/categorize', post({ id: 'n2', text: 'Something happened' }));

    const body = (await res.json()) as { results: Record<string, unknown>[] };
    expect(body.results[0]).toMatchObject({
      status: 'processed',
      news_type: 'N/A',
      fact_check_completed: false,
      fact_check_result: 'Not applicable for this news type',
    });
  });

  it('should still respond when the snapshot cannot be saved', async () => {
    const resultsRepository: ResultsRepository = {
      save: vi.fn().mockRejectedValue(new Error('disk full')),
      get: vi.fn(),
      list: vi.fn(),
    };
    const { app } = riceApp({ resultsRepository });

    const res = await app.request('/categorize', post({ id: 'n1', text: RICE }));

    expect(res.status).toBe(200);
    const body = (await res.json()) as Record<string, unknown>;
    expect(body).not.toHaveProperty('results_file');
    expect(body).toHaveProperty('processed_count', 1);
  });

  it('should return 400 for a body of the wrong shape', async () => {
    const { app } = riceApp();

    const res = await app.request('/categorize', post(42));

    expect(res.status).toBe(400);
    const body = (await res.json()) as Record<string, unknown>;
    expect(body).toHaveProperty('code', 'VALIDATION_ERROR');
  });

  it('should return 400 for malformed JSON', async () => {
    const { app } = riceApp();

    const res = await app.request('/categorize', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"text": ',
    });

    expect(res.status).toBe(400);
    const body = (await res.json()) as Record<string, unknown>;
    expect(body).toHaveProperty('code', 'INVALID_REQUEST');
  });
});
