import { describe, it, expect, vi } from 'vitest';
import type { PageFetcher } from '../services/scraper/types.js';
import { createInputResolver } from './input-resolver.js';

function fetcherReturning(status: number, body: string): PageFetcher {
  return { fetchPage: vi.fn().mockResolvedValue({ status, body }) };
}

describe('createInputResolver', () => {
  it('should return plain text trimmed without fetching', async () => {
    const fetcher = fetcherReturning(200, '');
    const resolver = createInputResolver(fetcher, { timeoutMs: 5000 });

    expect(await resolver.resolveInput('  Eating rice makes you fat.  ')).toBe('Eating rice makes you fat.');
    expect(fetcher.fetchPage).not.toHaveBeenCalled();
  });

  it('should return undefined for blank text', async () => {
    const resolver = createInputResolver(fetcherReturning(200, ''), { timeoutMs: 5000 });

    expect(await resolver.resolveInput('   ')).toBeUndefined();
  });

  it('should fetch a URL and extract its paragraphs', async () => {
    const fetcher = fetcherReturning(
      200,
      '<html><body><p>Rates were cut.</p><p>Markets rallied.</p></body></html>',
    );
    const resolver = createInputResolver(fetcher, { timeoutMs: 5000 });

    const text = await resolver.resolveInput('https://news.example.test/story');

    expect(text).toBe('Rates were cut. Markets rallied.');
    expect(fetcher.fetchPage).toHaveBeenCalledWith(
      'https://news.example.test/story',
      expect.objectContaining({ timeoutMs: 5000 }),
    );
  });

  it('should return undefined for an HTTP error', async () => {
    const resolver = createInputResolver(fetcherReturning(404, 'Not found'), { timeoutMs: 5000 });

    expect(await resolver.resolveInput('http://news.example.test/missing')).toBeUndefined();
  });

  it('should return undefined for a page without text', async () => {
    const resolver = createInputResolver(fetcherReturning(200, '<html><script>x()</script></html>'), {
      timeoutMs: 5000,
    });

    expect(await resolver.resolveInput('https://news.example.test/empty')).toBeUndefined();
  });

  it('should return undefined when the fetch fails', async () => {
    const fetcher: PageFetcher = { fetchPage: vi.fn().mockRejectedValue(new Error('ECONNREFUSED')) };
    const resolver = createInputResolver(fetcher, { timeoutMs: 5000 });

    expect(await resolver.resolveInput('https://news.example.test/down')).toBeUndefined();
  });
});
