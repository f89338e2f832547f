import { describe, it, expect, vi, afterEach } from 'vitest';
import { createSearchGateway } from './search-gateway.js';
import { createTrustCatalog } from '../../catalog/trust-catalog.js';
import { createMockWebSearchClient } from '../web-search/mock-web-search-client.js';
import type { WebSearchClient } from '../web-search/types.js';

const trustCatalog = createTrustCatalog({
  version: '1.0.0',
  evergreen: {
    General: ['wikipedia.org'],
    Health: ['cdc.gov', 'nhs.uk', 'mayoclinic.org'],
  },
  realtime: {
    General: ['reuters.com', 'apnews.com'],
  },
});

function gatewayFor(links: readonly string[], query = 'claim') {
  const responses = new Map<string, readonly string[]>([[query, links]]);
  const webSearchClient = createMockWebSearchClient(responses);
  const searchSpy = vi.spyOn(webSearchClient, 'searchPage');
  const gateway = createSearchGateway({ webSearchClient, trustCatalog }, { pageDelayMs: 0 });
  return { gateway, searchSpy };
}

describe('SearchGateway', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should keep only trusted links in ranking order without duplicates', async () => {
    const { gateway } = gatewayFor([
      'https://random-blog.test/rice',
      'https://www.cdc.gov/nutrition/rice',
      'https://www.nhs.uk/live-well/rice',
      'https://www.cdc.gov/nutrition/rice',
      'https://en.wikipedia.org/wiki/Rice',
    ]);

    const urls = await gateway.search('claim', 'Health', 'Evergreen');

    expect(urls).toEqual([
      'https://www.cdc.gov/nutrition/rice',
      'https://www.nhs.uk/live-well/rice',
    ]);
  });

  it('should cap evergreen results at 5 and stop paging', async () => {
    const links = Array.from({ length: 30 }, (_, i) => `https://www.cdc.gov/page-${String(i)}`);
    const { gateway, searchSpy } = gatewayFor(links);

    const urls = await gateway.search('claim', 'Health', 'Evergreen');

    expect(urls).toHaveLength(5);
    expect(urls[4]).toBe('https://www.cdc.gov/page-4');
    expect(searchSpy).toHaveBeenCalledTimes(1);
  });

  it('should page in steps of pageSize until a page comes back empty', async () => {
    const links = [
      'https://a.test/1',
      'https://a.test/2',
      'https://a.test/3',
      'https://www.cdc.gov/late',
    ];
    const { gateway, searchSpy } = gatewayFor(links);

    const urls = await gateway.search('claim', 'Health', 'Evergreen', 50, 2);

    expect(urls).toEqual(['https://www.cdc.gov/late']);
    expect(searchSpy.mock.calls.map((call) => call[1])).toEqual([1, 3, 5]);
  });

  it('should not request beyond maxResults', async () => {
    const links = Array.from({ length: 40 }, (_, i) => `https://a.test/${String(i)}`);
    const { gateway, searchSpy } = gatewayFor(links);

    await gateway.search('claim', 'Health', 'Evergreen', 25, 10);

    expect(searchSpy.mock.calls.map((call) => [call[1], call[2]])).toEqual([
      [1, 10],
      [11, 10],
      [21, 5],
    ]);
  });

  it('should page one result at a time when pageSize is not positive', async () => {
    const { gateway, searchSpy } = gatewayFor(['https://www.cdc.gov/a', 'https://a.test/b']);

    const urls = await gateway.search('claim', 'Health', 'Evergreen', 50, 0);

    expect(urls).toEqual(['https://www.cdc.gov/a']);
    expect(searchSpy.mock.calls.map((call) => [call[1], call[2]])).toEqual([
      [1, 1],
      [2, 1],
      [3, 1],
    ]);
  });

  it('should clamp pageSize to the 10 results a page can hold', async () => {
    const links = Array.from({ length: 40 }, (_, i) => `https://a.test/${String(i)}`);
    const { gateway, searchSpy } = gatewayFor(links);

    await gateway.search('claim', 'Health', 'Evergreen', 25, 25);

    expect(searchSpy.mock.calls.map((call) => [call[1], call[2]])).toEqual([
      [1, 10],
      [11, 10],
      [21, 5],
    ]);
  });

  it('should use the General list for an unknown domain', async () => {
    const { gateway } = gatewayFor(['https://www.cdc.gov/x', 'https://en.wikipedia.org/wiki/X']);

    const urls = await gateway.search('claim', 'Sports', 'Evergreen');

    expect(urls).toEqual(['https://en.wikipedia.org/wiki/X']);
  });

  it('should widen real-time results to news-like URLs when fewer than 3 are trusted', async () => {
    const { gateway } = gatewayFor([
      'https://www.reuters.com/world/story',
      'https://localpaper.test/news/story',
      'https://blog.test/opinion',
      'https://tv.test/live/updates',
      'https://www.reuters.com/world/story',
    ]);

    const urls = await gateway.search('claim', 'General', 'Realtime');

    expect(urls).toEqual([
      'https://www.reuters.com/world/story',
      'https://localpaper.test/news/story',
      'https://tv.test/live/updates',
    ]);
  });

  it('should cap real-time results at 8', async () => {
    const links = Array.from({ length: 12 }, (_, i) => `https://apnews.com/article-${String(i)}`);
    const { gateway } = gatewayFor(links);

    const urls = await gateway.search('claim', 'General', 'Realtime');

    expect(urls).toHaveLength(8);
  });

  it('should return an empty list when the client is not configured', async () => {
    const webSearchClient: WebSearchClient = {
      configured: false,
      searchPage: vi.fn(),
    };
    const gateway = createSearchGateway({ webSearchClient, trustCatalog }, { pageDelayMs: 0 });

    await expect(gateway.search('claim', 'Health', 'Evergreen')).resolves.toEqual([]);
    expect(webSearchClient.searchPage).not.toHaveBeenCalled();
  });

  it('should return an empty list when every page request fails', async () => {
    const webSearchClient: WebSearchClient = {
      configured: true,
      searchPage: vi.fn().mockRejectedValue(new Error('403 Forbidden')),
    };
    const gateway = createSearchGateway({ webSearchClient, trustCatalog }, { pageDelayMs: 0 });

    await expect(gateway.search('claim', 'Health', 'Evergreen')).resolves.toEqual([]);
  });

  it('should keep trusted links from pages fetched before a failure', async () => {
    const searchPage = vi
      .fn()
      .mockResolvedValueOnce({
        query: 'claim',
        start: 1,
        hits: [{ link: 'https://www.cdc.gov/first', position: 1 }],
      })
      .mockRejectedValueOnce(new Error('socket hang up'));
    const gateway = createSearchGateway(
      { webSearchClient: { configured: true, searchPage }, trustCatalog },
      { pageDelayMs: 0 },
    );

    const urls = await gateway.search('claim', 'Health', 'Evergreen');

    expect(urls).toEqual(['https://www.cdc.gov/first']);
    expect(searchPage).toHaveBeenCalledTimes(2);
  });

  it('should wait the page delay between page requests', async () => {
    vi.useFakeTimers();
    const links = Array.from({ length: 15 }, (_, i) => `https://a.test/${String(i)}`);
    const webSearchClient = createMockWebSearchClient(new Map([['claim', links]]));
    const searchSpy = vi.spyOn(webSearchClient, 'searchPage');
    const gateway = createSearchGateway({ webSearchClient, trustCatalog }, { pageDelayMs: 1000 });

    const pending = gateway.search('claim', 'Health', 'Evergreen', 20, 10);

    await vi.advanceTimersByTimeAsync(0);
    expect(searchSpy).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(999);
    expect(searchSpy).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    await expect(pending).resolves.toEqual([]);
    expect(searchSpy).toHaveBeenCalledTimes(2);
  });
});
