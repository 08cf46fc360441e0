import { describe, expect, it, vi } from 'vitest';

import { buildSearchQuery, isListedInPage, runResearcherAgent } from '../src/agents/researcherAgent';
import { seededRandom } from '../src/random';
import type { FetchHtmlOptions } from '../src/tools/http';

import { business, fetcherFrom, testConfig, testContext } from './helpers';

describe('buildSearchQuery', () => {
  it('adds the street segment when the address is known', () => {
    expect(buildSearchQuery(business())).toBe("Joe's Cafe 123 Harbor View Road");
  });

  it('uses the name alone for placeholder addresses', () => {
    expect(buildSearchQuery(business({ address: 'Address unavailable' }))).toBe("Joe's Cafe");
  });
});

describe('isListedInPage', () => {
  it('matches the name inside a listing title', () => {
    const html = '<ul><li><h3 class="business-name">Joe&#39;s Cafe &amp; Bakery</h3></li></ul>';
    expect(isListedInPage(html, business())).toBe(true);
  });

  it('ignores the name outside listing titles', () => {
    const html = "<p>People also searched for Joe's Cafe</p>";
    expect(isListedInPage(html, business({ address: 'Address unavailable', phone: 'Phone unavailable' }))).toBe(
      false
    );
  });

  it('falls back to the street address and the phone digits', () => {
    expect(isListedInPage('<p>123 HARBOR VIEW ROAD</p>', business())).toBe(true);
    expect(isListedInPage('<a href="tel:5551234567">Call</a>', business())).toBe(true);
    expect(isListedInPage('<p>Nothing here</p>', business())).toBe(false);
  });

  it('skips short street segments', () => {
    const html = '<p>1 Elm St is nearby</p>';
    expect(isListedInPage(html, business({ address: '1 Elm St, Springfield', phone: 'Phone unavailable' }))).toBe(
      false
    );
  });
});

describe('runResearcherAgent', () => {
  it('checks every directory in order and samples the missing ones', async () => {
    const urls: string[] = [];
    const pages = fetcherFrom({
      'www.yelp.com': '<h3 class="business-name">Joe\'s Cafe</h3>',
      'www.yellowpages.com': '<div>123 Harbor View Road, Springfield</div>',
    });
    const ctx = testContext(testConfig(), {
      fetchHtml: async (url, options) => {
        urls.push(url);
        return pages(url, options);
      },
    });

    const result = await runResearcherAgent(business(), ctx);

    expect(urls).toEqual([
      'https://www.yelp.com/search?find_desc=Joe%27s+Cafe+123+Harbor+View+Road',
      'https://www.yellowpages.com/search?search_terms=Joe%27s+Cafe+123+Harbor+View+Road',
      'https://www.bbb.org/search?find_text=Joe%27s+Cafe+123+Harbor+View+Road',
    ]);
    expect(result).toEqual({
      success: true,
      directoriesChecked: {
        yelp: { url: 'https://www.yelp.com', exists: true },
        yellowpages: { url: 'https://www.yellowpages.com', exists: true },
        bbb: { url: 'https://www.bbb.org', exists: false },
      },
      missingDirectories: ['bbb'],
      selectedDirectories: ['bbb'],
    });
  });

  it('records a failed check as missing and carries on', async () => {
    const ctx = testContext(testConfig(), {
      fetchHtml: fetcherFrom({
        'www.yelp.com': '<h3 class="business-name">Joe\'s Cafe</h3>',
        'www.yellowpages.com': new Error('HTTP 503 fetching https://www.yellowpages.com/search'),
      }),
    });

    const result = await runResearcherAgent(business(), ctx);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.directoriesChecked.yellowpages).toEqual({
      url: 'https://www.yellowpages.com',
      exists: false,
      error: 'HTTP 503 fetching https://www.yellowpages.com/search',
    });
    expect(result.directoriesChecked.bbb).toEqual({ url: 'https://www.bbb.org', exists: false });
    expect(result.missingDirectories).toEqual(['yellowpages', 'bbb']);
    expect(result.selectedDirectories).toEqual(['yellowpages', 'bbb']);
  });

  it('selects two distinct directories when more are missing', async () => {
    const config = testConfig({
      directories: ['https://www.yelp.com', 'https://www.manta.com', 'https://www.mapquest.com', 'https://tupalo.com/'],
    });
    const result = await runResearcherAgent(business(), testContext(config));

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.missingDirectories).toEqual(['yelp', 'manta', 'mapquest', 'tupalo']);
    expect(result.selectedDirectories).toHaveLength(2);
    expect(new Set(result.selectedDirectories).size).toBe(2);
    for (const id of result.selectedDirectories) expect(result.missingDirectories).toContain(id);
  });

  it('gives each configured directory its own entry when hosts share a first label', async () => {
    const config = testConfig({ directories: ['https://www.yelp.com', 'https://www.yelp.ca', 'https://www.bbb.org'] });

    for (const seed of [1, 2, 3, 4, 5]) {
      const result = await runResearcherAgent(business(), testContext(config, { random: seededRandom(seed) }));

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(Object.keys(result.directoriesChecked)).toEqual(['yelp.com', 'yelp.ca', 'bbb']);
      expect(result.missingDirectories).toEqual(['yelp.com', 'yelp.ca', 'bbb']);
      expect(new Set(result.selectedDirectories).size).toBe(2);
    }
  });

  it('records directories whose id is an object prototype key', async () => {
    const config = testConfig({ directories: ['https://__proto__.example.com', 'https://www.bbb.org'] });

    const result = await runResearcherAgent(business(), testContext(config));

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(Object.keys(result.directoriesChecked)).toEqual(['__proto__', 'bbb']);
    expect(result.missingDirectories).toEqual(['__proto__', 'bbb']);
  });

  it('waits between checks but not after the last one', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const config = testConfig({ requestDelayMs: 3000, requestJitterMs: { min: 1000, max: 1000 } });

    await runResearcherAgent(business(), testContext(config, { sleep }));

    expect(sleep.mock.calls).toEqual([[4000], [4000]]);
  });

  it('passes the request timeout and a fixed user agent when rotation is off', async () => {
    const seen: FetchHtmlOptions[] = [];
    const config = testConfig({ directories: ['https://www.yelp.com'], userAgentRotation: false, requestTimeoutMs: 1234 });
    await runResearcherAgent(
      business(),
      testContext(config, {
        fetchHtml: async (_url, options) => {
          seen.push(options);
          return '<html></html>';
        },
      })
    );

    expect(seen).toHaveLength(1);
    expect(seen[0].timeoutMs).toBe(1234);
    expect(seen[0].userAgent).toMatch(/^Mozilla\/5\.0 \(Windows NT 10\.0; Win64; x64\).*Chrome\/122/);
  });

  it('fails without a business name', async () => {
    const fetchHtml = vi.fn(fetcherFrom({}));
    const result = await runResearcherAgent(business({ name: '   ' }), testContext(testConfig(), { fetchHtml }));
    expect(result).toEqual({ success: false, error: 'No business name provided' });
    expect(fetchHtml).not.toHaveBeenCalled();
  });
});
