import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { createAgentContext, type AgentContext } from '../src/agents/context';
import { loadConfig, type AppConfig } from '../src/config';
import { createSilentLogger } from '../src/logger';
import { seededRandom } from '../src/random';
import type { ListingPage, ListingPageOpener } from '../src/tools/browser';
import type { HtmlFetcher } from '../src/tools/http';
import type { BusinessRecord } from '../src/types';

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...loadConfig({}),
    directories: ['https://www.yelp.com', 'https://www.yellowpages.com', 'https://www.bbb.org'],
    pageSettleMs: 0,
    requestDelayMs: 0,
    requestJitterMs: { min: 0, max: 0 },
    outputDirectory: path.join(os.tmpdir(), 'nap-citation-unused'),
    ...overrides,
  };
}

export type FakePageSpec = {
  texts?: Record<string, string>;
  failing?: Record<string, string>;
  clickable?: string[];
  title?: string;
  html?: string;
};

export function fakeListingPage(spec: FakePageSpec = {}) {
  const clicked: string[] = [];
  const page: ListingPage = {
    async firstText(selector) {
      if (spec.failing?.[selector]) throw new Error(spec.failing[selector]);
      return spec.texts?.[selector] ?? '';
    },
    async click(selector) {
      if (!spec.clickable?.includes(selector)) return false;
      clicked.push(selector);
      return true;
    },
    title: async () => spec.title ?? '',
    html: async () => spec.html ?? '<html><body></body></html>',
  };
  return { page, clicked };
}

export function openerFor(page: ListingPage): ListingPageOpener {
  return async (_url, use) => use(page);
}

export function fetcherFrom(pages: Record<string, string | Error>): HtmlFetcher {
  return async (url) => {
    const host = new URL(url).hostname;
    const body = pages[host];
    if (body instanceof Error) throw body;
    return body ?? '<html><body>No results</body></html>';
  };
}

export function testContext(
  config: AppConfig = testConfig(),
  overrides: Partial<Omit<AgentContext, 'config' | 'logger'>> = {}
): AgentContext {
  return createAgentContext(config, createSilentLogger(), {
    random: seededRandom(7),
    sleep: async () => {},
    now: () => new Date(2026, 0, 15, 9, 5, 3),
    openPage: openerFor(fakeListingPage().page),
    fetchHtml: fetcherFrom({}),
    ...overrides,
  });
}

export function business(overrides: Partial<BusinessRecord> = {}): BusinessRecord {
  return {
    name: "Joe's Cafe",
    address: '123 Harbor View Road, Springfield, IL 62704',
    phone: '(555) 123-4567',
    sourceUrl: 'https://maps.example.test/place/joes-cafe',
    ...overrides,
  };
}

export async function makeTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'nap-citation-'));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}
