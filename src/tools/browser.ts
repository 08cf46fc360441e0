import { chromium, type Page } from 'playwright-core';

import type { AppConfig } from '../config';
import { errorMessage } from '../errors';
import type { Logger } from '../logger';
import { pick, type RandomSource } from '../random';

import { pickUserAgent } from './http';

/**
 * The slice of a rendered page the extractor reads. Selectors are Playwright
 * selectors, so `xpath=` prefixes work alongside CSS.
 */
export interface ListingPage {
  /** Trimmed inner text of the first match, or '' when nothing matches. */
  firstText(selector: string): Promise<string>;
  /** Clicks the first match; false when nothing matched or the click failed. */
  click(selector: string): Promise<boolean>;
  title(): Promise<string>;
  html(): Promise<string>;
}

export type ListingPageOpener = <T>(url: string, use: (page: ListingPage) => Promise<T>) => Promise<T>;

const BLOCKED_RESOURCES = ['image', 'media', 'font', 'websocket'];

function wrapPage(page: Page, logger: Logger): ListingPage {
  return {
    async firstText(selector) {
      const el = await page.$(selector);
      if (!el) return '';
      return (await el.innerText()).trim();
    },
    async click(selector) {
      const el = await page.$(selector);
      if (!el) return false;
      try {
        await el.click();
        return true;
      } catch (e) {
        logger.warn({ selector, error: errorMessage(e) }, 'click failed');
        return false;
      }
    },
    title: () => page.title(),
    html: () => page.content(),
  };
}

/**
 * Opens a headless Chromium session per call. The browser is closed when
 * `use` settles, whether it resolved or threw.
 */
export function createListingPageOpener(options: {
  config: AppConfig;
  logger: Logger;
  random: RandomSource;
  sleep: (ms: number) => Promise<void>;
}): ListingPageOpener {
  const { config, logger, random, sleep } = options;

  return async (url, use) => {
    const proxy = config.useProxies ? pick(config.proxyList, random) : undefined;
    const browser = await chromium.launch({
      headless: true,
      args: ['--no-sandbox', '--disable-dev-shm-usage', '--disable-gpu', '--disable-extensions'],
      ...(proxy ? { proxy: { server: proxy } } : {}),
    });

    try {
      const context = await browser.newContext({
        locale: 'en-US',
        userAgent: pickUserAgent(config.userAgentRotation, random),
      });
      const page = await context.newPage();

      await page.route('**/*', (route) => {
        if (BLOCKED_RESOURCES.includes(route.request().resourceType())) return route.abort();
        return route.continue();
      });

      page.setDefaultNavigationTimeout(config.pageLoadTimeoutMs);
      page.setDefaultTimeout(config.elementWaitTimeoutMs);

      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: config.pageLoadTimeoutMs });

      try {
        await page.waitForLoadState('load', { timeout: config.elementWaitTimeoutMs });
      } catch (e) {
        logger.warn({ error: errorMessage(e) }, 'page load wait timed out');
      }

      if (config.pageSettleMs > 0) await sleep(config.pageSettleMs);

      return await use(wrapPage(page, logger));
    } finally {
      await browser.close().catch((e: unknown) => {
        logger.debug({ error: errorMessage(e) }, 'browser close failed');
      });
    }
  };
}
