import { errorMessage } from '../errors';
import type { Logger } from '../logger';
import { cleanString } from '../text';
import type { ListingPage } from '../tools/browser';
import type { ExtractionResult } from '../types';

import { agentLogger, type AgentContext } from './context';

type FieldStrategy = {
  label: string;
  read: (page: ListingPage) => Promise<string>;
};

const bySelector = (selector: string): FieldStrategy => ({
  label: selector,
  read: (page) => page.firstText(selector),
});

const byPattern = (label: string, pattern: RegExp): FieldStrategy => ({
  label,
  read: async (page) => (await page.html()).match(pattern)?.[1] ?? '',
});

const ADDRESS_PATTERN =
  /(\d+\s+[A-Za-z\s]+(?:Road|Street|Avenue|Lane|Drive|Blvd|Boulevard|Ave|St|Rd|Dr|Ln|Way|Place|Pl|Court|Ct),\s+[A-Za-z\s]+,\s+[A-Za-z\s]+\s+[\d-]+)/;

const PHONE_PATTERN = /(\(\d{3}\)\s*\d{3}-\d{4}|\d{3}-\d{3}-\d{4}|\+\d{1,2}\s*\d{3}\s*\d{3}\s*\d{4})/;

export const NAME_STRATEGIES: FieldStrategy[] = [
  ...[
    'h1.DUwDvf',
    'h1.fontHeadlineLarge',
    'h1',
    'div.fontHeadlineLarge',
    "div[role='main'] div.lMbq3e",
    "div[role='main'] div.qBF1Pd",
    'div.qBF1Pd',
  ].map(bySelector),
  {
    label: 'document title',
    read: async (page) => {
      const title = await page.title();
      return title.includes(' - ') ? title.split(' - ')[0] : '';
    },
  },
];

export const ADDRESS_STRATEGIES: FieldStrategy[] = [
  bySelector("button[data-item-id='address']"),
  bySelector("xpath=//button[contains(@aria-label, 'Address')]"),
  bySelector("xpath=//div[contains(text(), 'Address')]/following-sibling::div"),
  bySelector("xpath=//div[contains(@class, 'Io6YTe')]"),
  bySelector("xpath=//img[contains(@src, 'address')]/../../following-sibling::div"),
  byPattern('street address pattern', ADDRESS_PATTERN),
];

export const PHONE_STRATEGIES: FieldStrategy[] = [
  bySelector("button[data-item-id^='phone:']"),
  bySelector("xpath=//button[contains(@aria-label, 'Phone')]"),
  bySelector("xpath=//div[contains(text(), 'Phone')]/following-sibling::div"),
  bySelector("xpath=//img[contains(@src, 'phone')]/../../following-sibling::div"),
  byPattern('phone pattern', PHONE_PATTERN),
];

const EXPAND_CONTROLS = [
  "xpath=//button[contains(., 'About')]",
  "xpath=//button[contains(., 'Information')]",
  "xpath=//button[contains(., 'Overview')]",
  "xpath=//button[contains(@aria-label, 'Information')]",
  "xpath=//div[contains(@role, 'tab') and contains(., 'About')]",
];

function stripLabel(value: string, label: string): string {
  return value.toLowerCase().startsWith(label.toLowerCase())
    ? value.slice(label.length).trim()
    : value;
}

/** First strategy with non-empty text wins; results are never merged. */
async function firstMatch(
  page: ListingPage,
  field: string,
  strategies: FieldStrategy[],
  log: Logger
): Promise<string | null> {
  for (const strategy of strategies) {
    try {
      const text = cleanString(await strategy.read(page));
      if (text) {
        log.debug({ field, strategy: strategy.label }, 'field extracted');
        return text;
      }
    } catch (e) {
      log.warn({ field, strategy: strategy.label, error: errorMessage(e) }, 'extraction strategy failed');
    }
  }
  log.warn({ field }, `Could not find ${field} with any method`);
  return null;
}

async function expandInformation(page: ListingPage, ctx: AgentContext, log: Logger) {
  for (const control of EXPAND_CONTROLS) {
    if (await page.click(control)) {
      await ctx.sleep(2000);
      return;
    }
  }
  log.debug('no information panel control found');
}

/**
 * Pulls name, address and phone from a map listing page. Never throws:
 * automation failures come back as `{ success: false, error }`.
 */
export async function runExtractorAgent(
  listingUrl: string,
  ctx: AgentContext
): Promise<ExtractionResult> {
  const agent = agentLogger(ctx, 'ExtractorAgent');
  agent.start(`Processing URL: ${listingUrl}`);

  try {
    const { name, address, phone } = await ctx.openPage(listingUrl, async (page) => {
      const name = await firstMatch(page, 'name', NAME_STRATEGIES, agent.log);

      try {
        await expandInformation(page, ctx, agent.log);
      } catch (e) {
        agent.log.warn({ error: errorMessage(e) }, 'Error expanding information');
      }

      const rawAddress = await firstMatch(page, 'address', ADDRESS_STRATEGIES, agent.log);
      const rawPhone = await firstMatch(page, 'phone', PHONE_STRATEGIES, agent.log);

      return {
        name,
        address: rawAddress ? stripLabel(rawAddress, 'Address:') || null : null,
        phone: rawPhone ? stripLabel(rawPhone, 'Phone:') || null : null,
      };
    });

    const missing = Object.entries({ name, address, phone })
      .filter(([, value]) => !value)
      .map(([field]) => field);
    if (missing.length) {
      agent.log.warn(`Incomplete NAP data. Missing: ${missing.join(', ')}`);
    }

    agent.complete('Extracted NAP information');
    return {
      success: Boolean(name && address && phone),
      partialSuccess: Boolean(name || address || phone),
      name,
      address,
      phone,
      sourceUrl: listingUrl,
    };
  } catch (e) {
    const error = errorMessage(e);
    agent.error(error);
    return {
      success: false,
      partialSuccess: false,
      name: null,
      address: null,
      phone: null,
      sourceUrl: listingUrl,
      error,
    };
  }
}
