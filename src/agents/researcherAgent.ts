import * as cheerio from 'cheerio';

import { errorMessage } from '../errors';
import { sampleWithoutReplacement, uniform } from '../random';
import { digitsOnly, firstAddressSegment, isKnown } from '../text';
import { pickUserAgent } from '../tools/http';
import type { BusinessRecord, DirectoryCheck, ResearchResult } from '../types';

import { agentLogger, type AgentContext } from './context';
import { buildSearchUrl, resolveDirectories, type ConfiguredDirectory } from './directory';

export const LISTING_SELECTORS = [
  'h3.business-name',
  'a.business-name',
  '.listing-title',
  '.business-title',
  'h2.title',
  '.business-link',
  '.listing-title a',
  '.biz-name',
  '.result-title',
];

const CITATION_TARGETS = 2;

export function buildSearchQuery(business: BusinessRecord): string {
  if (isKnown(business.address)) {
    return `${business.name} ${firstAddressSegment(business.address)}`.trim();
  }
  return business.name.trim();
}

/**
 * Decides whether a directory search page lists the business: name inside a
 * listing title first, then street address or phone digits anywhere in the body.
 */
export function isListedInPage(html: string, business: BusinessRecord): boolean {
  const $ = cheerio.load(html);
  const name = business.name.trim().toLowerCase();

  for (const selector of LISTING_SELECTORS) {
    const hit = $(selector)
      .toArray()
      .some((el) => $(el).text().trim().toLowerCase().includes(name));
    if (hit) return true;
  }

  if (isKnown(business.address)) {
    const street = firstAddressSegment(business.address).toLowerCase();
    if (street.length > 10 && html.toLowerCase().includes(street)) return true;
  }

  if (isKnown(business.phone)) {
    const digits = digitsOnly(business.phone);
    if (digits && html.includes(digits)) return true;
  }

  return false;
}

async function checkDirectory(
  directory: ConfiguredDirectory,
  query: string,
  business: BusinessRecord,
  ctx: AgentContext
): Promise<boolean> {
  const searchUrl = buildSearchUrl(directory, query);
  const html = await ctx.fetchHtml(searchUrl, {
    timeoutMs: ctx.config.requestTimeoutMs,
    userAgent: pickUserAgent(ctx.config.userAgentRotation, ctx.random),
  });
  return isListedInPage(html, business);
}

/**
 * Checks every configured directory, one at a time and in configured order.
 * A directory that cannot be checked counts as missing.
 */
export async function runResearcherAgent(
  business: BusinessRecord,
  ctx: AgentContext
): Promise<ResearchResult> {
  const agent = agentLogger(ctx, 'ResearcherAgent');
  agent.start(`Researching directory presence for: ${business.name || 'Unknown business'}`);

  try {
    if (!business.name.trim()) {
      throw new Error('No business name provided');
    }

    const query = buildSearchQuery(business);
    const directories = resolveDirectories(ctx.config.directories);
    const directoriesChecked = new Map<string, DirectoryCheck>();
    const missingDirectories: string[] = [];

    for (let i = 0; i < directories.length; i += 1) {
      const directory = directories[i];

      try {
        const exists = await checkDirectory(directory, query, business, ctx);
        directoriesChecked.set(directory.id, { url: directory.baseUrl, exists });
        if (!exists) missingDirectories.push(directory.id);
        agent.log.debug({ directory: directory.id, exists }, 'directory checked');
      } catch (e) {
        const error = errorMessage(e);
        agent.log.warn(`Error checking ${directory.id}: ${error}`);
        directoriesChecked.set(directory.id, { url: directory.baseUrl, exists: false, error });
        missingDirectories.push(directory.id);
      }

      if (i < directories.length - 1) {
        const { requestDelayMs, requestJitterMs } = ctx.config;
        const delay = Math.round(
          requestDelayMs + uniform(ctx.random, requestJitterMs.min, requestJitterMs.max)
        );
        await ctx.sleep(delay);
      }
    }

    const selectedDirectories = sampleWithoutReplacement(
      missingDirectories,
      CITATION_TARGETS,
      ctx.random
    );

    agent.complete(`Found ${missingDirectories.length} missing directories`);
    return {
      success: true,
      directoriesChecked: Object.fromEntries(directoriesChecked),
      missingDirectories,
      selectedDirectories,
    };
  } catch (e) {
    const error = errorMessage(e);
    agent.error(error);
    return { success: false, error };
  }
}
