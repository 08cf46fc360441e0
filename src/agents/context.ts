import type { AppConfig } from '../config';
import type { Logger } from '../logger';
import { mathRandom, sleep as realSleep, type RandomSource } from '../random';
import { createListingPageOpener, type ListingPageOpener } from '../tools/browser';
import { fetchHtml as realFetchHtml, type HtmlFetcher } from '../tools/http';

/**
 * Everything an agent touches outside its own inputs. The CLI builds one per
 * run; tests swap in fakes for the page, fetcher, clock and randomness.
 */
export type AgentContext = {
  config: AppConfig;
  logger: Logger;
  random: RandomSource;
  sleep: (ms: number) => Promise<void>;
  now: () => Date;
  openPage: ListingPageOpener;
  fetchHtml: HtmlFetcher;
};

export function createAgentContext(
  config: AppConfig,
  logger: Logger,
  overrides: Partial<Omit<AgentContext, 'config' | 'logger'>> = {}
): AgentContext {
  const random = overrides.random ?? mathRandom;
  const sleep = overrides.sleep ?? realSleep;
  return {
    config,
    logger,
    random,
    sleep,
    now: overrides.now ?? (() => new Date()),
    openPage: overrides.openPage ?? createListingPageOpener({ config, logger, random, sleep }),
    fetchHtml: overrides.fetchHtml ?? realFetchHtml,
  };
}

/** Child logger tagged with the agent name, plus the start/finish lines every agent writes. */
export function agentLogger(ctx: AgentContext, agent: string) {
  const log = ctx.logger.child({ agent });
  return {
    log,
    start: (message?: string) => log.info(`Starting ${agent}${message ? `: ${message}` : ''}`),
    complete: (message?: string) => log.info(`Completed ${agent}${message ? `: ${message}` : ''}`),
    error: (error: string) => log.error(`Error in ${agent}: ${error}`),
  };
}
