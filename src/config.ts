import { z } from 'zod';

export const DEFAULT_DIRECTORIES = [
  'https://www.yelp.com',
  'https://www.yellowpages.com',
  'https://www.bbb.org',
  'https://www.foursquare.com',
  'https://www.manta.com',
  'https://www.superpages.com',
  'https://www.chamberofcommerce.com',
  'https://www.mapquest.com',
  'https://www.citysearch.com',
  'https://www.tripadvisor.com',
  'https://www.hotfrog.in',
  'https://www.provenexpert.com',
  'https://www.businessseek.biz/',
  'https://tupalo.com/',
];

// `KEY=` in .env arrives as '', which means "use the default" like an unset key.
const blankAsUnset = (value: unknown) => (value === '' ? undefined : value);

const flag = (fallback: boolean) =>
  z.preprocess(
    blankAsUnset,
    z
      .enum(['true', 'false', '1', '0', 'yes', 'no'])
      .optional()
      .transform((v) => (v === undefined ? fallback : v === 'true' || v === '1' || v === 'yes'))
  );

const ms = (fallback: number) =>
  z.preprocess(blankAsUnset, z.coerce.number().int().nonnegative().default(fallback));

const wordCount = (fallback: number) =>
  z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(fallback));

const urlList = (fallback: string[]) =>
  z.preprocess(
    blankAsUnset,
    z
      .string()
      .optional()
      .transform((raw) =>
        raw === undefined
          ? fallback
          : raw
              .split(',')
              .map((s) => s.trim())
              .filter(Boolean)
      )
      .pipe(z.array(z.string().url()))
  );

const EnvSchema = z
  .object({
    NAP_DIRECTORIES: urlList(DEFAULT_DIRECTORIES),
    NAP_PAGE_LOAD_TIMEOUT_MS: ms(30_000),
    NAP_ELEMENT_WAIT_TIMEOUT_MS: ms(10_000),
    NAP_PAGE_SETTLE_MS: ms(7_000),
    NAP_REQUEST_TIMEOUT_MS: ms(10_000),
    NAP_REQUEST_DELAY_MS: ms(3_000),
    NAP_REQUEST_JITTER_MIN_MS: ms(1_000),
    NAP_REQUEST_JITTER_MAX_MS: ms(3_000),
    NAP_OUTPUT_DIRECTORY: z.preprocess(blankAsUnset, z.string().min(1).default('data/output')),
    NAP_SUMMARY_MIN_WORDS: wordCount(100),
    NAP_SUMMARY_MAX_WORDS: wordCount(150),
    NAP_DEBUG: flag(true),
    NAP_USER_AGENT_ROTATION: flag(true),
    NAP_USE_PROXIES: flag(false),
    NAP_PROXY_LIST: urlList([]),
  })
  .refine((env) => env.NAP_SUMMARY_MIN_WORDS <= env.NAP_SUMMARY_MAX_WORDS, {
    message: 'NAP_SUMMARY_MIN_WORDS must not exceed NAP_SUMMARY_MAX_WORDS',
    path: ['NAP_SUMMARY_MIN_WORDS'],
  })
  .refine((env) => env.NAP_REQUEST_JITTER_MIN_MS <= env.NAP_REQUEST_JITTER_MAX_MS, {
    message: 'NAP_REQUEST_JITTER_MIN_MS must not exceed NAP_REQUEST_JITTER_MAX_MS',
    path: ['NAP_REQUEST_JITTER_MIN_MS'],
  });

export type AppConfig = {
  directories: string[];
  pageLoadTimeoutMs: number;
  elementWaitTimeoutMs: number;
  pageSettleMs: number;
  requestTimeoutMs: number;
  requestDelayMs: number;
  requestJitterMs: { min: number; max: number };
  outputDirectory: string;
  summaryWordCount: { min: number; max: number };
  debug: boolean;
  userAgentRotation: boolean;
  useProxies: boolean;
  proxyList: string[];
};

/**
 * Reads the static configuration from environment variables. Values are read
 * once at start-up; nothing edits them afterwards.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    directories: e.NAP_DIRECTORIES,
    pageLoadTimeoutMs: e.NAP_PAGE_LOAD_TIMEOUT_MS,
    elementWaitTimeoutMs: e.NAP_ELEMENT_WAIT_TIMEOUT_MS,
    pageSettleMs: e.NAP_PAGE_SETTLE_MS,
    requestTimeoutMs: e.NAP_REQUEST_TIMEOUT_MS,
    requestDelayMs: e.NAP_REQUEST_DELAY_MS,
    requestJitterMs: { min: e.NAP_REQUEST_JITTER_MIN_MS, max: e.NAP_REQUEST_JITTER_MAX_MS },
    outputDirectory: e.NAP_OUTPUT_DIRECTORY,
    summaryWordCount: { min: e.NAP_SUMMARY_MIN_WORDS, max: e.NAP_SUMMARY_MAX_WORDS },
    debug: e.NAP_DEBUG,
    userAgentRotation: e.NAP_USER_AGENT_ROTATION,
    useProxies: e.NAP_USE_PROXIES,
    proxyList: e.NAP_PROXY_LIST,
  };
}
