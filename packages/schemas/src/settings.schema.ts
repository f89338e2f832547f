import { z } from 'zod';

function emptyToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

const envString = z.preprocess(emptyToUndefined, z.string().trim().optional());

function envInt(defaultValue: number) {
  return z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).default(defaultValue));
}

const envFlag = z.preprocess(
  emptyToUndefined,
  z
    .enum(['true', 'false'])
    .default('false')
    .transform((v) => v === 'true'),
);

const ProxyListSchema = z.preprocess(
  emptyToUndefined,
  z
    .string()
    .optional()
    .transform((raw) =>
      (raw ?? '')
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0),
    )
    .pipe(z.array(z.string().url())),
);

export const SettingsSchema = z
  .object({
    GEMINI_API_KEY: envString,
    NEWSCHECK_LLM_MODEL: z.preprocess(emptyToUndefined, z.string().default('gemini-2.0-flash')),
    NEWSCHECK_MOCK_LLM: envFlag,
    GOOGLE_SEARCH_API_KEY: envString,
    GOOGLE_SEARCH_ENGINE_ID: envString,
    SCRAPER_PROXIES: ProxyListSchema,
    SCRAPE_TIMEOUT_MS: envInt(10_000),
    SEARCH_TIMEOUT_MS: envInt(15_000),
    SEARCH_PAGE_DELAY_MS: envInt(1_000),
    RESULTS_DIR: z.preprocess(emptyToUndefined, z.string().default('results')),
    DEBUG_ARTIFACTS_DIR: z.preprocess(emptyToUndefined, z.string().default('debug')),
    TRUST_CATALOG_PATH: envString,
    PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).max(65535).default(8080)),
  })
  .transform((env) => ({
    llm: {
      apiKey: env.GEMINI_API_KEY,
      model: env.NEWSCHECK_LLM_MODEL,
      mock: env.NEWSCHECK_MOCK_LLM,
    },
    search: {
      apiKey: env.GOOGLE_SEARCH_API_KEY,
      engineId: env.GOOGLE_SEARCH_ENGINE_ID,
      timeoutMs: env.SEARCH_TIMEOUT_MS,
      pageDelayMs: env.SEARCH_PAGE_DELAY_MS,
    },
    scraper: {
      proxies: env.SCRAPER_PROXIES,
      timeoutMs: env.SCRAPE_TIMEOUT_MS,
    },
    storage: {
      resultsDir: env.RESULTS_DIR,
      debugArtifactsDir: env.DEBUG_ARTIFACTS_DIR,
    },
    trustCatalogPath: env.TRUST_CATALOG_PATH,
    port: env.PORT,
  }));

export type Settings = z.output<typeof SettingsSchema>;
export type LlmSettings = Settings['llm'];
export type SearchSettings = Settings['search'];
export type ScraperSettings = Settings['scraper'];
