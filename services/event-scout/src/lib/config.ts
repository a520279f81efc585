import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { LUMA_CONFIG, SCRAPING_CONFIG } from './scraping/config.js';

const selectorMapSchema = z.record(z.string().min(1));

const settingsSchema = z.object({
  baseUrl: z.string().url(),
  navigation: z.object({
    maxAttempts: z.number().int().min(1).max(10),
    initialDelayMs: z.number().int().min(0),
    maxDelayMs: z.number().int().min(0),
    timeoutMs: z.number().int().min(1000),
    selectorTimeoutMs: z.number().int().min(100),
    settleDelayMs: z.number().int().min(0)
  }),
  search: z.object({
    overFetchFactor: z.number().min(1).max(10),
    maxScrollRounds: z.number().int().min(1).max(50),
    stagnationLimit: z.number().int().min(1).max(10),
    scrollStepPx: z.number().int().min(100),
    scrollDelayMs: z.number().int().min(0),
    searchUiRetries: z.number().int().min(0).max(3)
  }),
  extraction: z.object({
    minTextLength: z.number().int().min(0),
    maxPromptChars: z.number().int().min(500),
    aiProfiles: z.boolean()
  }),
  scoring: z.object({
    enabled: z.boolean(),
    minScore: z.number().min(0).max(100).optional()
  }),
  model: z.object({
    apiKey: z.string().optional(),
    baseUrl: z.string().url().optional(),
    name: z.string().min(1),
    temperature: z.number().min(0).max(2),
    timeoutMs: z.number().int().min(1000)
  }),
  store: z.object({
    csvPath: z.string().min(1),
    lockRetries: z.number().int().min(0).max(20),
    lockRetryDelayMs: z.number().int().min(0),
    staleLockMs: z.number().int().min(1000)
  }),
  browser: z.object({
    headless: z.boolean(),
    executablePath: z.string().optional(),
    viewport: z.object({
      width: z.number().int().min(320),
      height: z.number().int().min(240)
    })
  }),
  selectors: z.object({
    search: selectorMapSchema,
    detail: selectorMapSchema
  })
});

export type SearchSettings = z.infer<typeof settingsSchema>;

type PlainObject = Record<string, unknown>;

export const DEFAULT_SETTINGS: SearchSettings = {
  baseUrl: LUMA_CONFIG.BASE_URL,
  navigation: {
    maxAttempts: SCRAPING_CONFIG.MAX_NAVIGATION_ATTEMPTS,
    initialDelayMs: SCRAPING_CONFIG.INITIAL_RETRY_DELAY,
    maxDelayMs: SCRAPING_CONFIG.MAX_RETRY_DELAY,
    timeoutMs: SCRAPING_CONFIG.NAVIGATION_TIMEOUT,
    selectorTimeoutMs: SCRAPING_CONFIG.WAIT_FOR_SELECTOR_TIMEOUT,
    settleDelayMs: SCRAPING_CONFIG.SETTLE_DELAY
  },
  search: {
    overFetchFactor: 3,
    maxScrollRounds: 8,
    stagnationLimit: 2,
    scrollStepPx: 2400,
    scrollDelayMs: 1200,
    searchUiRetries: 1
  },
  extraction: {
    minTextLength: 200,
    maxPromptChars: 12000,
    aiProfiles: true
  },
  scoring: {
    enabled: true
  },
  model: {
    name: 'gpt-4o-mini',
    temperature: 0.2,
    timeoutMs: 30000
  },
  store: {
    csvPath: 'data/target_events.csv',
    lockRetries: 5,
    lockRetryDelayMs: 200,
    staleLockMs: 30000
  },
  browser: {
    headless: true,
    viewport: { ...SCRAPING_CONFIG.VIEWPORT }
  },
  selectors: {
    search: { ...LUMA_CONFIG.SEARCH_SELECTORS },
    detail: { ...LUMA_CONFIG.SELECTORS }
  }
};

/**
 * Resolve settings from defaults, an optional YAML file and the environment,
 * in that order of precedence (environment wins).
 */
export function loadSearchSettings(env: NodeJS.ProcessEnv = process.env): SearchSettings {
  let merged: PlainObject = toPlainObject(DEFAULT_SETTINGS);

  const configPath = env.EVENT_SCOUT_CONFIG;
  if (configPath) {
    merged = deepMerge(merged, readYamlOverrides(resolve(configPath)));
  }

  merged = deepMerge(merged, envOverrides(env));

  const parsed = settingsSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid search settings: ${issues.join('; ')}`);
  }
  return parsed.data;
}

function readYamlOverrides(path: string): PlainObject {
  if (!existsSync(path)) {
    throw new Error(`Settings file not found: ${path}`);
  }

  const content = yaml.load(readFileSync(path, 'utf8'));
  if (content === undefined || content === null) {
    return {};
  }
  if (!isPlainObject(content)) {
    throw new Error(`Settings file must contain a mapping: ${path}`);
  }
  return content;
}

function envOverrides(env: NodeJS.ProcessEnv): PlainObject {
  const overrides: PlainObject = {};

  const set = (path: string[], value: unknown) => {
    if (value === undefined) return;
    let target = overrides;
    for (const key of path.slice(0, -1)) {
      const next = target[key];
      if (isPlainObject(next)) {
        target = next;
      } else {
        const created: PlainObject = {};
        target[key] = created;
        target = created;
      }
    }
    target[path[path.length - 1]] = value;
  };

  set(['baseUrl'], env.EVENT_SCOUT_BASE_URL);
  set(['navigation', 'maxAttempts'], numberFrom(env.EVENT_SCOUT_MAX_NAV_ATTEMPTS));
  set(['navigation', 'timeoutMs'], numberFrom(env.EVENT_SCOUT_NAV_TIMEOUT_MS));
  set(['search', 'overFetchFactor'], numberFrom(env.EVENT_SCOUT_OVERFETCH_FACTOR));
  set(['search', 'maxScrollRounds'], numberFrom(env.EVENT_SCOUT_MAX_SCROLL_ROUNDS));
  set(['search', 'stagnationLimit'], numberFrom(env.EVENT_SCOUT_STAGNATION_LIMIT));
  set(['scoring', 'enabled'], booleanFrom(env.EVENT_SCOUT_SCORING));
  set(['scoring', 'minScore'], numberFrom(env.EVENT_SCOUT_MIN_SCORE));
  set(['model', 'apiKey'], env.OPENAI_API_KEY);
  set(['model', 'baseUrl'], env.OPENAI_BASE_URL);
  set(['model', 'name'], env.OPENAI_MODEL);
  set(['store', 'csvPath'], env.TARGET_EVENTS_CSV);
  set(['browser', 'headless'], booleanFrom(env.EVENT_SCOUT_HEADLESS));
  set(['browser', 'executablePath'], env.BROWSER_EXECUTABLE_PATH);

  return overrides;
}

function numberFrom(value: string | undefined): number | undefined {
  return value === undefined || value.trim() === '' ? undefined : Number(value);
}

function booleanFrom(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toPlainObject(settings: SearchSettings): PlainObject {
  return structuredClone(settings);
}

function deepMerge(base: PlainObject, overrides: PlainObject): PlainObject {
  const result: PlainObject = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    const current = result[key];
    result[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return result;
}
