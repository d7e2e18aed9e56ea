import { z } from 'zod';

export const DEFAULT_QUERY = '("AI engineer" OR "Gen AI engineer" OR "AI/ML engineer")';

export const DEFAULT_ASHBY_COMPANIES = [
  'pear',
  'deel',
  'cursor',
  'ramp',
  'notion',
  'linear',
  'onebrief',
  'articul8',
  'nightfall-ai',
  'melotech',
] as const;

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

const boolFromEnv = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .refine((value) => TRUE_VALUES.has(value) || FALSE_VALUES.has(value), {
    message: 'Expected one of 1/0, true/false, yes/no, on/off',
  })
  .transform((value) => TRUE_VALUES.has(value));

const commaList = z.string().transform((value) =>
  value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0),
);

const envSchema = z.object({
  MASTER_CSV: z.string().default('master_jobs.csv'),
  DELTA_CSV: z.string().default('delta_jobs.csv'),
  MAX_RESULTS: z.coerce.number().int().positive().default(20),
  WEBHOOK_URL: z.string().url().optional(),
  ASHBY_COMPANIES: commaList.default(DEFAULT_ASHBY_COMPANIES.join(',')),
  FETCH_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  ENRICH_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  CONTACT_TIMEOUT_MS: z.coerce.number().int().positive().default(8_000),
  CANDIDATES_FILE: z.string().optional(),
  ENRICHMENT_ENABLED: boolFromEnv.default('true'),
  USER_AGENT: z.string().default(DEFAULT_USER_AGENT),
});

export interface ScraperConfig {
  masterPath: string;
  deltaPath: string;
  maxResults: number;
  webhookUrl?: string;
  ashbyCompanies: string[];
  fetchDelayMs: number;
  enrichDelayMs: number;
  requestTimeoutMs: number;
  contactTimeoutMs: number;
  candidatesFile?: string;
  enrichmentEnabled: boolean;
  userAgent: string;
}

export class ConfigError extends Error {
  readonly keys: string[];

  constructor(message: string, keys: string[]) {
    super(message);
    this.name = 'ConfigError';
    this.keys = keys;
  }
}

/**
 * Builds the run configuration from environment variables. Blank values
 * count as unset. Throws `ConfigError` naming every invalid key.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ScraperConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => entry[1] !== undefined && entry[1].trim() !== ''),
  );

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    const keys = [...new Set(result.error.issues.map((issue) => issue.path.join('.')))];
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, keys);
  }

  const parsed = result.data;
  return {
    masterPath: parsed.MASTER_CSV,
    deltaPath: parsed.DELTA_CSV,
    maxResults: parsed.MAX_RESULTS,
    webhookUrl: parsed.WEBHOOK_URL,
    ashbyCompanies: parsed.ASHBY_COMPANIES,
    fetchDelayMs: parsed.FETCH_DELAY_MS,
    enrichDelayMs: parsed.ENRICH_DELAY_MS,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    contactTimeoutMs: parsed.CONTACT_TIMEOUT_MS,
    candidatesFile: parsed.CANDIDATES_FILE,
    enrichmentEnabled: parsed.ENRICHMENT_ENABLED,
    userAgent: parsed.USER_AGENT,
  };
}
