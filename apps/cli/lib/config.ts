/**
 * Application configuration: environment variables and the search config file.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError, errorMessage } from '@jobscout/core';
import { searchConfigSchema, type SearchConfig } from '@jobscout/schemas';

export const MAX_SCORING_CONCURRENCY = 4;

const optionalString = z
  .string()
  .trim()
  .transform((v) => v || undefined)
  .optional();

const appEnvSchema = z.object({
  DATABASE_URL: optionalString,
  SCRAPERAPI_KEY: optionalString,
  SCRAPERAPI_BASE_URL: z.string().trim().url().default('https://api.scraperapi.com/'),
  RESUME_PATH: z.string().trim().min(1).default('resume.txt'),
  SEARCH_CONFIG_PATH: z.string().trim().min(1).default('config/search.json'),
  TASKS_FILE: z.string().trim().min(1).default('.jobscout/tasks.json'),
  REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().default(2000),
  SCORING_CONCURRENCY: z.coerce
    .number()
    .int()
    .positive()
    .default(2)
    .transform((n) => Math.min(n, MAX_SCORING_CONCURRENCY)),
  MIN_MATCH_SCORE: z.coerce.number().int().min(0).max(100).default(70),
  LOG_LEVEL: z.enum(['debug', 'info', 'silent']).default('info'),
});

export interface AppConfig {
  databaseUrl: string | undefined;
  scraperApiKey: string | undefined;
  scraperApiBaseUrl: string;
  resumePath: string;
  searchConfigPath: string;
  tasksFile: string;
  requestDelayMs: number;
  scoringConcurrency: number;
  minMatchScore: number;
  logLevel: 'debug' | 'info' | 'silent';
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/** Empty strings count as unset, so `FOO=` in a .env file falls back to the default. */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value;
  }
  return out;
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = appEnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${formatIssues(parsed.error)}`);
  }
  const e = parsed.data;
  return {
    databaseUrl: e.DATABASE_URL,
    scraperApiKey: e.SCRAPERAPI_KEY,
    scraperApiBaseUrl: e.SCRAPERAPI_BASE_URL,
    resumePath: e.RESUME_PATH,
    searchConfigPath: e.SEARCH_CONFIG_PATH,
    tasksFile: e.TASKS_FILE,
    requestDelayMs: e.REQUEST_DELAY_MS,
    scoringConcurrency: e.SCORING_CONCURRENCY,
    minMatchScore: e.MIN_MATCH_SCORE,
    logLevel: e.LOG_LEVEL,
  };
}

export function parseSearchConfig(input: unknown, source = 'search config'): SearchConfig {
  const parsed = searchConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${source}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export async function loadSearchConfig(path: string): Promise<SearchConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigError(`Cannot read search config at ${path}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Search config at ${path} is not valid JSON: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  return parseSearchConfig(json, `search config at ${path}`);
}
