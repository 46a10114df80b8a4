import { readFileSync } from 'fs';
import { parse } from 'dotenv';
import { z } from 'zod';
import { DEFAULT_ICD10_BASE_URL } from '../modules/lookup/icd10';
import { DEFAULT_RXNORM_BASE_URL } from '../modules/lookup/rxnorm';
import { createLogger } from '../utils/logger';

const log = createLogger('CONFIG');

export type LlmProvider = 'openai' | 'anthropic';

export interface Config {
  LLM_PROVIDER: LlmProvider;
  LLM_MODEL: string;
  LLM_BASE_URL: string;
  LLM_API_KEY: string;
  LLM_TIMEOUT_MS: number;
  LLM_MAX_ATTEMPTS: number;
  ICD10_BASE_URL: string;
  RXNORM_BASE_URL: string;
  LOOKUP_TIMEOUT_MS: number;
  LOOKUP_MAX_CANDIDATES: number;
  LOOKUP_MAX_CONCURRENCY: number;
  PIPELINE_PARALLEL_ENRICHMENT: boolean;
  // null disables the run deadline
  PIPELINE_RUN_DEADLINE_MS: number | null;
}

export type Env = Record<string, string | undefined>;

const DEFAULT_BASE_URLS: Record<LlmProvider, string> = {
  openai: 'http://litellm:4000',
  anthropic: 'https://api.anthropic.com',
};

const DEFAULT_MODELS: Record<LlmProvider, string> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-sonnet-latest',
};

const providerSchema = z.enum(['openai', 'anthropic']);
const positiveInt = z.coerce.number().int().positive();
const booleanFlag = z.enum(['true', 'false']).transform((value) => value === 'true');

function requireEnv(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    log.error(`Missing required environment variable: ${name}`);
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function optionalEnv(env: Env, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

function parseEnv<T>(name: string, raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const reason = parsed.error.issues.map((issue) => issue.message).join('; ');
    log.error(`Invalid value for ${name}: ${raw}`, { reason });
    throw new Error(`Invalid value for environment variable ${name}: ${raw} (${reason})`);
  }
  return parsed.data;
}

export function loadConfig(env: Env = process.env): Config {
  log.info('Loading environment variables');

  const provider = parseEnv('LLM_PROVIDER', optionalEnv(env, 'LLM_PROVIDER', 'openai'), providerSchema);
  const deadline = optionalEnv(env, 'PIPELINE_RUN_DEADLINE_MS', '');

  const config: Config = {
    LLM_PROVIDER: provider,
    LLM_MODEL: optionalEnv(env, 'LLM_MODEL', DEFAULT_MODELS[provider]),
    LLM_BASE_URL: optionalEnv(env, 'LLM_BASE_URL', DEFAULT_BASE_URLS[provider]),
    LLM_API_KEY: requireEnv(env, 'LLM_API_KEY'),
    LLM_TIMEOUT_MS: parseEnv('LLM_TIMEOUT_MS', optionalEnv(env, 'LLM_TIMEOUT_MS', '60000'), positiveInt),
    LLM_MAX_ATTEMPTS: parseEnv('LLM_MAX_ATTEMPTS', optionalEnv(env, 'LLM_MAX_ATTEMPTS', '3'), positiveInt),
    ICD10_BASE_URL: optionalEnv(env, 'ICD10_BASE_URL', DEFAULT_ICD10_BASE_URL),
    RXNORM_BASE_URL: optionalEnv(env, 'RXNORM_BASE_URL', DEFAULT_RXNORM_BASE_URL),
    LOOKUP_TIMEOUT_MS: parseEnv('LOOKUP_TIMEOUT_MS', optionalEnv(env, 'LOOKUP_TIMEOUT_MS', '10000'), positiveInt),
    LOOKUP_MAX_CANDIDATES: parseEnv('LOOKUP_MAX_CANDIDATES', optionalEnv(env, 'LOOKUP_MAX_CANDIDATES', '5'), positiveInt),
    LOOKUP_MAX_CONCURRENCY: parseEnv('LOOKUP_MAX_CONCURRENCY', optionalEnv(env, 'LOOKUP_MAX_CONCURRENCY', '8'), positiveInt),
    PIPELINE_PARALLEL_ENRICHMENT: parseEnv(
      'PIPELINE_PARALLEL_ENRICHMENT',
      optionalEnv(env, 'PIPELINE_PARALLEL_ENRICHMENT', 'false'),
      booleanFlag
    ),
    PIPELINE_RUN_DEADLINE_MS: deadline ? parseEnv('PIPELINE_RUN_DEADLINE_MS', deadline, positiveInt) : null,
  };

  log.info(`LLM_PROVIDER: ${config.LLM_PROVIDER}`);
  log.info(`LLM_MODEL: ${config.LLM_MODEL}`);
  log.info(`LLM_BASE_URL: ${config.LLM_BASE_URL}`);
  log.info(`LLM_API_KEY: ***masked***`);
  log.info(`LLM_TIMEOUT_MS: ${config.LLM_TIMEOUT_MS}`);
  log.info(`LLM_MAX_ATTEMPTS: ${config.LLM_MAX_ATTEMPTS}`);
  log.info(`ICD10_BASE_URL: ${config.ICD10_BASE_URL}`);
  log.info(`RXNORM_BASE_URL: ${config.RXNORM_BASE_URL}`);
  log.info(`LOOKUP_TIMEOUT_MS: ${config.LOOKUP_TIMEOUT_MS}`);
  log.info(`LOOKUP_MAX_CANDIDATES: ${config.LOOKUP_MAX_CANDIDATES}`);
  log.info(`LOOKUP_MAX_CONCURRENCY: ${config.LOOKUP_MAX_CONCURRENCY}`);
  log.info(`PIPELINE_PARALLEL_ENRICHMENT: ${config.PIPELINE_PARALLEL_ENRICHMENT}`);
  log.info(`PIPELINE_RUN_DEADLINE_MS: ${config.PIPELINE_RUN_DEADLINE_MS ?? 'not configured'}`);
  log.info('Config loaded successfully');

  return config;
}

/**
 * Reads a dotenv file and loads configuration from it. Variables already set
 * in `env` take precedence over the file, as with dotenv itself.
 */
export function loadConfigFile(path: string, env: Env = process.env): Config {
  log.info(`Reading environment file: ${path}`);
  const fileValues = parse(readFileSync(path, 'utf-8'));
  return loadConfig({ ...fileValues, ...env });
}
