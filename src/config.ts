import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { AgeStatementPolicy } from './types.js';

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform(value => (value ? value : undefined));

const envSchema = z.object({
  HTTP_PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  API_ACCESS_TOKEN: optionalText,
  MAX_BODY_BYTES: z.coerce.number().int().min(1024).default(4 * 1024 * 1024),
  TAXONOMY_PATH: z.string().min(1).default('data/taxonomy.csv'),
  CACHE_DB_PATH: z.string().min(1).default('./data/results.db'),
  KEYWORD_STRATEGY: z.enum(['local', 'llm']).default('local'),
  AGE_STATEMENT_POLICY: z.enum(['auto', 'keep', 'drop']).default('auto'),
  AWS_REGION: z.string().min(1).default('us-east-1'),
  AWS_ACCESS_KEY_ID: optionalText,
  AWS_SECRET_ACCESS_KEY: optionalText,
  LLM_MODEL_ID: z.string().min(1).default('us.amazon.nova-micro-v1:0'),
  LLM_BATCH_SIZE: z.coerce.number().int().min(1).default(20),
  LLM_CONCURRENCY: z.coerce.number().int().min(1).default(2),
  LLM_BATCH_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  LLM_TIMEOUT_MS: z.coerce.number().int().min(0).default(30000),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
});

export interface AppConfig {
  port: number;
  apiAccessToken?: string;
  maxBodyBytes: number;
  taxonomyPath: string;
  cacheDbPath: string;
  keywordStrategy: 'local' | 'llm';
  agePolicy: AgeStatementPolicy;
  aws: {
    region: string;
    accessKeyId?: string;
    secretAccessKey?: string;
  };
  llm: {
    modelId: string;
    batchSize: number;
    concurrency: number;
    delayMs: number;
    timeoutMs: number;
    retries: number;
  };
}

/**
 * Reads settings from environment variables. Empty strings count as unset so
 * that a blank line in `.env` falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }

  const e = parsed.data;
  return Object.freeze({
    port: e.HTTP_PORT,
    apiAccessToken: e.API_ACCESS_TOKEN,
    maxBodyBytes: e.MAX_BODY_BYTES,
    taxonomyPath: e.TAXONOMY_PATH,
    cacheDbPath: e.CACHE_DB_PATH,
    keywordStrategy: e.KEYWORD_STRATEGY,
    agePolicy: e.AGE_STATEMENT_POLICY,
    aws: {
      region: e.AWS_REGION,
      accessKeyId: e.AWS_ACCESS_KEY_ID,
      secretAccessKey: e.AWS_SECRET_ACCESS_KEY,
    },
    llm: {
      modelId: e.LLM_MODEL_ID,
      batchSize: e.LLM_BATCH_SIZE,
      concurrency: e.LLM_CONCURRENCY,
      delayMs: e.LLM_BATCH_DELAY_MS,
      timeoutMs: e.LLM_TIMEOUT_MS,
      retries: e.LLM_MAX_RETRIES,
    },
  });
}
