/**
 * @fileOverview: Environment-driven configuration validated with Zod
 * @module: Settings
 * @keyFunctions:
 *   - loadSettings(): Parse and validate environment variables into typed settings
 *   - getSettings(): Lazily loaded process-wide settings
 * @dependencies:
 *   - zod: Schema validation for environment variables
 * @context: Defaults target a local Ollama endpoint and the Federal Register API
 */

import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errorHandler';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const EnvSchema = z
  .object({
    REGDOC_DB_PATH: z.string().min(1).optional(),

    DOCUMENT_API_URL: z.string().url().default('https://www.federalregister.gov/api/v1'),
    DOCUMENT_API_PAGE_SIZE: z.coerce.number().int().min(1).max(1000).default(100),
    DOCUMENT_API_TIMEOUT_MS: positiveInt(30000),
    FETCH_CONCURRENCY: positiveInt(3),
    FETCH_MAX_ATTEMPTS: positiveInt(4),
    FETCH_BASE_DELAY_MS: nonNegativeInt(500),

    LLM_BASE_URL: z.string().url().default('http://localhost:11434/v1'),
    LLM_API_KEY: z.string().min(1).default('ollama'),
    LLM_MODEL: z.string().min(1).default('llama3.1'),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
    LLM_MAX_OUTPUT_TOKENS: positiveInt(1500),

    EMBEDDING_BASE_URL: z.string().url().optional(),
    EMBEDDING_MODEL: z.string().min(1).default('nomic-embed-text'),
    EMBEDDING_DIMENSIONS: positiveInt(768),
    EMBEDDING_BATCH_SIZE: positiveInt(32),
    EMBEDDING_MAX_CONCURRENCY: positiveInt(4),
    EMBEDDING_MAX_ATTEMPTS: positiveInt(5),
    EMBEDDING_BASE_DELAY_MS: nonNegativeInt(1000),
    EMBEDDING_TIMEOUT_MS: positiveInt(60000),

    CHUNK_MAX_TOKENS: positiveInt(500),
    CHUNK_OVERLAP_TOKENS: nonNegativeInt(50),

    RETRIEVAL_TOP_K: positiveInt(8),
    CONTEXT_TOKEN_BUDGET: positiveInt(3000),
    RECENCY_WEIGHT: z.coerce.number().min(0).max(1).default(0.05),
    RECENCY_HALF_LIFE_DAYS: z.coerce.number().positive().default(365),
    HISTORY_TURNS: nonNegativeInt(6),
    QUERY_TIMEOUT_MS: positiveInt(120000),

    // Timers cap at 2^31 - 1 ms, about 596.5 hours
    UPDATE_INTERVAL_HOURS: z.coerce
      .number()
      .positive()
      .max(596, 'UPDATE_INTERVAL_HOURS must be at most 596')
      .default(24),
    INITIAL_LOOKBACK_DAYS: positiveInt(7),
    RETRY_MAX_ATTEMPTS: positiveInt(3),

    SESSION_MAX_HISTORY: positiveInt(20),
    SESSION_TIMEOUT_MS: positiveInt(3600000),
  })
  .refine(env => env.CHUNK_OVERLAP_TOKENS < env.CHUNK_MAX_TOKENS, {
    message: 'CHUNK_OVERLAP_TOKENS must be smaller than CHUNK_MAX_TOKENS',
    path: ['CHUNK_OVERLAP_TOKENS'],
  });

export interface Settings {
  dbPath: string;
  documentApi: {
    baseUrl: string;
    pageSize: number;
    timeoutMs: number;
    concurrency: number;
    maxAttempts: number;
    baseDelayMs: number;
  };
  llm: {
    baseUrl: string;
    apiKey: string;
    model: string;
    temperature: number;
    maxOutputTokens: number;
  };
  embedding: {
    baseUrl: string;
    model: string;
    dimensions: number;
    batchSize: number;
    maxConcurrency: number;
    maxAttempts: number;
    baseDelayMs: number;
    timeoutMs: number;
  };
  chunking: {
    maxTokens: number;
    overlapTokens: number;
  };
  retrieval: {
    topK: number;
    contextTokenBudget: number;
    recencyWeight: number;
    recencyHalfLifeDays: number;
    historyTurns: number;
    queryTimeoutMs: number;
  };
  scheduler: {
    intervalMs: number;
    initialLookbackDays: number;
    /** Failed runs before a queued document is dropped */
    maxRetryAttempts: number;
  };
  sessions: {
    maxHistory: number;
    timeoutMs: number;
  };
}

function defaultDbPath(env: NodeJS.ProcessEnv): string {
  const home = env.USERPROFILE || env.HOME || os.homedir();
  return path.join(home, '.regdoc', 'regdoc.db');
}

/**
 * Parse environment variables; throws ConfigurationError naming every invalid variable
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  // Empty strings count as unset
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = EnvSchema.safeParse(cleaned);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, {
      variables: parsed.error.issues.map(issue => issue.path.join('.')),
    });
  }

  const e = parsed.data;
  return {
    dbPath: e.REGDOC_DB_PATH ?? defaultDbPath(env),
    documentApi: {
      baseUrl: e.DOCUMENT_API_URL.replace(/\/+$/, ''),
      pageSize: e.DOCUMENT_API_PAGE_SIZE,
      timeoutMs: e.DOCUMENT_API_TIMEOUT_MS,
      concurrency: e.FETCH_CONCURRENCY,
      maxAttempts: e.FETCH_MAX_ATTEMPTS,
      baseDelayMs: e.FETCH_BASE_DELAY_MS,
    },
    llm: {
      baseUrl: e.LLM_BASE_URL,
      apiKey: e.LLM_API_KEY,
      model: e.LLM_MODEL,
      temperature: e.LLM_TEMPERATURE,
      maxOutputTokens: e.LLM_MAX_OUTPUT_TOKENS,
    },
    embedding: {
      baseUrl: e.EMBEDDING_BASE_URL ?? e.LLM_BASE_URL,
      model: e.EMBEDDING_MODEL,
      dimensions: e.EMBEDDING_DIMENSIONS,
      batchSize: e.EMBEDDING_BATCH_SIZE,
      maxConcurrency: e.EMBEDDING_MAX_CONCURRENCY,
      maxAttempts: e.EMBEDDING_MAX_ATTEMPTS,
      baseDelayMs: e.EMBEDDING_BASE_DELAY_MS,
      timeoutMs: e.EMBEDDING_TIMEOUT_MS,
    },
    chunking: {
      maxTokens: e.CHUNK_MAX_TOKENS,
      overlapTokens: e.CHUNK_OVERLAP_TOKENS,
    },
    retrieval: {
      topK: e.RETRIEVAL_TOP_K,
      contextTokenBudget: e.CONTEXT_TOKEN_BUDGET,
      recencyWeight: e.RECENCY_WEIGHT,
      recencyHalfLifeDays: e.RECENCY_HALF_LIFE_DAYS,
      historyTurns: e.HISTORY_TURNS,
      queryTimeoutMs: e.QUERY_TIMEOUT_MS,
    },
    scheduler: {
      intervalMs: Math.round(e.UPDATE_INTERVAL_HOURS * 60 * 60 * 1000),
      initialLookbackDays: e.INITIAL_LOOKBACK_DAYS,
      maxRetryAttempts: e.RETRY_MAX_ATTEMPTS,
    },
    sessions: {
      maxHistory: e.SESSION_MAX_HISTORY,
      timeoutMs: e.SESSION_TIMEOUT_MS,
    },
  };
}

let cachedSettings: Settings | null = null;

export function getSettings(): Settings {
  if (!cachedSettings) {
    cachedSettings = loadSettings(process.env);
  }
  return cachedSettings;
}
