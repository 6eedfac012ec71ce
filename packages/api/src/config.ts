import dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_THRESHOLDS, RAG_CONFIG, type Thresholds } from '@smart-rag/shared';
import { ConfigurationError } from './errors';

dotenv.config();

// Empty env vars fall back to defaults instead of coercing to 0
const blankAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const int = (fallback: number) =>
  z.preprocess(blankAsUndefined, z.coerce.number().int().default(fallback));

const str = (fallback: string) => z.preprocess(blankAsUndefined, z.string().default(fallback));

const EnvSchema = z.object({
  NODE_ENV: str('development'),
  HOST: str('0.0.0.0'),
  PORT: int(3000),
  CORS_ORIGINS: str('http://localhost:3001'),

  DB_HOST: str('localhost'),
  DB_PORT: int(5432),
  DB_NAME: str('smart_rag'),
  DB_USER: str('postgres'),
  DB_PASSWORD: str('postgres'),

  REDIS_URL: z.preprocess(blankAsUndefined, z.string().optional()),
  REDIS_HOST: str('localhost'),
  REDIS_PORT: int(6379),
  REDIS_PASSWORD: z.preprocess(blankAsUndefined, z.string().optional()),

  LLM_PROVIDER: z.preprocess(blankAsUndefined, z.enum(['groq', 'openai']).default('groq')),
  GROQ_API_KEY: str(''),
  GROQ_MODEL: str('llama-3.3-70b-versatile'),
  OPENAI_API_KEY: str(''),
  OPENAI_MODEL: str('gpt-4o-mini'),

  WORKER_URL: str('http://localhost:8000'),
  EMBEDDINGS_MODEL: str('BAAI/bge-large-en-v1.5'),
  EMBEDDINGS_CACHE_TTL: int(86400),

  LEARNED_STORE: z.preprocess(blankAsUndefined, z.enum(['postgres', 'memory']).default('postgres')),

  RAG_TOP_K: int(RAG_CONFIG.TOP_K),
  RAG_MAX_PER_FILE: int(RAG_CONFIG.MAX_PER_FILE),
  RAG_MAX_ANSWER_TOKENS: int(RAG_CONFIG.MAX_ANSWER_TOKENS),

  CONFIDENCE_OFFER_THRESHOLD: int(DEFAULT_THRESHOLDS.OFFER),
  CONFIDENCE_RETURN_THRESHOLD: int(DEFAULT_THRESHOLDS.RETURN),
  CONFIDENCE_LEARN_THRESHOLD: int(DEFAULT_THRESHOLDS.LEARN),
});

/**
 * Check the ordering invariant:
 * 0 <= offer <= learn <= 100 and offer <= return <= 100.
 */
export function validateThresholds(thresholds: Thresholds): Thresholds {
  const { offerThreshold: offer, returnThreshold: ret, learnThreshold: learn } = thresholds;
  const problems: string[] = [];

  for (const [name, value] of Object.entries(thresholds)) {
    if (!Number.isInteger(value) || value < 0 || value > 100) {
      problems.push(`${name} must be an integer in [0, 100], got ${value}`);
    }
  }
  if (offer > learn) {
    problems.push(`offerThreshold (${offer}) must not exceed learnThreshold (${learn})`);
  }
  if (offer > ret) {
    problems.push(`offerThreshold (${offer}) must not exceed returnThreshold (${ret})`);
  }

  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid confidence thresholds: ${problems.join('; ')}`);
  }
  return thresholds;
}

/**
 * Build the service configuration from environment variables.
 * Throws ConfigurationError; callers treat it as fatal at startup.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment: ${details}`);
  }
  const e = parsed.data;

  if (e.RAG_TOP_K < 1) {
    throw new ConfigurationError(`RAG_TOP_K must be at least 1, got ${e.RAG_TOP_K}`);
  }
  if (e.RAG_MAX_PER_FILE < 1) {
    throw new ConfigurationError(`RAG_MAX_PER_FILE must be at least 1, got ${e.RAG_MAX_PER_FILE}`);
  }

  const thresholds = validateThresholds({
    offerThreshold: e.CONFIDENCE_OFFER_THRESHOLD,
    returnThreshold: e.CONFIDENCE_RETURN_THRESHOLD,
    learnThreshold: e.CONFIDENCE_LEARN_THRESHOLD,
  });

  return {
    // Server
    env: e.NODE_ENV,
    host: e.HOST,
    port: e.PORT,
    corsOrigins: e.CORS_ORIGINS.split(',').map((origin) => origin.trim()),

    // Database
    database: {
      host: e.DB_HOST,
      port: e.DB_PORT,
      database: e.DB_NAME,
      user: e.DB_USER,
      password: e.DB_PASSWORD,
    },

    // Redis (embedding cache)
    redis: {
      url: e.REDIS_URL,
      host: e.REDIS_HOST,
      port: e.REDIS_PORT,
      password: e.REDIS_PASSWORD,
    },

    // LLM provider
    llm: {
      provider: e.LLM_PROVIDER,
      groq: { apiKey: e.GROQ_API_KEY, model: e.GROQ_MODEL },
      openai: { apiKey: e.OPENAI_API_KEY, model: e.OPENAI_MODEL },
    },

    // Embeddings (via worker service)
    embeddings: {
      workerUrl: e.WORKER_URL,
      model: e.EMBEDDINGS_MODEL,
      cacheTtl: e.EMBEDDINGS_CACHE_TTL,
    },

    learnedStore: e.LEARNED_STORE,

    rag: {
      topK: e.RAG_TOP_K,
      maxPerFile: e.RAG_MAX_PER_FILE,
      maxAnswerTokens: e.RAG_MAX_ANSWER_TOKENS,
    },

    thresholds,
  } as const;
}

export type AppConfig = ReturnType<typeof loadConfig>;
