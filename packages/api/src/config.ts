import { z } from 'zod';
import { EMBEDDING_CONFIG, INGESTION_DEFAULTS, SEARCH_DEFAULTS, BM25 } from '@pagecite/shared';
import { ConfigError } from './errors';

/**
 * Application configuration.
 *
 * Parsed once from the environment by the entry points and handed to
 * constructors explicitly; nothing below reads process.env on its own.
 */

const flag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((value) => value === 'true');

const csv = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((item) => item.trim())
        .filter(Boolean)
    );

const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(3000),
  CORS_ORIGINS: csv('http://localhost:3001'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Database (pgvector)
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_NAME: z.string().default('pagecite'),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default('postgres'),
  DB_POOL_MAX: z.coerce.number().int().positive().default(20),

  // Redis
  REDIS_URL: z.string().optional(),
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  REDIS_PASSWORD: z.string().optional(),
  EMBEDDING_CACHE_ENABLED: flag('true'),
  EMBEDDING_CACHE_TTL: z.coerce.number().int().positive().default(EMBEDDING_CONFIG.CACHE_TTL),

  // Embeddings (OpenAI)
  OPENAI_API_KEY: z.string().default(''),
  EMBEDDING_MODEL: z.string().default(EMBEDDING_CONFIG.MODEL),
  EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(EMBEDDING_CONFIG.DIMENSIONS),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),

  // Generation (Groq)
  GROQ_API_KEY: z.string().default(''),
  GROQ_MODEL: z.string().default('llama-3.3-70b-versatile'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(1200),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),

  // Vector index
  INDEX_BACKEND: z.enum(['pgvector', 'memory']).default('pgvector'),
  INDEX_HYBRID: flag('true'),
  INDEX_TABLE: z
    .string()
    .regex(/^[a-z_][a-z0-9_]*$/, 'INDEX_TABLE must be a plain lower-case identifier')
    .default('vector_records'),
  INDEX_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  INDEX_MAX_PAYLOAD_BYTES: z.coerce.number().int().positive().default(4 * 1024 * 1024),
  SPARSE_VOCABULARY_SIZE: z.coerce.number().int().min(16).default(BM25.VOCABULARY_SIZE),

  // Search
  SEARCH_DEFAULT_TOP_K: z.coerce.number().int().positive().default(SEARCH_DEFAULTS.TOP_K),
  SEARCH_MAX_TOP_K: z.coerce.number().int().positive().default(SEARCH_DEFAULTS.MAX_TOP_K),
  SEARCH_DEFAULT_ALPHA: z.coerce.number().min(0).max(1).default(SEARCH_DEFAULTS.ALPHA),

  // Ingestion
  INGEST_BATCH_SIZE: z.coerce.number().int().positive().default(INGESTION_DEFAULTS.BATCH_SIZE),
  INGEST_CONCURRENCY: z.coerce.number().int().positive().default(INGESTION_DEFAULTS.CONCURRENCY),
  INGEST_MAX_ATTEMPTS: z.coerce.number().int().positive().default(INGESTION_DEFAULTS.MAX_ATTEMPTS),
  INGEST_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(INGESTION_DEFAULTS.BASE_DELAY_MS),
  INGEST_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(INGESTION_DEFAULTS.MAX_DELAY_MS),
  INGEST_EXCLUDED_TYPES: csv(INGESTION_DEFAULTS.EXCLUDED_TYPES.join(',')),
  INGEST_PREFIX_FILENAME: flag('true'),
});

export type Env = z.input<typeof envSchema>;

export function loadConfig(source: Record<string, string | undefined> = process.env) {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const fields = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([key, messages]) => `${key}: ${(messages ?? []).join(', ')}`)
      .join('; ');
    throw new ConfigError(`Invalid environment variables: ${fields}`);
  }

  const env = parsed.data;

  if (env.SEARCH_DEFAULT_TOP_K > env.SEARCH_MAX_TOP_K) {
    throw new ConfigError('SEARCH_DEFAULT_TOP_K must not exceed SEARCH_MAX_TOP_K');
  }

  return {
    // Server
    env: env.NODE_ENV,
    host: env.HOST,
    port: env.PORT,
    corsOrigins: env.CORS_ORIGINS,
    logLevel: env.LOG_LEVEL,

    // Database
    database: {
      host: env.DB_HOST,
      port: env.DB_PORT,
      database: env.DB_NAME,
      user: env.DB_USER,
      password: env.DB_PASSWORD,
      max: env.DB_POOL_MAX,
    },

    // Redis
    redis: {
      url: env.REDIS_URL,
      host: env.REDIS_HOST,
      port: env.REDIS_PORT,
      password: env.REDIS_PASSWORD,
    },

    embeddingCache: {
      enabled: env.EMBEDDING_CACHE_ENABLED,
      ttlSeconds: env.EMBEDDING_CACHE_TTL,
    },

    embeddings: {
      apiKey: env.OPENAI_API_KEY,
      model: env.EMBEDDING_MODEL,
      dimension: env.EMBEDDING_DIMENSION,
      timeoutMs: env.EMBEDDING_TIMEOUT_MS,
    },

    groq: {
      apiKey: env.GROQ_API_KEY,
      model: env.GROQ_MODEL,
      temperature: env.LLM_TEMPERATURE,
      maxTokens: env.LLM_MAX_TOKENS,
      timeoutMs: env.GENERATION_TIMEOUT_MS,
    },

    index: {
      backend: env.INDEX_BACKEND,
      hybrid: env.INDEX_HYBRID,
      table: env.INDEX_TABLE,
      timeoutMs: env.INDEX_TIMEOUT_MS,
      maxPayloadBytes: env.INDEX_MAX_PAYLOAD_BYTES,
      dimension: env.EMBEDDING_DIMENSION,
      vocabularySize: env.SPARSE_VOCABULARY_SIZE,
    },

    search: {
      defaultTopK: env.SEARCH_DEFAULT_TOP_K,
      maxTopK: env.SEARCH_MAX_TOP_K,
      defaultAlpha: env.SEARCH_DEFAULT_ALPHA,
    },

    ingestion: {
      batchSize: env.INGEST_BATCH_SIZE,
      concurrency: env.INGEST_CONCURRENCY,
      maxAttempts: env.INGEST_MAX_ATTEMPTS,
      baseDelayMs: env.INGEST_BASE_DELAY_MS,
      maxDelayMs: env.INGEST_MAX_DELAY_MS,
      excludedTypes: env.INGEST_EXCLUDED_TYPES,
      prefixFilename: env.INGEST_PREFIX_FILENAME,
    },

    sparse: {
      vocabularySize: env.SPARSE_VOCABULARY_SIZE,
    },
  } as const;
}

export type AppConfig = ReturnType<typeof loadConfig>;
export type DatabaseConfig = AppConfig['database'];
export type RedisConfig = AppConfig['redis'];
export type EmbeddingsConfig = AppConfig['embeddings'];
export type GroqConfig = AppConfig['groq'];
export type IndexConfig = AppConfig['index'];
export type SearchConfig = AppConfig['search'];
export type IngestionConfig = AppConfig['ingestion'];
export type SparseConfig = AppConfig['sparse'];
