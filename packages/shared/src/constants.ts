/**
 * Shared constants for PageCite.
 */

export const LATENCY_BUDGETS = {
  EMBEDDING: 500, // ms
  SEARCH: 1000, // ms
  GENERATION: 15000, // ms
  TOTAL: 20000, // ms
} as const;

export const SEARCH_DEFAULTS = {
  TOP_K: 5,
  MAX_TOP_K: 20,
  ALPHA: 0.5,
  MAX_QUERY_LENGTH: 1000,
} as const;

export const BM25 = {
  K1: 1.5,
  B: 0.75,
  VOCABULARY_SIZE: 262144, // 2^18
} as const;

// Reserved by the tokenizer; never scored.
export const SPECIAL_TOKEN_IDS: ReadonlySet<number> = new Set([0, 1, 2]);

export const INGESTION_DEFAULTS = {
  BATCH_SIZE: 50,
  CONCURRENCY: 1,
  MAX_ATTEMPTS: 3,
  BASE_DELAY_MS: 1000,
  MAX_DELAY_MS: 8000,
  EXCLUDED_TYPES: ['Footer', 'Image', 'PageNumber'],
} as const;

export const EMBEDDING_CONFIG = {
  MODEL: 'text-embedding-3-large',
  DIMENSIONS: 3072,
  CACHE_TTL: 86400, // 24 hours
} as const;
