import type postgres from 'postgres';
import type Redis from 'ioredis';
import type { AppConfig } from './config';
import { AnswerService } from './services/synthesis';
import { IngestionBatcher } from './services/ingestion';
import { HybridQueryEngine } from './services/retrieval';
import { SparseVectorBuilder } from './services/sparse';
import { MemoryVectorIndex } from './store/memory';
import { PgVectorIndex } from './store/pgvector';
import type { VectorIndex } from './store/types';
import { checkDatabaseHealth, createSql } from './utils/db';
import { CachedEmbedder, OpenAIEmbedder } from './utils/embeddings';
import type { Embedder } from './utils/embeddings';
import { GroqGenerator } from './utils/llm';
import type { Generator } from './utils/llm';
import type { Logger } from './utils/logger';
import { RedisEmbeddingCache, checkRedisHealth, createRedis } from './utils/redis';

/**
 * Composition root.
 *
 * Every client is created here from explicit config and handed down; no
 * module opens a connection at import time.
 */

export type HealthCheck = () => Promise<boolean>;

export interface Services {
  index: VectorIndex;
  engine: HybridQueryEngine;
  answers: AnswerService;
  ingestion: IngestionBatcher;
  /** Named readiness probes; empty when no external store is configured. */
  healthChecks: Record<string, HealthCheck>;
  close(): Promise<void>;
}

export interface Collaborators {
  index: VectorIndex;
  embedder: Embedder;
  generator: Generator;
  healthChecks?: Record<string, HealthCheck>;
  close?: () => Promise<void>;
}

/**
 * Wire services around already-built collaborators. Tests call this with
 * in-process fakes.
 */
export function assembleServices(config: AppConfig, logger: Logger, collaborators: Collaborators): Services {
  const { index, embedder, generator } = collaborators;
  const sparse = new SparseVectorBuilder({ vocabularySize: config.sparse.vocabularySize });

  const engine = new HybridQueryEngine({ index, embedder, sparse, logger }, config.search);
  const answers = new AnswerService({ engine, generator, logger }, config.groq);
  const ingestion = new IngestionBatcher({ index, embedder, sparse, logger }, config.ingestion);

  return {
    index,
    engine,
    answers,
    ingestion,
    healthChecks: collaborators.healthChecks ?? {},
    close: collaborators.close ?? (async () => undefined),
  };
}

/**
 * Build the production service graph. The pgvector schema is created
 * before this returns.
 */
export async function createServices(config: AppConfig, logger: Logger): Promise<Services> {
  const healthChecks: Record<string, HealthCheck> = {};
  let sql: postgres.Sql | undefined;
  let redis: Redis | undefined;

  let index: VectorIndex;
  if (config.index.backend === 'pgvector') {
    const db = createSql(config.database);
    sql = db;
    const pgIndex = new PgVectorIndex(db, config.index, logger);
    await pgIndex.ensureSchema();
    index = pgIndex;
    healthChecks.database = () => checkDatabaseHealth(db);
  } else {
    logger.warn('Using in-memory vector index; records are lost on restart');
    index = new MemoryVectorIndex({
      hybrid: config.index.hybrid,
      dimension: config.index.dimension,
      maxPayloadBytes: config.index.maxPayloadBytes,
    });
  }

  let embedder: Embedder = new OpenAIEmbedder(config.embeddings, logger);
  if (config.embeddingCache.enabled) {
    const client = createRedis(config.redis, logger);
    redis = client;
    embedder = new CachedEmbedder(embedder, new RedisEmbeddingCache(client, config.embeddingCache.ttlSeconds), logger);
    healthChecks.redis = () => checkRedisHealth(client);
  }

  const generator = new GroqGenerator(config.groq, logger);

  return assembleServices(config, logger, {
    index,
    embedder,
    generator,
    healthChecks,
    close: async () => {
      await Promise.all([sql?.end({ timeout: 5 }), redis?.quit()]);
    },
  });
}
