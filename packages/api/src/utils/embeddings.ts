import OpenAI from 'openai';
import type { EmbeddingsConfig } from '../config';
import { EmbeddingError, toAppError } from '../errors';
import { withDeadline } from './deadline';
import type { Logger } from './logger';

/**
 * Embeddings Utility
 *
 * Uses OpenAI text-embedding-3-large by default.
 * Output dimension: 3072
 *
 * CRITICAL: queries and documents must go through the same model and
 * dimension, or cosine scores are meaningless.
 */

export interface EmbedOptions {
  signal?: AbortSignal;
}

/**
 * Embedding collaborator: one fixed-dimension vector per input, same order.
 */
export interface Embedder {
  readonly model: string;
  embed(texts: string[], options?: EmbedOptions): Promise<number[][]>;
}

export class OpenAIEmbedder implements Embedder {
  readonly model: string;
  private client: OpenAI;

  constructor(
    private readonly config: EmbeddingsConfig,
    private readonly logger: Logger
  ) {
    if (!config.apiKey || config.apiKey.trim() === '') {
      throw new EmbeddingError(
        'OPENAI_API_KEY is not configured. ' + 'Set OPENAI_API_KEY in .env file or as environment variable.'
      );
    }

    // No SDK retries; callers own retry policy.
    this.client = new OpenAI({ apiKey: config.apiKey, maxRetries: 0 });
    this.model = config.model;

    logger.info({ model: this.model, dimension: config.dimension }, 'OpenAIEmbedder initialized');
  }

  async embed(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const startTime = Date.now();

    try {
      const response = await withDeadline(
        'embedding',
        this.config.timeoutMs,
        (signal) =>
          this.client.embeddings.create(
            { model: this.model, input: texts, dimensions: this.config.dimension },
            { signal }
          ),
        options.signal
      );

      // The API may return items out of order; `index` is authoritative.
      const vectors = [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);

      for (const vector of vectors) {
        if (vector.length !== this.config.dimension) {
          throw new EmbeddingError(`Expected dimension ${this.config.dimension}, got ${vector.length}`);
        }
      }

      this.logger.info(
        { latency: Date.now() - startTime, count: texts.length, model: this.model },
        'Embedding batch completed'
      );

      return vectors;
    } catch (error) {
      this.logger.error({ error, count: texts.length }, 'Embedding service call failed');
      throw toAppError(error, EmbeddingError, 'Embedding service call failed');
    }
  }
}

/**
 * Query-embedding cache contract. Implementations must never be required
 * for correctness: a miss or a failure falls through to the embedder.
 */
export interface EmbeddingCache {
  get(model: string, text: string): Promise<number[] | null>;
  set(model: string, text: string, embedding: number[]): Promise<void>;
}

/**
 * Embedder that serves repeated single-text lookups from a cache.
 *
 * Strategy:
 * 1. Check cache first (normalized text)
 * 2. If miss → call the wrapped embedder
 * 3. Store result for future hits
 */
export class CachedEmbedder implements Embedder {
  readonly model: string;

  constructor(
    private readonly inner: Embedder,
    private readonly cache: EmbeddingCache,
    private readonly logger: Logger
  ) {
    this.model = inner.model;
  }

  async embed(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
    // Bulk ingestion calls bypass the cache; only queries repeat.
    if (texts.length !== 1) {
      return this.inner.embed(texts, options);
    }

    // Normalize query (lowercase + trim) for better cache hits
    const key = texts[0].toLowerCase().trim();

    const cached = await this.cache.get(this.model, key).catch((error: unknown) => {
      this.logger.warn({ error }, 'Embedding cache read failed');
      return null;
    });
    if (cached) {
      return [cached];
    }

    const [embedding] = await this.inner.embed(texts, options);

    await this.cache.set(this.model, key, embedding).catch((error: unknown) => {
      this.logger.warn({ error }, 'Embedding cache write failed');
    });

    return [embedding];
  }
}
