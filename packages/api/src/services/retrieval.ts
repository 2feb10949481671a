import { z } from 'zod';
import { LATENCY_BUDGETS, SEARCH_DEFAULTS, coercePageNumber } from '@pagecite/shared';
import type { Query, SearchResult, SparseVector } from '@pagecite/shared';
import type { SearchConfig } from '../config';
import { EmbeddingError, IndexQueryError, ValidationError, toAppError } from '../errors';
import type { IndexFilter, IndexMatch, VectorIndex } from '../store/types';
import type { Embedder } from '../utils/embeddings';
import type { Logger } from '../utils/logger';
import type { SparseVectorBuilder } from './sparse';

/**
 * Retrieval Service
 *
 * Implements HYBRID RETRIEVAL against a single index query:
 * 1. Dense query embedding (semantic)
 * 2. Sparse BM25 query vector (lexical), only when the index can blend it
 * 3. Optional filename / product-category filter
 *
 * Results come back in the index's relevance order and are not re-sorted.
 * Embedding and index failures propagate; there are no silent retries here.
 */

export function searchQuerySchema(config: SearchConfig) {
  return z.object({
    query: z.string().trim().min(1).max(SEARCH_DEFAULTS.MAX_QUERY_LENGTH),
    topK: z.number().int().positive().max(config.maxTopK).default(config.defaultTopK),
    fileFilter: z.string().min(1).optional(),
    categoryFilter: z.string().min(1).optional(),
    alpha: z.number().min(0).max(1).optional(),
  });
}

export type SearchRequest = z.input<ReturnType<typeof searchQuerySchema>>;

export interface RetrievalDeps {
  index: VectorIndex;
  embedder: Embedder;
  sparse: SparseVectorBuilder;
  logger: Logger;
}

export interface SearchOptions {
  signal?: AbortSignal;
}

export class HybridQueryEngine {
  private readonly schema: ReturnType<typeof searchQuerySchema>;

  constructor(
    private readonly deps: RetrievalDeps,
    private readonly config: SearchConfig
  ) {
    this.schema = searchQuerySchema(config);
  }

  /**
   * Validate raw request input into a Query.
   */
  parse(input: unknown): Query {
    const result = this.schema.safeParse(input);
    if (!result.success) {
      throw new ValidationError(
        'Invalid search query',
        result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
      );
    }

    const { query, topK, fileFilter, categoryFilter, alpha } = result.data;
    return { text: query, topK, fileFilter, categoryFilter, alpha: alpha ?? this.config.defaultAlpha };
  }

  /**
   * Validate `input` (a SearchRequest) and retrieve.
   */
  async search(input: unknown, options: SearchOptions = {}): Promise<SearchResult[]> {
    return this.retrieve(this.parse(input), options);
  }

  /**
   * Perform hybrid retrieval for an already validated query.
   *
   * @returns at most `topK` results, descending score
   */
  async retrieve(query: Query, options: SearchOptions = {}): Promise<SearchResult[]> {
    const { index, embedder, sparse, logger } = this.deps;
    const startTime = Date.now();

    // ===== DENSE =====
    let dense: number[];
    try {
      const [vector] = await embedder.embed([query.text], { signal: options.signal });
      if (!vector) {
        throw new EmbeddingError('Embedding service returned no vector for the query');
      }
      dense = vector;
    } catch (error) {
      logger.error({ error }, 'Query embedding failed');
      throw toAppError(error, EmbeddingError, 'Query embedding failed');
    }
    const embeddingLatency = Date.now() - startTime;
    if (embeddingLatency > LATENCY_BUDGETS.EMBEDDING) {
      logger.warn({ embeddingLatency, budget: LATENCY_BUDGETS.EMBEDDING }, 'Query embedding exceeded latency budget');
    }

    // ===== SPARSE (index-capability-conditional) =====
    let sparseVector: SparseVector | undefined;
    if (index.capabilities.hybrid) {
      sparseVector = sparse.buildQuery(query.text);
    }

    // ===== QUERY =====
    let matches: IndexMatch[];
    try {
      matches = await index.query(
        {
          dense,
          sparse: sparseVector,
          filter: buildFilter(query),
          topK: query.topK,
          alpha: sparseVector ? query.alpha ?? this.config.defaultAlpha : undefined,
        },
        { signal: options.signal }
      );
    } catch (error) {
      logger.error({ error }, 'Index query failed');
      throw toAppError(error, IndexQueryError, 'Index query failed');
    }

    const results = matches.slice(0, query.topK).map(toSearchResult);

    logger.info(
      {
        latency: Date.now() - startTime,
        embeddingLatency,
        resultsCount: results.length,
        hybrid: sparseVector !== undefined,
        fileFilter: query.fileFilter,
        categoryFilter: query.categoryFilter,
      },
      'Hybrid retrieval completed'
    );

    return results;
  }
}

/**
 * Absent filters search the full corpus; both together are a conjunction.
 */
export function buildFilter(query: Pick<Query, 'fileFilter' | 'categoryFilter'>): IndexFilter | undefined {
  const filter: IndexFilter = {};
  if (query.fileFilter !== undefined) {
    filter.filename = query.fileFilter;
  }
  if (query.categoryFilter !== undefined) {
    filter.product_category = query.categoryFilter;
  }
  return Object.keys(filter).length > 0 ? filter : undefined;
}

export function toSearchResult(match: IndexMatch): SearchResult {
  return {
    id: match.id,
    text: typeof match.metadata.text === 'string' ? match.metadata.text : '',
    source: typeof match.metadata.filename === 'string' ? match.metadata.filename : '',
    page: coercePageNumber(match.metadata.page_number),
    score: match.score,
  };
}
