import type postgres from 'postgres';
import type { FilterFacets, RecordMetadata, SparseVector, VectorRecord } from '@pagecite/shared';
import type { IndexConfig } from '../config';
import { IndexQueryError, IndexUpsertError, PayloadTooLargeError, toAppError } from '../errors';
import type { AppError } from '../errors';
import { withDeadline } from '../utils/deadline';
import type { Logger } from '../utils/logger';
import { estimatePayloadBytes } from './types';
import type { CallOptions, IndexCapabilities, IndexFilter, IndexMatch, IndexQuery, VectorIndex } from './types';

/**
 * pgvector-backed index.
 *
 * Dense vectors live in a `vector` column (cosine distance `<=>`), sparse
 * vectors in a `sparsevec` column (negative inner product `<#>`).
 *
 * Hybrid score:  alpha * cosine_similarity + (1 - alpha) * sparse_dot
 *
 * With INDEX_HYBRID=false the sparse column stays NULL and queries are
 * dense-only.
 */

// program_limit_exceeded: row or statement over a server limit
const PG_PROGRAM_LIMIT_EXCEEDED = '54000';

interface MatchRow {
  id: string;
  metadata: Partial<RecordMetadata>;
  score: number;
}

interface FacetRow {
  filenames: string[];
  product_categories: string[];
  product_ids: string[];
  product_names: string[];
}

export class PgVectorIndex implements VectorIndex {
  readonly capabilities: IndexCapabilities;

  constructor(
    private readonly sql: postgres.Sql,
    private readonly config: IndexConfig,
    private readonly logger: Logger
  ) {
    this.capabilities = { hybrid: config.hybrid };
  }

  /**
   * Create the extension, table and filter indexes if missing.
   *
   * No ANN index: HNSW on `vector` stops at 2000 dimensions and the default
   * embedding model has 3072.
   */
  async ensureSchema(): Promise<void> {
    const { table, dimension, vocabularySize } = this.config;

    await this.sql`CREATE EXTENSION IF NOT EXISTS vector`;
    await this.sql.unsafe(`
      CREATE TABLE IF NOT EXISTS ${table} (
        id text PRIMARY KEY,
        embedding vector(${dimension}) NOT NULL,
        sparse sparsevec(${vocabularySize}),
        metadata jsonb NOT NULL,
        created_at timestamptz NOT NULL DEFAULT now()
      )
    `);
    await this.sql.unsafe(
      `CREATE INDEX IF NOT EXISTS ${table}_filename_idx ON ${table} ((metadata->>'filename'))`
    );
    await this.sql.unsafe(
      `CREATE INDEX IF NOT EXISTS ${table}_category_idx ON ${table} ((metadata->>'product_category'))`
    );

    this.logger.info({ table, dimension, hybrid: this.config.hybrid }, 'Vector index schema ready');
  }

  async exists(ids: string[], options: CallOptions = {}): Promise<Set<string>> {
    if (ids.length === 0) {
      return new Set();
    }

    const rows = await this.run('exists', options, IndexQueryError, (signal) =>
      cancelOnAbort(
        this.sql<{ id: string }[]>`
          SELECT id FROM ${this.sql(this.config.table)}
          WHERE id IN ${this.sql(ids)}
        `,
        signal
      )
    );

    return new Set(rows.map((row) => row.id));
  }

  async upsert(records: VectorRecord[], options: CallOptions = {}): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const payloadBytes = estimatePayloadBytes(records);
    if (payloadBytes > this.config.maxPayloadBytes) {
      throw new PayloadTooLargeError(
        records.length,
        `Upsert payload of ${payloadBytes} bytes exceeds ${this.config.maxPayloadBytes}`
      );
    }

    const startTime = Date.now();

    await this.run('upsert', options, IndexUpsertError, async (signal) => {
      const statements = statementCanceller(signal);
      try {
        await this.sql.begin(async (tx) => {
          for (const record of records) {
            const sparse = this.config.hybrid
              ? toSparsevecLiteral(record.sparse, this.config.vocabularySize)
              : null;

            await statements.track(tx`
              INSERT INTO ${tx(this.config.table)} (id, embedding, sparse, metadata)
              VALUES (
                ${record.id},
                ${toVectorLiteral(record.dense)}::vector,
                ${sparse}::sparsevec,
                ${JSON.stringify(record.metadata)}::jsonb
              )
              ON CONFLICT (id) DO NOTHING
            `);
          }
        });
      } catch (error) {
        if (pgErrorCode(error) === PG_PROGRAM_LIMIT_EXCEEDED) {
          throw new PayloadTooLargeError(records.length);
        }
        throw error;
      } finally {
        statements.release();
      }
    });

    this.logger.debug({ latency: Date.now() - startTime, count: records.length }, 'Index upsert completed');
  }

  async query(request: IndexQuery, options: CallOptions = {}): Promise<IndexMatch[]> {
    const sql = this.sql;
    const dense = toVectorLiteral(request.dense);
    const denseScore = sql`(1 - (embedding <=> ${dense}::vector))`;

    let score = denseScore;
    if (this.capabilities.hybrid && request.sparse) {
      const alpha = request.alpha ?? 1;
      const sparse = toSparsevecLiteral(request.sparse, this.config.vocabularySize);
      score = sql`
        ${alpha}::float8 * ${denseScore}
        + ${1 - alpha}::float8 * coalesce((sparse <#> ${sparse}::sparsevec) * -1, 0)
      `;
    }

    const rows = await this.run('query', options, IndexQueryError, (signal) =>
      cancelOnAbort(
        sql<MatchRow[]>`
          SELECT id, metadata, (${score})::float8 AS score
          FROM ${sql(this.config.table)}
          ${this.whereClause(request.filter)}
          ORDER BY score DESC, created_at, id
          LIMIT ${request.topK}
        `,
        signal
      )
    );

    return rows.map((row) => ({ id: row.id, score: Number(row.score), metadata: row.metadata }));
  }

  async facets(options: CallOptions = {}): Promise<FilterFacets> {
    const sql = this.sql;
    const distinct = (key: string) =>
      sql`coalesce(array_agg(DISTINCT metadata->>${key}) FILTER (WHERE metadata->>${key} IS NOT NULL), '{}')`;

    const rows = await this.run('facets', options, IndexQueryError, (signal) =>
      cancelOnAbort(
        sql<FacetRow[]>`
          SELECT
            ${distinct('filename')} AS filenames,
            ${distinct('product_category')} AS product_categories,
            ${distinct('product_id')} AS product_ids,
            ${distinct('product_name')} AS product_names
          FROM ${sql(this.config.table)}
        `,
        signal
      )
    );

    const row = rows[0];
    return {
      filenames: [...(row?.filenames ?? [])].sort(),
      productCategories: [...(row?.product_categories ?? [])].sort(),
      productIds: [...(row?.product_ids ?? [])].sort(),
      productNames: [...(row?.product_names ?? [])].sort(),
    };
  }

  private whereClause(filter?: IndexFilter) {
    const sql = this.sql;
    const conditions: postgres.PendingQuery<postgres.Row[]>[] = [];

    if (filter?.filename !== undefined) {
      conditions.push(sql`metadata->>'filename' = ${filter.filename}`);
    }
    if (filter?.product_category !== undefined) {
      conditions.push(sql`metadata->>'product_category' = ${filter.product_category}`);
    }

    if (conditions.length === 0) {
      return sql``;
    }
    return sql`WHERE ${conditions.reduce((acc, condition) => sql`${acc} AND ${condition}`)}`;
  }

  /**
   * Deadline + caller cancellation; driver failures become the given typed
   * error, typed errors pass through.
   */
  private async run<T>(
    operation: string,
    options: CallOptions,
    Wrap: new (message: string, options?: { cause?: unknown }) => AppError,
    task: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    const startTime = Date.now();
    try {
      return await withDeadline(`index ${operation}`, this.config.timeoutMs, task, options.signal);
    } catch (error) {
      this.logger.error({ error, operation, latency: Date.now() - startTime }, 'Index call failed');
      throw toAppError(error, Wrap, `Index ${operation} failed`);
    }
  }
}

interface Cancellable {
  cancel(): unknown;
}

function cancelOnAbort<Q extends Cancellable>(query: Q, signal: AbortSignal): Q {
  signal.addEventListener('abort', () => query.cancel(), { once: true });
  return query;
}

/**
 * Cancels the statement in flight when the signal aborts, and refuses to
 * start another one afterwards, so an abandoned transaction rolls back.
 */
export function statementCanceller(signal: AbortSignal) {
  let current: Cancellable | undefined;
  const onAbort = (): void => {
    current?.cancel();
  };
  signal.addEventListener('abort', onAbort, { once: true });

  return {
    track<Q extends Cancellable>(query: Q): Q {
      if (signal.aborted) {
        query.cancel();
        throw signal.reason;
      }
      current = query;
      return query;
    },
    release(): void {
      signal.removeEventListener('abort', onAbort);
      current = undefined;
    },
  };
}

export function toVectorLiteral(values: number[]): string {
  return `[${values.join(',')}]`;
}

/**
 * pgvector sparse text format: `{index:value,...}/dimensions`, 1-based
 * indices in ascending order. Token ids start at 3, so they map directly.
 */
export function toSparsevecLiteral(vector: SparseVector, dimensions: number): string {
  const entries = vector.indices
    .map((index, i) => [index, vector.values[i]] as const)
    .sort((a, b) => a[0] - b[0])
    .map(([index, value]) => `${index}:${value}`);
  return `{${entries.join(',')}}/${dimensions}`;
}

function pgErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
