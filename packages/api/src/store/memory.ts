import { cosineSimilarity } from '@pagecite/shared';
import type { FilterFacets, VectorRecord } from '@pagecite/shared';
import { CancelledError, PayloadTooLargeError, ValidationError } from '../errors';
import { estimatePayloadBytes, sparseDot } from './types';
import type { CallOptions, IndexCapabilities, IndexFilter, IndexMatch, IndexQuery, VectorIndex } from './types';

export interface MemoryIndexOptions {
  hybrid?: boolean;
  dimension?: number;
  maxPayloadBytes?: number;
}

/**
 * In-process vector index.
 *
 * Exact search over every record, same scoring as the pgvector backend.
 * Used for local development (INDEX_BACKEND=memory) and tests.
 */
export class MemoryVectorIndex implements VectorIndex {
  readonly capabilities: IndexCapabilities;
  private readonly records = new Map<string, VectorRecord>();
  private readonly dimension?: number;
  private readonly maxPayloadBytes: number;

  constructor(options: MemoryIndexOptions = {}) {
    this.capabilities = { hybrid: options.hybrid ?? true };
    this.dimension = options.dimension;
    this.maxPayloadBytes = options.maxPayloadBytes ?? Number.POSITIVE_INFINITY;
  }

  get size(): number {
    return this.records.size;
  }

  get(id: string): VectorRecord | undefined {
    return this.records.get(id);
  }

  async exists(ids: string[], options: CallOptions = {}): Promise<Set<string>> {
    ensureActive('exists', options.signal);
    return new Set(ids.filter((id) => this.records.has(id)));
  }

  async upsert(records: VectorRecord[], options: CallOptions = {}): Promise<void> {
    ensureActive('upsert', options.signal);

    if (estimatePayloadBytes(records) > this.maxPayloadBytes) {
      throw new PayloadTooLargeError(records.length);
    }

    for (const record of records) {
      if (this.dimension !== undefined && record.dense.length !== this.dimension) {
        throw new ValidationError(
          `Record ${record.id} has dimension ${record.dense.length}, expected ${this.dimension}`
        );
      }
      if (!this.records.has(record.id)) {
        this.records.set(record.id, record);
      }
    }
  }

  async query(request: IndexQuery, options: CallOptions = {}): Promise<IndexMatch[]> {
    ensureActive('query', options.signal);

    const alpha = this.capabilities.hybrid && request.sparse ? request.alpha ?? 1 : 1;
    const matches: IndexMatch[] = [];

    // Map iteration follows insertion order, which is the tie-break.
    for (const record of this.records.values()) {
      if (!matchesFilter(record, request.filter)) {
        continue;
      }

      const dense = cosineSimilarity(request.dense, record.dense);
      const lexical = alpha < 1 && request.sparse ? sparseDot(request.sparse, record.sparse) : 0;

      matches.push({
        id: record.id,
        score: alpha * dense + (1 - alpha) * lexical,
        metadata: record.metadata,
      });
    }

    // Array.prototype.sort is stable.
    return matches.sort((a, b) => b.score - a.score).slice(0, request.topK);
  }

  async facets(options: CallOptions = {}): Promise<FilterFacets> {
    ensureActive('facets', options.signal);

    const collect = (pick: (record: VectorRecord) => unknown): string[] =>
      [...new Set([...this.records.values()].map(pick).filter(isNonEmptyString))].sort();

    return {
      filenames: collect((record) => record.metadata.filename),
      productCategories: collect((record) => record.metadata.product_category),
      productIds: collect((record) => record.metadata.product_id),
      productNames: collect((record) => record.metadata.product_name),
    };
  }
}

function matchesFilter(record: VectorRecord, filter?: IndexFilter): boolean {
  if (!filter) {
    return true;
  }
  if (filter.filename !== undefined && record.metadata.filename !== filter.filename) {
    return false;
  }
  if (filter.product_category !== undefined && record.metadata.product_category !== filter.product_category) {
    return false;
  }
  return true;
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

function ensureActive(operation: string, signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError(`index ${operation}`);
  }
}
