import type { FilterFacets, RecordMetadata, SparseVector, VectorRecord } from '@pagecite/shared';

/**
 * Vector index protocol.
 *
 * Only the calls the core issues are defined here; storage internals
 * belong to each backend.
 */

export interface IndexCapabilities {
  /** Stores sparse vectors and blends them with dense similarity via alpha. */
  hybrid: boolean;
}

/** Conjunction of exact metadata matches. */
export interface IndexFilter {
  filename?: string;
  product_category?: string;
}

export interface IndexQuery {
  dense: number[];
  sparse?: SparseVector;
  filter?: IndexFilter;
  topK: number;
  alpha?: number;
}

export interface IndexMatch {
  id: string;
  score: number;
  metadata: Partial<RecordMetadata>;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface VectorIndex {
  readonly capabilities: IndexCapabilities;

  /** Ids from `ids` already present. */
  exists(ids: string[], options?: CallOptions): Promise<Set<string>>;

  /**
   * Insert records whose id is absent. Throws PayloadTooLargeError when the
   * batch exceeds the backend's limit and IndexUpsertError on other failures.
   */
  upsert(records: VectorRecord[], options?: CallOptions): Promise<void>;

  /** Matches in descending score order, at most `topK`. */
  query(request: IndexQuery, options?: CallOptions): Promise<IndexMatch[]>;

  facets(options?: CallOptions): Promise<FilterFacets>;
}

/**
 * Approximate wire size of an upsert, used for payload limits.
 */
export function estimatePayloadBytes(records: VectorRecord[]): number {
  return Buffer.byteLength(JSON.stringify(records), 'utf8');
}

export function sparseDot(a: SparseVector, b: SparseVector): number {
  const weights = new Map<number, number>();
  a.indices.forEach((index, i) => weights.set(index, a.values[i]));

  let dot = 0;
  b.indices.forEach((index, i) => {
    const weight = weights.get(index);
    if (weight !== undefined) {
      dot += weight * b.values[i];
    }
  });
  return dot;
}
