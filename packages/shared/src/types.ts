/**
 * Core types for PageCite.
 * Shared across the API service, the ingestion script and any UI client.
 */

export interface ChunkMetadata {
  filename: string;
  page_number?: number | string;
  product_category?: string;
  product_id?: string;
  product_name?: string;
  type?: string;
  [key: string]: unknown;
}

/**
 * A unit of source text as produced by the external chunker.
 * Never mutated after creation; enrichment produces a new chunk with the same id.
 */
export interface Chunk {
  readonly id: string;
  readonly text: string;
  readonly metadata: Readonly<ChunkMetadata>;
}

/**
 * Token id -> weight, stored as parallel arrays (index i of `values` weights `indices[i]`).
 */
export interface SparseVector {
  indices: number[];
  values: number[];
}

export interface RecordMetadata extends ChunkMetadata {
  text: string;
  text_with_filename: string;
}

export interface VectorRecord {
  id: string;
  dense: number[];
  sparse: SparseVector;
  metadata: RecordMetadata;
}

export interface Query {
  text: string;
  topK: number;
  fileFilter?: string;
  categoryFilter?: string;
  /** 0 = pure lexical, 1 = pure semantic */
  alpha?: number;
}

export interface SearchResult {
  id: string;
  text: string;
  source: string;
  page: number;
  score: number;
}

export interface Citation {
  filename: string;
  page: number;
}

export interface VerifiedCitation extends Citation {
  verified: boolean;
}

export interface FailedBatch {
  batchIndex: number;
  ids: string[];
  reason: string;
}

export interface IngestionReport {
  runId: string;
  processed: number;
  skipped: number;
  skippedEmpty: number;
  excluded: number;
  failedBatches: FailedBatch[];
  cancelled: boolean;
  elapsedSeconds: number;
}

/**
 * On-disk report consumed by operational tooling.
 */
export interface PersistedIngestionReport {
  processedCount: number;
  skippedCount: number;
  failedBatchCount: number;
  elapsedSeconds: number;
  emptyCount: number;
  excludedCount: number;
  failedIds: string[];
}

export interface AnswerResult {
  answer: string;
  citations: VerifiedCitation[];
  sources: SearchResult[];
  incomplete: boolean;
  error?: {
    code: string;
    message: string;
  };
}

export interface FilterFacets {
  filenames: string[];
  productCategories: string[];
  productIds: string[];
  productNames: string[];
}
