import { setTimeout as sleep } from 'node:timers/promises';
import { generateRequestId } from '@pagecite/shared';
import type { Chunk, FailedBatch, IngestionReport, VectorRecord } from '@pagecite/shared';
import type { IngestionConfig } from '../config';
import {
  CancelledError,
  EmbeddingError,
  IndexUpsertError,
  PayloadTooLargeError,
  TimeoutError,
  ValidationError,
  errorMessage,
} from '../errors';
import type { VectorIndex } from '../store/types';
import { backoffDelay } from '../utils/deadline';
import type { Embedder } from '../utils/embeddings';
import type { Logger } from '../utils/logger';
import { normalizeChunkText, withFilenamePrefix } from './chunks';
import type { SparseVectorBuilder } from './sparse';

/**
 * Ingestion Batcher
 *
 * Per batch:
 * 1. Existence check; ids already in the index are skipped, never re-embedded
 * 2. Drop excluded types and chunks empty after normalization
 * 3. One bulk embedding call + batch-local BM25 sparse vectors
 * 4. One upsert, shrinking on payload limits, backing off on transient errors
 *
 * A failed batch is recorded and the run moves on.
 */

export interface IngestionDeps {
  index: VectorIndex;
  embedder: Embedder;
  sparse: SparseVectorBuilder;
  logger: Logger;
}

export interface IngestOptions {
  batchSize?: number;
  concurrency?: number;
  signal?: AbortSignal;
}

interface BatchCounts {
  processed: number;
  skipped: number;
  skippedEmpty: number;
  excluded: number;
}

interface BatchOutcome extends BatchCounts {
  failure?: FailedBatch;
  cancelled?: boolean;
}

const NO_COUNTS: BatchCounts = { processed: 0, skipped: 0, skippedEmpty: 0, excluded: 0 };

/**
 * Single accumulation point for run counters. Workers hand their batch
 * outcome here instead of touching counters themselves.
 */
class IngestionTally {
  private readonly totals: BatchCounts;
  private readonly failedBatches: FailedBatch[] = [];
  private cancelled = false;

  constructor(duplicates: number) {
    this.totals = { ...NO_COUNTS, skipped: duplicates };
  }

  record(outcome: BatchOutcome): void {
    this.totals.processed += outcome.processed;
    this.totals.skipped += outcome.skipped;
    this.totals.skippedEmpty += outcome.skippedEmpty;
    this.totals.excluded += outcome.excluded;
    if (outcome.failure) {
      this.failedBatches.push(outcome.failure);
    }
    if (outcome.cancelled) {
      this.cancelled = true;
    }
  }

  report(runId: string, startTime: number): IngestionReport {
    return {
      runId,
      ...this.totals,
      failedBatches: [...this.failedBatches].sort((a, b) => a.batchIndex - b.batchIndex),
      cancelled: this.cancelled,
      elapsedSeconds: (Date.now() - startTime) / 1000,
    };
  }
}

interface PreparedChunk {
  chunk: Chunk;
  text: string;
  embeddingText: string;
}

export class IngestionBatcher {
  private readonly excludedTypes: ReadonlySet<string>;

  constructor(
    private readonly deps: IngestionDeps,
    private readonly config: IngestionConfig
  ) {
    this.excludedTypes = new Set(config.excludedTypes);
  }

  async ingest(chunks: Chunk[], options: IngestOptions = {}): Promise<IngestionReport> {
    const batchSize = options.batchSize ?? this.config.batchSize;
    const concurrency = options.concurrency ?? this.config.concurrency;

    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new ValidationError('batchSize must be a positive integer', [
        { path: 'batchSize', message: `got ${batchSize}` },
      ]);
    }
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ValidationError('concurrency must be a positive integer', [
        { path: 'concurrency', message: `got ${concurrency}` },
      ]);
    }

    const runId = generateRequestId('ingest');
    const startTime = Date.now();
    const { logger } = this.deps;

    // Repeated ids would let two concurrent batches both see "absent".
    const unique = new Map<string, Chunk>();
    for (const chunk of chunks) {
      if (!unique.has(chunk.id)) {
        unique.set(chunk.id, chunk);
      }
    }

    const ordered = [...unique.values()];
    const batches: Chunk[][] = [];
    for (let i = 0; i < ordered.length; i += batchSize) {
      batches.push(ordered.slice(i, i + batchSize));
    }

    const tally = new IngestionTally(chunks.length - ordered.length);

    logger.info(
      { runId, chunks: chunks.length, unique: ordered.length, batches: batches.length, batchSize, concurrency },
      'Ingestion started'
    );

    let cursor = 0;
    const worker = async (): Promise<void> => {
      while (cursor < batches.length) {
        if (options.signal?.aborted) {
          tally.record({ ...NO_COUNTS, cancelled: true });
          return;
        }
        const batchIndex = cursor++;
        tally.record(await this.processBatch(batches[batchIndex], batchIndex, options.signal));
      }
    };

    await Promise.all(Array.from({ length: Math.min(concurrency, batches.length) }, worker));

    const report = tally.report(runId, startTime);

    logger.info(
      {
        runId,
        processed: report.processed,
        skipped: report.skipped,
        skippedEmpty: report.skippedEmpty,
        excluded: report.excluded,
        failedBatches: report.failedBatches.length,
        cancelled: report.cancelled,
        elapsedSeconds: report.elapsedSeconds,
      },
      'Ingestion completed'
    );

    return report;
  }

  private async processBatch(batch: Chunk[], batchIndex: number, signal?: AbortSignal): Promise<BatchOutcome> {
    const { index, embedder, sparse, logger } = this.deps;
    const startTime = Date.now();
    const ids = batch.map((chunk) => chunk.id);

    const fail = (reason: unknown, failedIds: string[], counts: BatchCounts): BatchOutcome => {
      if (reason instanceof CancelledError) {
        logger.warn({ batchIndex, processed: counts.processed }, 'Batch cancelled');
        return { ...counts, cancelled: true };
      }
      logger.error({ batchIndex, error: errorMessage(reason), failedIds: failedIds.length }, 'Batch failed');
      return { ...counts, failure: { batchIndex, ids: failedIds, reason: errorMessage(reason) } };
    };

    // ===== EXISTENCE CHECK =====
    let existing: Set<string>;
    try {
      existing = await index.exists(ids, { signal });
    } catch (error) {
      return fail(error, ids, NO_COUNTS);
    }

    // ===== FILTER =====
    let excluded = 0;
    let skippedEmpty = 0;
    const prepared: PreparedChunk[] = [];

    for (const chunk of batch) {
      if (existing.has(chunk.id)) {
        continue;
      }
      const type = chunk.metadata.type;
      if (type !== undefined && this.excludedTypes.has(type)) {
        excluded++;
        continue;
      }
      const text = normalizeChunkText(chunk.text);
      if (!text) {
        skippedEmpty++;
        continue;
      }
      prepared.push({
        chunk,
        text,
        embeddingText: this.config.prefixFilename ? withFilenamePrefix(chunk.metadata.filename, text) : text,
      });
    }

    const counts: BatchCounts = { processed: 0, skipped: existing.size, skippedEmpty, excluded };

    if (prepared.length === 0) {
      logger.debug({ batchIndex, ...counts }, 'Batch had nothing to embed');
      return counts;
    }

    // ===== EMBED =====
    const texts = prepared.map((item) => item.embeddingText);
    let dense: number[][];
    try {
      dense = await embedder.embed(texts, { signal });
      if (dense.length !== texts.length) {
        throw new EmbeddingError(`Expected ${texts.length} embeddings, got ${dense.length}`);
      }
    } catch (error) {
      return fail(error, prepared.map((item) => item.chunk.id), counts);
    }

    const sparseVectors = sparse.build(texts);

    const records: VectorRecord[] = prepared.map((item, i) => ({
      id: item.chunk.id,
      dense: dense[i],
      sparse: sparseVectors[i],
      metadata: {
        ...item.chunk.metadata,
        text: item.text,
        text_with_filename: item.embeddingText,
      },
    }));

    // ===== UPSERT =====
    const result = await this.upsertWithBackoff(records, batchIndex, signal);
    const outcomeCounts = { ...counts, processed: result.upserted };

    if (result.failure) {
      return fail(result.failure.error, result.failure.ids, outcomeCounts);
    }

    logger.info(
      { batchIndex, latency: Date.now() - startTime, ...outcomeCounts },
      'Batch ingested'
    );
    return outcomeCounts;
  }

  /**
   * Upsert in sub-batches. The sub-batch size starts at the whole batch and
   * halves on PayloadTooLargeError (floor 1); transient errors back off
   * exponentially up to maxAttempts.
   */
  private async upsertWithBackoff(
    records: VectorRecord[],
    batchIndex: number,
    signal?: AbortSignal
  ): Promise<{ upserted: number; failure?: { error: unknown; ids: string[] } }> {
    let size = records.length;
    let start = 0;

    while (start < records.length) {
      const slice = records.slice(start, start + size);
      try {
        await this.upsertWithRetry(slice, batchIndex, signal);
        start += slice.length;
      } catch (error) {
        if (error instanceof PayloadTooLargeError && size > 1) {
          size = Math.max(1, Math.floor(size / 2));
          this.deps.logger.warn({ batchIndex, size }, 'Upsert payload too large, reducing sub-batch size');
          continue;
        }
        return { upserted: start, failure: { error, ids: records.slice(start).map((record) => record.id) } };
      }
    }

    return { upserted: start };
  }

  private async upsertWithRetry(records: VectorRecord[], batchIndex: number, signal?: AbortSignal): Promise<void> {
    const { maxAttempts, baseDelayMs, maxDelayMs } = this.config;

    for (let attempt = 0; ; attempt++) {
      try {
        await this.deps.index.upsert(records, { signal });
        return;
      } catch (error) {
        const transient = error instanceof IndexUpsertError || error instanceof TimeoutError;
        if (!transient || attempt + 1 >= maxAttempts) {
          throw error;
        }

        const delay = backoffDelay(attempt, baseDelayMs, maxDelayMs);
        this.deps.logger.warn(
          { batchIndex, attempt: attempt + 1, maxAttempts, delay, error: errorMessage(error) },
          'Upsert failed, retrying'
        );
        try {
          await sleep(delay, undefined, { signal });
        } catch {
          throw new CancelledError('upsert backoff');
        }
      }
    }
  }
}
