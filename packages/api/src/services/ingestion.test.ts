import { describe, expect, it } from 'vitest';
import type { Chunk, VectorRecord } from '@pagecite/shared';
import { IndexQueryError, IndexUpsertError, PayloadTooLargeError, ValidationError } from '../errors';
import { MemoryVectorIndex } from '../store/memory';
import type { CallOptions } from '../store/types';
import { BrokenEmbedder, FakeEmbedder, silentLogger, testConfig } from '../testing/fakes';
import { IngestionBatcher } from './ingestion';
import { SparseVectorBuilder } from './sparse';

const config = testConfig();

function chunk(id: string, text: string, metadata: Partial<Chunk['metadata']> = {}): Chunk {
  return { id, text, metadata: { filename: 'f.pdf', page_number: 3, ...metadata } };
}

function setup(options: { index?: MemoryVectorIndex; embedder?: FakeEmbedder; maxAttempts?: number } = {}) {
  const index = options.index ?? new MemoryVectorIndex({ dimension: 8 });
  const embedder = options.embedder ?? new FakeEmbedder();
  const batcher = new IngestionBatcher(
    { index, embedder, sparse: new SparseVectorBuilder(), logger: silentLogger },
    { ...config.ingestion, maxAttempts: options.maxAttempts ?? config.ingestion.maxAttempts }
  );
  return { index, embedder, batcher };
}

/** Rejects any upsert of more than `limit` records and remembers batch sizes. */
class LimitedIndex extends MemoryVectorIndex {
  readonly upsertSizes: number[] = [];

  constructor(private readonly limit: number) {
    super({ dimension: 8 });
  }

  override async upsert(records: VectorRecord[], options?: CallOptions): Promise<void> {
    this.upsertSizes.push(records.length);
    if (records.length > this.limit) {
      throw new PayloadTooLargeError(records.length);
    }
    return super.upsert(records, options);
  }
}

/** Upserts touching `badId` always fail with a transient error. */
class FlakyIndex extends MemoryVectorIndex {
  attempts = 0;

  constructor(private readonly badId: string) {
    super({ dimension: 8 });
  }

  override async upsert(records: VectorRecord[], options?: CallOptions): Promise<void> {
    if (records.some((record) => record.id === this.badId)) {
      this.attempts++;
      throw new IndexUpsertError('connection reset');
    }
    return super.upsert(records, options);
  }
}

/** The first `failures` upserts fail with a transient error, later ones land. */
class RecoveringIndex extends MemoryVectorIndex {
  attempts = 0;

  constructor(private failures: number) {
    super({ dimension: 8 });
  }

  override async upsert(records: VectorRecord[], options?: CallOptions): Promise<void> {
    this.attempts++;
    if (this.failures > 0) {
      this.failures--;
      throw new IndexUpsertError('connection reset');
    }
    return super.upsert(records, options);
  }
}

/** Existence lookups that include `badId` fail. */
class LookupFailingIndex extends MemoryVectorIndex {
  constructor(private readonly badId: string) {
    super({ dimension: 8 });
  }

  override async exists(ids: string[], options?: CallOptions): Promise<Set<string>> {
    if (ids.includes(this.badId)) {
      throw new IndexQueryError('lookup timed out');
    }
    return super.exists(ids, options);
  }
}

/** Slow existence lookups; records the most lookups ever running at once. */
class SlowLookupIndex extends MemoryVectorIndex {
  inFlight = 0;
  maxInFlight = 0;

  constructor() {
    super({ dimension: 8 });
  }

  override async exists(ids: string[], options?: CallOptions): Promise<Set<string>> {
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await new Promise((resolve) => setTimeout(resolve, 5));
    this.inFlight--;
    return super.exists(ids, options);
  }
}

describe('IngestionBatcher', () => {
  it('skips chunks that are already indexed on a second run', async () => {
    const { batcher, embedder } = setup();
    const chunks = [chunk('a1', 'Pressure valve spec')];

    const first = await batcher.ingest(chunks);
    const second = await batcher.ingest(chunks);

    expect(first).toMatchObject({ processed: 1, skipped: 0, failedBatches: [] });
    expect(second).toMatchObject({ processed: 0, skipped: 1, failedBatches: [] });
    expect(embedder.calls).toEqual([['Document f: Pressure valve spec']]);
  });

  it('stores normalized text, the prefixed embedding text and a sparse vector', async () => {
    const { batcher, index } = setup();

    await batcher.ingest([chunk('a1', '  Pressure valve   spec ', { product_category: 'valves' })]);

    const stored = index.get('a1');
    expect(stored?.metadata).toEqual({
      filename: 'f.pdf',
      page_number: 3,
      product_category: 'valves',
      text: 'Pressure valve spec',
      text_with_filename: 'Document f: Pressure valve spec',
    });
    expect(stored?.dense).toHaveLength(8);
    expect(stored?.sparse.indices.length).toBe(stored?.sparse.values.length);
  });

  it('counts chunks empty after normalization without calling the embedder', async () => {
    const embedder = new FakeEmbedder();
    const { batcher } = setup({ embedder });

    const report = await batcher.ingest([chunk('e1', '   '), chunk('e2', '\u200B\n')]);

    expect(report).toMatchObject({ processed: 0, skippedEmpty: 2, failedBatches: [] });
    expect(embedder.calls).toEqual([]);
  });

  it('drops excluded element types', async () => {
    const { batcher } = setup();

    const report = await batcher.ingest([chunk('f1', 'Page 3 of 10', { type: 'Footer' }), chunk('t1', 'Torque 40 Nm')]);

    expect(report).toMatchObject({ processed: 1, excluded: 1 });
  });

  it('counts repeated ids in the input as skipped', async () => {
    const { batcher, index } = setup();

    const report = await batcher.ingest([chunk('a', 'one'), chunk('a', 'again'), chunk('b', 'two')]);

    expect(report).toMatchObject({ processed: 2, skipped: 1 });
    expect(index.get('a')?.metadata.text).toBe('one');
  });

  it('halves the upsert size until the payload fits', async () => {
    const index = new LimitedIndex(1);
    const { batcher } = setup({ index });

    const report = await batcher.ingest(['a', 'b', 'c', 'd'].map((id) => chunk(id, `text ${id}`)), { batchSize: 4 });

    expect(report).toMatchObject({ processed: 4, failedBatches: [] });
    expect(index.upsertSizes).toEqual([4, 2, 1, 1, 1, 1]);
  });

  it('records a batch that keeps failing and moves on', async () => {
    const index = new FlakyIndex('bad');
    const { batcher } = setup({ index, maxAttempts: 3 });

    const report = await batcher.ingest([chunk('bad', 'never lands'), chunk('good', 'lands')], { batchSize: 1 });

    expect(index.attempts).toBe(3);
    expect(report.processed).toBe(1);
    expect(report.failedBatches).toEqual([{ batchIndex: 0, ids: ['bad'], reason: 'connection reset' }]);
    expect(index.get('good')).toBeDefined();
  });

  it('retries a transient upsert failure and lands the batch', async () => {
    const index = new RecoveringIndex(1);
    const { batcher } = setup({ index, maxAttempts: 3 });

    const report = await batcher.ingest([chunk('a', 'retry me')]);

    expect(report).toMatchObject({ processed: 1, failedBatches: [] });
    expect(index.attempts).toBe(2);
    expect(index.get('a')).toBeDefined();
  });

  it('fails only the batch whose existence check fails', async () => {
    const index = new LookupFailingIndex('bad');
    const { batcher, embedder } = setup({ index });

    const report = await batcher.ingest([chunk('bad', 'one'), chunk('x', 'two'), chunk('good', 'three')], {
      batchSize: 2,
    });

    expect(report.processed).toBe(1);
    expect(report.failedBatches).toEqual([{ batchIndex: 0, ids: ['bad', 'x'], reason: 'lookup timed out' }]);
    expect(embedder.calls).toEqual([['Document f: three']]);
    expect(index.get('good')).toBeDefined();
  });

  it('records the whole batch when embedding fails', async () => {
    const { batcher } = setup({ embedder: new BrokenEmbedder() });

    const report = await batcher.ingest([chunk('a', 'one'), chunk('b', '  ')]);

    expect(report).toMatchObject({ processed: 0, skippedEmpty: 1 });
    expect(report.failedBatches).toEqual([{ batchIndex: 0, ids: ['a'], reason: 'embedding backend unavailable' }]);
  });

  it('runs batches on a bounded worker pool', async () => {
    const index = new SlowLookupIndex();
    const { batcher } = setup({ index });
    const chunks = Array.from({ length: 10 }, (_, i) => chunk(`c${i}`, `passage number ${i}`));

    const report = await batcher.ingest(chunks, { batchSize: 2, concurrency: 3 });

    expect(report).toMatchObject({ processed: 10, skipped: 0, failedBatches: [], cancelled: false });
    expect(index.size).toBe(10);
    expect(index.maxInFlight).toBe(3);
  });

  it('stops before the first batch when already cancelled', async () => {
    const { batcher, embedder } = setup();
    const controller = new AbortController();
    controller.abort();

    const report = await batcher.ingest([chunk('a', 'one')], { signal: controller.signal });

    expect(report).toMatchObject({ processed: 0, cancelled: true });
    expect(embedder.calls).toEqual([]);
  });

  it('rejects a non-positive batch size', async () => {
    const { batcher } = setup();
    await expect(batcher.ingest([chunk('a', 'one')], { batchSize: 0 })).rejects.toBeInstanceOf(ValidationError);
  });
});
