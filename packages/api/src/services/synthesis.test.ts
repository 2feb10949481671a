import { describe, expect, it } from 'vitest';
import { GenerationError, ValidationError } from '../errors';
import { MemoryVectorIndex } from '../store/memory';
import { FakeEmbedder, ScriptedGenerator, silentLogger, testConfig } from '../testing/fakes';
import { IngestionBatcher } from './ingestion';
import { HybridQueryEngine } from './retrieval';
import { SparseVectorBuilder } from './sparse';
import { ALL_DOCUMENTS_SEARCH_FAILED, AnswerService, NO_RESULTS_ANSWER, buildAnswerPrompt } from './synthesis';

const config = testConfig();

async function setup(generator: ScriptedGenerator, timeoutMs = 1000) {
  const index = new MemoryVectorIndex({ dimension: 8 });
  const embedder = new FakeEmbedder();
  const sparse = new SparseVectorBuilder();

  await new IngestionBatcher({ index, embedder, sparse, logger: silentLogger }, config.ingestion).ingest([
    { id: 'a1', text: 'Pressure valve spec', metadata: { filename: 'f.pdf', page_number: 3 } },
  ]);

  const engine = new HybridQueryEngine({ index, embedder, sparse, logger: silentLogger }, config.search);
  return new AnswerService({ engine, generator, logger: silentLogger }, { timeoutMs });
}

describe('AnswerService', () => {
  it('streams a cited answer and verifies its citations', async () => {
    const generator = new ScriptedGenerator(['The valve is rated ', 'for 16 bar [f.pdf, Page 3]', ' [g.pdf, Page 1].']);
    const service = await setup(generator);
    const deltas: string[] = [];

    const result = await service.answer({ query: 'pressure valve' }, { onDelta: (delta) => deltas.push(delta) });

    expect(result.answer).toBe('The valve is rated for 16 bar [f.pdf, Page 3] [g.pdf, Page 1].');
    expect(result.citations).toEqual([
      { filename: 'f.pdf', page: 3, verified: true },
      { filename: 'g.pdf', page: 1, verified: false },
    ]);
    expect(result.incomplete).toBe(false);
    expect(result.error).toBeUndefined();
    expect(result.sources.map((source) => source.id)).toEqual(['a1']);
    expect(deltas).toHaveLength(3);
  });

  it('answers without generation when nothing is retrieved', async () => {
    const generator = new ScriptedGenerator(['unused']);
    const service = await setup(generator);

    const result = await service.answer({ query: 'pressure', fileFilter: 'missing.pdf' });

    expect(result).toEqual({ answer: NO_RESULTS_ANSWER, citations: [], sources: [], incomplete: false });
    expect(generator.prompts).toEqual([]);
  });

  it('puts every retrieved passage in the prompt', async () => {
    const generator = new ScriptedGenerator(['ok']);
    const service = await setup(generator);

    await service.answer({ query: 'pressure valve' });

    expect(generator.prompts).toHaveLength(1);
    expect(generator.prompts[0]).toContain('From f.pdf, Page 3: Pressure valve spec');
    expect(generator.prompts[0]).toContain('Question: pressure valve');
  });

  it('returns the partial answer when the stream fails', async () => {
    const generator = new ScriptedGenerator(['Rated 16 bar [f.pdf, Page 3]', ' and more'], {
      failAfter: 1,
      error: new GenerationError('upstream returned 500'),
    });
    const service = await setup(generator);

    const result = await service.answer({ query: 'pressure valve' });

    expect(result.answer).toBe('Rated 16 bar [f.pdf, Page 3]');
    expect(result.citations).toEqual([{ filename: 'f.pdf', page: 3, verified: true }]);
    expect(result.incomplete).toBe(true);
    expect(result.error).toEqual({ code: 'GENERATION_ERROR', message: 'upstream returned 500' });
  });

  it('marks the answer incomplete when generation times out', async () => {
    const generator = new ScriptedGenerator(['Rated 16 bar'], { hang: true });
    const service = await setup(generator, 20);

    const result = await service.answer({ query: 'pressure valve' });

    expect(result.answer).toBe('Rated 16 bar');
    expect(result.error).toEqual({ code: 'TIMEOUT', message: 'generation timed out after 20ms' });
  });

  it('stops generating when the caller aborts', async () => {
    const generator = new ScriptedGenerator(['Rated 16 bar'], { hang: true });
    const service = await setup(generator);
    const controller = new AbortController();

    const result = await service.answer(
      { query: 'pressure valve' },
      { signal: controller.signal, onDelta: () => controller.abort() }
    );

    expect(result.incomplete).toBe(true);
    expect(result.error?.code).toBe('CANCELLED');
  });

  it('rejects invalid requests before retrieval', async () => {
    const service = await setup(new ScriptedGenerator([]));
    await expect(service.answer({ query: '' })).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('buildAnswerPrompt', () => {
  it('lists passages in retrieval order', () => {
    const prompt = buildAnswerPrompt('Wie hoch ist der Druck?', [
      { id: 'a', text: 'Max 16 bar', source: 'a.pdf', page: 2, score: 0.9 },
      { id: 'b', text: 'Min 2 bar', source: 'b.pdf', page: 5, score: 0.4 },
    ]);

    expect(prompt).toContain('From a.pdf, Page 2: Max 16 bar\n\nFrom b.pdf, Page 5: Min 2 bar');
    expect(prompt).toContain('[Filename, Page N]');
    expect(prompt).toContain('Question: Wie hoch ist der Druck?');
  });

  it('tells the model how to answer when the question names another document', () => {
    const prompt = buildAnswerPrompt('What is the pressure in b.pdf?', [
      { id: 'a', text: 'Max 16 bar', source: 'a.pdf', page: 2, score: 0.9 },
    ]);

    expect(prompt).toContain(
      '6. If the question names a document and the passages come from a different document, reply only with this message, translated into the language of the question:\n' +
        `   "${ALL_DOCUMENTS_SEARCH_FAILED}"`
    );
    expect(prompt).toContain(
      '7. If the question names a document that none of the passages come from, say that the passages are likely not relevant'
    );
  });
});
