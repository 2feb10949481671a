import { LATENCY_BUDGETS } from '@pagecite/shared';
import type { AnswerResult, SearchResult } from '@pagecite/shared';
import type { GroqConfig } from '../config';
import { AppError, CancelledError, TimeoutError } from '../errors';
import type { Generator } from '../utils/llm';
import type { Logger } from '../utils/logger';
import { extractCitations, verifyCitations } from './citations';
import type { HybridQueryEngine } from './retrieval';
import { StreamSession } from './streaming';

/**
 * Answer Synthesis Service
 *
 * Purpose: Generate grounded, cited answers from retrieved passages.
 *
 * STRICT GROUNDING POLICY:
 * - Answer ONLY from provided passages
 * - Cite every fact inline as [Filename, Page N]
 * - Say so when the passages are insufficient
 *
 * A failed or timed-out stream still returns its partial text and the
 * citations it already contains, flagged `incomplete`.
 */

export const ALL_DOCUMENTS_SEARCH_FAILED =
  'Search over all documents was not successful. Please try again by selecting the specific document as the file filter.';

export const NO_RESULTS_ANSWER = 'No relevant passages were found for this question in the indexed documents.';

export interface AnswerOptions {
  signal?: AbortSignal;
  onDelta?: (delta: string) => void;
  /** Called once retrieval has finished, before generation starts. */
  onSources?: (sources: SearchResult[]) => void;
}

export interface AnswerDeps {
  engine: HybridQueryEngine;
  generator: Generator;
  logger: Logger;
}

export class AnswerService {
  constructor(
    private readonly deps: AnswerDeps,
    private readonly config: Pick<GroqConfig, 'timeoutMs'>
  ) {}

  async answer(input: unknown, options: AnswerOptions = {}): Promise<AnswerResult> {
    const { engine, generator, logger } = this.deps;
    const startTime = Date.now();

    const query = engine.parse(input);
    const sources = await engine.retrieve(query, { signal: options.signal });
    options.onSources?.(sources);

    if (sources.length === 0) {
      logger.info({ query: query.text }, 'No passages retrieved, skipping generation');
      return { answer: NO_RESULTS_ANSWER, citations: [], sources, incomplete: false };
    }

    const prompt = buildAnswerPrompt(query.text, sources);
    const session = new StreamSession();

    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new TimeoutError('generation', this.config.timeoutMs)),
      this.config.timeoutMs
    );
    const onParentAbort = () => {
      const reason = options.signal?.reason;
      controller.abort(reason instanceof AppError ? reason : new CancelledError('generation'));
    };
    if (options.signal?.aborted) {
      onParentAbort();
    } else {
      options.signal?.addEventListener('abort', onParentAbort, { once: true });
    }

    const generationStart = Date.now();
    let text: string;
    try {
      text = await session.consume(generator.generate(prompt, { signal: controller.signal }), {
        signal: controller.signal,
        onDelta: options.onDelta,
      });
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onParentAbort);
    }

    const generationLatency = Date.now() - generationStart;
    if (generationLatency > LATENCY_BUDGETS.GENERATION) {
      logger.warn({ generationLatency, budget: LATENCY_BUDGETS.GENERATION }, 'Generation exceeded latency budget');
    }

    const citations = verifyCitations(extractCitations(text), sources);
    const failure = session.error;

    logger.info(
      {
        latency: Date.now() - startTime,
        sourcesUsed: sources.length,
        citations: citations.length,
        unverified: citations.filter((citation) => !citation.verified).length,
        incomplete: failure !== undefined,
      },
      'Answer synthesis completed'
    );

    if (failure) {
      logger.warn({ code: failure.code, error: failure.message }, 'Answer stream ended early');
      return {
        answer: text,
        citations,
        sources,
        incomplete: true,
        error: { code: failure.code, message: failure.message },
      };
    }

    return { answer: text, citations, sources, incomplete: false };
  }
}

/**
 * Instructions followed by one line per retrieved passage.
 */
export function buildAnswerPrompt(question: string, sources: SearchResult[]): string {
  const context = sources.map((source) => `From ${source.source}, Page ${source.page}: ${source.text}`).join('\n\n');

  return `${buildSystemPrompt()}

${buildUserPrompt(question, context)}`;
}

/**
 * Prompt enforcing strict grounding.
 */
function buildSystemPrompt(): string {
  return `You are a precise technical documentation assistant. Answer questions using ONLY the provided passages.

STRICT RULES:
1. Answer in the same language as the question
2. Cite every fact inline in the form [Filename, Page N], using the filename and page of the passage it came from
3. If the passages do not contain enough information, say so plainly instead of guessing
4. Do NOT use external knowledge or make assumptions
5. Be concise but complete
6. If the question names a document and the passages come from a different document, reply only with this message, translated into the language of the question:
   "${ALL_DOCUMENTS_SEARCH_FAILED}"
7. If the question names a document that none of the passages come from, say that the passages are likely not relevant, and suggest selecting that document as the file filter or asking the question more precisely`;
}

function buildUserPrompt(question: string, context: string): string {
  return `Passages:
${context}

Question: ${question}

Answer (using ONLY the passages above):`;
}
