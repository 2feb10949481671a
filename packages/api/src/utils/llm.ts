import Groq from 'groq-sdk';
import type { GroqConfig } from '../config';
import { AppError, CancelledError, GenerationError, toAppError } from '../errors';
import type { Logger } from './logger';

/**
 * Generator Interface
 *
 * Vendor-agnostic abstraction for streamed generation.
 * `generate` returns a lazy, finite, non-restartable sequence of text
 * deltas. Nothing is requested until iteration starts; stopping early
 * (break, return, abort) closes the underlying HTTP stream.
 *
 * Implementation: GroqGenerator
 */

export interface GenerateOptions {
  signal?: AbortSignal;
  temperature?: number;
  maxTokens?: number;
}

export interface Generator {
  readonly model: string;
  generate(prompt: string, options?: GenerateOptions): AsyncIterable<string>;
}

/**
 * GroqGenerator Implementation
 *
 * Groq chat completions with `stream: true`.
 */
export class GroqGenerator implements Generator {
  readonly model: string;
  private client: Groq;

  constructor(
    private readonly config: GroqConfig,
    private readonly logger: Logger
  ) {
    const apiKey = config.apiKey;

    // Validate API key is present
    if (!apiKey || apiKey.trim() === '') {
      throw new GenerationError(
        'GROQ_API_KEY is not configured. ' + 'Set GROQ_API_KEY in .env file or as environment variable.'
      );
    }

    this.client = new Groq({ apiKey, maxRetries: 0 });
    this.model = config.model;

    logger.info({ model: this.model }, 'GroqGenerator initialized');
  }

  async *generate(prompt: string, options: GenerateOptions = {}): AsyncGenerator<string, void, undefined> {
    const startTime = Date.now();
    let deltas = 0;

    try {
      const stream = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: 'user', content: prompt }],
          temperature: options.temperature ?? this.config.temperature,
          max_tokens: options.maxTokens ?? this.config.maxTokens,
          stream: true,
        },
        { signal: options.signal }
      );

      for await (const chunk of stream) {
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) {
          deltas++;
          yield delta;
        }
      }

      this.logger.info({ latency: Date.now() - startTime, deltas, model: this.model }, 'LLM stream completed');
    } catch (error) {
      if (options.signal?.aborted) {
        throw options.signal.reason instanceof AppError ? options.signal.reason : new CancelledError('generation');
      }
      this.logger.error({ error, deltas }, 'LLM stream failed');
      throw toAppError(error, GenerationError, 'Generation failed');
    }
  }
}
