import { AppError, CancelledError, GenerationError } from '../errors';

/**
 * Streaming Assembler
 *
 * One session per answer exchange. Deltas are appended in arrival order to
 * a single buffer; the session is done once the stream completes or fails.
 * A failed session keeps its partial text, which may still hold complete
 * citation markers.
 */
export class StreamSession {
  private readonly parts: string[] = [];
  private done = false;
  private failure?: AppError;

  append(delta: string): void {
    if (this.done) {
      throw new Error('Cannot append to a finished stream session');
    }
    this.parts.push(delta);
  }

  current(): string {
    return this.parts.join('');
  }

  isDone(): boolean {
    return this.done;
  }

  get error(): AppError | undefined {
    return this.failure;
  }

  complete(): void {
    this.done = true;
  }

  fail(error: unknown): void {
    this.failure =
      error instanceof AppError
        ? error
        : new GenerationError(error instanceof Error ? error.message : String(error), { cause: error });
    this.done = true;
  }

  /**
   * Drain `deltas` into the session.
   *
   * Never throws for stream failures: they end the session with `error`
   * set. An aborted signal stops iteration, which closes the source.
   */
  async consume(
    deltas: AsyncIterable<string>,
    options: { signal?: AbortSignal; onDelta?: (delta: string) => void } = {}
  ): Promise<string> {
    const { signal, onDelta } = options;

    try {
      for await (const delta of deltas) {
        if (signal?.aborted) {
          break;
        }
        this.append(delta);
        onDelta?.(delta);
      }

      if (signal?.aborted) {
        this.fail(signal.reason instanceof AppError ? signal.reason : new CancelledError('generation'));
      } else {
        this.complete();
      }
    } catch (error) {
      this.fail(error);
    }

    return this.current();
  }
}
