import { describe, expect, it } from 'vitest';
import { CancelledError, GenerationError, TimeoutError } from '../errors';
import { StreamSession } from './streaming';

async function* fromArray(parts: string[], failWith?: Error): AsyncGenerator<string> {
  for (const part of parts) {
    yield part;
  }
  if (failWith) {
    throw failWith;
  }
}

describe('StreamSession', () => {
  it('concatenates deltas in arrival order', async () => {
    const session = new StreamSession();
    const seen: string[] = [];

    const text = await session.consume(fromArray(['Hello', ', ', 'world']), { onDelta: (d) => seen.push(d) });

    expect(text).toBe('Hello, world');
    expect(seen).toEqual(['Hello', ', ', 'world']);
    expect(session.isDone()).toBe(true);
    expect(session.error).toBeUndefined();
  });

  it('keeps partial text when the stream fails', async () => {
    const session = new StreamSession();

    const text = await session.consume(fromArray(['See [a.pdf, Page 1]'], new Error('socket hang up')));

    expect(text).toBe('See [a.pdf, Page 1]');
    expect(session.isDone()).toBe(true);
    expect(session.error).toBeInstanceOf(GenerationError);
    expect(session.error?.message).toBe('socket hang up');
  });

  it('keeps typed stream errors as they are', async () => {
    const session = new StreamSession();
    const timeout = new TimeoutError('generation', 50);

    await session.consume(fromArray([], timeout));

    expect(session.error).toBe(timeout);
  });

  it('stops on abort and records the abort reason', async () => {
    const session = new StreamSession();
    const controller = new AbortController();

    const text = await session.consume(fromArray(['a', 'b', 'c']), {
      signal: controller.signal,
      onDelta: (delta) => {
        if (delta === 'a') controller.abort();
      },
    });

    expect(text).toBe('a');
    expect(session.error).toBeInstanceOf(CancelledError);
  });

  it('rejects appends after completion', () => {
    const session = new StreamSession();
    session.append('x');
    session.complete();

    expect(() => session.append('y')).toThrow('Cannot append to a finished stream session');
    expect(session.current()).toBe('x');
  });
});
