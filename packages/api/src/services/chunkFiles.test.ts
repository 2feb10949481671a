import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ValidationError } from '../errors';
import { readChunkDirectory } from './chunkFiles';

describe('readChunkDirectory', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'pagecite-chunks-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads json files in name order and ignores others', async () => {
    await writeFile(
      path.join(dir, 'b.json'),
      JSON.stringify([{ id: 'b1', text: 'Second', metadata: { filename: 'b.pdf' } }])
    );
    await writeFile(
      path.join(dir, 'a.json'),
      JSON.stringify([{ element_id: 'a1', text: 'First', metadata: { filename: 'a.pdf', page_number: 1 } }])
    );
    await writeFile(path.join(dir, 'notes.txt'), 'not chunks');

    const { files, chunks } = await readChunkDirectory(dir);

    expect(files).toEqual(['a.json', 'b.json']);
    expect(chunks.map((chunk) => chunk.id)).toEqual(['a1', 'b1']);
  });

  it('names the file that is not valid JSON', async () => {
    await writeFile(path.join(dir, 'broken.json'), '[{');

    await expect(readChunkDirectory(dir)).rejects.toBeInstanceOf(ValidationError);
    await expect(readChunkDirectory(dir)).rejects.toThrow(/^broken\.json is not valid JSON/);
  });
});
