import { readFile, readdir } from 'node:fs/promises';
import path from 'node:path';
import type { Chunk } from '@pagecite/shared';
import { ValidationError, errorMessage } from '../errors';
import { parseChunks } from './chunks';

/**
 * Load every `*.json` chunk file in `dir` (non-recursive, sorted by name).
 * Each file holds an array of raw chunks.
 */
export async function readChunkDirectory(dir: string): Promise<{ files: string[]; chunks: Chunk[] }> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files = entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.json'))
    .map((entry) => entry.name)
    .sort();

  const chunks: Chunk[] = [];
  for (const name of files) {
    const raw = await readFile(path.join(dir, name), 'utf8');

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ValidationError(`${name} is not valid JSON: ${errorMessage(error)}`);
    }

    chunks.push(...parseChunks(parsed, name));
  }

  return { files, chunks };
}
