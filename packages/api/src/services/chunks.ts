import { z } from 'zod';
import type { Chunk, ChunkMetadata } from '@pagecite/shared';
import { ValidationError } from '../errors';

/**
 * Chunk preparation: parsing raw chunker output and normalizing text
 * before it is embedded.
 */

const ChunkMetadataSchema = z
  .object({
    filename: z.string().min(1),
    page_number: z.union([z.number(), z.string()]).optional(),
    product_category: z.string().optional(),
    product_id: z.string().optional(),
    product_name: z.string().optional(),
    type: z.string().optional(),
  })
  .passthrough();

/**
 * Accepts both our own shape (`id`) and the partitioner's (`element_id`,
 * top-level `type`).
 */
export const RawChunkSchema = z
  .object({
    id: z.string().min(1).optional(),
    element_id: z.string().min(1).optional(),
    type: z.string().optional(),
    text: z.string(),
    metadata: ChunkMetadataSchema,
  })
  .refine((raw) => Boolean(raw.id ?? raw.element_id), {
    message: 'Chunk requires an id or element_id',
    path: ['id'],
  })
  .transform((raw): Chunk => {
    const metadata: ChunkMetadata = { ...raw.metadata };
    const type = raw.type ?? raw.metadata.type;
    if (type !== undefined) {
      metadata.type = type;
    }
    return {
      id: raw.id ?? raw.element_id ?? '',
      text: raw.text,
      metadata,
    };
  });

export type RawChunk = z.input<typeof RawChunkSchema>;

export function parseChunks(input: unknown, source = 'chunks'): Chunk[] {
  const result = z.array(RawChunkSchema).safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      `Invalid chunk data in ${source}`,
      result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    );
  }
  return result.data;
}

const INVISIBLE_CHARS = /[\u00AD\u200B-\u200D\u2060\uFEFF]/g;

/**
 * Encoding normalization (NFKC, invisible characters removed, non-breaking
 * spaces folded) followed by whitespace collapse. Case is kept.
 */
export function normalizeChunkText(text: string): string {
  return text
    .normalize('NFKC')
    .replace(INVISIBLE_CHARS, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * "Document <stem>: <text>" so the filename carries some weight in the
 * embedding without dominating it.
 */
export function withFilenamePrefix(filename: string, text: string): string {
  const stem = filename.replace(/\.pdf$/i, '').replace(/_/g, ' ');
  return `Document ${stem}: ${text}`;
}

