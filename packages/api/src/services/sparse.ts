import { BM25, SPECIAL_TOKEN_IDS } from '@pagecite/shared';
import type { SparseVector } from '@pagecite/shared';

/**
 * Sparse Vector Builder
 *
 * BM25-weighted term vectors for the lexical half of hybrid search.
 *
 * IDF is computed over the batch being built, not the whole corpus:
 * the same text gets different weights in different batches. Callers must
 * not compare sparse weights across batches.
 */

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;
const RESERVED_IDS = 3;
const WORD_PATTERN = /[\p{L}\p{N}]+/gu;

export interface SparseBuilderOptions {
  vocabularySize?: number;
  k1?: number;
  b?: number;
}

/**
 * Words are maximal runs of letters and digits after NFKC + lower-casing;
 * each is hashed (32-bit FNV-1a) into [3, vocabularySize).
 */
export class HashingTokenizer {
  constructor(private readonly vocabularySize: number = BM25.VOCABULARY_SIZE) {
    if (!Number.isInteger(vocabularySize) || vocabularySize <= RESERVED_IDS) {
      throw new RangeError(`vocabularySize must be an integer greater than ${RESERVED_IDS}`);
    }
  }

  words(text: string): string[] {
    return text.normalize('NFKC').toLowerCase().match(WORD_PATTERN) ?? [];
  }

  encode(text: string): number[] {
    return this.words(text).map((word) => this.tokenId(word));
  }

  tokenId(word: string): number {
    let hash = FNV_OFFSET;
    for (const byte of Buffer.from(word, 'utf8')) {
      hash ^= byte;
      hash = Math.imul(hash, FNV_PRIME) >>> 0;
    }
    return RESERVED_IDS + (hash % (this.vocabularySize - RESERVED_IDS));
  }
}

export class SparseVectorBuilder {
  readonly tokenizer: HashingTokenizer;
  private readonly k1: number;
  private readonly b: number;

  constructor(options: SparseBuilderOptions = {}) {
    this.tokenizer = new HashingTokenizer(options.vocabularySize);
    this.k1 = options.k1 ?? BM25.K1;
    this.b = options.b ?? BM25.B;
  }

  /**
   * One vector per input text, in input order.
   */
  build(texts: string[]): SparseVector[] {
    if (texts.length === 0) {
      return [];
    }

    const documents = texts.map((text) => this.tokenizer.encode(text));
    const totalDocs = documents.length;

    const docFreq = new Map<number, number>();
    for (const tokenIds of documents) {
      for (const tokenId of new Set(tokenIds)) {
        docFreq.set(tokenId, (docFreq.get(tokenId) ?? 0) + 1);
      }
    }

    const avgDocLength = documents.reduce((sum, doc) => sum + doc.length, 0) / totalDocs;

    return documents.map((tokenIds) => {
      // A batch of empty documents has nothing to normalize against.
      if (avgDocLength === 0) {
        return { indices: [], values: [] };
      }

      return this.weigh(tokenIds, (tokenId) => {
        const df = docFreq.get(tokenId) ?? 0;
        return Math.max(0, Math.log((totalDocs - df + 0.5) / (df + 0.5)));
      }, tokenIds.length / avgDocLength);
    });
  }

  /**
   * Query-side vector.
   *
   * A query is a one-document batch, where batch-local IDF is always 0.
   * The query therefore carries IDF-neutral term saturation only
   * (idf = 1, len = avgLen) and the document-side weights supply the IDF.
   */
  buildQuery(text: string): SparseVector {
    return this.weigh(this.tokenizer.encode(text), () => 1, 1);
  }

  private weigh(tokenIds: number[], idfOf: (tokenId: number) => number, relativeLength: number): SparseVector {
    const termFreq = new Map<number, number>();
    for (const tokenId of tokenIds) {
      termFreq.set(tokenId, (termFreq.get(tokenId) ?? 0) + 1);
    }

    const indices: number[] = [];
    const values: number[] = [];

    for (const [tokenId, tf] of termFreq) {
      if (SPECIAL_TOKEN_IDS.has(tokenId)) {
        continue;
      }

      const idf = idfOf(tokenId);
      const score =
        idf * ((tf * (this.k1 + 1)) / (tf + this.k1 * (1 - this.b + this.b * relativeLength)));

      if (score > 0) {
        indices.push(tokenId);
        values.push(score);
      }
    }

    return { indices, values };
  }
}
