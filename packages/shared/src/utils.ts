/**
 * Shared utility functions for PageCite.
 */

import type { IngestionReport, PersistedIngestionReport } from './types';

/**
 * Generate a unique id for tracing requests and ingestion runs.
 */
export function generateRequestId(prefix = 'req'): string {
  return `${prefix}_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}

/**
 * Check if a latency exceeds its budget.
 */
export function checkLatencyBudget(
  actual: number,
  budget: number,
  stage: string
): { exceeded: boolean; violation?: string } {
  if (actual > budget) {
    return {
      exceeded: true,
      violation: `${stage}: ${actual}ms exceeded budget of ${budget}ms`,
    };
  }
  return { exceeded: false };
}

/**
 * Stored page numbers may be floats ("3.0") or missing entirely.
 * Float conversion, then truncation; anything unusable reads as page 1.
 */
export function coercePageNumber(value: unknown): number {
  const numeric = typeof value === 'number' ? value : typeof value === 'string' ? parseFloat(value) : NaN;
  if (!Number.isFinite(numeric)) {
    return 1;
  }
  return Math.max(1, Math.trunc(numeric));
}

/**
 * Calculate cosine similarity between two vectors.
 * Zero-magnitude vectors have no direction and score 0.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error('Vectors must have same dimensions');
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function toPersistedReport(report: IngestionReport): PersistedIngestionReport {
  return {
    processedCount: report.processed,
    skippedCount: report.skipped,
    failedBatchCount: report.failedBatches.length,
    elapsedSeconds: report.elapsedSeconds,
    emptyCount: report.skippedEmpty,
    excludedCount: report.excluded,
    failedIds: report.failedBatches.flatMap((batch) => batch.ids),
  };
}
