import type { Citation, SearchResult, VerifiedCitation } from '@pagecite/shared';

/**
 * Citation Extractor
 *
 * Markers are `[<filename>, Page <N>]` or `[<filename>, Seite <N>]`.
 * The keyword is matched case-sensitively; the filename may contain commas
 * but not brackets.
 */
const CITATION_PATTERN = /\[([^[\]]+?),\s*(?:Page|Seite)\s+(\d+)\]/g;

/**
 * Deduplicated by (filename, page), in order of first appearance.
 */
export function extractCitations(text: string): Citation[] {
  const seen = new Set<string>();
  const citations: Citation[] = [];

  for (const match of text.matchAll(CITATION_PATTERN)) {
    const filename = match[1].trim();
    const page = Number.parseInt(match[2], 10);

    if (!filename || page < 1 || !Number.isSafeInteger(page)) {
      continue;
    }

    const key = `${filename}\u0000${page}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    citations.push({ filename, page });
  }

  return citations;
}

/**
 * A citation is verified when it points at a page that was actually
 * retrieved for this answer.
 */
export function verifyCitations(citations: Citation[], sources: SearchResult[]): VerifiedCitation[] {
  const retrieved = new Set(sources.map((source) => `${source.source}\u0000${source.page}`));
  return citations.map((citation) => ({
    ...citation,
    verified: retrieved.has(`${citation.filename}\u0000${citation.page}`),
  }));
}
