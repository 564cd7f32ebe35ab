import type { RetrievalSource } from './domain/grounding.js';

/**
 * Marker syntax as instructed in the citation prompt. Exported for callers
 * that match markers themselves; scanning here never reads its `lastIndex`.
 */
export const CITATION_MARKER_PATTERN = /\[SOURCE:\s*([^\]]+)\]/g;

export interface CitationExtractionOptions {
  /** Called once per marker whose id was not among the supplied sources */
  onUnknownCitation?: (sourceId: string) => void;
}

/**
 * Every citation marker in `text`, trimmed, in order of appearance.
 */
export function findCitationMarkers(text: string): string[] {
  const pattern = new RegExp(CITATION_MARKER_PATTERN.source, 'g');
  return Array.from(text.matchAll(pattern), (match) => match[1].trim());
}

/**
 * Validated citations: ids that were supplied as context, deduplicated in
 * first-seen order. Markers naming anything else are reported, never kept.
 */
export function extractCitations(
  answerText: string,
  sources: readonly RetrievalSource[],
  options: CitationExtractionOptions = {}
): string[] {
  const validSourceIds = new Set(sources.map((source) => source.sourceId));
  const citations: string[] = [];

  for (const sourceId of findCitationMarkers(answerText)) {
    if (!validSourceIds.has(sourceId)) {
      options.onUnknownCitation?.(sourceId);
      continue;
    }
    if (!citations.includes(sourceId)) {
      citations.push(sourceId);
    }
  }

  return citations;
}
