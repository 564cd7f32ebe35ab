import type { RetrievalSource } from './domain/grounding.js';

export const SOURCE_SEPARATOR = '\n\n---\n\n';

export function formatSourceTag(source: RetrievalSource): string {
  let tag = `[SOURCE: ${source.sourceId}]`;
  if (source.metadata.filename) {
    tag += `, file: ${source.metadata.filename}`;
  }
  if (source.metadata.pageNum) {
    tag += `, page: ${source.metadata.pageNum}`;
  }
  return tag;
}

/**
 * Renders sources as one labelled block per source, in the order given.
 * Snippets are emitted verbatim; redaction and truncation belong upstream.
 */
export function buildLabeledContext(sources: readonly RetrievalSource[]): string {
  return sources
    .map((source) => `${formatSourceTag(source)}\n${source.contentSnippet}`)
    .join(SOURCE_SEPARATOR);
}
