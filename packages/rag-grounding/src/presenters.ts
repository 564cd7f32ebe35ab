import type { AnswerResult, RefusalReason, RetrievalResult, RetrievalSource } from './domain/grounding.js';

const PREVIEW_LENGTH = 200;
const DEFAULT_MAX_SOURCES = 5;

export interface QueryResponseSource {
  sourceId: string;
  filename: string | null;
  pageNum: number | null;
  score: number;
  contentPreview: string;
}

export interface QueryResponse {
  query: string;
  answer: string;
  citations: string[];
  refusalReason: RefusalReason | null;
  sources: QueryResponseSource[];
}

export function previewContent(content: string): string {
  return content.length > PREVIEW_LENGTH ? `${content.slice(0, PREVIEW_LENGTH)}...` : content;
}

const toResponseSource = (source: RetrievalSource): QueryResponseSource => ({
  sourceId: source.sourceId,
  filename: source.metadata.filename ?? null,
  pageNum: source.metadata.pageNum ?? null,
  score: source.score,
  contentPreview: previewContent(source.contentSnippet),
});

/**
 * Shapes an answer for API consumers. Cited sources are listed in citation
 * order; an uncited answer lists the top retrieved sources instead.
 * Refusals list nothing and carry only the fixed sentence.
 */
export function presentAnswer(
  query: string,
  answer: AnswerResult,
  retrievalResult: RetrievalResult,
  options: { maxSources?: number } = {}
): QueryResponse {
  const maxSources = options.maxSources ?? DEFAULT_MAX_SOURCES;

  if (answer.isRefusal) {
    return {
      query,
      answer: answer.answerText,
      citations: [],
      refusalReason: answer.refusalReason,
      sources: [],
    };
  }

  const byId = new Map(retrievalResult.sources.map((source) => [source.sourceId, source]));
  const cited = answer.citations.flatMap((sourceId) => {
    const source = byId.get(sourceId);
    return source ? [source] : [];
  });
  const listed = cited.length > 0 ? cited : retrievalResult.sources;

  return {
    query,
    answer: answer.answerText,
    citations: [...answer.citations],
    refusalReason: null,
    sources: listed.slice(0, maxSources).map(toResponseSource),
  };
}
