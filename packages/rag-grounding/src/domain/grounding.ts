/**
 * Domain models for the grounded generation contract.
 *
 * Both result types are immutable: instances come only from the static
 * factories below and are frozen on construction.
 */

import { REFUSAL_MESSAGE } from '@compliance-rag/rag-prompts';

export const REFUSAL_INSUFFICIENT_SOURCES = 'insufficient_sources';
export const REFUSAL_COLLECTION_NOT_FOUND = 'collection_not_found';
export const REFUSAL_NO_RELEVANT_CONTENT = 'no_relevant_content';
export const REFUSAL_GENERATION_ERROR = 'generation_error';

export type RefusalReason =
  | typeof REFUSAL_INSUFFICIENT_SOURCES
  | typeof REFUSAL_COLLECTION_NOT_FOUND
  | typeof REFUSAL_NO_RELEVANT_CONTENT
  | typeof REFUSAL_GENERATION_ERROR;

export interface SourceMetadata {
  filename?: string;
  pageNum?: number;
  projectId?: string;
  blockId?: string;
  sectionId?: string;
  [key: string]: unknown;
}

export interface RetrievalSource {
  readonly sourceId: string;
  readonly contentSnippet: string;
  readonly score: number;
  readonly metadata: Readonly<SourceMetadata>;
}

/**
 * Raw record as produced by the retrieval pipeline (vector hits plus
 * graph-expanded references).
 */
export interface RetrievedDocument {
  id?: string;
  content?: string;
  score?: number;
  filename?: string | null;
  page_num?: number | null;
  project_id?: string | null;
  block_id?: string | null;
  section_id?: string | null;
  is_graph?: boolean;
}

export function createRetrievalSource(input: {
  sourceId: string;
  contentSnippet: string;
  score: number;
  metadata?: SourceMetadata;
}): RetrievalSource {
  return Object.freeze({
    sourceId: input.sourceId,
    contentSnippet: input.contentSnippet,
    score: input.score,
    metadata: Object.freeze({ ...(input.metadata ?? {}) }),
  });
}

const compactMetadata = (document: RetrievedDocument): SourceMetadata => {
  const metadata: SourceMetadata = {};
  if (document.filename != null) metadata.filename = document.filename;
  if (document.page_num != null) metadata.pageNum = document.page_num;
  if (document.project_id != null) metadata.projectId = document.project_id;
  if (document.block_id != null) metadata.blockId = document.block_id;
  if (document.section_id != null) metadata.sectionId = document.section_id;
  return metadata;
};

export interface RetrievalResultOptions {
  queryAnalysis?: Record<string, unknown>;
  minSources?: number;
}

export class RetrievalResult {
  readonly sources: readonly RetrievalSource[];
  readonly queryAnalysis: Readonly<Record<string, unknown>>;
  readonly isSufficient: boolean;

  private constructor(
    sources: RetrievalSource[],
    queryAnalysis: Record<string, unknown>,
    isSufficient: boolean
  ) {
    this.sources = Object.freeze([...sources]);
    this.queryAnalysis = Object.freeze({ ...queryAnalysis });
    this.isSufficient = isSufficient;
    Object.freeze(this);
  }

  /**
   * Wraps already-built sources, keeping the retriever's order.
   */
  static fromSources(sources: RetrievalSource[], options: RetrievalResultOptions = {}): RetrievalResult {
    const minSources = options.minSources ?? 1;
    return new RetrievalResult(sources, options.queryAnalysis ?? {}, sources.length >= minSources);
  }

  /**
   * Builds a result from raw retrieval records. Graph-expanded records are
   * dropped before sufficiency is computed.
   */
  static fromDocuments(documents: RetrievedDocument[], options: RetrievalResultOptions = {}): RetrievalResult {
    const sources = documents
      .filter((document) => !document.is_graph)
      .map((document) =>
        createRetrievalSource({
          sourceId: document.id ?? '',
          contentSnippet: document.content ?? '',
          score: document.score ?? 0,
          metadata: compactMetadata(document),
        })
      );

    return RetrievalResult.fromSources(sources, options);
  }

  static empty(queryAnalysis: Record<string, unknown> = {}): RetrievalResult {
    return new RetrievalResult([], queryAnalysis, false);
  }

  get sourceIds(): ReadonlySet<string> {
    return new Set(this.sources.map((source) => source.sourceId));
  }
}

/**
 * True when `text` is the fixed refusal sentence, ignoring surrounding
 * whitespace.
 */
export const isRefusalSentence = (text: string): boolean => text.trim() === REFUSAL_MESSAGE;

export class AnswerResult {
  readonly answerText: string;
  readonly citations: readonly string[];
  readonly refusalReason: RefusalReason | null;
  readonly confidence: number | null;

  private constructor(
    answerText: string,
    citations: string[],
    refusalReason: RefusalReason | null,
    confidence: number | null
  ) {
    this.answerText = answerText;
    this.citations = Object.freeze(citations);
    this.refusalReason = refusalReason;
    this.confidence = confidence;
    Object.freeze(this);
  }

  /**
   * An uncited answer that is the refusal sentence becomes a
   * `no_relevant_content` refusal: an answer is a refusal exactly when it
   * carries no citations and the refusal text.
   */
  static answered(input: { answerText: string; citations?: readonly string[]; confidence?: number }): AnswerResult {
    const citations = [...new Set(input.citations ?? [])];
    if (citations.length === 0 && isRefusalSentence(input.answerText)) {
      return AnswerResult.refusal(REFUSAL_NO_RELEVANT_CONTENT);
    }
    return new AnswerResult(input.answerText, citations, null, input.confidence ?? null);
  }

  static refusal(reason: RefusalReason): AnswerResult {
    return new AnswerResult(REFUSAL_MESSAGE, [], reason, null);
  }

  get isRefusal(): boolean {
    return this.refusalReason !== null;
  }
}
