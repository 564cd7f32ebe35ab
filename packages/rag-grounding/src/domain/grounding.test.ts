import { describe, expect, it } from 'vitest';
import { REFUSAL_MESSAGE } from '@compliance-rag/rag-prompts';
import {
  AnswerResult,
  REFUSAL_COLLECTION_NOT_FOUND,
  REFUSAL_GENERATION_ERROR,
  REFUSAL_INSUFFICIENT_SOURCES,
  REFUSAL_NO_RELEVANT_CONTENT,
  RetrievalResult,
  createRetrievalSource,
  type RefusalReason,
} from './grounding.js';
import { hipaaSources } from '../__tests__/fakes.js';

describe('createRetrievalSource', () => {
  it('creates a frozen source', () => {
    const source = createRetrievalSource({
      sourceId: 'test-id',
      contentSnippet: 'Test content',
      score: 0.95,
      metadata: { filename: 'test.pdf' },
    });

    expect(source.sourceId).toBe('test-id');
    expect(source.score).toBe(0.95);
    expect(Object.isFrozen(source)).toBe(true);
    expect(Object.isFrozen(source.metadata)).toBe(true);
  });

  it('defaults metadata to an empty map', () => {
    const source = createRetrievalSource({ sourceId: 'a', contentSnippet: 'b', score: 0 });

    expect(source.metadata).toEqual({});
  });
});

describe('RetrievalResult.fromDocuments', () => {
  it('is insufficient when empty', () => {
    const result = RetrievalResult.fromDocuments([], { minSources: 1 });

    expect(result.sources).toHaveLength(0);
    expect(result.isSufficient).toBe(false);
  });

  it('maps raw records into sources in retriever order', () => {
    const result = RetrievalResult.fromDocuments([
      { id: 'doc-2', content: 'Content 2', score: 0.5, filename: 'b.pdf', page_num: 3, project_id: 'p-1' },
      { id: 'doc-1', content: 'Content 1', score: 0.9, filename: 'a.pdf', block_id: 'blk-7', section_id: null },
    ]);

    expect(result.sources.map((s) => s.sourceId)).toEqual(['doc-2', 'doc-1']);
    expect(result.sources[0].metadata).toEqual({ filename: 'b.pdf', pageNum: 3, projectId: 'p-1' });
    expect(result.sources[1].metadata).toEqual({ filename: 'a.pdf', blockId: 'blk-7' });
    expect(result.isSufficient).toBe(true);
  });

  it('defaults missing id, content and score', () => {
    const result = RetrievalResult.fromDocuments([{}]);

    expect(result.sources[0]).toMatchObject({ sourceId: '', contentSnippet: '', score: 0 });
  });

  it('drops graph-expanded records before counting', () => {
    const result = RetrievalResult.fromDocuments(
      [
        { id: 'doc-1', content: 'Vector content', score: 0.9 },
        { id: 'graph-1', content: 'Graph content', score: 1.0, is_graph: true },
      ],
      { minSources: 2 }
    );

    expect(result.sources).toHaveLength(1);
    expect(result.sources[0].sourceId).toBe('doc-1');
    expect(result.isSufficient).toBe(false);
  });

  it('keeps the query analysis for diagnostics', () => {
    const result = RetrievalResult.fromDocuments([], {
      queryAnalysis: { intent: 'information', keywords: ['hipaa'] },
    });

    expect(result.queryAnalysis).toEqual({ intent: 'information', keywords: ['hipaa'] });
  });
});

describe('RetrievalResult.fromSources', () => {
  it('treats a count equal to the minimum as sufficient', () => {
    expect(RetrievalResult.fromSources(hipaaSources(), { minSources: 2 }).isSufficient).toBe(true);
    expect(RetrievalResult.fromSources(hipaaSources(), { minSources: 3 }).isSufficient).toBe(false);
  });

  it('is immutable', () => {
    const result = RetrievalResult.fromSources(hipaaSources());

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.sources)).toBe(true);
    expect([...result.sourceIds]).toEqual(['src-1', 'src-2']);
  });

  it('has an empty variant', () => {
    const result = RetrievalResult.empty();

    expect(result.sources).toEqual([]);
    expect(result.isSufficient).toBe(false);
  });
});

describe('AnswerResult', () => {
  it('builds refusals with the fixed sentence and no citations', () => {
    const result = AnswerResult.refusal(REFUSAL_INSUFFICIENT_SOURCES);

    expect(result.isRefusal).toBe(true);
    expect(result.refusalReason).toBe('insufficient_sources');
    expect(result.answerText).toBe(REFUSAL_MESSAGE);
    expect(result.citations).toEqual([]);
  });

  it('builds answers without a refusal reason', () => {
    const result = AnswerResult.answered({ answerText: 'The answer is 42.', citations: ['src-1'] });

    expect(result.isRefusal).toBe(false);
    expect(result.refusalReason).toBeNull();
    expect(result.confidence).toBeNull();
    expect(result.citations).toEqual(['src-1']);
  });

  it('deduplicates citations keeping first appearance', () => {
    const result = AnswerResult.answered({ answerText: 'x', citations: ['src-2', 'src-1', 'src-2'] });

    expect(result.citations).toEqual(['src-2', 'src-1']);
  });

  it('turns an uncited refusal sentence into a no_relevant_content refusal', () => {
    const exact = AnswerResult.answered({ answerText: REFUSAL_MESSAGE });
    const padded = AnswerResult.answered({ answerText: `\n${REFUSAL_MESSAGE}  `, citations: [] });

    for (const result of [exact, padded]) {
      expect(result.isRefusal).toBe(true);
      expect(result.refusalReason).toBe('no_relevant_content');
      expect(result.answerText).toBe(REFUSAL_MESSAGE);
      expect(result.citations).toEqual([]);
    }
  });

  it('keeps a cited answer that quotes the refusal sentence', () => {
    const result = AnswerResult.answered({ answerText: REFUSAL_MESSAGE, citations: ['src-1'] });

    expect(result.isRefusal).toBe(false);
    expect(result.citations).toEqual(['src-1']);
  });

  it('cannot be mutated after construction', () => {
    const result = AnswerResult.refusal(REFUSAL_GENERATION_ERROR);

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.citations)).toBe(true);
  });

  it('pairs every refusal reason with empty citations and the refusal sentence', () => {
    const reasons: RefusalReason[] = [
      REFUSAL_INSUFFICIENT_SOURCES,
      REFUSAL_GENERATION_ERROR,
      REFUSAL_COLLECTION_NOT_FOUND,
      REFUSAL_NO_RELEVANT_CONTENT,
    ];

    for (const reason of reasons) {
      const result = AnswerResult.refusal(reason);
      expect(result.refusalReason).toBe(reason);
      expect(result.isRefusal).toBe(true);
      expect(result.citations).toEqual([]);
      expect(result.answerText).toBe(REFUSAL_MESSAGE);
    }
  });

  it('exposes the shared refusal vocabulary', () => {
    expect(REFUSAL_INSUFFICIENT_SOURCES).toBe('insufficient_sources');
    expect(REFUSAL_COLLECTION_NOT_FOUND).toBe('collection_not_found');
    expect(REFUSAL_NO_RELEVANT_CONTENT).toBe('no_relevant_content');
    expect(REFUSAL_GENERATION_ERROR).toBe('generation_error');
  });
});
