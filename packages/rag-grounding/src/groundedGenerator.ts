/**
 * Grounded Generator - guard between retrieval and the generation backend
 *
 * Per call:
 * 1. Refuse (`insufficient_sources`) when fewer sources than the threshold
 * 2. Build the defended context: preamble + citation instruction + labelled sources
 * 3. Invoke the backend; any failure becomes a `generation_error` refusal
 * 4. Keep only citations that name a supplied source
 * 5. Apply the citation policy, then return the answer
 *
 * A model reply that is only the refusal sentence is reported as a
 * `no_relevant_content` refusal under every citation policy, not returned as
 * an uncited answer; `AnswerResult.answered` enforces the same rule.
 *
 * Holds no per-call state, so concurrent calls need no coordination.
 */

import { trace } from '@opentelemetry/api';
import { buildGroundedPrompt } from '@compliance-rag/rag-prompts';
import { describeError } from '@compliance-rag/rag-llm';
import { createLogger, formatPayloadForLog, withSpan, type Logger } from '@compliance-rag/rag-observability';
import {
  AnswerResult,
  isRefusalSentence,
  REFUSAL_GENERATION_ERROR,
  REFUSAL_INSUFFICIENT_SOURCES,
  REFUSAL_NO_RELEVANT_CONTENT,
  type RetrievalResult,
  type RetrievalSource,
} from './domain/grounding.js';
import { buildLabeledContext } from './contextLabeler.js';
import { extractCitations } from './citations.js';
import { minSourcesSchema, resolveGroundingConfig, type GroundingConfig } from './config.js';
import { generationOutputSchema, type GenerativeModel } from './generativeModel.js';
import { GenerationError } from './errors.js';

export interface GroundedGeneratorDeps {
  generator: GenerativeModel;
  config?: Partial<GroundingConfig>;
  logger?: Logger;
}

export class GroundedGenerator {
  private readonly generator: GenerativeModel;
  private readonly config: GroundingConfig;
  private readonly logger: Logger;

  constructor(deps: GroundedGeneratorDeps) {
    this.generator = deps.generator;
    this.config = resolveGroundingConfig(deps.config);
    this.logger = deps.logger ?? createLogger('GroundedGenerator');
  }

  getConfig(): Readonly<GroundingConfig> {
    return { ...this.config };
  }

  /**
   * Answers `query` strictly from `retrievalResult`. Never rejects: every
   * failure comes back as a refusal with a machine-readable reason.
   */
  async generateGrounded(
    query: string,
    retrievalResult: RetrievalResult,
    minSources?: number
  ): Promise<AnswerResult> {
    const threshold = this.resolveThreshold(minSources);
    const sources = retrievalResult.sources;

    return withSpan(
      'compliance_rag.grounded_generation',
      {
        'rag.source_count': sources.length,
        'rag.min_sources': threshold,
        'rag.citation_policy': this.config.citationPolicy,
      },
      async () => {
        const answer = await this.answer(query, sources, threshold);
        trace.getActiveSpan()?.setAttribute('rag.outcome', answer.refusalReason ?? 'answered');
        return answer;
      }
    );
  }

  /**
   * An override that is not a non-negative integer (NaN, negative,
   * fractional) would disable the gate, so the configured threshold applies.
   */
  private resolveThreshold(minSources: number | undefined): number {
    if (minSources === undefined) {
      return this.config.minSources;
    }
    if (minSourcesSchema.safeParse(minSources).success) {
      return minSources;
    }

    this.logger.warn(
      { minSources: String(minSources), threshold: this.config.minSources },
      'Ignoring invalid minSources override'
    );
    return this.config.minSources;
  }

  private async answer(
    query: string,
    sources: readonly RetrievalSource[],
    threshold: number
  ): Promise<AnswerResult> {
    const { payloadHash: queryHash } = formatPayloadForLog(query);
    const log = this.logger.child({ queryHash });

    if (sources.length < threshold) {
      log.info(
        { sourceCount: sources.length, threshold },
        `Refusing to answer: ${sources.length} sources < ${threshold} threshold`
      );
      return AnswerResult.refusal(REFUSAL_INSUFFICIENT_SOURCES);
    }

    const context = await buildGroundedPrompt(buildLabeledContext(sources));

    let answerText: string;
    try {
      answerText = await this.invokeGenerator(query, context);
    } catch (error) {
      const errorFields = describeError(error);
      trace.getActiveSpan()?.setAttribute('rag.error_code', errorFields.errorCode);
      log.error({ ...errorFields, sourceCount: sources.length }, 'Generation failed');
      return AnswerResult.refusal(REFUSAL_GENERATION_ERROR);
    }

    const citations = extractCitations(answerText, sources, {
      onUnknownCitation: (sourceId) => log.warn({ sourceId }, `Citation references unknown source: ${sourceId}`),
    });

    if (citations.length === 0 && isRefusalSentence(answerText)) {
      log.info('Model declined to answer from the supplied sources');
      return AnswerResult.refusal(REFUSAL_NO_RELEVANT_CONTENT);
    }

    if (this.config.requireCitations && citations.length === 0) {
      log.warn(
        { citationPolicy: this.config.citationPolicy },
        'Answer generated without citations - may indicate hallucination'
      );
      if (this.config.citationPolicy === 'refuse') {
        return AnswerResult.refusal(REFUSAL_NO_RELEVANT_CONTENT);
      }
    }

    return AnswerResult.answered({ answerText, citations });
  }

  private async invokeGenerator(query: string, context: string): Promise<string> {
    const output: unknown = await this.generator.generate(query, context);
    const parsed = generationOutputSchema.safeParse(output);

    if (!parsed.success) {
      throw new GenerationError('Generation backend returned a malformed response', {
        cause: parsed.error,
      });
    }

    return parsed.data.answer;
  }
}
