/**
 * @package rag-grounding
 *
 * Grounded generation for compliance RAG: refuses on thin evidence, keeps
 * retrieved text apart from instructions, and returns only citations that
 * name a supplied source.
 */

export {
  RetrievalResult,
  AnswerResult,
  createRetrievalSource,
  isRefusalSentence,
  REFUSAL_INSUFFICIENT_SOURCES,
  REFUSAL_COLLECTION_NOT_FOUND,
  REFUSAL_NO_RELEVANT_CONTENT,
  REFUSAL_GENERATION_ERROR,
  type RefusalReason,
  type RetrievalSource,
  type RetrievedDocument,
  type RetrievalResultOptions,
  type SourceMetadata,
} from './domain/grounding.js';

export { buildLabeledContext, formatSourceTag, SOURCE_SEPARATOR } from './contextLabeler.js';

export {
  extractCitations,
  findCitationMarkers,
  CITATION_MARKER_PATTERN,
  type CitationExtractionOptions,
} from './citations.js';

export { GroundedGenerator, type GroundedGeneratorDeps } from './groundedGenerator.js';

export {
  LlmGenerativeModel,
  buildUserPrompt,
  generationOutputSchema,
  type GenerativeModel,
  type GenerationOutput,
  type LlmGenerativeModelOptions,
} from './generativeModel.js';

export {
  DEFAULT_GROUNDING_CONFIG,
  loadGroundingConfig,
  resolveGroundingConfig,
  type CitationPolicy,
  type GroundingConfig,
} from './config.js';

export { presentAnswer, previewContent, type QueryResponse, type QueryResponseSource } from './presenters.js';

export { GenerationError, ConfigurationError } from './errors.js';

export {
  RefusalEvaluator,
  CitationEvaluator,
  PhiSafetyEvaluator,
  REFUSAL_PHRASES,
  type EvalInput,
  type EvalResult,
  type Evaluator,
} from './evals/evaluators.js';

export {
  DEFAULT_EVALUATORS,
  evalCaseSchema,
  parseEvalCases,
  runEvaluations,
  type EvalCase,
  type EvalCaseResult,
  type EvalSummary,
  type EvaluatorName,
} from './evals/evalRunner.js';
