/**
 * @package rag-llm
 *
 * Chat types, the provider-agnostic LlmClient contract and an
 * OpenAI-compatible client on the Vercel AI SDK.
 */

export {
  OpenAiLlmClient,
  DEFAULT_OPENAI_MODEL,
  DEFAULT_LLM_TEMPERATURE,
  DEFAULT_MAX_TOKENS,
  type OpenAiClientConfig,
} from './openAiClient.js';

export {
  ComplianceError,
  LlmError,
  describeError,
  getErrorMessage,
  type ComplianceErrorCode,
  type ErrorLogFields,
} from './errors.js';

export type { ChatMessage, LlmChatRequest, LlmChatResponse, LlmClient } from './types.js';
