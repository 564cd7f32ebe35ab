/**
 * OpenAI-compatible LLM client built on the Vercel AI SDK.
 *
 * Works against api.openai.com or any OpenAI-compatible endpoint
 * (vLLM, Ollama, a RunPod proxy) through `baseURL`.
 */

import { createOpenAI } from '@ai-sdk/openai';
import { generateText } from 'ai';
import type { LlmChatRequest, LlmChatResponse, LlmClient } from './types.js';
import { LlmError, getErrorMessage } from './errors.js';

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';
export const DEFAULT_LLM_TEMPERATURE = 0.3;
export const DEFAULT_MAX_TOKENS = 2048;

export interface OpenAiClientConfig {
  apiKey: string;
  baseURL?: string;
  defaultModel?: string;
}

const readStatusCode = (error: unknown): number | undefined => {
  if (typeof error === 'object' && error !== null && 'statusCode' in error) {
    const { statusCode } = error;
    return typeof statusCode === 'number' ? statusCode : undefined;
  }
  return undefined;
};

export class OpenAiLlmClient implements LlmClient {
  private readonly openai: ReturnType<typeof createOpenAI>;
  private readonly defaultModel: string;

  constructor(config: OpenAiClientConfig) {
    this.openai = createOpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
    });
    this.defaultModel = config.defaultModel ?? DEFAULT_OPENAI_MODEL;
  }

  async chat(request: LlmChatRequest): Promise<LlmChatResponse> {
    const model = request.model ?? this.defaultModel;

    try {
      const result = await generateText({
        model: this.openai(model),
        messages: request.messages.map((m) => ({
          role: m.role,
          content: m.content,
        })),
        temperature: request.temperature ?? DEFAULT_LLM_TEMPERATURE,
        maxTokens: request.max_tokens ?? DEFAULT_MAX_TOKENS,
      });

      return {
        content: result.text,
        model,
        usage: {
          prompt_tokens: result.usage.promptTokens,
          completion_tokens: result.usage.completionTokens,
          total_tokens: result.usage.totalTokens,
        },
      };
    } catch (error) {
      throw new LlmError(`OpenAI error: ${getErrorMessage(error)}`, readStatusCode(error), {
        cause: error,
      });
    }
  }
}
