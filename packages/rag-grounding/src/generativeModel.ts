/**
 * Generation capability consumed by the grounded generator, plus the
 * LLM-backed implementation used in production.
 */

import { z } from 'zod';
import { DEFAULT_LLM_TEMPERATURE, DEFAULT_MAX_TOKENS, type LlmClient } from '@compliance-rag/rag-llm';
import { HIPAA_SYSTEM_PROMPT } from '@compliance-rag/rag-prompts';
import { createLogger, type Logger } from '@compliance-rag/rag-observability';

export interface GenerationOutput {
  answer: string;
  model?: string;
  backend?: string;
  tokensUsed?: number | null;
}

/**
 * Any backend (hosted model, local model, test double) that answers a query
 * from a context string. Failure is signalled by rejecting.
 */
export interface GenerativeModel {
  generate(query: string, context: string): Promise<GenerationOutput>;
}

export const generationOutputSchema = z
  .object({
    answer: z.string(),
    model: z.string().optional(),
    backend: z.string().optional(),
    tokensUsed: z.number().nullable().optional(),
  })
  .passthrough();

export interface LlmGenerativeModelOptions {
  model?: string;
  backend?: string;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  logger?: Logger;
}

export function buildUserPrompt(query: string, context: string): string {
  if (context) {
    return `Context:\n${context}\n\nQuestion: ${query}\n\nAnswer:`;
  }

  return `Question: ${query}\n\nNote: No context was provided. Indicate that specific information is not available.\n\nAnswer:`;
}

export class LlmGenerativeModel implements GenerativeModel {
  private readonly logger: Logger;

  constructor(
    private readonly client: LlmClient,
    private readonly options: LlmGenerativeModelOptions = {}
  ) {
    this.logger = options.logger ?? createLogger('LlmGenerativeModel');
  }

  async generate(query: string, context: string): Promise<GenerationOutput> {
    const response = await this.client.chat({
      messages: [
        { role: 'system', content: this.options.systemPrompt ?? HIPAA_SYSTEM_PROMPT },
        { role: 'user', content: buildUserPrompt(query, context) },
      ],
      model: this.options.model,
      temperature: this.options.temperature ?? DEFAULT_LLM_TEMPERATURE,
      max_tokens: this.options.maxTokens ?? DEFAULT_MAX_TOKENS,
    });

    this.logger.debug({ answerLength: response.content.length }, 'Generated answer');

    return {
      answer: response.content,
      model: response.model ?? this.options.model,
      backend: this.options.backend ?? 'openai',
      tokensUsed: response.usage?.total_tokens ?? null,
    };
  }
}
