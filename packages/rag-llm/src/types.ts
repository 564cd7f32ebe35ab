/**
 * Type definitions for @compliance-rag/rag-llm
 */

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmChatRequest {
  messages: ChatMessage[];
  model?: string;
  temperature?: number;
  max_tokens?: number;
}

export interface LlmChatResponse {
  content: string;
  model?: string;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

/**
 * Provider-agnostic chat client. Anything that can turn messages into text
 * (hosted API, local OpenAI-compatible server, test double) implements this.
 */
export interface LlmClient {
  chat(request: LlmChatRequest): Promise<LlmChatResponse>;
}
