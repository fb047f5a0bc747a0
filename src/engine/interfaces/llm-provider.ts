/**
 * LLM Provider interface - abstraction for different AI providers
 */

import type { ZodType, ZodTypeDef } from 'zod';

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  topP?: number;
  stop?: string[];
}

export interface TokenUsage {
  prompt: number;
  completion: number;
  total: number;
}

export interface CompletionResult {
  content: string;
  tokensUsed: TokenUsage;
  finishReason: 'stop' | 'length' | 'content_filter' | 'error';
  model: string;
}

export interface ILLMProvider {
  readonly name: string;
  readonly model: string;

  /**
   * Send a completion request to the LLM
   */
  complete(messages: Message[], options?: CompletionOptions): Promise<CompletionResult>;

  /**
   * Send a completion request with a JSON response validated against `schema`
   */
  completeJSON<T>(
    messages: Message[],
    schema: ZodType<T, ZodTypeDef, unknown>,
    options?: CompletionOptions
  ): Promise<{ data: T; tokensUsed: TokenUsage }>;

  /**
   * Get approximate token count for text
   */
  estimateTokens(text: string): number;
}

export interface LLMProviderConfig {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  timeout?: number;
  maxRetries?: number;
  temperature?: number;
}
