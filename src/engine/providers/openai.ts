/**
 * OpenAI LLM Provider implementation
 *
 * Also serves OpenAI-compatible endpoints (Qwen through DashScope compatible mode).
 * SDK-level retries are off by default: the orchestrator owns the retry loop.
 */

import OpenAI from 'openai';
import type { ZodType, ZodTypeDef } from 'zod';
import type {
  ILLMProvider,
  LLMProviderConfig,
  Message,
  CompletionOptions,
  CompletionResult,
  TokenUsage,
} from '../interfaces/llm-provider.js';
import { estimateTokens } from '../chunking/tokens.js';

/** The model answered, but not with the JSON that was asked for */
export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedResponseError';
  }
}

export class OpenAIProvider implements ILLMProvider {
  readonly name: string;
  readonly model: string;

  private client: OpenAI;
  private temperature: number;

  constructor(config: LLMProviderConfig, name = 'openai') {
    this.name = name;
    this.model = config.model ?? 'gpt-3.5-turbo';
    this.temperature = config.temperature ?? 0.1;

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeout ?? 60000,
      maxRetries: config.maxRetries ?? 0,
    });
  }

  async complete(messages: Message[], options?: CompletionOptions): Promise<CompletionResult> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: messages.map((m) => ({
        role: m.role,
        content: m.content,
      })),
      temperature: options?.temperature ?? this.temperature,
      max_tokens: options?.maxTokens ?? 4096,
      top_p: options?.topP,
      stop: options?.stop,
    });

    const choice = response.choices[0];

    return {
      content: choice?.message.content ?? '',
      tokensUsed: this.usageOf(response.usage),
      finishReason: this.mapFinishReason(choice?.finish_reason ?? null),
      model: response.model,
    };
  }

  async completeJSON<T>(
    messages: Message[],
    schema: ZodType<T, ZodTypeDef, unknown>,
    options?: CompletionOptions
  ): Promise<{ data: T; tokensUsed: TokenUsage }> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: messages.map((m) => ({
        role: m.role,
        content: m.content,
      })),
      temperature: options?.temperature ?? this.temperature,
      max_tokens: options?.maxTokens ?? 4096,
      response_format: { type: 'json_object' },
    });

    const content = response.choices[0]?.message.content ?? '';
    return {
      data: parseJSONResponse(content, schema),
      tokensUsed: this.usageOf(response.usage),
    };
  }

  estimateTokens(text: string): number {
    return estimateTokens(text);
  }

  private usageOf(
    usage: { prompt_tokens: number; completion_tokens: number; total_tokens: number } | undefined
  ): TokenUsage {
    return {
      prompt: usage?.prompt_tokens ?? 0,
      completion: usage?.completion_tokens ?? 0,
      total: usage?.total_tokens ?? 0,
    };
  }

  private mapFinishReason(reason: string | null): CompletionResult['finishReason'] {
    switch (reason) {
      case 'stop':
        return 'stop';
      case 'length':
        return 'length';
      case 'content_filter':
        return 'content_filter';
      default:
        return 'error';
    }
  }
}

/**
 * Parse a model's JSON answer, tolerating a surrounding ```json fence.
 */
export function parseJSONResponse<T>(content: string, schema: ZodType<T, ZodTypeDef, unknown>): T {
  const unfenced = content
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '');

  let raw: unknown;
  try {
    raw = JSON.parse(unfenced);
  } catch {
    throw new MalformedResponseError(`Failed to parse JSON response: ${content.slice(0, 200)}`);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedResponseError(`Unexpected JSON response shape: ${parsed.error.message}`);
  }
  return parsed.data;
}
