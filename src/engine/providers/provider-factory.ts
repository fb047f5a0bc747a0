/**
 * Provider selection: OpenAI, or Qwen through DashScope's OpenAI-compatible mode
 */

import type { ILLMProvider } from '../interfaces/llm-provider.js';
import type { ProviderName } from '../types/common.js';
import { ConfigurationError } from '../errors.js';
import { OpenAIProvider } from './openai.js';

export const DASHSCOPE_BASE_URL = 'https://dashscope.aliyuncs.com/compatible-mode/v1';

export interface ProviderCredentials {
  openaiApiKey: string;
  openaiBaseUrl?: string;
  dashscopeApiKey: string;
}

export interface ProviderSelection {
  provider: ProviderName;
  model: string;
  temperature?: number;
  timeoutMs?: number;
}

/**
 * Resolve `auto`: Qwen models go to DashScope; otherwise OpenAI when a key is set.
 */
export function resolveProviderName(
  credentials: ProviderCredentials,
  selection: ProviderSelection
): Exclude<ProviderName, 'auto'> {
  if (selection.provider !== 'auto') return selection.provider;
  if (selection.model.toLowerCase().startsWith('qwen')) return 'qwen';
  return credentials.openaiApiKey ? 'openai' : 'qwen';
}

export function createProvider(
  credentials: ProviderCredentials,
  selection: ProviderSelection
): ILLMProvider {
  const name = resolveProviderName(credentials, selection);

  if (name === 'qwen') {
    if (!credentials.dashscopeApiKey) {
      throw new ConfigurationError(`DASHSCOPE_API_KEY is required for model "${selection.model}"`);
    }
    console.log(`[Providers] Using Qwen (DashScope) with model ${selection.model}`);
    return new OpenAIProvider(
      {
        apiKey: credentials.dashscopeApiKey,
        baseUrl: DASHSCOPE_BASE_URL,
        model: selection.model,
        temperature: selection.temperature,
        timeout: selection.timeoutMs,
      },
      'qwen'
    );
  }

  if (!credentials.openaiApiKey) {
    throw new ConfigurationError(`OPENAI_API_KEY is required for model "${selection.model}"`);
  }
  console.log(`[Providers] Using OpenAI with model ${selection.model}`);
  return new OpenAIProvider({
    apiKey: credentials.openaiApiKey,
    baseUrl: credentials.openaiBaseUrl,
    model: selection.model,
    temperature: selection.temperature,
    timeout: selection.timeoutMs,
  });
}
