/**
 * Configuration management for Chunkwise
 */

import { PROVIDER_NAMES, isProviderName } from './engine/types/common.js';

/** `rolling` keeps recent translated text; `llm` asks the model for a summary */
export const SUMMARIZER_KINDS = ['rolling', 'llm'] as const;

export type SummarizerKind = (typeof SUMMARIZER_KINDS)[number];

export function isSummarizerKind(value: string): value is SummarizerKind {
  return SUMMARIZER_KINDS.some((kind) => kind === value);
}

export interface AppConfig {
  // Server
  port: number;

  // AI Providers
  openai: {
    apiKey: string;
    baseUrl: string | undefined;
  };
  dashscope: {
    apiKey: string;
  };
  model: {
    name: string;
    /** `openai`, `qwen` or `auto`; anything else fails validation */
    provider: string;
    requestTimeoutMs: number;
  };

  // Translation settings
  translation: {
    sourceLanguage: string;
    targetLanguage: string;
    maxTokensPerChunk: number;
    temperature: number;
    summaryMaxLength: number;
    tailLength: number;
    /** `rolling` or `llm`; anything else fails validation */
    summarizer: string;
    translateCodeComments: boolean;
  };

  retry: {
    maxAttempts: number;
    baseDelayMs: number;
  };
}

type Env = Record<string, string | undefined>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: parseInt(env.PORT ?? '3000', 10),

    openai: {
      apiKey: env.OPENAI_API_KEY ?? '',
      baseUrl: env.OPENAI_BASE_URL || undefined,
    },

    dashscope: {
      apiKey: env.DASHSCOPE_API_KEY ?? '',
    },

    model: {
      name: env.MODEL_NAME ?? 'gpt-3.5-turbo',
      provider: env.MODEL_PROVIDER ?? 'auto',
      requestTimeoutMs: parseInt(env.REQUEST_TIMEOUT_MS ?? '60000', 10),
    },

    translation: {
      sourceLanguage: env.SOURCE_LANGUAGE ?? 'en',
      targetLanguage: env.TARGET_LANGUAGE ?? 'zh',
      maxTokensPerChunk: parseInt(env.MAX_TOKENS_PER_CHUNK ?? '800', 10),
      temperature: parseFloat(env.TRANSLATION_TEMPERATURE ?? '0.1'),
      summaryMaxLength: parseInt(env.SUMMARY_MAX_LENGTH ?? '1000', 10),
      tailLength: parseInt(env.TAIL_LENGTH ?? '200', 10),
      summarizer: env.SUMMARIZER ?? 'rolling',
      translateCodeComments: env.TRANSLATE_CODE_COMMENTS === 'true',
    },

    retry: {
      maxAttempts: parseInt(env.MAX_ATTEMPTS ?? '3', 10),
      baseDelayMs: parseInt(env.RETRY_BASE_DELAY_MS ?? '1000', 10),
    },
  };
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Validate configuration. API keys are not required here: `chunks` and the
 * status endpoint work without them.
 */
export function validateConfig(config: AppConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!isPositiveInteger(config.port)) {
    errors.push(`PORT must be a positive integer, got ${config.port}`);
  }

  if (!isProviderName(config.model.provider)) {
    errors.push(
      `MODEL_PROVIDER must be one of ${PROVIDER_NAMES.join(', ')}, got "${config.model.provider}"`
    );
  }

  if (!config.model.name.trim()) {
    errors.push('MODEL_NAME must not be empty');
  }

  if (!isPositiveInteger(config.model.requestTimeoutMs)) {
    errors.push('REQUEST_TIMEOUT_MS must be a positive integer');
  }

  if (!isPositiveInteger(config.translation.maxTokensPerChunk)) {
    errors.push('MAX_TOKENS_PER_CHUNK must be a positive integer');
  }

  if (
    Number.isNaN(config.translation.temperature) ||
    config.translation.temperature < 0 ||
    config.translation.temperature > 2
  ) {
    errors.push('TRANSLATION_TEMPERATURE must be between 0 and 2');
  }

  if (!isPositiveInteger(config.translation.summaryMaxLength)) {
    errors.push('SUMMARY_MAX_LENGTH must be a positive integer');
  }

  if (!Number.isInteger(config.translation.tailLength) || config.translation.tailLength < 0) {
    errors.push('TAIL_LENGTH must be a non-negative integer');
  }

  if (!isSummarizerKind(config.translation.summarizer)) {
    errors.push(
      `SUMMARIZER must be one of ${SUMMARIZER_KINDS.join(', ')}, got "${config.translation.summarizer}"`
    );
  }

  if (!isPositiveInteger(config.retry.maxAttempts)) {
    errors.push('MAX_ATTEMPTS must be a positive integer');
  }

  if (!Number.isInteger(config.retry.baseDelayMs) || config.retry.baseDelayMs < 0) {
    errors.push('RETRY_BASE_DELAY_MS must be a non-negative integer');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Check if AI provider is configured
 */
export function hasAIProvider(config: AppConfig): boolean {
  return Boolean(config.openai.apiKey || config.dashscope.apiKey);
}
