import { describe, it, expect } from 'vitest';
import { loadConfig, validateConfig, hasAIProvider } from './config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.model).toEqual({ name: 'gpt-3.5-turbo', provider: 'auto', requestTimeoutMs: 60000 });
    expect(config.translation).toEqual({
      sourceLanguage: 'en',
      targetLanguage: 'zh',
      maxTokensPerChunk: 800,
      temperature: 0.1,
      summaryMaxLength: 1000,
      tailLength: 200,
      summarizer: 'rolling',
      translateCodeComments: false,
    });
    expect(config.retry).toEqual({ maxAttempts: 3, baseDelayMs: 1000 });
    expect(config.openai.baseUrl).toBeUndefined();
  });

  it('reads the environment', () => {
    const config = loadConfig({
      OPENAI_API_KEY: 'test-key',
      MODEL_NAME: 'qwen-plus',
      MODEL_PROVIDER: 'qwen',
      TARGET_LANGUAGE: 'ja',
      MAX_TOKENS_PER_CHUNK: '500',
      SUMMARIZER: 'llm',
      TRANSLATE_CODE_COMMENTS: 'true',
    });

    expect(config.openai.apiKey).toBe('test-key');
    expect(config.model.name).toBe('qwen-plus');
    expect(config.model.provider).toBe('qwen');
    expect(config.translation.targetLanguage).toBe('ja');
    expect(config.translation.maxTokensPerChunk).toBe(500);
    expect(config.translation.summarizer).toBe('llm');
    expect(config.translation.translateCodeComments).toBe(true);
  });
});

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(validateConfig(loadConfig({}))).toEqual({ valid: true, errors: [] });
  });

  it('reports every problem', () => {
    const result = validateConfig(
      loadConfig({ MODEL_PROVIDER: 'claude', MAX_TOKENS_PER_CHUNK: 'lots', SUMMARIZER: 'gpt', MAX_ATTEMPTS: '0' })
    );

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'MODEL_PROVIDER must be one of openai, qwen, auto, got "claude"',
      'MAX_TOKENS_PER_CHUNK must be a positive integer',
      'SUMMARIZER must be one of rolling, llm, got "gpt"',
      'MAX_ATTEMPTS must be a positive integer',
    ]);
  });
});

describe('hasAIProvider', () => {
  it('needs at least one key', () => {
    expect(hasAIProvider(loadConfig({}))).toBe(false);
    expect(hasAIProvider(loadConfig({ DASHSCOPE_API_KEY: 'test-key' }))).toBe(true);
  });
});
