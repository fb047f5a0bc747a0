import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createProvider, resolveProviderName } from './provider-factory.js';
import { ConfigurationError } from '../errors.js';

const BOTH = { openaiApiKey: 'test-openai-key', dashscopeApiKey: 'test-dashscope-key' };

describe('resolveProviderName', () => {
  it('sends qwen models to qwen', () => {
    expect(resolveProviderName(BOTH, { provider: 'auto', model: 'qwen-plus' })).toBe('qwen');
  });

  it('prefers OpenAI when its key is set', () => {
    expect(resolveProviderName(BOTH, { provider: 'auto', model: 'gpt-4o-mini' })).toBe('openai');
  });

  it('falls back to qwen without an OpenAI key', () => {
    const credentials = { openaiApiKey: '', dashscopeApiKey: 'test-dashscope-key' };

    expect(resolveProviderName(credentials, { provider: 'auto', model: 'gpt-4o-mini' })).toBe('qwen');
  });

  it('respects an explicit choice', () => {
    expect(resolveProviderName(BOTH, { provider: 'openai', model: 'qwen-plus' })).toBe('openai');
  });
});

describe('createProvider', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('builds a qwen provider', () => {
    const provider = createProvider(BOTH, { provider: 'qwen', model: 'qwen-turbo' });

    expect(provider.name).toBe('qwen');
    expect(provider.model).toBe('qwen-turbo');
  });

  it('builds an OpenAI provider', () => {
    const provider = createProvider(BOTH, { provider: 'auto', model: 'gpt-3.5-turbo' });

    expect(provider.name).toBe('openai');
  });

  it('requires a key for the chosen provider', () => {
    expect(() =>
      createProvider({ openaiApiKey: '', dashscopeApiKey: '' }, { provider: 'openai', model: 'gpt-3.5-turbo' })
    ).toThrow(ConfigurationError);
    expect(() =>
      createProvider({ openaiApiKey: 'test-openai-key', dashscopeApiKey: '' }, { provider: 'auto', model: 'qwen-max' })
    ).toThrow('DASHSCOPE_API_KEY is required for model "qwen-max"');
  });
});
