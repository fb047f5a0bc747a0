import { describe, it, expect } from 'vitest';
import { parseJSONResponse, MalformedResponseError, OpenAIProvider } from './openai.js';
import { translationResponseSchema } from '../translation/llm-translator.js';

describe('parseJSONResponse', () => {
  it('parses a plain JSON answer', () => {
    expect(parseJSONResponse('{"translation":"你好","terms":[]}', translationResponseSchema)).toEqual({
      translation: '你好',
      terms: [],
    });
  });

  it('accepts an answer wrapped in a json fence', () => {
    const content = '```json\n{"translation":"你好"}\n```';

    expect(parseJSONResponse(content, translationResponseSchema)).toEqual({ translation: '你好' });
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseJSONResponse('Sure! Here is the translation.', translationResponseSchema)).toThrow(
      MalformedResponseError
    );
  });

  it('rejects JSON of the wrong shape', () => {
    expect(() => parseJSONResponse('{"text":"你好"}', translationResponseSchema)).toThrow(
      'Unexpected JSON response shape'
    );
  });
});

describe('OpenAIProvider', () => {
  it('uses the configured model and name', () => {
    const provider = new OpenAIProvider({ apiKey: 'test-key', model: 'qwen-plus' }, 'qwen');

    expect(provider.name).toBe('qwen');
    expect(provider.model).toBe('qwen-plus');
    expect(provider.estimateTokens('abcdefgh')).toBe(2);
  });

  it('defaults to gpt-3.5-turbo', () => {
    expect(new OpenAIProvider({ apiKey: 'test-key' }).model).toBe('gpt-3.5-turbo');
  });
});
