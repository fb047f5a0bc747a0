import { describe, it, expect } from 'vitest';
import { PreservedTermExtractor, stripFencedCode } from './term-extractor.js';

describe('PreservedTermExtractor', () => {
  const extractor = new PreservedTermExtractor();

  it('finds code spans, acronyms and CamelCase kept in the translation', () => {
    const source = 'Use the `fetchData` helper on the GPU with HttpClient and myValue.';
    const translated = '在 GPU 上使用 `fetchData` 辅助函数和 HttpClient。';

    expect(extractor.extract(source, translated)).toEqual([
      { source: 'fetchData', target: 'fetchData' },
      { source: 'GPU', target: 'GPU' },
      { source: 'HttpClient', target: 'HttpClient' },
    ]);
  });

  it('ignores fenced code', () => {
    const source = '```\nconst SECRET = 1;\n```\nPlain text.';

    expect(extractor.extract(source, 'SECRET 纯文本')).toEqual([]);
  });

  it('reports each term once', () => {
    expect(extractor.extract('The API and the API again.', 'API 和 API。')).toEqual([
      { source: 'API', target: 'API' },
    ]);
  });
});

describe('stripFencedCode', () => {
  it('drops fenced blocks and keeps the rest', () => {
    expect(stripFencedCode('before\n~~~\ncode\n~~~\nafter')).toBe('before\nafter');
  });

  it('needs a matching closing fence', () => {
    expect(stripFencedCode('````\n```\nstill code\n````\nafter')).toBe('after');
  });
});
