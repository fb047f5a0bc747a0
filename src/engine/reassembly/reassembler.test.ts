import { describe, it, expect } from 'vitest';
import { reassemble, verifyStructure, normalizeChunk } from './reassembler.js';
import { ReassemblyError } from '../errors.js';
import type { ChunkLayout, TranslationResult } from '../types/pipeline.js';

const LAYOUT: ChunkLayout = {
  leading: '',
  separators: ['\n\n'],
  trailing: '\n',
  chunkCount: 2,
  blockKinds: [['heading'], ['paragraph']],
};

function result(sequenceIndex: number, translatedText: string): TranslationResult {
  return { sequenceIndex, translatedText, updatedGlossaryEntries: [], attemptCount: 1, tokensUsed: 0 };
}

function reassemblyError(fn: () => unknown): ReassemblyError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ReassemblyError) return error;
    throw error;
  }
  throw new Error('expected a ReassemblyError');
}

describe('reassemble', () => {
  it('joins translations with the original separators', () => {
    const text = reassemble([result(0, '\n\n# 标题  \n'), result(1, '段落。')], LAYOUT);

    expect(text).toBe('# 标题\n\n段落。\n');
  });

  it('rejects duplicate chunks', () => {
    const error = reassemblyError(() => reassemble([result(0, 'a'), result(0, 'b')], LAYOUT));

    expect(error.sequenceIndex).toBe(0);
    expect(error.message).toBe('Duplicate translation for chunk 0');
  });

  it('rejects chunk indices outside the document', () => {
    const error = reassemblyError(() => reassemble([result(0, 'a'), result(5, 'b')], LAYOUT));

    expect(error.sequenceIndex).toBe(5);
  });

  it('rejects a missing chunk', () => {
    const error = reassemblyError(() => reassemble([result(0, 'a')], LAYOUT));

    expect(error.sequenceIndex).toBe(1);
    expect(error.message).toBe('Missing translation for chunk 1');
  });

  it('rejects chunks out of order', () => {
    const error = reassemblyError(() => reassemble([result(1, 'b'), result(0, 'a')], LAYOUT));

    expect(error.message).toBe('Translations out of order: chunk 1 at position 0');
  });

  it('returns the leading text for a document without chunks', () => {
    const layout: ChunkLayout = { leading: '\n\n', separators: [], trailing: '', chunkCount: 0, blockKinds: [] };

    expect(reassemble([], layout)).toBe('\n\n');
  });
});

describe('normalizeChunk', () => {
  it('keeps indentation on the first line', () => {
    expect(normalizeChunk('\n    code\n\n')).toBe('    code');
  });
});

describe('verifyStructure', () => {
  it('accepts matching block kinds', () => {
    expect(() => verifyStructure(LAYOUT.blockKinds, '# 标题\n\n段落。\n')).not.toThrow();
  });

  it('names the chunk of the first divergent block', () => {
    const error = reassemblyError(() => verifyStructure(LAYOUT.blockKinds, '标题\n\n段落。\n'));

    expect(error.message).toBe('Structure mismatch at block 0: expected heading, found paragraph');
    expect(error.sequenceIndex).toBe(0);
  });

  it('reports missing blocks at the end', () => {
    const error = reassemblyError(() => verifyStructure(LAYOUT.blockKinds, '# 标题\n'));

    expect(error.message).toBe('Structure mismatch at block 1: expected paragraph, found end of document');
    expect(error.sequenceIndex).toBe(1);
  });

  it('reports output that no longer parses', () => {
    const error = reassemblyError(() => verifyStructure([['code-fence']], '```\ncode\n'));

    expect(error.message).toContain('Translated document no longer parses');
  });
});
