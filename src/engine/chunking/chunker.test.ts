import { describe, it, expect, vi } from 'vitest';
import { chunkBlocks, chunkDocument } from './chunker.js';
import { estimateTokens } from './tokens.js';
import { createBlock } from '../types/document.js';
import { parseMarkdown } from '../parser/markdown-parser.js';
import { ChunkingError } from '../errors.js';

describe('estimateTokens', () => {
  it('counts about four Latin characters per token', () => {
    expect(estimateTokens('abcd')).toBe(1);
    expect(estimateTokens('abcde')).toBe(2);
    expect(estimateTokens('')).toBe(0);
  });

  it('counts one token per CJK character', () => {
    expect(estimateTokens('你好')).toBe(2);
    expect(estimateTokens('你好 ab')).toBe(3);
  });
});

describe('chunkBlocks', () => {
  it('gives an oversized code block its own chunk', () => {
    const code = '```\n' + 'x'.repeat(2392) + '\n```';
    const blocks = [
      createBlock('heading', '# Title', 1),
      createBlock('code-fence', code),
      createBlock('paragraph', 'Some text.'),
    ];

    const chunks = chunkBlocks(blocks, 500);

    expect(chunks).toHaveLength(3);
    expect(chunks.map((c) => c.blocks.map((b) => b.kind))).toEqual([
      ['heading'],
      ['code-fence'],
      ['paragraph'],
    ]);
    expect(chunks.map((c) => c.oversize)).toEqual([false, true, false]);
    expect(chunks[1]?.tokenEstimate).toBe(600);
  });

  it('packs blocks greedily up to the budget', () => {
    const blocks = ['aaaa', 'bbbb', 'cccc', 'dddd', 'eeee'].map((t) => createBlock('paragraph', t));

    const chunks = chunkBlocks(blocks, 2);

    expect(chunks.map((c) => c.text)).toEqual(['aaaa\n\nbbbb', 'cccc\n\ndddd', 'eeee']);
    expect(chunks.map((c) => c.sequenceIndex)).toEqual([0, 1, 2]);
  });

  it('moves the preceding block forward instead of opening a chunk on a break', () => {
    const blocks = [
      createBlock('paragraph', 'aaaa'),
      createBlock('paragraph', 'b'.repeat(16)),
      createBlock('thematic-break', '---'),
      createBlock('paragraph', 'cccc'),
    ];

    const chunks = chunkBlocks(blocks, 5);

    expect(chunks.map((c) => c.blocks.map((b) => b.kind))).toEqual([
      ['paragraph'],
      ['paragraph', 'thematic-break'],
      ['paragraph'],
    ]);
    expect(chunks.map((c) => c.tokenEstimate)).toEqual([1, 5, 1]);
    expect(chunks[1]?.text).toBe('b'.repeat(16) + '\n\n---');
  });

  it('opens a chunk on a break when the chunk before holds a single block', () => {
    const blocks = [
      createBlock('paragraph', 'a'.repeat(20)),
      createBlock('thematic-break', '---'),
      createBlock('paragraph', 'b'.repeat(20)),
    ];

    const chunks = chunkBlocks(blocks, 5);

    expect(chunks.map((c) => c.blocks.map((b) => b.kind))).toEqual([
      ['paragraph'],
      ['thematic-break'],
      ['paragraph'],
    ]);
    expect(chunks.map((c) => c.oversize)).toEqual([false, false, false]);
  });

  it('stays within the budget unless a single block exceeds it', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const texts = ['# Intro', 'x'.repeat(18), '---', 'y'.repeat(9), 'z'.repeat(30), '***', 'w'.repeat(7), '---'];
    const blocks = texts.map((t) =>
      t === '---' || t === '***' ? createBlock('thematic-break', t) : createBlock('paragraph', t)
    );

    for (const budget of [3, 4, 5, 6, 8, 10, 12]) {
      const chunks = chunkBlocks(blocks, budget);
      expect(chunks.flatMap((c) => c.blocks)).toEqual(blocks);
      for (const chunk of chunks) {
        if (chunk.oversize) {
          expect(chunk.blocks).toHaveLength(1);
        } else {
          expect(chunk.tokenEstimate).toBeLessThanOrEqual(budget);
        }
      }
    }
    warn.mockRestore();
  });

  it('warns about an oversized block that could be split', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const chunks = chunkBlocks([createBlock('paragraph', 'p'.repeat(100))], 10);

    expect(chunks).toHaveLength(1);
    expect(chunks[0]?.oversize).toBe(true);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it('rejects budgets below the smallest atomic block', () => {
    expect(() => chunkBlocks([], 1)).toThrow(ChunkingError);
    expect(() => chunkBlocks([], 0)).toThrow(ChunkingError);
    expect(() => chunkBlocks([], 2.5)).toThrow(ChunkingError);
    expect(chunkBlocks([], 2)).toEqual([]);
  });
});

describe('chunkDocument', () => {
  const source = '# Guide\n\nFirst paragraph here.\n\n\nSecond paragraph here.\n\n- item\n';

  it('covers every block exactly once, in order', () => {
    const document = parseMarkdown(source);

    const { chunks } = chunkDocument(document, 8);
    const covered = chunks.flatMap((c) => c.blocks);

    expect(covered).toEqual(document.blocks);
    chunks.forEach((chunk, i) => {
      expect(chunk.sequenceIndex).toBe(i);
    });
  });

  it('records the text between chunks so the source can be rebuilt', () => {
    const document = parseMarkdown(source);

    const { chunks, layout } = chunkDocument(document, 8);

    let rebuilt = layout.leading;
    chunks.forEach((chunk, i) => {
      if (i > 0) rebuilt += layout.separators[i - 1];
      rebuilt += chunk.text;
    });
    rebuilt += layout.trailing;

    expect(rebuilt).toBe(source);
    expect(layout.chunkCount).toBe(chunks.length);
    expect(layout.separators).toContain('\n\n\n');
  });

  it('keeps the original gaps inside a chunk', () => {
    const document = parseMarkdown(source);

    const { chunks } = chunkDocument(document, 1000);

    expect(chunks).toHaveLength(1);
    expect(chunks[0]?.text).toBe(source.trimEnd());
  });

  it('puts a blank document in the leading text', () => {
    const { chunks, layout } = chunkDocument(parseMarkdown('\n\n'), 10);

    expect(chunks).toEqual([]);
    expect(layout.leading).toBe('\n\n');
    expect(layout.trailing).toBe('');
  });
});
