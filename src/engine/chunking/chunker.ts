/**
 * Chunker - partitions a block sequence into budget-bounded translation units
 *
 * - Blocks are never split; chunk boundaries fall between blocks only
 * - An oversized block occupies a chunk by itself (tolerated for atomic blocks)
 * - A blank line or thematic break that does not fit takes the block before it into the
 *   next chunk; it opens a chunk alone only when that block cannot come along
 */

import { ChunkingError } from '../errors.js';
import type { Block, BlockKind, ParsedDocument } from '../types/document.js';
import type { Chunk, ChunkLayout } from '../types/pipeline.js';
import { estimateTokens, type TokenEstimator } from './tokens.js';

export interface ChunkerOptions {
  estimateTokens?: TokenEstimator;
}

export interface ChunkedDocument {
  chunks: Chunk[];
  layout: ChunkLayout;
}

/** The smallest atomic block there is: an empty code fence */
export const SMALLEST_ATOMIC_BLOCK = '```\n```';

const BLOCK_SEPARATOR = '\n\n';

const TRAILING_KINDS: ReadonlySet<BlockKind> = new Set<BlockKind>(['blank', 'thematic-break']);

/**
 * Chunk a bare block sequence. Blocks inside a chunk are joined with a blank line.
 */
export function chunkBlocks(
  blocks: readonly Block[],
  maxTokens: number,
  options: ChunkerOptions = {}
): Chunk[] {
  const gaps = ['', ...blocks.slice(1).map(() => BLOCK_SEPARATOR), ''];
  return chunkDocument({ blocks, gaps }, maxTokens, options).chunks;
}

/**
 * Chunk a parsed document, keeping its own inter-block text inside each chunk
 * and recording the text between chunks for reassembly.
 */
export function chunkDocument(
  document: ParsedDocument,
  maxTokens: number,
  options: ChunkerOptions = {}
): ChunkedDocument {
  const estimate = options.estimateTokens ?? estimateTokens;
  assertBudget(maxTokens, estimate);

  const { blocks } = document;
  const ranges: { start: number; end: number; tokens: number; oversize: boolean }[] = [];

  let start = 0;
  let count = 0;
  let tokens = 0;
  let lastCost = 0;

  const close = (oversize = false) => {
    if (count > 0) {
      ranges.push({ start, end: start + count, tokens, oversize });
    }
    start += count;
    count = 0;
    tokens = 0;
  };

  blocks.forEach((block, index) => {
    const cost = estimate(block.rawText);

    if (cost > maxTokens) {
      close();
      if (!block.atomic) {
        console.warn(
          `[Chunker] ⚠️ Block #${index} (${block.kind}, ~${cost} tokens) exceeds the budget of ${maxTokens} and cannot be split`
        );
      }
      count = 1;
      tokens = cost;
      close(true);
      return;
    }

    if (tokens + cost <= maxTokens) {
      count++;
      tokens += cost;
      lastCost = cost;
      return;
    }

    // Move the previous block forward so the next chunk does not open on a break
    if (TRAILING_KINDS.has(block.kind) && count > 1 && lastCost + cost <= maxTokens) {
      count--;
      tokens -= lastCost;
      close();
      count = 2;
      tokens = lastCost + cost;
      lastCost = cost;
      return;
    }

    close();
    count = 1;
    tokens = cost;
    lastCost = cost;
  });
  close();

  const chunks = ranges.map((range, sequenceIndex): Chunk => {
    const members = blocks.slice(range.start, range.end);
    return Object.freeze({
      sequenceIndex,
      blocks: members,
      startBlockIndex: range.start,
      tokenEstimate: range.tokens,
      text: joinBlocks(document, range.start, range.end),
      oversize: range.oversize,
    });
  });

  return { chunks, layout: describeLayout(document, chunks) };
}

/**
 * Text between chunks: the document gap at each chunk boundary.
 */
export function describeLayout(document: ParsedDocument, chunks: readonly Chunk[]): ChunkLayout {
  const { gaps } = document;
  const blockCount = document.blocks.length;

  if (chunks.length === 0) {
    return {
      leading: gaps.join(''),
      separators: [],
      trailing: '',
      chunkCount: 0,
      blockKinds: [],
    };
  }

  return {
    leading: gaps[0] ?? '',
    separators: chunks.slice(1).map((chunk) => gaps[chunk.startBlockIndex] ?? ''),
    trailing: gaps[blockCount] ?? '',
    chunkCount: chunks.length,
    blockKinds: chunks.map((chunk) => chunk.blocks.map((b) => b.kind)),
  };
}

function joinBlocks(document: ParsedDocument, start: number, end: number): string {
  let text = '';
  for (let i = start; i < end; i++) {
    if (i > start) {
      text += document.gaps[i] ?? '';
    }
    text += document.blocks[i]?.rawText ?? '';
  }
  return text;
}

function assertBudget(maxTokens: number, estimate: TokenEstimator): void {
  if (!Number.isInteger(maxTokens) || maxTokens <= 0) {
    throw new ChunkingError(`maxTokens must be a positive integer, got ${maxTokens}`);
  }
  const minimum = estimate(SMALLEST_ATOMIC_BLOCK);
  if (maxTokens < minimum) {
    throw new ChunkingError(
      `maxTokens (${maxTokens}) is smaller than the smallest atomic block (~${minimum} tokens)`
    );
  }
}
