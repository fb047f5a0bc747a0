/**
 * Reassembler - stitches chunk translations back into one document
 *
 * Chunks are joined with the original text that separated them in the source,
 * so blank lines between chunks survive whatever the model did at the edges.
 */

import { ParseError, ReassemblyError } from '../errors.js';
import type { BlockKind, ParsedDocument } from '../types/document.js';
import type { ChunkLayout, TranslationResult } from '../types/pipeline.js';
import { parseMarkdown } from '../parser/markdown-parser.js';

const LEADING_BLANK_LINES = /^(?:[ \t]*\r?\n)+/;

export function reassemble(results: readonly TranslationResult[], layout: ChunkLayout): string {
  assertComplete(results, layout.chunkCount);

  let text = layout.leading;
  results.forEach((result, i) => {
    if (i > 0) {
      text += layout.separators[i - 1] ?? '';
    }
    text += normalizeChunk(result.translatedText);
  });
  return text + layout.trailing;
}

export function normalizeChunk(text: string): string {
  return text.replace(LEADING_BLANK_LINES, '').trimEnd();
}

function assertComplete(results: readonly TranslationResult[], chunkCount: number): void {
  const seen = new Set<number>();
  for (const { sequenceIndex } of results) {
    if (seen.has(sequenceIndex)) {
      throw new ReassemblyError(`Duplicate translation for chunk ${sequenceIndex}`, sequenceIndex);
    }
    seen.add(sequenceIndex);
  }

  for (const { sequenceIndex } of results) {
    if (!Number.isInteger(sequenceIndex) || sequenceIndex < 0 || sequenceIndex >= chunkCount) {
      throw new ReassemblyError(
        `Chunk index ${sequenceIndex} is outside the document's ${chunkCount} chunks`,
        sequenceIndex
      );
    }
  }

  for (let i = 0; i < chunkCount; i++) {
    if (!seen.has(i)) {
      throw new ReassemblyError(`Missing translation for chunk ${i}`, i);
    }
  }

  results.forEach((result, i) => {
    if (result.sequenceIndex !== i) {
      throw new ReassemblyError(
        `Translations out of order: chunk ${result.sequenceIndex} at position ${i}`,
        result.sequenceIndex
      );
    }
  });
}

/**
 * Re-parse the reassembled text and compare its block kinds with the source,
 * chunk by chunk. `chunkKinds` is `ChunkLayout.blockKinds`.
 */
export function verifyStructure(
  chunkKinds: readonly (readonly BlockKind[])[],
  text: string,
  parse: (markdown: string) => ParsedDocument = parseMarkdown
): void {
  let document: ParsedDocument;
  try {
    document = parse(text);
  } catch (error) {
    if (error instanceof ParseError) {
      throw new ReassemblyError(`Translated document no longer parses: ${error.message}`);
    }
    throw error;
  }

  const expected = chunkKinds.flatMap((kinds, chunkIndex) =>
    kinds.map((kind) => ({ kind, chunkIndex }))
  );
  const actual = document.blocks.map((b) => b.kind);

  const length = Math.max(expected.length, actual.length);
  for (let i = 0; i < length; i++) {
    const want = expected[i];
    const got = actual[i];
    if (want?.kind === got) continue;

    const chunkIndex = want?.chunkIndex ?? expected[expected.length - 1]?.chunkIndex;
    throw new ReassemblyError(
      `Structure mismatch at block ${i}: expected ${want?.kind ?? 'end of document'}, found ${got ?? 'end of document'}`,
      chunkIndex
    );
  }
}
