/**
 * Translation pipeline types
 */

import type { Block, BlockKind } from './document.js';
import type { Glossary, GlossaryEntry } from './common.js';

export interface Chunk {
  /** Position among all chunks, 0-based, assigned once */
  readonly sequenceIndex: number;
  readonly blocks: readonly Block[];
  /** Index of the first block in the source block sequence */
  readonly startBlockIndex: number;
  readonly tokenEstimate: number;
  /** Text sent for translation: the blocks with the gaps between them */
  readonly text: string;
  /** True when a single block exceeds the budget on its own */
  readonly oversize: boolean;
}

export interface ChunkLayout {
  /** Text before the first chunk */
  readonly leading: string;
  /** separators[i] sits between chunk i and chunk i+1 */
  readonly separators: readonly string[];
  /** Text after the last chunk */
  readonly trailing: string;
  readonly chunkCount: number;
  /** Block kinds of each chunk, for diagnostics */
  readonly blockKinds: readonly (readonly BlockKind[])[];
}

export interface ContextState {
  /** Bounded running summary of the translated document so far */
  readonly summary: string;
  readonly glossary: Glossary;
  /** Last characters of the most recently translated chunk */
  readonly previousTail: string;
}

export interface TranslationResult {
  readonly sequenceIndex: number;
  readonly translatedText: string;
  /** Terms observed in this chunk (candidates; the context applies first-write-wins) */
  readonly updatedGlossaryEntries: readonly GlossaryEntry[];
  readonly attemptCount: number;
  readonly tokensUsed: number;
}

export interface TranslationRun {
  readonly results: TranslationResult[];
  readonly context: ContextState;
}

export type ChunkStatus = 'translating' | 'retrying' | 'success' | 'error';

export interface TranslationProgress {
  completed: number;
  total: number;
  currentChunkIndex: number;
  status: ChunkStatus;
  attempt: number;
}

export type TranslationProgressCallback = (progress: TranslationProgress) => void;
